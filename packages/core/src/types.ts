/**
 * Core types for the delivery acknowledgment engine
 *
 * All timestamps are epoch milliseconds. Durations read from configuration are
 * expressed in seconds and converted where they are consumed.
 */

// ==========================================
// NODES
// ==========================================

export interface MeshNode {
  name: string;
  id: number;
  publicKey?: Uint8Array;
}

// ==========================================
// PENDING MESSAGES
// ==========================================

export type MessageState =
  | 'sent'
  | 'implicit_ack'
  | 'real_ack'
  | 'nak'
  | 'timed_out'
  | 'confirmation_sent';

export type AckOutcome = 'implicit_ack' | 'real_ack' | 'nak';

export interface PendingMessage {
  messageId: number;
  nodeName: string;
  nodeId: number;
  payload: string;
  sentAt: number;
  snrAtSend?: number;
  state: MessageState;
  ackedAt?: number;
  ackSnr?: number;
  nakReason?: string;
  retryCount: number;
}

export interface RegisterRequest {
  messageId: number;
  nodeName: string;
  nodeId: number;
  payload: string;
  sentAt: number;
  snrAtSend?: number;
  retryCount?: number;
}

export type ResolveStatus = 'applied' | 'already_resolved' | 'duplicate';

export interface ResolveResult {
  status: ResolveStatus;
  previousState: MessageState;
  entry: PendingMessage;
}

// ==========================================
// DELIVERY EVENTS
// ==========================================

export type RoutingErrorCode = number | string;

export interface DeliveryEvent {
  requestId: number;
  fromNodeId: number;
  errorCode: RoutingErrorCode;
  snr?: number;
  receivedAt?: number;
}

export type DeliveryEventListener = (raw: unknown) => void;

// ==========================================
// TRANSPORT
// ==========================================

export type EncryptionMode = 'pki' | 'channel';

export interface NodeSignal {
  nodeId: number;
  snr?: number;
  hopsAway?: number;
  /** Epoch milliseconds of the last packet heard from the node. */
  lastHeard?: number;
}

/**
 * Capability consumed from the radio layer.
 *
 * `onDeliveryEvent` may invoke its listener at any time, any number of times
 * per request id; the returned function unsubscribes.
 */
export interface MeshTransport {
  getLocalNodeId(): number | undefined;
  sendMessage(
    nodeId: number,
    payload: string,
    channel: number,
    encryptionMode: EncryptionMode
  ): Promise<number>;
  onDeliveryEvent(listener: DeliveryEventListener): () => void;
  getNodeSignal?(nodeId: number): NodeSignal | undefined;
  listNodeSignals?(): NodeSignal[];
}

// ==========================================
// RETRIES
// ==========================================

export type SweepAction = 'retry' | 'give_up';

export interface SweepDecision {
  action: SweepAction;
  entry: PendingMessage;
}

// ==========================================
// SNR STATISTICS
// ==========================================

export interface SnrRecord {
  minSnr: number;
  maxSnr: number;
  sum: number;
  count: number;
  firstSeen: number;
  lastSeen: number;
  recent: number[];
}

export interface SnrSummary extends SnrRecord {
  nodeName: string;
  average: number;
}

export type SnrRecordMap = Record<string, SnrRecord>;

export interface SnrStatsStorage {
  readonly description: string;
  load(): Promise<SnrRecordMap>;
  save(records: SnrRecordMap): Promise<void>;
  close(): Promise<void>;
}

export interface ResetConfirmation {
  confirmed: boolean;
  reconfirmed: boolean;
}

// ==========================================
// CONFIRMATIONS
// ==========================================

export interface ScheduledConfirmation {
  messageId: number;
  nodeName: string;
  ackedAt: number;
  snr?: number;
  dueAt: number;
}

export interface ConfirmationDue {
  messageId: number;
  nodeName: string;
  payload: string;
}

// ==========================================
// STATUS SURFACE
// ==========================================

export type DeliveryOutcome =
  | 'pending'
  | 'implicit_ack'
  | 'delivered'
  | 'confirmed'
  | 'failed'
  | 'timed_out'
  | 'send_failed';

export interface DeliveryStatus {
  messageId?: number;
  nodeName: string;
  sentAt: number;
  ackedAt?: number;
  snr?: number;
  outcome: DeliveryOutcome;
  retryCount: number;
  reason?: string;
}

export interface DeliveryMetrics {
  messagesSent: number;
  messagesDelivered: number;
  implicitAcks: number;
  messagesRetried: number;
  messagesFailed: number;
  naks: number;
  timeouts: number;
  confirmationsSent: number;
  confirmationFailures: number;
  currentPendingCount: number;
}

// ==========================================
// CONFIGURATION
// ==========================================

export type NodeConfigValue =
  | number
  | string
  | { id: number | string; publicKey?: string };

export type StatsStorageType = 'json' | 'leveldb';

export interface DeliveryConfig {
  localNodeName?: string;
  selectedNode?: string;
  nodes: Record<string, NodeConfigValue>;
  channelIndex: number;
  ackRetryTimeoutSeconds: number;
  maxRetries: number;
  confirmationsEnabled: boolean;
  confirmationDelaySeconds: number;
  confirmationTemplate: string;
  statsAutosaveEvery: number;
  statsStorage: StatsStorageType;
  statsPath: string;
  retentionSeconds: number;
  orphanEventWindowSeconds: number;
  updateIntervalSeconds: number;
  tickIntervalSeconds: number;
  messageTemplate: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}
