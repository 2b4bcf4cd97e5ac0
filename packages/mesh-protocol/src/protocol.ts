import {
  TransportError,
  type DeliveryEventListener,
  type EncryptionMode,
  type MeshTransport,
  type NodeSignal,
  type RoutingErrorCode,
} from '@meshack/core';
import { Logger, errorMessage, formatNodeId } from '@meshack/shared';

export interface SimulatedMeshConfig {
  localNodeId?: number;
  /** Packet id handed out by the first send. */
  firstPacketId?: number;
  /**
   * Acknowledge every send on the next macrotask: first the local radio's
   * implicit ack, then the destination's ack at its table SNR.
   */
  autoAck?: boolean;
  maxPayloadBytes?: number;
}

export interface SentPacket {
  packetId: number;
  nodeId: number;
  payload: string;
  channel: number;
  encryptionMode: EncryptionMode;
  sentAt: number;
}

export interface SimulatedDelivery {
  requestId: number;
  from: number;
  errorCode?: RoutingErrorCode;
  snr?: number;
}

// Largest text payload a Meshtastic packet carries
const DEFAULT_MAX_PAYLOAD_BYTES = 228;

/**
 * In-process mesh radio. Sends are recorded instead of transmitted and
 * delivery events are raised on demand (or automatically with `autoAck`).
 */
export class SimulatedMeshTransport implements MeshTransport {
  private logger = Logger.getInstance();
  private config: Required<Omit<SimulatedMeshConfig, 'localNodeId'>>;
  private localNodeId: number | undefined;
  private nextPacketId: number;
  private isConnected = false;
  private peers: Map<number, NodeSignal> = new Map();
  private listeners: Set<DeliveryEventListener> = new Set();
  private sent: SentPacket[] = [];
  private scriptedFailures: string[] = [];
  private timers: Set<NodeJS.Timeout> = new Set();

  constructor(config: SimulatedMeshConfig = {}) {
    this.localNodeId = config.localNodeId;
    this.config = {
      firstPacketId: config.firstPacketId ?? 1,
      autoAck: config.autoAck ?? false,
      maxPayloadBytes: config.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES,
    };
    this.nextPacketId = this.config.firstPacketId;
  }

  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }
    this.isConnected = true;
    this.logger.info('Connected to simulated mesh', {
      localNodeId:
        this.localNodeId === undefined
          ? undefined
          : formatNodeId(this.localNodeId),
      peers: this.peers.size,
    });
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }
    this.isConnected = false;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.logger.info('Disconnected from simulated mesh');
  }

  isConnectedToMesh(): boolean {
    return this.isConnected;
  }

  getLocalNodeId(): number | undefined {
    return this.localNodeId;
  }

  setLocalNodeId(nodeId: number | undefined): void {
    this.localNodeId = nodeId;
  }

  setPeer(signal: NodeSignal): void {
    this.peers.set(signal.nodeId, { ...signal });
  }

  removePeer(nodeId: number): boolean {
    return this.peers.delete(nodeId);
  }

  getNodeSignal(nodeId: number): NodeSignal | undefined {
    const signal = this.peers.get(nodeId);
    return signal ? { ...signal } : undefined;
  }

  listNodeSignals(): NodeSignal[] {
    return Array.from(this.peers.values(), signal => ({ ...signal }));
  }

  /** The next `count` sends reject with a TransportError. */
  failNextSends(count: number, reason = 'Radio unavailable'): void {
    for (let i = 0; i < count; i++) {
      this.scriptedFailures.push(reason);
    }
  }

  async sendMessage(
    nodeId: number,
    payload: string,
    channel: number,
    encryptionMode: EncryptionMode
  ): Promise<number> {
    if (!this.isConnected) {
      throw new TransportError('Not connected to mesh network');
    }

    const scripted = this.scriptedFailures.shift();
    if (scripted !== undefined) {
      throw new TransportError(scripted);
    }

    const size = new TextEncoder().encode(payload).length;
    if (size > this.config.maxPayloadBytes) {
      throw new TransportError(
        `Payload of ${size} bytes exceeds ${this.config.maxPayloadBytes}`
      );
    }

    const packetId = this.nextPacketId++;
    this.sent.push({
      packetId,
      nodeId,
      payload,
      channel,
      encryptionMode,
      sentAt: Date.now(),
    });

    this.logger.debug('Simulated packet sent', {
      packetId,
      to: formatNodeId(nodeId),
      channel,
      encryptionMode,
      size,
    });

    if (this.config.autoAck) {
      this.scheduleAcks(packetId, nodeId);
    }
    return packetId;
  }

  onDeliveryEvent(listener: DeliveryEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Raises a routing event the way the radio reports it. */
  emitDelivery(delivery: SimulatedDelivery): void {
    this.emitRaw({
      from: delivery.from,
      rxSnr: delivery.snr,
      decoded: {
        requestId: delivery.requestId,
        routing: { errorReason: delivery.errorCode ?? 'NONE' },
      },
    });
  }

  emitRaw(raw: unknown): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(raw);
      } catch (error) {
        this.logger.error('Delivery listener threw', {
          error: errorMessage(error),
        });
      }
    }
  }

  getSentPackets(): SentPacket[] {
    return this.sent.map(packet => ({ ...packet }));
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  private scheduleAcks(packetId: number, nodeId: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      const localNodeId = this.localNodeId;
      if (localNodeId !== undefined) {
        this.emitDelivery({ requestId: packetId, from: localNodeId });
      }
      this.emitDelivery({
        requestId: packetId,
        from: nodeId,
        snr: this.peers.get(nodeId)?.snr,
      });
    }, 0);
    this.timers.add(timer);
  }
}
