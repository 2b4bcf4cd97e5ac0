export * from './types.js';
export * from './errors.js';

// Nodes and routing codes
export { NodeDirectory, parseNodeId } from './node-directory.js';
export {
  ROUTING_ERROR_NAMES,
  routingErrorName,
  isRoutingFailure,
} from './routing-errors.js';

// Acknowledgment tracking
export {
  PendingMessageRegistry,
  isOpenState,
} from './pending-message-registry.js';
export {
  AckEventHandler,
  parseDeliveryEvent,
  type AckEventHandlerOptions,
  type SnrSampleSink,
  type ConfirmationSink,
} from './ack-event-handler.js';
export {
  RetrySweeper,
  type RetryCandidate,
  type RetrySweeperOptions,
} from './retry-sweeper.js';
export { ConfirmationScheduler } from './confirmation-scheduler.js';

// SNR statistics
export { RingBuffer } from './ring-buffer.js';
export { SnrStatsStore, type SnrStatsStoreOptions } from './snr-stats-store.js';
export {
  JsonFileStatsStorage,
  LevelStatsStorage,
  MemoryStatsStorage,
  RECENT_SAMPLE_CAPACITY,
  STATS_FILE_VERSION,
  isSnrRecord,
  parseSnrRecords,
} from './stats-storage.js';
export { formatSnrReport, type SnrSummarySource } from './snr-report.js';

// Engine
export {
  DeliveryEngine,
  createDeliveryEngine,
  type CreateDeliveryEngineOptions,
  type DeliveryEngineComponents,
  type RetryNotice,
  type RetryReason,
  type TickSummary,
} from './delivery-engine.js';

// Configuration and templates
export { DeliveryConfigFactory } from './delivery-config.js';
export {
  DEFAULT_CONFIRMATION_TEMPLATE,
  DEFAULT_MESSAGE_TEMPLATE,
  formatSnr,
  renderTemplate,
  type TemplateValue,
} from './message-template.js';
export {
  logDeliveryEvent,
  traceFor,
  type DeliveryLogEvent,
  type DeliveryLogEventType,
} from './event-log.js';
