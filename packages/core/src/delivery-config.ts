import { promises as fs } from 'fs';
import { ConfigurationError, errorMessage, isRecord } from '@meshack/shared';
import type {
  DeliveryConfig,
  NodeConfigValue,
  StatsStorageType,
  ValidationResult,
} from './types.js';
import { NodeDirectory } from './node-directory.js';
import {
  DEFAULT_CONFIRMATION_TEMPLATE,
  DEFAULT_MESSAGE_TEMPLATE,
} from './message-template.js';

const DEFAULT_CONFIG: DeliveryConfig = {
  nodes: {},
  channelIndex: 0,
  ackRetryTimeoutSeconds: 60,
  maxRetries: 1,
  confirmationsEnabled: true,
  confirmationDelaySeconds: 5,
  confirmationTemplate: DEFAULT_CONFIRMATION_TEMPLATE,
  statsAutosaveEvery: 10,
  statsStorage: 'json',
  statsPath: 'snr_stats.json',
  retentionSeconds: 600,
  orphanEventWindowSeconds: 10,
  updateIntervalSeconds: 60,
  tickIntervalSeconds: 1,
  messageTemplate: DEFAULT_MESSAGE_TEMPLATE,
};

const STATS_STORAGE_TYPES: readonly StatsStorageType[] = ['json', 'leveldb'];

// Meshtastic radios expose channel slots 0-7
const MAX_CHANNEL_INDEX = 7;

/**
 * DeliveryConfigFactory - builds and checks engine configuration
 */
export class DeliveryConfigFactory {
  /**
   * Default configuration with the given overrides applied
   */
  static createDefault(overrides: Partial<DeliveryConfig> = {}): DeliveryConfig {
    return {
      ...DEFAULT_CONFIG,
      nodes: { ...DEFAULT_CONFIG.nodes },
      ...overrides,
    };
  }

  /**
   * Reads configuration from an untyped object (parsed JSON). Missing keys
   * take their defaults; keys of the wrong type are reported together.
   */
  static fromObject(raw: unknown): DeliveryConfig {
    if (!isRecord(raw)) {
      throw new ConfigurationError('Configuration must be an object');
    }

    const errors: string[] = [];
    const reader = new FieldReader(raw, errors);
    const config = this.createDefault({
      localNodeName: reader.optionalString('localNodeName'),
      selectedNode: reader.optionalString('selectedNode'),
      nodes: readNodes(raw.nodes, errors),
      channelIndex: reader.number('channelIndex', DEFAULT_CONFIG.channelIndex),
      ackRetryTimeoutSeconds: reader.number(
        'ackRetryTimeoutSeconds',
        DEFAULT_CONFIG.ackRetryTimeoutSeconds
      ),
      maxRetries: readMaxRetries(raw.maxRetries, errors),
      confirmationsEnabled: reader.boolean(
        'confirmationsEnabled',
        DEFAULT_CONFIG.confirmationsEnabled
      ),
      confirmationDelaySeconds: reader.number(
        'confirmationDelaySeconds',
        DEFAULT_CONFIG.confirmationDelaySeconds
      ),
      confirmationTemplate: reader.string(
        'confirmationTemplate',
        DEFAULT_CONFIG.confirmationTemplate
      ),
      statsAutosaveEvery: reader.number(
        'statsAutosaveEvery',
        DEFAULT_CONFIG.statsAutosaveEvery
      ),
      statsStorage: readStatsStorage(raw.statsStorage, errors),
      statsPath: reader.string('statsPath', DEFAULT_CONFIG.statsPath),
      retentionSeconds: reader.number(
        'retentionSeconds',
        DEFAULT_CONFIG.retentionSeconds
      ),
      orphanEventWindowSeconds: reader.number(
        'orphanEventWindowSeconds',
        DEFAULT_CONFIG.orphanEventWindowSeconds
      ),
      updateIntervalSeconds: reader.number(
        'updateIntervalSeconds',
        DEFAULT_CONFIG.updateIntervalSeconds
      ),
      tickIntervalSeconds: reader.number(
        'tickIntervalSeconds',
        DEFAULT_CONFIG.tickIntervalSeconds
      ),
      messageTemplate: reader.string(
        'messageTemplate',
        DEFAULT_CONFIG.messageTemplate
      ),
    });

    const validation = this.validateConfig(config);
    errors.push(...validation.errors);
    if (errors.length > 0) {
      throw new ConfigurationError(
        `Invalid configuration: ${errors.join('; ')}`
      );
    }
    return config;
  }

  /**
   * Loads a JSON configuration file
   */
  static async fromFile(path: string): Promise<DeliveryConfig> {
    let text: string;
    try {
      text = await fs.readFile(path, 'utf8');
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read configuration file ${path}: ${errorMessage(error)}`
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ConfigurationError(
        `Configuration file ${path} is not valid JSON: ${errorMessage(error)}`
      );
    }
    return this.fromObject(raw);
  }

  /**
   * Validates a delivery configuration
   */
  static validateConfig(config: DeliveryConfig): ValidationResult {
    const errors: string[] = [];

    if (
      !Number.isInteger(config.channelIndex) ||
      config.channelIndex < 0 ||
      config.channelIndex > MAX_CHANNEL_INDEX
    ) {
      errors.push(`Channel index must be an integer from 0 to ${MAX_CHANNEL_INDEX}`);
    }

    // Timing
    if (!(config.ackRetryTimeoutSeconds > 0)) {
      errors.push('Ack retry timeout must be positive');
    }
    if (
      config.maxRetries !== Infinity &&
      (!Number.isInteger(config.maxRetries) || config.maxRetries < 0)
    ) {
      errors.push('Max retries must be a non-negative integer');
    }
    if (!(config.confirmationDelaySeconds >= 0)) {
      errors.push('Confirmation delay cannot be negative');
    }
    if (!(config.retentionSeconds >= config.ackRetryTimeoutSeconds)) {
      errors.push('Retention must be at least the ack retry timeout');
    } else if (
      config.confirmationsEnabled &&
      config.retentionSeconds <
        config.ackRetryTimeoutSeconds + config.confirmationDelaySeconds
    ) {
      // a real ack can land just before the timeout; its confirmation is due later
      errors.push(
        'Retention must cover the ack retry timeout plus the confirmation delay'
      );
    }
    if (!(config.orphanEventWindowSeconds >= 0)) {
      errors.push('Orphan event window cannot be negative');
    }
    if (!(config.updateIntervalSeconds > 0)) {
      errors.push('Update interval must be positive');
    }
    if (!(config.tickIntervalSeconds > 0)) {
      errors.push('Tick interval must be positive');
    }

    // Statistics
    if (
      !Number.isInteger(config.statsAutosaveEvery) ||
      config.statsAutosaveEvery < 0
    ) {
      errors.push('Stats autosave interval must be a non-negative integer');
    }
    if (!STATS_STORAGE_TYPES.includes(config.statsStorage)) {
      errors.push(`Unknown stats storage: ${config.statsStorage}`);
    }
    if (!config.statsPath) errors.push('Stats path is required');

    if (!config.messageTemplate) errors.push('Message template is required');

    // Nodes
    try {
      const directory = NodeDirectory.fromConfig(config.nodes);
      if (config.selectedNode && !directory.has(config.selectedNode)) {
        errors.push(`Selected node is not configured: ${config.selectedNode}`);
      }
      if (config.localNodeName && !directory.has(config.localNodeName)) {
        errors.push(`Local node is not configured: ${config.localNodeName}`);
      }
    } catch (error) {
      errors.push(errorMessage(error));
    }

    return { valid: errors.length === 0, errors };
  }
}

class FieldReader {
  constructor(
    private raw: Record<string, unknown>,
    private errors: string[]
  ) {}

  number(key: string, fallback: number): number {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || Number.isNaN(value)) {
      this.errors.push(`${key} must be a number`);
      return fallback;
    }
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
      this.errors.push(`${key} must be a boolean`);
      return fallback;
    }
    return value;
  }

  string(key: string, fallback: string): string {
    return this.optionalString(key) ?? fallback;
  }

  optionalString(key: string): string | undefined {
    const value = this.raw[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
      this.errors.push(`${key} must be a string`);
      return undefined;
    }
    return value;
  }
}

function readNodes(
  value: unknown,
  errors: string[]
): Record<string, NodeConfigValue> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    errors.push('nodes must map node names to ids');
    return {};
  }

  const nodes: Record<string, NodeConfigValue> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry === 'number' || typeof entry === 'string') {
      nodes[name] = entry;
    } else if (
      isRecord(entry) &&
      (typeof entry.id === 'number' || typeof entry.id === 'string') &&
      (entry.publicKey === undefined || typeof entry.publicKey === 'string')
    ) {
      nodes[name] = { id: entry.id, publicKey: entry.publicKey };
    } else {
      errors.push(`Node ${name} must be an id or {id, publicKey}`);
    }
  }
  return nodes;
}

// JSON has no Infinity, so "unlimited" stands in for it
function readMaxRetries(value: unknown, errors: string[]): number {
  if (value === undefined) return DEFAULT_CONFIG.maxRetries;
  if (value === 'unlimited') return Infinity;
  if (typeof value !== 'number') {
    errors.push('maxRetries must be a number or "unlimited"');
    return DEFAULT_CONFIG.maxRetries;
  }
  return value;
}

function readStatsStorage(value: unknown, errors: string[]): StatsStorageType {
  if (value === undefined) return DEFAULT_CONFIG.statsStorage;
  const match = STATS_STORAGE_TYPES.find(type => type === value);
  if (!match) {
    errors.push(`statsStorage must be one of ${STATS_STORAGE_TYPES.join(', ')}`);
    return DEFAULT_CONFIG.statsStorage;
  }
  return match;
}
