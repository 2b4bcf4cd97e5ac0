import {
  formatSnr,
  renderTemplate,
  type DeliveryConfig,
  type DeliveryEngine,
  type MeshNode,
  type MeshTransport,
} from '@meshack/core';
import { Logger, errorMessage } from '@meshack/shared';

export interface TelemetryReading {
  temperatureC: number;
  humidity: number;
}

/**
 * Sensor access supplied by the host. Resolves undefined when the sensor
 * could not be read this cycle.
 */
export interface TelemetrySource {
  read(): Promise<TelemetryReading | undefined>;
}

export interface TelemetryStationOptions {
  config: DeliveryConfig;
  engine: DeliveryEngine;
  transport: MeshTransport;
  source: TelemetrySource;
  clock?: () => number;
}

export interface NodeCounts {
  online: number;
  total: number;
}

// Nodes heard within this window count as online
export const ONLINE_WINDOW_MS = 15 * 60 * 1000;

export class TelemetryStation {
  private config: DeliveryConfig;
  private engine: DeliveryEngine;
  private transport: MeshTransport;
  private source: TelemetrySource;
  private clock: () => number;
  private logger = Logger.getInstance();

  private isRunning = false;
  private interval: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | undefined;
  private lastReportAt: number | undefined;
  private lastReading: TelemetryReading | undefined;

  constructor(options: TelemetryStationOptions) {
    this.config = options.config;
    this.engine = options.engine;
    this.transport = options.transport;
    this.source = options.source;
    this.clock = options.clock ?? Date.now;
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Station is already running');
    }

    await this.engine.initialize();
    this.isRunning = true;
    this.logger.info('Starting telemetry station', {
      updateIntervalSeconds: this.config.updateIntervalSeconds,
      tickIntervalSeconds: this.config.tickIntervalSeconds,
    });

    this.interval = setInterval(() => {
      this.runTick();
    }, this.config.tickIntervalSeconds * 1000);
    this.runTick();
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    clearInterval(this.interval);
    this.interval = undefined;
    await this.inFlight;

    this.logger.info('Stopping telemetry station');
    await this.engine.shutdown();
  }

  getIsRunning(): boolean {
    return this.isRunning;
  }

  /**
   * One loop iteration: engine housekeeping, then a telemetry report when
   * the update interval has elapsed.
   */
  async tick(now: number = this.clock()): Promise<number[]> {
    await this.engine.onTick(now);

    if (
      this.lastReportAt !== undefined &&
      now - this.lastReportAt < this.config.updateIntervalSeconds * 1000
    ) {
      return [];
    }
    this.lastReportAt = now;
    return this.report(now);
  }

  /**
   * Reads the sensor and sends one message per recipient. Returns the ids of
   * the messages the transport accepted.
   */
  async report(now: number = this.clock()): Promise<number[]> {
    const reading = await this.readSensor();
    if (!reading) {
      if (this.lastReading) {
        this.logger.warn('Sensor read failed, skipping send', {
          lastTemperatureF: toFahrenheit(this.lastReading.temperatureC),
          lastHumidity: this.lastReading.humidity,
        });
      } else {
        this.logger.warn('No sensor data available yet');
      }
      return [];
    }
    this.lastReading = reading;

    const recipients = this.engine
      .getDirectory()
      .recipientsFor(this.transport.getLocalNodeId(), this.config.selectedNode);
    if (recipients.length === 0) {
      this.logger.warn('No recipients configured');
      return [];
    }

    const sent: number[] = [];
    for (const recipient of recipients) {
      const message = this.renderMessage(reading, recipient, now);
      try {
        sent.push(await this.engine.send(recipient.name, message));
      } catch (error) {
        this.logger.error('Telemetry send failed', {
          nodeName: recipient.name,
          error: errorMessage(error),
        });
      }
    }

    if (sent.length > 0) {
      this.logger.info('Telemetry sent', {
        recipients: recipients.map(node => node.name),
        accepted: sent.length,
      });
    }
    return sent;
  }

  renderMessage(
    reading: TelemetryReading,
    recipient: MeshNode,
    now: number = this.clock()
  ): string {
    const signal = this.transport.getNodeSignal?.(recipient.id);
    const hasSignal =
      signal?.snr !== undefined && signal.hopsAway !== undefined;
    const { online, total } = this.countNodes(now);
    const date = new Date(now);

    return renderTemplate(this.config.messageTemplate, {
      date: `${pad(date.getMonth() + 1)}/${pad(date.getDate())}`,
      time: `${pad(date.getHours())}:${pad(date.getMinutes())}`,
      time_detail: `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`,
      online,
      total,
      temp: Math.trunc(toFahrenheit(reading.temperatureC)),
      humidity: Math.trunc(reading.humidity),
      snr: hasSignal ? formatSnr(signal?.snr) : '--',
      hops: hasSignal ? String(signal?.hopsAway) : '--',
      ack: this.engine.ackIndicator(recipient.name),
      node: recipient.name,
    });
  }

  countNodes(now: number = this.clock()): NodeCounts {
    const signals = this.transport.listNodeSignals?.() ?? [];
    const online = signals.filter(
      signal =>
        signal.lastHeard !== undefined &&
        now - signal.lastHeard < ONLINE_WINDOW_MS
    ).length;
    return { online, total: signals.length };
  }

  private runTick(): void {
    if (this.inFlight) {
      return;
    }
    this.inFlight = this.tick()
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.error('Station tick failed', { error: errorMessage(error) });
      })
      .finally(() => {
        this.inFlight = undefined;
      });
  }

  private async readSensor(): Promise<TelemetryReading | undefined> {
    try {
      return await this.source.read();
    } catch (error) {
      this.logger.error('Sensor read threw', { error: errorMessage(error) });
      return undefined;
    }
  }
}

export function toFahrenheit(celsius: number): number {
  return (celsius * 9) / 5 + 32;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
