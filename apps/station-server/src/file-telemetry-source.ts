import { promises as fs } from 'fs';
import { Logger, errorMessage, isFiniteNumber, isRecord } from '@meshack/shared';
import type { TelemetryReading, TelemetrySource } from '@meshack/node';

/**
 * Reads the latest sensor sample from a JSON file written by a separate
 * sensor process: `{"temperatureC": 21.5, "humidity": 40}`.
 */
export class FileTelemetrySource implements TelemetrySource {
  private logger = Logger.getInstance();

  constructor(private readonly filePath: string) {}

  async read(): Promise<TelemetryReading | undefined> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(this.filePath, 'utf8'));
    } catch (error) {
      this.logger.warn('Sensor file unreadable', {
        path: this.filePath,
        error: errorMessage(error),
      });
      return undefined;
    }

    if (
      !isRecord(raw) ||
      !isFiniteNumber(raw.temperatureC) ||
      !isFiniteNumber(raw.humidity)
    ) {
      this.logger.warn('Sensor file has no valid reading', {
        path: this.filePath,
      });
      return undefined;
    }
    return { temperatureC: raw.temperatureC, humidity: raw.humidity };
  }
}
