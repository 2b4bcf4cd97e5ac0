export {
  TelemetryStation,
  ONLINE_WINDOW_MS,
  toFahrenheit,
  type NodeCounts,
  type TelemetryReading,
  type TelemetrySource,
  type TelemetryStationOptions,
} from './station.js';
