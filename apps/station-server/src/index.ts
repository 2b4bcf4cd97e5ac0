import { pathToFileURL } from 'url';
import {
  DeliveryConfigFactory,
  NodeDirectory,
  createDeliveryEngine,
} from '@meshack/core';
import { SimulatedMeshTransport } from '@meshack/mesh-protocol';
import { TelemetryStation } from '@meshack/node';
import { Logger, errorMessage, parseLogLevel } from '@meshack/shared';
import { FileTelemetrySource } from './file-telemetry-source.js';
import { StationServer } from './StationServer.js';

export { StationServer, type StationServerDependencies } from './StationServer.js';
export { FileTelemetrySource } from './file-telemetry-source.js';
export { createDeliveryRouter } from './routes/delivery.js';
export { createSnrRouter } from './routes/snr.js';
export * from './types.js';

/**
 * Runs a station against the simulated radio. Environment:
 * MESHACK_CONFIG (config JSON), SENSOR_FILE, PORT, HOST, CORS_ORIGINS, LOG_LEVEL.
 */
async function main(): Promise<void> {
  const logger = Logger.getInstance();
  logger.setLogLevel(parseLogLevel(process.env.LOG_LEVEL));

  const config = await DeliveryConfigFactory.fromFile(
    process.env.MESHACK_CONFIG ?? 'meshack.json'
  );
  const directory = NodeDirectory.fromConfig(config.nodes);

  const transport = new SimulatedMeshTransport({
    localNodeId: config.localNodeName
      ? directory.resolve(config.localNodeName).id
      : undefined,
    autoAck: true,
  });
  for (const node of directory.list()) {
    transport.setPeer({ nodeId: node.id, hopsAway: 0, lastHeard: Date.now() });
  }
  await transport.connect();

  const engine = createDeliveryEngine(config, transport);
  const station = new TelemetryStation({
    config,
    engine,
    transport,
    source: new FileTelemetrySource(process.env.SENSOR_FILE ?? 'sensor.json'),
  });
  const server = new StationServer(
    {
      port: Number(process.env.PORT ?? 3000),
      host: process.env.HOST ?? '127.0.0.1',
      corsOrigins: (process.env.CORS_ORIGINS ?? '')
        .split(',')
        .map(origin => origin.trim())
        .filter(origin => origin.length > 0),
    },
    { engine, snrStats: engine.getSnrStats() }
  );

  const shutdown = (): void => {
    logger.info('Shutting down station');
    Promise.all([station.stop(), server.stop()])
      .then(() => transport.disconnect())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', { error: errorMessage(error) });
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await station.start();
  await server.start();
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    Logger.getInstance().error('Station failed to start', {
      error: errorMessage(error),
    });
    process.exit(1);
  });
}
