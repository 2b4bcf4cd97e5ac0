import { MemoryStatsStorage } from '../../../src/stats-storage.js';
import { DeliveryConfigFactory } from '../../../src/delivery-config.js';
import {
  createDeliveryEngine,
  type DeliveryEngine,
} from '../../../src/delivery-engine.js';
import type { DeliveryConfig } from '../../../src/types.js';
import { MockTransport } from '../mocks/mock-transport.js';
import { LOCAL_NODE_ID, TEST_NODE_CONFIG } from '../fixtures/test-nodes.js';

/**
 * Manually advanced clock in epoch milliseconds
 */
export class TestClock {
  constructor(public now = 0) {}

  read = (): number => this.now;

  advanceSeconds(seconds: number): number {
    this.now += seconds * 1000;
    return this.now;
  }
}

export interface EngineHarness {
  engine: DeliveryEngine;
  transport: MockTransport;
  storage: MemoryStatsStorage;
  clock: TestClock;
  config: DeliveryConfig;
}

/**
 * Engine wired to a mock transport, in-memory statistics and a test clock
 */
export function createEngineHarness(
  overrides: Partial<DeliveryConfig> = {}
): EngineHarness {
  const config = DeliveryConfigFactory.createDefault({
    nodes: TEST_NODE_CONFIG,
    selectedNode: 'yang',
    ...overrides,
  });
  const transport = new MockTransport(LOCAL_NODE_ID);
  const storage = new MemoryStatsStorage();
  const clock = new TestClock();
  const engine = createDeliveryEngine(config, transport, {
    storage,
    clock: clock.read,
  });
  return { engine, transport, storage, clock, config };
}
