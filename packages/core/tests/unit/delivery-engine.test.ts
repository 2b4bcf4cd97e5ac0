/**
 * DeliveryEngine Unit Tests
 *
 * Drives the engine through a mock transport and a manual clock
 */

import { describe, test, expect, beforeEach } from 'vitest';
import type { DeliveryStatus } from '../../src/types.js';
import type { RetryNotice } from '../../src/delivery-engine.js';
import { NotFoundError, TransportError } from '../../src/errors.js';
import { traceFor } from '../../src/event-log.js';
import {
  createEngineHarness,
  type EngineHarness,
} from '../shared/helpers/test-utils.js';
import {
  LOCAL_NODE_ID,
  REMOTE_ACKER_ID,
  YANG_ID,
  YING_ID,
} from '../shared/fixtures/test-nodes.js';

describe('DeliveryEngine', () => {
  let harness: EngineHarness;

  beforeEach(async () => {
    harness = createEngineHarness();
    await harness.engine.initialize();
  });

  describe('send', () => {
    test('should transmit and start tracking the message', async () => {
      const { engine, transport } = harness;

      const messageId = await engine.send('yang', 'T: 71F');

      expect(messageId).toBe(1);
      expect(transport.sends).toEqual([
        {
          messageId: 1,
          nodeId: YANG_ID,
          payload: 'T: 71F',
          channel: 0,
          encryptionMode: 'channel',
        },
      ]);
      expect(engine.getLastStatus('yang')).toMatchObject({
        messageId: 1,
        outcome: 'pending',
        retryCount: 0,
      });
      expect(engine.ackIndicator('yang')).toBe('?');
      expect(engine.getMetrics()).toMatchObject({
        messagesSent: 1,
        currentPendingCount: 1,
      });
    });

    test('should reject an unknown node', async () => {
      await expect(harness.engine.send('zed', 'hi')).rejects.toThrow(
        NotFoundError
      );
      expect(harness.transport.sends).toEqual([]);
    });

    test('should use PKI for nodes with a public key', async () => {
      const pki = createEngineHarness({
        nodes: { yang: { id: YANG_ID, publicKey: '0aff' } },
      });

      await pki.engine.send('yang', 'secret');

      expect(pki.transport.sends[0].encryptionMode).toBe('pki');
    });

    test('should emit message_sent', async () => {
      const sent: DeliveryStatus[] = [];
      harness.engine.on('message_sent', (status: DeliveryStatus) =>
        sent.push(status)
      );

      await harness.engine.send('ying', 'T: 68F');

      expect(sent.map(status => [status.nodeName, status.messageId])).toEqual([
        ['ying', 1],
      ]);
    });
  });

  describe('acknowledgments', () => {
    test('should report an implicit ack and then delivery', async () => {
      const { engine, transport } = harness;
      const delivered: DeliveryStatus[] = [];
      engine.on('delivered', (status: DeliveryStatus) => delivered.push(status));
      await engine.send('yang', 'T: 71F');

      transport.ack(1, LOCAL_NODE_ID);
      expect(engine.ackIndicator('yang')).toBe('~');

      transport.ack(1, REMOTE_ACKER_ID, 7);
      expect(engine.ackIndicator('yang')).toBe('✓');
      expect(delivered).toHaveLength(1);
      expect(delivered[0]).toMatchObject({
        messageId: 1,
        outcome: 'delivered',
        snr: 7,
        ackedAt: 0,
      });
      expect(engine.getSnrStats().summary('yang')?.average).toBe(7);
      expect(engine.getMetrics()).toMatchObject({
        implicitAcks: 1,
        messagesDelivered: 1,
      });
    });

    test('should fail a nak without retrying it', async () => {
      const { engine, transport } = harness;
      const failed: DeliveryStatus[] = [];
      engine.on('failed', (status: DeliveryStatus) => failed.push(status));
      await engine.send('yang', 'T: 71F');

      transport.ack(1, LOCAL_NODE_ID, undefined, 1);
      await engine.onTick(1000);

      expect(failed).toHaveLength(1);
      expect(failed[0]).toMatchObject({ outcome: 'failed', reason: 'NO_ROUTE' });
      expect(transport.sends).toHaveLength(1);
      expect(engine.getMetrics()).toMatchObject({
        naks: 1,
        messagesFailed: 1,
        currentPendingCount: 0,
      });
    });

    test('should apply an ack that arrives before send resolves', async () => {
      const { engine, transport } = harness;
      transport.beforeResolve = messageId => {
        transport.ack(messageId, REMOTE_ACKER_ID, 6);
      };

      await engine.send('yang', 'T: 71F');

      expect(engine.getLastStatus('yang')?.outcome).toBe('delivered');
      expect(engine.getSnrStats().snapshot('yang')?.count).toBe(1);
    });

    test('should not let an older message overwrite the node status', async () => {
      const { engine, transport } = harness;
      await engine.send('yang', 'first');
      await engine.send('yang', 'second');

      transport.ack(1, REMOTE_ACKER_ID, 7);

      expect(engine.getLastStatus('yang')).toMatchObject({
        messageId: 2,
        outcome: 'pending',
      });
    });

    test('should ignore an ack for a message it never sent', async () => {
      harness.transport.ack(42, REMOTE_ACKER_ID, 7);

      expect(harness.engine.getSnrStats().size).toBe(0);
      expect(harness.engine.getMostRecentStatus()).toBeUndefined();
      expect(harness.engine.ackIndicator()).toBe('?');
    });
  });

  describe('confirmations', () => {
    test('should send one confirmation once the delay elapses', async () => {
      const { engine, transport } = harness;
      const confirmed: DeliveryStatus[] = [];
      engine.on('confirmation_sent', (status: DeliveryStatus) =>
        confirmed.push(status)
      );
      await engine.send('yang', 'T: 71F');
      transport.ack(1, REMOTE_ACKER_ID, 7);
      transport.ack(1, REMOTE_ACKER_ID, 7);

      const early = await engine.onTick(4999);
      const due = await engine.onTick(5000);
      const after = await engine.onTick(6000);

      expect(early.confirmationsSent).toBe(0);
      expect(due.confirmationsSent).toBe(1);
      expect(after.confirmationsSent).toBe(0);
      expect(transport.sends.map(send => send.payload)).toEqual([
        'T: 71F',
        'ACK #1 7.0 snr',
      ]);
      expect(transport.sends[1].nodeId).toBe(YANG_ID);
      expect(confirmed).toHaveLength(1);
      expect(engine.getLastStatus('yang')?.outcome).toBe('confirmed');
      expect(engine.getMetrics()).toMatchObject({
        confirmationsSent: 1,
        currentPendingCount: 0,
      });
    });

    test('should drop the message when the confirmation cannot be sent', async () => {
      const { engine, transport } = harness;
      await engine.send('yang', 'T: 71F');
      transport.ack(1, REMOTE_ACKER_ID, 7);
      transport.failNext(1);

      const summary = await engine.onTick(5000);

      expect(summary.confirmationsSent).toBe(0);
      expect(engine.getMetrics()).toMatchObject({
        confirmationFailures: 1,
        currentPendingCount: 0,
      });
      expect(engine.getLastStatus('yang')?.outcome).toBe('delivered');
    });

    test('should release real acks at once when confirmations are off', async () => {
      const quiet = createEngineHarness({ confirmationsEnabled: false });
      await quiet.engine.send('yang', 'T: 71F');
      quiet.transport.ack(1, REMOTE_ACKER_ID, 7);

      await quiet.engine.onTick(10000);

      expect(quiet.transport.sends).toHaveLength(1);
      expect(quiet.engine.getMetrics().currentPendingCount).toBe(0);
    });
  });

  describe('timeouts', () => {
    test('should retry once and then give up', async () => {
      const { engine, transport, clock } = harness;
      const retries: RetryNotice[] = [];
      const failed: DeliveryStatus[] = [];
      engine.on('retry', (notice: RetryNotice) => retries.push(notice));
      engine.on('failed', (status: DeliveryStatus) => failed.push(status));
      await engine.send('ying', 'T: 68F');

      clock.advanceSeconds(61);
      const first = await engine.onTick();

      expect(first).toEqual({
        retried: 1,
        failed: 0,
        confirmationsSent: 0,
        evicted: 0,
      });
      expect(retries).toEqual([
        {
          nodeName: 'ying',
          previousMessageId: 1,
          retryCount: 1,
          reason: 'timeout',
        },
      ]);
      expect(transport.sends.map(send => [send.messageId, send.nodeId])).toEqual([
        [1, YING_ID],
        [2, YING_ID],
      ]);
      expect(engine.getLastStatus('ying')).toMatchObject({
        messageId: 2,
        outcome: 'pending',
        retryCount: 1,
      });

      clock.advanceSeconds(61);
      const second = await engine.onTick();

      expect(second.failed).toBe(1);
      expect(failed).toHaveLength(1);
      expect(failed[0]).toMatchObject({ messageId: 2, outcome: 'failed' });
      expect(engine.getLastStatus('ying')?.outcome).toBe('failed');
      expect(engine.ackIndicator('ying')).toBe('✗');
      expect(transport.sends).toHaveLength(2);
      expect(engine.getMetrics()).toMatchObject({
        messagesSent: 2,
        messagesRetried: 1,
        timeouts: 2,
        messagesFailed: 1,
        currentPendingCount: 0,
      });
    });

    test('should discard a late ack for the timed-out id during the resend', async () => {
      const { engine, transport, clock } = harness;
      await engine.send('yang', 'T: 71F');
      transport.beforeResolve = messageId => {
        if (messageId === 2) {
          transport.ack(1, REMOTE_ACKER_ID, 7);
        }
      };

      clock.advanceSeconds(61);
      const summary = await engine.onTick();

      expect(summary.retried).toBe(1);
      expect(engine.getLastStatus('yang')).toMatchObject({
        messageId: 2,
        outcome: 'pending',
        retryCount: 1,
      });
      expect(engine.getSnrStats().snapshot('yang')).toBeUndefined();
      expect(engine.getMetrics().messagesDelivered).toBe(0);
    });

    test('should time out an implicit ack that was never confirmed', async () => {
      const strict = createEngineHarness({ maxRetries: 0 });
      await strict.engine.send('ying', 'T: 68F');
      strict.transport.ack(1, LOCAL_NODE_ID);

      const summary = await strict.engine.onTick(60000);

      expect(summary.failed).toBe(1);
      expect(strict.engine.getLastStatus('ying')?.outcome).toBe('failed');
    });

    test('should evict entries past the retention period', async () => {
      const short = createEngineHarness({ retentionSeconds: 30 });
      await short.engine.send('yang', 'T: 71F');
      short.transport.ack(1, LOCAL_NODE_ID);

      const summary = await short.engine.onTick(30000);

      expect(summary.evicted).toBe(1);
      expect(short.engine.getMetrics().currentPendingCount).toBe(0);
    });

    test('should keep a real ack until its confirmation goes out', async () => {
      const slow = createEngineHarness({ confirmationDelaySeconds: 700 });
      const confirmed: DeliveryStatus[] = [];
      slow.engine.on('confirmation_sent', (status: DeliveryStatus) =>
        confirmed.push(status)
      );
      await slow.engine.send('yang', 'T: 71F');
      slow.transport.ack(1, REMOTE_ACKER_ID, 7);

      const retained = await slow.engine.onTick(600000);
      const due = await slow.engine.onTick(700000);

      expect(retained.evicted).toBe(0);
      expect(due.confirmationsSent).toBe(1);
      expect(slow.engine.getLastStatus('yang')?.outcome).toBe('confirmed');
      expect(confirmed.map(status => status.outcome)).toEqual(['confirmed']);
      expect(
        traceFor(1).some(
          event => event.from === 'real_ack' && event.outcome === 'confirmation_sent'
        )
      ).toBe(true);
    });
  });

  describe('transport failures', () => {
    test('should queue a retry for the next tick', async () => {
      const { engine, transport } = harness;
      const retries: RetryNotice[] = [];
      engine.on('retry', (notice: RetryNotice) => retries.push(notice));
      transport.failNext(1);

      await expect(engine.send('yang', 'T: 71F')).rejects.toThrow(TransportError);
      expect(engine.getLastStatus('yang')).toMatchObject({
        outcome: 'send_failed',
        reason: 'Radio busy',
      });
      expect(engine.getLastStatus('yang')?.messageId).toBeUndefined();

      const summary = await engine.onTick(1000);

      expect(summary.retried).toBe(1);
      expect(retries).toEqual([
        {
          nodeName: 'yang',
          previousMessageId: undefined,
          retryCount: 1,
          reason: 'transport_error',
        },
      ]);
      expect(engine.getLastStatus('yang')).toMatchObject({
        messageId: 1,
        outcome: 'pending',
        retryCount: 1,
      });
    });

    test('should fail at once when no retries are allowed', async () => {
      const strict = createEngineHarness({ maxRetries: 0 });
      const failed: DeliveryStatus[] = [];
      strict.engine.on('failed', (status: DeliveryStatus) => failed.push(status));
      strict.transport.failNext(1);

      await expect(strict.engine.send('yang', 'T: 71F')).rejects.toThrow(
        'Radio busy'
      );
      const summary = await strict.engine.onTick(1000);

      expect(summary.retried).toBe(0);
      expect(failed).toHaveLength(1);
      expect(strict.engine.ackIndicator()).toBe('✗');
      expect(strict.engine.getMetrics().messagesFailed).toBe(1);
    });
  });

  describe('shutdown', () => {
    test('should unsubscribe and flush statistics', async () => {
      const { engine, transport, storage } = harness;
      await engine.send('yang', 'T: 71F');
      transport.ack(1, REMOTE_ACKER_ID, 7);

      await engine.shutdown();

      expect(transport.listenerCount).toBe(0);
      expect(storage.peek()?.yang.count).toBe(1);
    });
  });
});
