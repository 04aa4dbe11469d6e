import { ResponsePollerService } from '../response-poller.service';
import { formatResponse } from '../response-formatter';
import { GovernanceEventsService } from '../../governance/governance-events.service';
import { FakeClock } from '../../__tests__/support/fake-clock';
import { buildGovernanceConfig } from '../../__tests__/support/governance-config';
import { InMemoryResponseQueue } from '../../__tests__/support/in-memory-response.queue';

/**
 * ResponsePollerService Tests
 *
 * Test Strategy:
 * - In-memory queue with visibility timeouts; long polls advance a fake clock
 * - Deletion discipline asserted on what stays in the queue
 */
describe('ResponsePollerService', () => {
  let poller: ResponsePollerService;
  let queue: InMemoryResponseQueue;
  let events: GovernanceEventsService;
  let clock: FakeClock;
  let start: number;

  const response = (overrides: Record<string, unknown> = {}) => ({
    id: 'resp-1',
    created_date: '2026-03-14T09:30:03.000Z',
    created_by: 'webaction',
    stage: 'dev',
    message_type: 'agent_response',
    status: 'completed',
    payload: '{"tee_times":2}',
    correlation_id: 'a1',
    ...overrides,
  });

  function createPoller(env: Record<string, string> = {}): void {
    clock = new FakeClock();
    start = clock.now();
    queue = new InMemoryResponseQueue(clock);
    events = new GovernanceEventsService();
    poller = new ResponsePollerService(
      queue,
      buildGovernanceConfig(env),
      events,
      clock,
    );
  }

  beforeEach(() => createPoller());

  describe('drain() - correlation', () => {
    it('should return the correlated response as soon as it arrives and delete it', async () => {
      queue.push(response(), 3000);

      const responses = await poller.drain(30000, { expectedIds: ['a1'] });

      expect(responses).toEqual([
        {
          id: 'resp-1',
          correlationId: 'a1',
          createdBy: 'webaction',
          messageType: 'agent_response',
          status: 'completed',
          payload: '{"tee_times":2}',
          createdDate: '2026-03-14T09:30:03.000Z',
          stage: 'dev',
        },
      ]);
      expect(formatResponse(responses[0])).toBe(
        'Tool Response (status: completed):\n{"tee_times":2}',
      );
      expect(queue.size).toBe(0);
      expect(clock.now() - start).toBe(3000);
    });

    it('should release responses for other actions back to the queue', async () => {
      queue.push(response({ id: 'resp-other', correlation_id: 'b7' }));
      queue.push(response(), 2000);

      const responses = await poller.drain(30000, { expectedIds: ['a1'] });

      expect(responses.map((r) => r.id)).toEqual(['resp-1']);
      expect(queue.ids()).toEqual(['sqs-1']);
      expect(queue.released).toEqual([
        'sqs-1#1',
        'sqs-1#2',
        'sqs-1#3',
        'sqs-1#4',
        'sqs-1#5',
      ]);
      expect(clock.sleeps).toEqual([500, 500, 500, 500]);
      await expect(poller.getQueueDepth()).resolves.toBe(1);
    });

    it('should reject responses without a correlation id when ids are expected', async () => {
      queue.push(response({ correlation_id: undefined }));

      const responses = await poller.drain(10000, { expectedIds: ['a1'] });

      expect(responses).toEqual([]);
      expect(queue.size).toBe(1);
      expect(clock.now() - start).toBe(10000);
    });

    it('should treat an empty id list as no filter', async () => {
      queue.push(response({ correlation_id: 'zz' }));

      const responses = await poller.drain(30000, { expectedIds: [] });

      expect(responses.map((r) => r.correlationId)).toEqual(['zz']);
      expect(queue.size).toBe(0);
    });

    it('should keep polling past other responses while ids are outstanding', async () => {
      queue.push(response({ id: 'resp-a1', correlation_id: 'a1' }), 1000);
      queue.push(response({ id: 'resp-zz', correlation_id: 'zz' }), 2000);
      queue.push(response({ id: 'resp-a2', correlation_id: 'a2' }), 4000);

      const responses = await poller.drain(30000, {
        expectedIds: ['a1', 'a2'],
      });

      expect(responses.map((r) => r.id)).toEqual(['resp-a1', 'resp-a2']);
      expect(clock.now() - start).toBe(4000);
      expect(queue.ids()).toEqual(['sqs-2']);
      expect(events.count('response_uncorrelated')).toBe(5);
    });
  });

  describe('drain() - shared queue', () => {
    let other: ResponsePollerService;

    beforeEach(() => {
      other = new ResponsePollerService(
        queue,
        buildGovernanceConfig(),
        events,
        clock,
      );
    });

    it('should leave a response it received for the turn that owns it', async () => {
      queue.push(response({ id: 'resp-b', correlation_id: 'b7' }), 1000);
      queue.push(response({ id: 'resp-a', correlation_id: 'a1' }), 2000);

      const first = await poller.drain(30000, { expectedIds: ['a1'] });
      const second = await other.drain(25000, { expectedIds: ['b7'] });

      expect(first.map((r) => r.id)).toEqual(['resp-a']);
      expect(second.map((r) => r.id)).toEqual(['resp-b']);
      expect(queue.size).toBe(0);
    });

    it('should route responses to concurrent drains by correlation id', async () => {
      queue.push(response({ id: 'resp-b', correlation_id: 'b7' }), 1000);
      queue.push(response({ id: 'resp-a', correlation_id: 'a1' }), 2000);

      const [first, second] = await Promise.all([
        poller.drain(30000, { expectedIds: ['a1'] }),
        other.drain(25000, { expectedIds: ['b7'] }),
      ]);

      expect(first.map((r) => r.id)).toEqual(['resp-a']);
      expect(second.map((r) => r.id)).toEqual(['resp-b']);
      expect(queue.size).toBe(0);
    });
  });

  describe('drain() - stopping rules', () => {
    it('should poll until the window elapses when nothing arrives', async () => {
      const responses = await poller.drain(30000);

      expect(responses).toEqual([]);
      expect(queue.receiveCalls).toHaveLength(6);
      expect(queue.receiveCalls[0]).toEqual({
        maxMessages: 10,
        waitTimeSeconds: 5,
      });
      expect(clock.now() - start).toBe(30000);
    });

    it('should bound the per-call wait by the remaining window', async () => {
      await poller.drain(12500);

      expect(
        queue.receiveCalls.map((call) => call.waitTimeSeconds),
      ).toEqual([5, 5, 2, 0]);
      expect(clock.sleeps).toEqual([500]);
      expect(clock.now() - start).toBe(12500);
    });

    it('should stop after a round that yields nothing further', async () => {
      queue.push(response({ id: 'resp-1', correlation_id: 'a1' }));
      queue.push(response({ id: 'resp-2', correlation_id: 'a2' }));

      const responses = await poller.drain(30000);

      expect(responses.map((r) => r.id)).toEqual(['resp-1', 'resp-2']);
      expect(queue.receiveCalls).toHaveLength(2);
      expect(clock.now() - start).toBe(5000);
      expect(queue.size).toBe(0);
    });

    it('should honour the configured batch size', async () => {
      createPoller({ RESPONSE_POLL_MAX_MESSAGES: '2' });
      queue.push(response({ id: 'resp-1' }));
      queue.push(response({ id: 'resp-2' }));
      queue.push(response({ id: 'resp-3' }));

      const responses = await poller.drain(30000);

      expect(responses).toHaveLength(3);
      expect(queue.receiveCalls.map((call) => call.maxMessages)).toEqual([
        2, 2, 2,
      ]);
    });

    it('should end the drain when the queue cannot be read', async () => {
      queue.receiveError = new Error('AccessDenied');

      await expect(poller.drain(30000)).resolves.toEqual([]);
      expect(queue.receiveCalls).toHaveLength(1);
    });
  });

  describe('drain() - parsing', () => {
    it('should log and keep malformed messages on the queue', async () => {
      queue.push('not json at all');
      queue.push({ id: 'resp-broken', payload: 'missing envelope fields' });
      queue.push(response());

      const responses = await poller.drain(30000);

      expect(responses.map((r) => r.id)).toEqual(['resp-1']);
      expect(queue.ids()).toEqual(['sqs-1', 'sqs-2']);
      expect(events.count('response_malformed')).toBe(2);
    });

    it('should unwrap SNS notifications', async () => {
      queue.push({
        Type: 'Notification',
        MessageId: 'sns-msg-1',
        Message: JSON.stringify(
          response({ status: 'failed', payload: 'upstream returned 503' }),
        ),
      });

      const responses = await poller.drain(30000, { expectedIds: ['a1'] });

      expect(responses).toHaveLength(1);
      expect(formatResponse(responses[0])).toBe(
        'Tool Response (status: failed):\nupstream returned 503',
      );
    });

    it('should encode structured payloads as JSON text', async () => {
      queue.push(response({ payload: { tee_times: [{ time: '08:10' }] } }));

      const [received] = await poller.drain(30000, { expectedIds: ['a1'] });

      expect(received.payload).toBe('{"tee_times":[{"time":"08:10"}]}');
    });

    it('should report status unknown when the executor omits it', async () => {
      queue.push(response({ status: undefined }));

      const [received] = await poller.drain(30000, { expectedIds: ['a1'] });

      expect(received.status).toBe('unknown');
    });
  });

  describe('drain() - deletion failures', () => {
    it('should still return a response whose delete failed', async () => {
      queue.deleteError = new Error('ReceiptHandleIsInvalid');
      queue.push(response());

      const responses = await poller.drain(30000, { expectedIds: ['a1'] });

      expect(responses).toHaveLength(1);
      expect(queue.size).toBe(1);
    });
  });

  describe('getQueueDepth()', () => {
    it('should report visible messages', async () => {
      queue.push(response({ id: 'resp-1' }));
      queue.push(response({ id: 'resp-2' }));

      await expect(poller.getQueueDepth()).resolves.toBe(2);
    });

    it('should report 0 when the queue cannot be asked', async () => {
      queue.depthError = new Error('throttled');

      await expect(poller.getQueueDepth()).resolves.toBe(0);
    });
  });
});
