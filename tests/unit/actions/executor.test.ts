import { describe, it, expect, beforeEach } from 'vitest';
import { ActionExecutor, type ActionExecutorConfig } from '../../../src/actions/executor.js';
import { ActionRateLimiter } from '../../../src/actions/action-rate-limiter.js';
import { DryRunBackend } from '../../../src/actions/dry-run-backend.js';
import { contentDigest } from '../../../src/actions/validation.js';
import { CircuitBreakerRegistry } from '../../../src/core/circuit-breaker.js';
import { InMemoryMetrics } from '../../../src/core/metrics.js';
import { WorldState } from '../../../src/world/world-state.js';
import type { BackendRegistry, BackendResult, MediaBackend, PlatformBackend } from '../../../src/ports/backend.js';
import type { ActionRecord, ProposedAction } from '../../../src/types/index.js';
import {
  FakePlatformBackend,
  createActionRecord,
  createFakeClock,
  createInstantSleep,
  createMessage,
  createMockLogger,
  loggedMessages,
  type FakeClock,
  type MockLogger,
} from '../../helpers/factories.js';

const ROOM = '!room:example.org';
const CAST_THREAD = 'cast-thread';

const transient: BackendResult = { ok: false, error: 'transient', message: 'bad gateway' };
const permanent: BackendResult = { ok: false, error: 'permanent', message: 'forbidden' };

const replyTo = (messageId: string, content = 'hi'): ProposedAction => ({
  kind: 'reply',
  channelId: ROOM,
  messageId,
  content,
});

describe('ActionExecutor', () => {
  let clock: FakeClock;
  let logger: MockLogger;
  let metrics: InMemoryMetrics;
  let world: WorldState;
  let matrix: FakePlatformBackend;
  let backends: BackendRegistry;
  let sleep: ReturnType<typeof createInstantSleep>;

  beforeEach(() => {
    clock = createFakeClock(1_000_000);
    logger = createMockLogger();
    metrics = new InMemoryMetrics();
    world = new WorldState({}, { clock: clock.clock });
    world.recordMessage(ROOM, createMessage({ id: 'msg-1' }));
    world.recordMessage(ROOM, createMessage({ id: 'msg-2' }));
    world.recordMessage(CAST_THREAD, createMessage({ id: '0xcast', platform: 'farcaster' }));
    matrix = new FakePlatformBackend('matrix');
    backends = { platforms: { matrix }, media: {} };
    sleep = createInstantSleep();
  });

  function executor(
    extra: { actionLimiter?: ActionRateLimiter; circuits?: CircuitBreakerRegistry } = {},
    config: Partial<ActionExecutorConfig> = {}
  ): ActionExecutor {
    let n = 0;
    return new ActionExecutor(
      {
        worldState: world,
        backends,
        logger,
        metrics,
        clock: clock.clock,
        sleep,
        idGenerator: () => `id-${String(++n)}`,
        ...extra,
      },
      config
    );
  }

  function outcomes(records: ActionRecord[]): string[] {
    return records.map((r) => (r.outcome.status === 'success' ? 'success' : r.outcome.errorKind));
  }

  it('executes a reply and records it in world state', async () => {
    const report = await executor().execute([replyTo('msg-1', 'hello back')], { cycleId: 'cycle-1' });

    expect(report).toEqual({
      cancelled: false,
      notExecuted: 0,
      records: [
        {
          id: 'id-1',
          cycleId: 'cycle-1',
          kind: 'reply',
          platform: 'matrix',
          channelId: ROOM,
          messageId: 'msg-1',
          content: 'hello back',
          contentHash: contentDigest('hello back'),
          timestamp: 1_000_000,
          attempts: 1,
          outcome: { status: 'success', referenceId: 'ref-1' },
        },
      ],
    });
    expect(matrix.calls).toEqual([
      { method: 'reply', request: { channelId: ROOM, messageId: 'msg-1', content: 'hello back' } },
    ]);
    expect(world.getActionHistory()).toEqual(report.records);
    expect(metrics.getCounter('actions_total', { kind: 'reply', status: 'success' })).toBe(1);
  });

  it('produces no record for wait', async () => {
    const report = await executor().execute([{ kind: 'wait', rationale: 'nothing new' }], { cycleId: 'c' });

    expect(report.records).toEqual([]);
    expect(world.getActionHistory()).toEqual([]);
  });

  describe('retries', () => {
    it('retries transient failures with backoff', async () => {
      matrix.script('reply', transient);

      const [record] = (await executor().execute([replyTo('msg-1')], { cycleId: 'c' })).records;

      expect(record?.attempts).toBe(2);
      expect(record?.outcome).toEqual({ status: 'success', referenceId: 'ref-2' });
      expect(sleep.delays).toEqual([1000]);
      expect(loggedMessages(logger, 'warn')).toEqual(['Transient action failure, retrying']);
    });

    it('records a transient failure once retries are exhausted', async () => {
      matrix.script('reply', transient, transient, transient);

      const [record] = (await executor().execute([replyTo('msg-1')], { cycleId: 'c' })).records;

      expect(record?.attempts).toBe(3);
      expect(record?.outcome).toEqual({ status: 'failed', errorKind: 'transient', message: 'bad gateway' });
      expect(sleep.delays).toEqual([1000, 2000]);
    });

    it('treats a thrown back-end error as transient', async () => {
      matrix.script('reply', new Error('socket hang up'));

      const [record] = (await executor({}, { maxRetries: 0 }).execute([replyTo('msg-1')], { cycleId: 'c' }))
        .records;

      expect(record?.outcome).toEqual({ status: 'failed', errorKind: 'transient', message: 'socket hang up' });
    });

    it('times out a hanging back-end call', async () => {
      matrix.script('reply', () => new Promise<BackendResult>(() => undefined));

      const [record] = (
        await executor({}, { maxRetries: 0, actionTimeoutMs: 10 }).execute([replyTo('msg-1')], { cycleId: 'c' })
      ).records;

      expect(record?.outcome).toEqual({
        status: 'failed',
        errorKind: 'transient',
        message: 'Operation timed out after 10ms',
      });
    });

    it('does not retry permanent failures', async () => {
      matrix.script('reply', permanent);

      const [record] = (await executor().execute([replyTo('msg-1')], { cycleId: 'c' })).records;

      expect(record?.attempts).toBe(1);
      expect(record?.outcome).toEqual({ status: 'failed', errorKind: 'permanent', message: 'forbidden' });
      expect(matrix.calls).toHaveLength(1);
    });

    it('does not retry rate limiting and stores the reported quota', async () => {
      matrix.script('reply', {
        ok: false,
        error: 'rate_limited',
        message: 'slow down',
        rateLimit: { remaining: 0, resetAt: 1_060_000 },
      });

      const [record] = (await executor().execute([replyTo('msg-1')], { cycleId: 'c' })).records;

      expect(record?.outcome).toEqual({ status: 'failed', errorKind: 'rate_limited', message: 'slow down' });
      expect(matrix.calls).toHaveLength(1);
      expect(world.getRateLimit('matrix')).toEqual({
        remaining: 0,
        limit: undefined,
        resetAt: 1_060_000,
        observedAt: 1_000_000,
      });
    });
  });

  describe('platform quota', () => {
    it('blocks an action while the platform quota is exhausted', async () => {
      world.updateRateLimit('matrix', { remaining: 0, resetAt: 1_001_000 });

      const [record] = (await executor().execute([replyTo('msg-1')], { cycleId: 'c' })).records;

      expect(record?.outcome).toEqual({
        status: 'failed',
        errorKind: 'rate_limited',
        message: 'matrix: quota exhausted',
      });
      expect(matrix.calls).toHaveLength(0);
    });

    it('checks the per-kind quota key', async () => {
      world.updateRateLimit('matrix:reply', { remaining: 0, resetAt: 1_001_000 });

      const report = await executor().execute(
        [replyTo('msg-1'), { kind: 'send_message', channelId: ROOM, content: 'hey' }],
        { cycleId: 'c' }
      );

      expect(outcomes(report.records)).toEqual(['rate_limited', 'success']);
    });

    it('allows the action again once the reset time has passed', async () => {
      world.updateRateLimit('matrix', { remaining: 0, resetAt: 1_000_000 });

      const [record] = (await executor().execute([replyTo('msg-1')], { cycleId: 'c' })).records;

      expect(record?.outcome.status).toBe('success');
    });

    it('presumes a stale low reading exhausted', async () => {
      world.updateRateLimit('matrix', { remaining: 1, resetAt: 2_000_000, observedAt: 500_000 });

      const [record] = (await executor().execute([replyTo('msg-1')], { cycleId: 'c' })).records;

      expect(record?.outcome).toMatchObject({ status: 'failed', errorKind: 'rate_limited' });
      expect(logger.calls.warn).toHaveLength(1);
      expect(logger.calls.warn[0]?.[0]).toMatchObject({ errorKind: 'rate_limited', retryAfterMs: 1_000_000 });
    });

    it('trusts a stale reading with room to spare', async () => {
      world.updateRateLimit('matrix', { remaining: 5, resetAt: 2_000_000, observedAt: 500_000 });

      const [record] = (await executor().execute([replyTo('msg-1')], { cycleId: 'c' })).records;

      expect(record?.outcome.status).toBe('success');
    });
  });

  it('enforces local hourly limits', async () => {
    const limiter = new ActionRateLimiter({ perKind: { reply: 1 }, perPlatform: {} });

    const report = await executor({ actionLimiter: limiter }).execute([replyTo('msg-1'), replyTo('msg-2')], {
      cycleId: 'c',
    });

    expect(outcomes(report.records)).toEqual(['success', 'rate_limited']);
    expect(matrix.calls).toHaveLength(1);
  });

  it('stops calling a target whose circuit opened', async () => {
    const circuits = new CircuitBreakerRegistry({ failureThreshold: 1, clock: clock.clock });
    matrix.script('reply', permanent);

    const report = await executor({ circuits }).execute([replyTo('msg-1'), replyTo('msg-2')], { cycleId: 'c' });

    expect(outcomes(report.records)).toEqual(['permanent', 'circuit_open']);
    expect(matrix.calls).toHaveLength(1);
  });

  describe('validation', () => {
    it('rejects unknown targets without calling a back-end', async () => {
      const [record] = (
        await executor().execute([{ kind: 'reply', channelId: ROOM, messageId: 'nope', content: 'hi' }], {
          cycleId: 'c',
        })
      ).records;

      expect(record?.outcome).toEqual({
        status: 'failed',
        errorKind: 'validation',
        message: `message nope not found in ${ROOM}`,
      });
      expect(record?.attempts).toBe(0);
      expect(matrix.calls).toHaveLength(0);
    });

    it('refuses a second reply to the same message', async () => {
      world.recordActionResult(createActionRecord({ channelId: ROOM, messageId: 'msg-1' }));

      const [record] = (await executor().execute([replyTo('msg-1', 'again')], { cycleId: 'c' })).records;

      expect(record?.outcome).toMatchObject({ status: 'failed', errorKind: 'duplicate' });
    });

    it('enforces per-platform content limits', async () => {
      backends.platforms.farcaster = new FakePlatformBackend('farcaster');

      const [record] = (
        await executor().execute([{ kind: 'post', platform: 'farcaster', content: 'x'.repeat(321) }], {
          cycleId: 'c',
        })
      ).records;

      expect(record?.outcome).toEqual({
        status: 'failed',
        errorKind: 'validation',
        message: 'content is 321 chars, farcaster allows 320',
      });
      expect(record?.platform).toBe('farcaster');
    });

    it('records a content preview and a hash of the full text', async () => {
      const text = 'y'.repeat(2500);
      const [record] = (
        await executor().execute([{ kind: 'send_message', channelId: ROOM, content: text }], {
          cycleId: 'c',
        })
      ).records;

      expect(record?.outcome.status).toBe('success');
      expect(record?.content).toBe('y'.repeat(200));
      expect(record?.contentHash).toBe(contentDigest(text));
    });

    it('refuses to send the same long text twice', async () => {
      const text = 'z'.repeat(3000);
      const send: ProposedAction = { kind: 'send_message', channelId: ROOM, content: text };

      const first = await executor().execute([send], { cycleId: 'c1' });
      const second = await executor().execute([send], { cycleId: 'c2' });

      expect(outcomes(first.records)).toEqual(['success']);
      expect(outcomes(second.records)).toEqual(['duplicate']);
      expect(matrix.calls).toHaveLength(1);
    });

    it('sends long texts that differ only after the preview', async () => {
      const head = 'z'.repeat(300);

      const report = await executor().execute(
        [
          { kind: 'send_message', channelId: ROOM, content: `${head}a` },
          { kind: 'send_message', channelId: ROOM, content: `${head}b` },
        ],
        { cycleId: 'c' }
      );

      expect(outcomes(report.records)).toEqual(['success', 'success']);
    });
  });

  describe('back-end resolution', () => {
    it('fails permanently when no back-end serves the platform', async () => {
      const [record] = (
        await executor().execute([{ kind: 'react', channelId: CAST_THREAD, messageId: '0xcast', reaction: 'like' }], {
          cycleId: 'c',
        })
      ).records;

      expect(record?.outcome).toEqual({
        status: 'failed',
        errorKind: 'permanent',
        message: 'no back-end configured for farcaster',
      });
    });

    it('fails permanently when the back-end lacks the method', async () => {
      const bare: PlatformBackend = {
        name: 'bare',
        sendMessage: async () => ({ ok: true, referenceId: 'x' }),
      };
      backends.platforms.matrix = bare;

      const [record] = (
        await executor().execute([{ kind: 'react', channelId: ROOM, messageId: 'msg-1', reaction: '👍' }], {
          cycleId: 'c',
        })
      ).records;

      expect(record?.outcome).toEqual({
        status: 'failed',
        errorKind: 'permanent',
        message: 'bare does not support react',
      });
    });

    it('uploads media and stores endpoint quota under the service', async () => {
      const media: MediaBackend = {
        name: 's3',
        upload: async () => ({
          ok: true,
          referenceId: 's3://bucket/a.png',
          rateLimit: { endpoint: 'upload', remaining: 9, resetAt: 2_000_000 },
        }),
      };
      backends.media.s3 = media;

      const [record] = (
        await executor().execute([{ kind: 'upload_media', service: 's3', url: 'https://example.org/a.png' }], {
          cycleId: 'c',
        })
      ).records;

      expect(record).toMatchObject({
        kind: 'upload_media',
        platform: undefined,
        content: 'https://example.org/a.png',
        outcome: { status: 'success', referenceId: 's3://bucket/a.png' },
      });
      expect(world.getRateLimit('s3:upload')?.remaining).toBe(9);
    });

    it('succeeds through a dry-run back-end', async () => {
      backends.media.arweave = new DryRunBackend('arweave', logger);

      const [record] = (
        await executor().execute([{ kind: 'upload_media', service: 'arweave', url: 'https://example.org/b.png' }], {
          cycleId: 'c',
        })
      ).records;

      expect(record?.outcome.status === 'success' && record.outcome.referenceId.startsWith('dry-run:arweave:')).toBe(
        true
      );
    });
  });

  it('contains a failure and carries on with the remaining actions', async () => {
    matrix.script('sendMessage', permanent);

    const report = await executor().execute(
      [replyTo('msg-1'), { kind: 'send_message', channelId: ROOM, content: 'x' }, replyTo('msg-2')],
      { cycleId: 'c' }
    );

    expect(outcomes(report.records)).toEqual(['success', 'permanent', 'success']);
    expect(world.getSystemStatus().lastActionFailure).toEqual({
      at: 1_000_000,
      kind: 'send_message',
      errorKind: 'permanent',
      message: 'forbidden',
    });
  });

  describe('cancellation', () => {
    it('executes nothing once the cycle is cancelled', async () => {
      const report = await executor().execute([{ kind: 'wait' }, replyTo('msg-1'), replyTo('msg-2')], {
        cycleId: 'c',
        signal: AbortSignal.abort(),
      });

      expect(report).toEqual({ records: [], cancelled: true, notExecuted: 2 });
      expect(matrix.calls).toHaveLength(0);
    });

    it('finishes the action in progress and drops the rest', async () => {
      const controller = new AbortController();
      matrix.script('reply', async () => {
        controller.abort();
        return { ok: true, referenceId: 'ref-first' };
      });

      const report = await executor().execute([replyTo('msg-1'), replyTo('msg-2')], {
        cycleId: 'c',
        signal: controller.signal,
      });

      expect(report.cancelled).toBe(true);
      expect(report.notExecuted).toBe(1);
      expect(report.records.map((r) => r.outcome)).toEqual([{ status: 'success', referenceId: 'ref-first' }]);
    });
  });
});
