import { describe, it, expect, vi, afterEach } from 'vitest';
import { ChangeDetector } from '../../../src/world/change-detector.js';
import { fingerprint } from '../../../src/world/fingerprint.js';
import { createHarness } from '../../helpers/harness.js';
import { createMessage, loggedMessages } from '../../helpers/factories.js';

const ROOM = '!room:example.org';

/**
 * Decision step that stays pending until released.
 */
function heldDecision(response: unknown = { actions: [] }) {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  return {
    step: async (): Promise<unknown> => {
      await gate;
      return response;
    },
    release: () => {
      release();
    },
  };
}

describe('OrchestrationLoop', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts a cycle on the first tick and skips once nothing changed', async () => {
    const h = createHarness();

    expect(h.loop.tick()).toEqual({ kind: 'cycle_started', cycleId: 'cycle-1', cycleSeq: 1, trigger: 'change' });
    await h.loop.waitForIdle();

    h.clock.advance(10_000);
    expect(h.loop.tick()).toEqual({ kind: 'skipped_no_change' });
    expect(h.decisions.calls).toBe(1);
  });

  it('drains queued observations before deciding', async () => {
    const h = createHarness();
    h.queue.recordMessage(ROOM, createMessage({ id: '$1' }));

    h.loop.tick();
    await h.loop.waitForIdle();

    expect(h.world.hasMessage(ROOM, '$1')).toBe(true);
    expect(h.decisions.payloads[0]?.channels[0]?.messages[0]?.id).toBe('$1');
  });

  it('applies at most maxEventsPerTick observations per tick', () => {
    const h = createHarness({ loop: { maxEventsPerTick: 2 } });
    for (let i = 0; i < 5; i++) h.queue.recordMessage(ROOM, createMessage({ id: `$${String(i)}` }));

    h.loop.tick();

    expect(h.world.getChannel(ROOM)?.messages).toHaveLength(2);
    expect(h.loop.getStats().queueSize).toBe(3);
  });

  it('never runs two cycles at once', async () => {
    const held = heldDecision();
    const h = createHarness({ steps: [held.step] });

    h.loop.tick();
    h.world.recordMessage(ROOM, createMessage());
    h.clock.advance(60_000);

    expect(h.loop.tick()).toEqual({ kind: 'skipped_busy' });
    expect(h.loop.getState()).toBe('cycle_running');

    held.release();
    await h.loop.waitForIdle();

    expect(h.loop.getState()).toBe('idle');
    expect(h.loop.getStats().peakInFlight).toBe(1);
    expect(h.decisions.calls).toBe(1);
  });

  it('keeps the minimum interval between cycle starts', async () => {
    const h = createHarness();
    h.loop.tick();
    await h.loop.waitForIdle();
    h.world.recordMessage(ROOM, createMessage());

    h.clock.advance(5_000);
    expect(h.loop.tick()).toEqual({ kind: 'skipped_min_interval', retryAt: h.clock.now() + 5_000 });

    h.clock.advance(5_000);
    expect(h.loop.tick()).toMatchObject({ kind: 'cycle_started', trigger: 'change' });
  });

  it('defers on an exhausted hourly budget and warns once per streak', async () => {
    const h = createHarness({ limiter: { maxCyclesPerHour: 1 } });
    h.loop.tick();
    await h.loop.waitForIdle();

    for (let i = 0; i < 3; i++) {
      h.world.recordMessage(ROOM, createMessage({ id: `$${String(i)}` }));
      h.clock.advance(60_000);
      expect(h.loop.tick()).toMatchObject({ kind: 'deferred_rate_limit', reason: 'hourly_limit' });
    }

    expect(loggedMessages(h.logger, 'warn')).toEqual(['Cycle budget exhausted, deferring decision cycles']);
    expect(h.world.getSystemStatus().cycleBudget).toEqual({ used: 1, limit: 1, inCooldown: false });
  });

  it('runs a scheduled cycle when nothing changed for long enough', async () => {
    const h = createHarness({ loop: { scheduledObservationIntervalMs: 60_000 } });
    h.loop.tick();
    await h.loop.waitForIdle();

    h.clock.advance(30_000);
    expect(h.loop.tick()).toEqual({ kind: 'skipped_no_change' });

    h.clock.advance(30_000);
    expect(h.loop.tick()).toEqual({ kind: 'cycle_started', cycleId: 'cycle-2', cycleSeq: 2, trigger: 'scheduled' });
  });

  it('advances the detector to the submitted snapshot once the gateway answers', async () => {
    const h = createHarness({
      steps: [{ actions: [{ kind: 'reply', channelId: ROOM, messageId: '$1', content: 'hi' }] }],
    });
    h.world.recordMessage(ROOM, createMessage({ id: '$1' }));
    const submitted = fingerprint(h.world.snapshot());

    h.loop.tick();
    await h.loop.waitForIdle();

    expect(h.detector.getReference()).toEqual({ fingerprint: submitted, cycleSeq: 1 });
    expect(h.world.getActionHistory()).toHaveLength(1);
    expect(h.loop.getStats().outcomes.triggered_actions).toBe(1);
  });

  it('aborts the cycle on a gateway error without advancing the detector', async () => {
    const h = createHarness({ steps: [new Error('connection reset'), { actions: [] }] });

    h.loop.tick();
    await h.loop.waitForIdle();

    expect(h.detector.getReference()).toEqual({ fingerprint: null, cycleSeq: 0 });
    expect(h.status.getHealth()).toBe('degraded');
    expect(h.loop.getStats().outcomes.aborted_gateway_error).toBe(1);
    expect(loggedMessages(h.logger, 'warn')).toContain('Decision cycle aborted by gateway error');

    h.clock.advance(10_000);
    expect(h.loop.tick()).toMatchObject({ kind: 'cycle_started', cycleSeq: 2, trigger: 'change' });
    await h.loop.waitForIdle();
    expect(h.status.getHealth()).toBe('healthy');
  });

  it('continues the cycle sequence of a restored detector', () => {
    const detector = new ChangeDetector();
    detector.restore('fp-old', 41);
    const h = createHarness({ detector });

    expect(h.loop.tick()).toMatchObject({ kind: 'cycle_started', cycleSeq: 42 });
  });

  it('keeps a bounded outcome history', async () => {
    const h = createHarness({ loop: { outcomeHistory: 2 } });
    h.loop.tick();
    await h.loop.waitForIdle();
    h.clock.advance(10_000);
    h.loop.tick();
    h.loop.tick();

    const stats = h.loop.getStats();
    expect(stats.recentOutcomes.map((o) => o.outcome)).toEqual(['skipped_no_change', 'skipped_no_change']);
    expect(stats.outcomes).toMatchObject({ triggered_zero_actions: 1, skipped_no_change: 2 });
  });

  describe('stop', () => {
    it('lets the in-flight call finish but drops its remaining actions', async () => {
      const held = heldDecision({
        actions: [
          { kind: 'send_message', channelId: ROOM, content: 'one' },
          { kind: 'send_message', channelId: ROOM, content: 'two' },
        ],
      });
      const h = createHarness({ steps: [held.step] });
      h.world.recordMessage(ROOM, createMessage());
      h.loop.tick();

      const stopped = h.loop.stop();
      held.release();
      await stopped;

      expect(h.matrix.calls).toHaveLength(0);
      expect(h.loop.getState()).toBe('stopped');
      expect(h.loop.tick()).toEqual({ kind: 'stopped' });
    });

    it('is idempotent', async () => {
      const h = createHarness();

      await h.loop.stop();
      await h.loop.stop();

      expect(loggedMessages(h.logger, 'info').filter((m) => m === 'Orchestration loop stopped')).toHaveLength(1);
    });
  });

  describe('timer', () => {
    it('ticks every interval once started', async () => {
      vi.useFakeTimers();
      const h = createHarness({ loop: { tickIntervalMs: 1_000 } });

      h.loop.start();
      await vi.advanceTimersByTimeAsync(3_000);
      await h.loop.stop();

      expect(h.loop.getStats().ticks).toBe(3);
    });

    it('ticks immediately when woken', async () => {
      vi.useFakeTimers();
      const h = createHarness({ loop: { tickIntervalMs: 1_000 } });

      h.loop.start();
      h.loop.wake();
      await vi.advanceTimersByTimeAsync(0);

      expect(h.loop.getStats().ticks).toBe(1);
      await h.loop.stop();
    });

    it('ignores wake before start', async () => {
      vi.useFakeTimers();
      const h = createHarness();

      h.loop.wake();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(h.loop.getStats().ticks).toBe(0);
    });
  });
});
