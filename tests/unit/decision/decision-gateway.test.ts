import { describe, it, expect, beforeEach } from 'vitest';
import { DecisionGateway } from '../../../src/decision/decision-gateway.js';
import { GatewayError } from '../../../src/core/errors.js';
import { InMemoryMetrics } from '../../../src/core/metrics.js';
import { WorldState } from '../../../src/world/world-state.js';
import type { WorldStateSnapshot } from '../../../src/types/index.js';
import {
  ScriptedDecisionBackend,
  createMessage,
  createMockLogger,
  loggedMessages,
  type MockLogger,
} from '../../helpers/factories.js';

const ROOM = '!room:example.org';

describe('DecisionGateway', () => {
  let logger: MockLogger;
  let metrics: InMemoryMetrics;
  let snapshot: WorldStateSnapshot;

  beforeEach(() => {
    logger = createMockLogger();
    metrics = new InMemoryMetrics();
    const world = new WorldState();
    world.recordMessage(ROOM, createMessage({ id: '$hello', content: 'hello' }));
    snapshot = world.snapshot();
  });

  function gateway(steps: unknown[], maxActionsPerCycle = 3, timeoutMs = 1_000) {
    const backend = new ScriptedDecisionBackend(steps);
    return {
      backend,
      gateway: new DecisionGateway({ backend, logger, metrics }, { maxActionsPerCycle, timeoutMs }),
    };
  }

  it('returns validated actions', async () => {
    const { gateway: gw, backend } = gateway([
      { actions: [{ kind: 'reply', channelId: ROOM, messageId: '$hello', content: 'hi!' }], reasoning: 'greeted' },
    ]);

    const decision = await gw.decide(snapshot);

    expect(decision.actions).toEqual([{ kind: 'reply', channelId: ROOM, messageId: '$hello', content: 'hi!' }]);
    expect(decision.dropped).toBe(0);
    expect(decision.reasoning).toBe('greeted');
    expect(backend.payloads[0]?.channels[0]?.messages[0]?.id).toBe('$hello');
    expect(backend.payloads[0]?.knobs.maxActions).toBe(3);
    expect(loggedMessages(logger, 'info')).toEqual(['Decision received']);
  });

  it('treats empty output as nothing to do', async () => {
    const { gateway: gw } = gateway(['']);

    const decision = await gw.decide(snapshot);

    expect(decision.actions).toEqual([]);
    expect(loggedMessages(logger, 'info')).toEqual(['Decision: nothing to do']);
  });

  it('drops entries that fail validation and keeps the rest', async () => {
    const { gateway: gw } = gateway([
      {
        actions: [
          { kind: 'reply', channelId: ROOM, content: 'missing target' },
          { kind: 'wait' },
          { kind: 'teleport' },
        ],
      },
    ]);

    const decision = await gw.decide(snapshot);

    expect(decision.actions).toEqual([{ kind: 'wait' }]);
    expect(decision.dropped).toBe(2);
    expect(loggedMessages(logger, 'warn')).toEqual([
      'Dropping non-conforming action',
      'Dropping non-conforming action',
    ]);
    expect(metrics.getCounter('gateway_actions_dropped_total', {})).toBe(2);
  });

  it('orders by priority and truncates to the per-cycle maximum', async () => {
    const { gateway: gw } = gateway(
      [
        {
          actions: [
            { kind: 'wait' },
            { kind: 'send_message', channelId: ROOM, content: 'low', priority: 1 },
            { kind: 'post', platform: 'farcaster', content: 'high', priority: 5 },
          ],
        },
      ],
      2
    );

    const decision = await gw.decide(snapshot);

    expect(decision.actions.map((a) => a.kind)).toEqual(['post', 'send_message']);
    expect(decision.truncated).toBe(1);
    expect(loggedMessages(logger, 'warn')).toEqual(['Decision returned too many actions, truncating']);
  });

  it('keeps proposal order when no priorities are given', async () => {
    const { gateway: gw } = gateway(
      [
        {
          actions: [
            { kind: 'send_message', channelId: ROOM, content: 'first' },
            { kind: 'send_message', channelId: ROOM, content: 'second' },
            { kind: 'send_message', channelId: ROOM, content: 'third' },
          ],
        },
      ],
      2
    );

    const decision = await gw.decide(snapshot);

    expect(decision.actions.map((a) => (a.kind === 'send_message' ? a.content : ''))).toEqual(['first', 'second']);
  });

  it('raises a timeout GatewayError when the backend is too slow', async () => {
    const { gateway: gw } = gateway([() => new Promise(() => undefined)], 3, 20);

    const error = await gw.decide(snapshot).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GatewayError);
    expect(error instanceof GatewayError && error.reason).toBe('timeout');
    expect(metrics.getCounter('gateway_failures_total', { reason: 'timeout' })).toBe(1);
  });

  it('raises a transport GatewayError when the backend throws', async () => {
    const cause = new Error('connection refused');
    const { gateway: gw } = gateway([cause]);

    const error = await gw.decide(snapshot).catch((e: unknown) => e);

    expect(error instanceof GatewayError && error.reason).toBe('transport');
    expect(error instanceof GatewayError && error.cause).toBe(cause);
    expect(error instanceof GatewayError && error.message).toBe(
      'Decision backend scripted failed: connection refused'
    );
  });

  it('raises a malformed GatewayError for unparseable output', async () => {
    const { gateway: gw } = gateway(['I think we should say hi']);

    await expect(gw.decide(snapshot)).rejects.toMatchObject({ reason: 'malformed' });
    expect(metrics.getCounter('gateway_failures_total', { reason: 'malformed' })).toBe(1);
  });
});
