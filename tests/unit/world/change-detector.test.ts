import { describe, it, expect, beforeEach } from 'vitest';
import { ChangeDetector } from '../../../src/world/change-detector.js';
import { WorldState } from '../../../src/world/world-state.js';
import { fingerprint } from '../../../src/world/fingerprint.js';
import { createMessage, createMockLogger, loggedMessages, type MockLogger } from '../../helpers/factories.js';

describe('ChangeDetector', () => {
  let logger: MockLogger;
  let detector: ChangeDetector;
  let world: WorldState;

  beforeEach(() => {
    logger = createMockLogger();
    detector = new ChangeDetector(logger);
    world = new WorldState();
  });

  it('reports a change when there is no reference yet', () => {
    expect(detector.hasChanged(world.snapshot())).toBe(true);
    expect(detector.getReference()).toEqual({ fingerprint: null, cycleSeq: 0 });
  });

  it('is idempotent once advanced to the current fingerprint', () => {
    world.recordMessage('!a:example.org', createMessage());
    const snapshot = world.snapshot();
    detector.advance(fingerprint(snapshot), 1);

    expect(detector.hasChanged(snapshot)).toBe(false);
    expect(detector.hasChanged(world.snapshot())).toBe(false);
  });

  it('reports a change after new content arrives', () => {
    detector.advance(fingerprint(world.snapshot()), 1);
    world.recordMessage('!a:example.org', createMessage());

    expect(detector.hasChanged(world.snapshot())).toBe(true);
  });

  it('never moves backwards', () => {
    expect(detector.advance('fp-2', 2)).toBe(true);
    expect(detector.advance('fp-1', 1)).toBe(false);
    expect(detector.advance('fp-2b', 2)).toBe(false);

    expect(detector.getReference()).toEqual({ fingerprint: 'fp-2', cycleSeq: 2 });
    expect(loggedMessages(logger, 'warn')).toEqual([
      'Ignoring out-of-order fingerprint advance',
      'Ignoring out-of-order fingerprint advance',
    ]);
  });

  it('restores a persisted reference', () => {
    detector.restore('fp-9', 9);

    expect(detector.hasChangedFingerprint('fp-9')).toBe(false);
    expect(detector.advance('fp-5', 5)).toBe(false);
  });
});
