import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createContainer } from '../../../src/core/container.js';
import { ConfigError } from '../../../src/core/errors.js';
import { ScriptedDecisionBackend, createMessage, createMockLogger } from '../../helpers/factories.js';

const ROOM = '!room:example.org';

describe('createContainer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'conductor-container-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function build(): ReturnType<typeof createContainer> {
    return createContainer({
      configPath: join(dir, 'config'),
      env: { DATA_DIR: dir },
      logger: createMockLogger(),
      decisionBackend: new ScriptedDecisionBackend([{ actions: [] }]),
    });
  }

  it('refuses to start without a decision backend', async () => {
    await expect(
      createContainer({ configPath: join(dir, 'config'), env: { DATA_DIR: dir }, logger: createMockLogger() })
    ).rejects.toThrow(ConfigError);
  });

  it('routes actions to dry-run back-ends by default', async () => {
    const container = await build();
    container.worldState.recordMessage(ROOM, createMessage());

    const report = await container.executor.execute(
      [{ kind: 'send_message', channelId: ROOM, content: 'hello' }],
      { cycleId: 'cycle-1' }
    );

    const outcome = report.records[0]?.outcome;
    expect(outcome?.status).toBe('success');
    expect(outcome?.status === 'success' ? outcome.referenceId : '').toMatch(/^dry-run:matrix:/);
  });

  it('persists on shutdown and restores on the next build', async () => {
    const first = await build();
    first.worldState.recordMessage(ROOM, createMessage());
    await first.executor.execute([{ kind: 'send_message', channelId: ROOM, content: 'hello' }], {
      cycleId: 'cycle-1',
    });
    first.detector.advance('fp-1', 3);
    await first.shutdown();

    const second = await build();

    expect(second.worldState.getActionHistory().map((r) => r.content)).toEqual(['hello']);
    expect(second.detector.getReference()).toEqual({ fingerprint: 'fp-1', cycleSeq: 3 });
    expect(second.config.paths.state).toBe(join(dir, 'state'));
  });
});
