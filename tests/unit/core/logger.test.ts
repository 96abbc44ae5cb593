import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { cleanupOldLogs } from '../../../src/core/logger.js';

describe('cleanupOldLogs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'conductor-logs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function logFile(name: string, content: string, mtimeSeconds: number): Promise<void> {
    const file = join(dir, name);
    await writeFile(file, content);
    await utimes(file, mtimeSeconds, mtimeSeconds);
  }

  it('removes empty files and all but the newest maxFiles', async () => {
    await logFile('conductor-a.log', 'x', 1_000);
    await logFile('conductor-b.log', 'x', 2_000);
    await logFile('conductor-c.log', 'x', 3_000);
    await logFile('conductor-empty.log', '', 4_000);
    await logFile('decisions-a.log', 'x', 500);

    expect(cleanupOldLogs(dir, 'conductor-', 2)).toEqual([]);

    expect((await readdir(dir)).sort()).toEqual(['conductor-b.log', 'conductor-c.log', 'decisions-a.log']);
  });

  it('does nothing for a missing directory', () => {
    expect(cleanupOldLogs(join(dir, 'missing'), 'conductor-', 1)).toEqual([]);
  });
});
