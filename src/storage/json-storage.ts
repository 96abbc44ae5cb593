import { access, mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Storage } from './storage.js';
import type { Logger } from '../types/index.js';

export interface JSONStorageConfig {
  /** Directory holding one `<key>.json` file per key */
  basePath: string;
  /** Keep the previous version as `<key>.backup.json` (default: true) */
  createBackup?: boolean | undefined;
  logger?: Logger | undefined;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * JSON file storage.
 *
 * Writes go to a temp file that is renamed over the target, so a crash never
 * leaves a half-written file. A file that no longer parses is set aside as
 * `.corrupted` and the backup is used instead.
 */
export class JSONStorage implements Storage {
  private readonly basePath: string;
  private readonly createBackup: boolean;
  private readonly logger: Logger | undefined;

  constructor(config: JSONStorageConfig) {
    this.basePath = config.basePath;
    this.createBackup = config.createBackup ?? true;
    this.logger = config.logger?.child({ component: 'json-storage' });
  }

  private path(key: string, suffix = ''): string {
    return join(this.basePath, `${key}${suffix}.json`);
  }

  async load(key: string): Promise<unknown> {
    const primary = await this.readJson(this.path(key));
    if (primary.status === 'ok') return primary.value;
    if (primary.status === 'missing') return null;

    const corruptedPath = `${this.path(key)}.corrupted`;
    await rename(this.path(key), corruptedPath);
    this.logger?.warn({ key, corruptedPath, error: primary.message }, 'Corrupted file set aside');

    const backup = await this.readJson(this.path(key, '.backup'));
    if (backup.status === 'ok') {
      this.logger?.warn({ key }, 'Loaded from backup');
      return backup.value;
    }
    return null;
  }

  async save(key: string, data: unknown): Promise<void> {
    await mkdir(this.basePath, { recursive: true });

    const target = this.path(key);
    const temp = this.path(key, '.tmp');
    await writeFile(temp, JSON.stringify(data, null, 2), 'utf-8');

    if (this.createBackup && (await this.exists(key))) {
      try {
        await rename(target, this.path(key, '.backup'));
      } catch (error) {
        this.logger?.warn(
          { key, error: error instanceof Error ? error.message : String(error) },
          'Backup failed, saving without one'
        );
      }
    }

    await rename(temp, target);
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.path(key));
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return false;
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.path(key));
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return false;
      throw error;
    }
  }

  private async readJson(
    path: string
  ): Promise<{ status: 'ok'; value: unknown } | { status: 'missing' } | { status: 'corrupted'; message: string }> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return { status: 'missing' };
      throw error;
    }
    try {
      return { status: 'ok', value: JSON.parse(content) };
    } catch (error) {
      if (error instanceof SyntaxError) return { status: 'corrupted', message: error.message };
      throw error;
    }
  }
}

export function createJSONStorage(
  basePath: string,
  options: Omit<JSONStorageConfig, 'basePath'> = {}
): JSONStorage {
  return new JSONStorage({ basePath, ...options });
}
