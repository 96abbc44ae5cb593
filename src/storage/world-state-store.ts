import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { Logger } from '../types/index.js';
import type { Storage } from './storage.js';
import type { WorldState } from '../world/world-state.js';
import type { ChangeDetector } from '../world/change-detector.js';

/**
 * Bump when the persisted shape changes incompatibly.
 */
export const WORLD_STATE_STORE_VERSION = 1;

const actionErrorKindSchema = z.enum([
  'rate_limited',
  'transient',
  'permanent',
  'invalid_input',
  'validation',
  'duplicate',
  'circuit_open',
]);

const actionRecordSchema = z.object({
  id: z.string(),
  cycleId: z.string(),
  kind: z.enum(['send_message', 'reply', 'post', 'react', 'upload_media']),
  platform: z.enum(['matrix', 'farcaster']).optional(),
  channelId: z.string().optional(),
  messageId: z.string().optional(),
  content: z.string().optional(),
  contentHash: z.string().optional(),
  rationale: z.string().optional(),
  timestamp: z.number(),
  attempts: z.number().int().nonnegative(),
  outcome: z.discriminatedUnion('status', [
    z.object({ status: z.literal('success'), referenceId: z.string() }),
    z.object({ status: z.literal('failed'), errorKind: actionErrorKindSchema, message: z.string() }),
  ]),
});

const rateLimitSchema = z.object({
  remaining: z.number(),
  limit: z.number().optional(),
  resetAt: z.number(),
  observedAt: z.number(),
});

const persistedWorldSchema = z.object({
  version: z.literal(WORLD_STATE_STORE_VERSION),
  savedAt: z.string(),
  actionHistory: z.array(actionRecordSchema),
  rateLimits: z.record(rateLimitSchema),
  reference: z.object({
    fingerprint: z.string().nullable(),
    cycleSeq: z.number().int().nonnegative(),
  }),
});

export type PersistedWorld = z.infer<typeof persistedWorldSchema>;

export interface WorldStateStoreConfig {
  /** Storage key (default: 'world-state') */
  key: string;
  /** Save after every N completed cycles (0 = only on shutdown) */
  saveEveryCycles: number;
}

const DEFAULT_CONFIG: WorldStateStoreConfig = {
  key: 'world-state',
  saveEveryCycles: 5,
};

/**
 * Persists what must survive a restart: action history (so duplicates are
 * still refused), platform rate limits, and the change detector reference.
 * Channel messages are not persisted; observers replay them.
 */
export class WorldStateStore {
  private readonly config: WorldStateStoreConfig;
  private readonly logger: Logger;
  private cyclesSinceSave = 0;
  private lastSavedHash: string | null = null;

  constructor(
    private readonly storage: Storage,
    private readonly world: WorldState,
    private readonly detector: ChangeDetector,
    logger: Logger,
    config: Partial<WorldStateStoreConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger.child({ component: 'world-state-store' });
  }

  collect(): PersistedWorld {
    const snapshot = this.world.snapshot();
    return {
      version: WORLD_STATE_STORE_VERSION,
      savedAt: new Date(snapshot.capturedAt).toISOString(),
      actionHistory: snapshot.actionHistory.map((record) => ({ ...record })),
      rateLimits: { ...snapshot.rateLimits },
      reference: this.detector.getReference(),
    };
  }

  /**
   * Load and apply persisted state. Unreadable or invalid data is logged and
   * ignored; the process starts fresh.
   *
   * @returns whether anything was restored
   */
  async restore(): Promise<boolean> {
    const raw = await this.storage.load(this.config.key);
    if (raw === null) {
      this.logger.info('No persisted world state, starting fresh');
      return false;
    }

    const parsed = persistedWorldSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(
        { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
        'Persisted world state invalid, starting fresh'
      );
      return false;
    }

    const data = parsed.data;
    this.world.restore({ actionHistory: data.actionHistory, rateLimits: data.rateLimits });
    this.detector.restore(data.reference.fingerprint, data.reference.cycleSeq);
    this.logger.info(
      { savedAt: data.savedAt, actions: data.actionHistory.length, cycleSeq: data.reference.cycleSeq },
      'World state restored from storage'
    );
    return true;
  }

  /**
   * Save, skipping the write when nothing changed since the last save.
   * @returns whether a write happened
   */
  async save(): Promise<boolean> {
    const state = this.collect();
    const hash = createHash('sha256')
      .update(JSON.stringify({ ...state, savedAt: undefined }))
      .digest('hex');
    if (hash === this.lastSavedHash) {
      this.logger.debug('World state unchanged, skipping save');
      return false;
    }

    await this.storage.save(this.config.key, state);
    this.lastSavedHash = hash;
    this.cyclesSinceSave = 0;
    this.logger.debug({ actions: state.actionHistory.length }, 'World state saved');
    return true;
  }

  /**
   * Count a finished cycle and save when the interval is reached.
   */
  async onCycleCompleted(): Promise<void> {
    if (this.config.saveEveryCycles <= 0) return;
    this.cyclesSinceSave++;
    if (this.cyclesSinceSave >= this.config.saveEveryCycles) {
      this.cyclesSinceSave = 0;
      await this.save();
    }
  }
}

export function createWorldStateStore(
  storage: Storage,
  world: WorldState,
  detector: ChangeDetector,
  logger: Logger,
  config: Partial<WorldStateStoreConfig> = {}
): WorldStateStore {
  return new WorldStateStore(storage, world, detector, logger, config);
}
