import { z } from 'zod';
import type { ExecutableKind, Platform } from '../types/index.js';

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();
const platformMap = z.object({ matrix: positiveInt, farcaster: positiveInt }).partial().strict();

/**
 * Schema of data/config/orchestrator.json.
 *
 * Every field is optional; defaults fill the gaps. Unknown keys are rejected
 * so that typos surface at startup instead of being silently ignored.
 */
export const configFileSchema = z
  .object({
    version: positiveInt,
    loop: z
      .object({
        tickIntervalMs: positiveInt,
        minCycleIntervalMs: nonNegativeInt,
        maxCyclesPerHour: positiveInt,
        scheduledObservationIntervalMs: positiveInt,
        maxEventsPerTick: positiveInt,
        burst: z
          .object({
            enabled: z.boolean(),
            windowMs: positiveInt,
            maxCycles: positiveInt,
            cooldownMultiplier: z.number().positive(),
          })
          .partial()
          .strict(),
      })
      .partial()
      .strict(),
    gateway: z
      .object({
        timeoutMs: positiveInt,
        maxActionsPerCycle: positiveInt,
        messageDepth: nonNegativeInt,
        actionHistoryDepth: nonNegativeInt,
      })
      .partial()
      .strict(),
    retention: z
      .object({
        messagesPerChannel: positiveInt,
        actionHistory: positiveInt,
        seenIdsPerChannel: positiveInt,
      })
      .partial()
      .strict(),
    executor: z
      .object({
        maxRetries: nonNegativeInt,
        baseDelayMs: nonNegativeInt,
        maxDelayMs: nonNegativeInt,
        actionTimeoutMs: positiveInt,
        staleAfterMs: positiveInt,
        lowQuotaThreshold: nonNegativeInt,
        dryRun: z.boolean(),
        actionLimits: z
          .object({
            perKind: z
              .object({
                send_message: positiveInt,
                reply: positiveInt,
                post: positiveInt,
                react: positiveInt,
                upload_media: positiveInt,
              })
              .partial()
              .strict(),
            perPlatform: platformMap,
          })
          .partial()
          .strict(),
        contentLimits: platformMap,
        circuit: z
          .object({
            failureThreshold: positiveInt,
            windowMs: positiveInt,
            resetTimeoutMs: positiveInt,
          })
          .partial()
          .strict(),
      })
      .partial()
      .strict(),
    queue: z.object({ capacity: positiveInt }).partial().strict(),
    persistence: z.object({ saveEveryCycles: nonNegativeInt }).partial().strict(),
    llm: z
      .object({
        model: z.string().min(1),
        appName: z.string().min(1),
        siteUrl: z.string().url(),
        temperature: z.number().min(0).max(2),
        maxTokens: positiveInt,
        persona: z.string(),
        timezone: z.string().min(1),
        local: z
          .object({ baseUrl: z.string().url(), model: z.string().min(1) })
          .partial()
          .strict(),
      })
      .partial()
      .strict(),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']),
        pretty: z.boolean(),
        maxFiles: positiveInt,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Final configuration after merging defaults, the config file and the
 * environment (highest priority).
 */
export interface MergedConfig {
  loop: {
    tickIntervalMs: number;
    minCycleIntervalMs: number;
    maxCyclesPerHour: number;
    scheduledObservationIntervalMs: number;
    maxEventsPerTick: number;
    burst: {
      enabled: boolean;
      windowMs: number;
      maxCycles: number;
      cooldownMultiplier: number;
    };
  };

  gateway: {
    timeoutMs: number;
    maxActionsPerCycle: number;
    messageDepth: number;
    actionHistoryDepth: number;
  };

  retention: {
    messagesPerChannel: number;
    actionHistory: number;
    /** Message ids remembered per channel for dedupe after eviction */
    seenIdsPerChannel: number;
  };

  executor: {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    actionTimeoutMs: number;
    staleAfterMs: number;
    lowQuotaThreshold: number;
    /** Route every action to a logging back-end instead of a real platform */
    dryRun: boolean;
    actionLimits: {
      perKind: Partial<Record<ExecutableKind, number>>;
      perPlatform: Partial<Record<Platform, number>>;
    };
    contentLimits: Record<Platform, number>;
    circuit: {
      failureThreshold: number;
      windowMs: number;
      resetTimeoutMs: number;
    };
  };

  queue: {
    capacity: number;
  };

  persistence: {
    /** Save after every N completed cycles (0 = shutdown only) */
    saveEveryCycles: number;
  };

  llm: {
    openRouterApiKey: string | null;
    model: string;
    /** App name for API tracking (shows in provider dashboards) */
    appName: string;
    siteUrl: string | null;
    temperature: number;
    maxTokens: number;
    persona: string | null;
    timezone: string;
    /** OpenAI-compatible local server; used instead of OpenRouter when set */
    local: {
      baseUrl: string | null;
      model: string | null;
    };
  };

  logging: {
    level: LogLevel;
    pretty: boolean;
    logDir: string;
    maxFiles: number;
  };

  paths: {
    data: string;
    config: string;
    state: string;
    logs: string;
  };
}

export const DEFAULT_CONFIG: MergedConfig = {
  loop: {
    tickIntervalMs: 2_000,
    minCycleIntervalMs: 12_000,
    maxCyclesPerHour: 30,
    scheduledObservationIntervalMs: 60_000,
    maxEventsPerTick: 500,
    burst: {
      enabled: true,
      windowMs: 5 * 60 * 1000,
      maxCycles: 20,
      cooldownMultiplier: 1.5,
    },
  },
  gateway: {
    timeoutMs: 60_000,
    maxActionsPerCycle: 3,
    messageDepth: 10,
    actionHistoryDepth: 20,
  },
  retention: {
    messagesPerChannel: 50,
    actionHistory: 100,
    seenIdsPerChannel: 1000,
  },
  executor: {
    maxRetries: 2,
    baseDelayMs: 1_000,
    maxDelayMs: 8_000,
    actionTimeoutMs: 30_000,
    staleAfterMs: 5 * 60 * 1000,
    lowQuotaThreshold: 1,
    dryRun: true,
    actionLimits: {
      perKind: { send_message: 100, reply: 100, post: 50, react: 200, upload_media: 30 },
      perPlatform: { matrix: 50, farcaster: 30 },
    },
    contentLimits: { matrix: 4000, farcaster: 320 },
    circuit: {
      failureThreshold: 3,
      windowMs: 5 * 60 * 1000,
      resetTimeoutMs: 10 * 60 * 1000,
    },
  },
  queue: {
    capacity: 1000,
  },
  persistence: {
    saveEveryCycles: 5,
  },
  llm: {
    openRouterApiKey: null,
    model: 'anthropic/claude-haiku-4.5',
    appName: 'Conductor',
    siteUrl: null,
    temperature: 0.4,
    maxTokens: 1500,
    persona: null,
    timezone: 'utc',
    local: {
      baseUrl: null,
      model: null,
    },
  },
  logging: {
    level: 'info',
    pretty: true,
    logDir: 'data/logs',
    maxFiles: 10,
  },
  paths: {
    data: 'data',
    config: 'data/config',
    state: 'data/state',
    logs: 'data/logs',
  },
};
