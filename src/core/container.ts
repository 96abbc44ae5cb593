import type { Logger, Metrics } from '../types/index.js';
import { PLATFORMS } from '../types/index.js';
import type { BackendRegistry, DecisionBackend, Observer } from '../ports/index.js';
import { type MergedConfig, createConfigLoader } from '../config/index.js';
import { createDecisionLogger, createLogger, setDecisionLogger } from './logger.js';
import { createMetrics } from './metrics.js';
import { ConfigError, describeError } from './errors.js';
import { CircuitBreakerRegistry } from './circuit-breaker.js';
import { CycleRateLimiter } from './cycle-rate-limiter.js';
import { type SystemStatusTracker, createSystemStatusTracker } from './system-status.js';
import { type OrchestrationLoop, createOrchestrationLoop } from './orchestration-loop.js';
import { type WorldState, createWorldState } from '../world/world-state.js';
import { type ObservationQueue, createObservationQueue } from '../world/observation-queue.js';
import { type ChangeDetector, createChangeDetector } from '../world/change-detector.js';
import { type DecisionGateway, createDecisionGateway, createLlmDecisionBackend } from '../decision/index.js';
import { type ActionExecutor, createActionExecutor } from '../actions/executor.js';
import { ActionRateLimiter } from '../actions/action-rate-limiter.js';
import { createDryRunBackend } from '../actions/dry-run-backend.js';
import { type WorldStateStore, createJSONStorage, createWorldStateStore } from '../storage/index.js';
import { createVercelAIProvider, type LLMProvider } from '../llm/index.js';

/**
 * Pieces the caller may supply instead of the defaults built from config.
 */
export interface ContainerOverrides {
  /** Replaces the LLM decision backend */
  decisionBackend?: DecisionBackend | undefined;
  /** Real platform and media back-ends; gaps are filled with dry-run back-ends when `executor.dryRun` is on */
  backends?: Partial<BackendRegistry> | undefined;
  observers?: Observer[] | undefined;
  configPath?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  logger?: Logger | undefined;
}

export interface Container {
  config: MergedConfig;
  logger: Logger;
  metrics: Metrics;
  worldState: WorldState;
  queue: ObservationQueue;
  detector: ChangeDetector;
  gateway: DecisionGateway;
  executor: ActionExecutor;
  status: SystemStatusTracker;
  store: WorldStateStore;
  loop: OrchestrationLoop;
  observers: Observer[];
  /** Start observers, then the loop */
  start: () => Promise<void>;
  /** Stop observers and the loop, then persist */
  shutdown: () => Promise<void>;
}

function createProvider(config: MergedConfig, logger: Logger): LLMProvider {
  const { llm } = config;
  if (llm.local.baseUrl && llm.local.model) {
    return createVercelAIProvider({ baseUrl: llm.local.baseUrl, model: llm.local.model }, { logger });
  }
  if (llm.openRouterApiKey) {
    return createVercelAIProvider(
      {
        apiKey: llm.openRouterApiKey,
        model: llm.model,
        appName: llm.appName,
        siteUrl: llm.siteUrl ?? undefined,
      },
      { logger }
    );
  }
  throw new ConfigError('No decision backend configured', [
    'set OPENROUTER_API_KEY, or LOCAL_LLM_BASE_URL and LOCAL_LLM_MODEL',
  ]);
}

function resolveBackends(
  config: MergedConfig,
  logger: Logger,
  supplied: Partial<BackendRegistry> = {}
): BackendRegistry {
  const registry: BackendRegistry = {
    platforms: { ...supplied.platforms },
    media: { ...supplied.media },
  };
  if (!config.executor.dryRun) return registry;

  for (const platform of PLATFORMS) {
    registry.platforms[platform] ??= createDryRunBackend(platform, logger);
  }
  registry.media.arweave ??= createDryRunBackend('arweave', logger);
  registry.media.s3 ??= createDryRunBackend('s3', logger);
  return registry;
}

/**
 * Build the application: config, logging, world model, decision and action
 * pipeline, persistence and the loop. Restores persisted state before
 * returning; nothing is started.
 *
 * @throws ConfigError when configuration is invalid or incomplete
 */
export async function createContainer(overrides: ContainerOverrides = {}): Promise<Container> {
  const loader = createConfigLoader(overrides.configPath, overrides.env);
  const config = await loader.load();

  const logger: Logger =
    overrides.logger ??
    createLogger({
      logDir: config.logging.logDir,
      maxFiles: config.logging.maxFiles,
      level: config.logging.level,
      pretty: config.logging.pretty,
    });
  for (const warning of loader.getWarnings()) {
    logger.warn({ warning }, 'Configuration warning');
  }
  if (!overrides.logger) {
    setDecisionLogger(createDecisionLogger(config.logging.logDir, 'info', config.logging.maxFiles));
  }

  const metrics = createMetrics();
  const worldState = createWorldState(config.retention, { logger });
  const queue = createObservationQueue(config.queue.capacity, logger, metrics);
  const detector = createChangeDetector(logger);

  const backend =
    overrides.decisionBackend ??
    createLlmDecisionBackend(createProvider(config, logger), logger, {
      model: config.llm.local.baseUrl ? (config.llm.local.model ?? undefined) : config.llm.model,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      persona: config.llm.persona ?? undefined,
      timezone: config.llm.timezone,
    });
  const gateway = createDecisionGateway(
    { backend, logger, metrics },
    { ...config.gateway, staleAfterMs: config.executor.staleAfterMs }
  );

  const executor = createActionExecutor(
    {
      worldState,
      backends: resolveBackends(config, logger, overrides.backends),
      logger,
      metrics,
      actionLimiter: new ActionRateLimiter(config.executor.actionLimits),
      circuits: new CircuitBreakerRegistry({ ...config.executor.circuit, logger }),
    },
    config.executor
  );

  const status = createSystemStatusTracker(worldState, logger, metrics);
  const cycleLimiter = new CycleRateLimiter(
    {
      minCycleIntervalMs: config.loop.minCycleIntervalMs,
      maxCyclesPerHour: config.loop.maxCyclesPerHour,
      burst: config.loop.burst,
    },
    logger
  );

  const store = createWorldStateStore(
    createJSONStorage(config.paths.state, { logger }),
    worldState,
    detector,
    logger,
    { saveEveryCycles: config.persistence.saveEveryCycles }
  );
  await store.restore();

  const loop = createOrchestrationLoop(
    { worldState, queue, detector, gateway, executor, cycleLimiter, status, logger, metrics, store },
    config.loop
  );

  const observers = overrides.observers ?? [];
  const containerLogger = logger.child({ component: 'container' });

  const start = async (): Promise<void> => {
    for (const observer of observers) {
      await observer.start(queue, { wake: () => loop.wake() });
      containerLogger.info({ observer: observer.name }, 'Observer started');
    }
    loop.start();
  };

  const shutdown = async (): Promise<void> => {
    containerLogger.info('Shutting down...');

    for (const observer of observers) {
      try {
        await observer.stop();
      } catch (error) {
        containerLogger.error({ observer: observer.name, error: describeError(error) }, 'Observer failed to stop');
      }
    }

    await loop.stop();

    try {
      await store.save();
    } catch (error) {
      containerLogger.error({ error: describeError(error) }, 'Failed to save world state on shutdown');
    }

    containerLogger.info(
      { stats: loop.getStats().outcomes, world: worldState.getStats(), metrics: metrics.toJSON() },
      'Shutdown complete'
    );
    setDecisionLogger(null);
  };

  containerLogger.info(
    {
      dryRun: config.executor.dryRun,
      decisionBackend: backend.name,
      stateDir: config.paths.state,
      observers: observers.map((o) => o.name),
    },
    'Container ready'
  );

  return {
    config,
    logger,
    metrics,
    worldState,
    queue,
    detector,
    gateway,
    executor,
    status,
    store,
    loop,
    observers,
    start,
    shutdown,
  };
}
