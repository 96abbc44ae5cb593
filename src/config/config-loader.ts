import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError } from '../core/errors.js';
import type { ConfigFile, LogLevel, MergedConfig } from './config-schema.js';
import { CONFIG_FILE_VERSION, DEFAULT_CONFIG, configFileSchema } from './config-schema.js';

const CONFIG_FILE_NAME = 'orchestrator.json';
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables (secrets, model, paths)
 * 2. Config file (data/config/orchestrator.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private loadedConfig: ConfigFile | null = null;
  private readonly warnings: string[] = [];

  constructor(
    private readonly configPath = 'data/config',
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * @throws ConfigError when the file exists but cannot be read or validated
   */
  async load(): Promise<MergedConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const config = structuredClone(DEFAULT_CONFIG);
    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }
    this.mergeEnvironment(config);
    return config;
  }

  getLoadedConfigFile(): ConfigFile | null {
    return this.loadedConfig;
  }

  /**
   * Non-fatal problems found while loading, for logging once a logger exists.
   */
  getWarnings(): readonly string[] {
    return this.warnings;
  }

  private async loadConfigFile(): Promise<ConfigFile | null> {
    const filePath = join(this.configPath, CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to read config file ${filePath}: ${message}`, [], { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Config file ${filePath} is not valid JSON: ${message}`, [], { cause: error });
    }

    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      throw new ConfigError(`Config file ${filePath} is invalid`, issues);
    }

    const version = parsed.data.version;
    if (version !== undefined && version > CONFIG_FILE_VERSION) {
      this.warnings.push(
        `Config file version (${String(version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }
    return parsed.data;
  }

  private mergeConfigFile(config: MergedConfig, file: ConfigFile): void {
    if (file.loop) {
      config.loop = {
        ...config.loop,
        ...file.loop,
        burst: { ...config.loop.burst, ...file.loop.burst },
      };
    }

    if (file.gateway) {
      config.gateway = { ...config.gateway, ...file.gateway };
    }

    if (file.retention) {
      config.retention = { ...config.retention, ...file.retention };
    }

    if (file.executor) {
      const executor = file.executor;
      config.executor = {
        ...config.executor,
        ...executor,
        actionLimits: {
          perKind: { ...config.executor.actionLimits.perKind, ...executor.actionLimits?.perKind },
          perPlatform: { ...config.executor.actionLimits.perPlatform, ...executor.actionLimits?.perPlatform },
        },
        contentLimits: { ...config.executor.contentLimits, ...executor.contentLimits },
        circuit: { ...config.executor.circuit, ...executor.circuit },
      };
    }

    if (file.queue) {
      config.queue = { ...config.queue, ...file.queue };
    }

    if (file.persistence) {
      config.persistence = { ...config.persistence, ...file.persistence };
    }

    if (file.llm) {
      const llm = file.llm;
      if (llm.model) config.llm.model = llm.model;
      if (llm.appName) config.llm.appName = llm.appName;
      if (llm.siteUrl) config.llm.siteUrl = llm.siteUrl;
      if (llm.temperature !== undefined) config.llm.temperature = llm.temperature;
      if (llm.maxTokens !== undefined) config.llm.maxTokens = llm.maxTokens;
      if (llm.persona !== undefined) config.llm.persona = llm.persona;
      if (llm.timezone) config.llm.timezone = llm.timezone;
      if (llm.local?.baseUrl) config.llm.local.baseUrl = llm.local.baseUrl;
      if (llm.local?.model) config.llm.local.model = llm.local.model;
    }

    if (file.logging) {
      config.logging = { ...config.logging, ...file.logging };
    }
  }

  private mergeEnvironment(config: MergedConfig): void {
    const openRouterKey = this.env['OPENROUTER_API_KEY'];
    if (openRouterKey) {
      config.llm.openRouterApiKey = openRouterKey;
    }

    const model = this.env['LLM_MODEL'];
    if (model) {
      config.llm.model = model;
    }

    const localUrl = this.env['LOCAL_LLM_BASE_URL'];
    if (localUrl) {
      config.llm.local.baseUrl = localUrl;
    }

    const localModel = this.env['LOCAL_LLM_MODEL'];
    if (localModel) {
      config.llm.local.model = localModel;
    }

    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel) {
      if (isLogLevel(logLevel)) {
        config.logging.level = logLevel;
      } else {
        this.warnings.push(`Ignoring unknown LOG_LEVEL "${logLevel}"`);
      }
    }

    const dataDir = this.env['DATA_DIR'];
    if (dataDir) {
      config.paths.data = dataDir;
      config.paths.config = join(dataDir, 'config');
      config.paths.state = join(dataDir, 'state');
      config.paths.logs = join(dataDir, 'logs');
      config.logging.logDir = config.paths.logs;
    }
  }
}

export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string, env?: NodeJS.ProcessEnv): Promise<MergedConfig> {
  return createConfigLoader(configPath, env).load();
}
