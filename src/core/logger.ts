import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { getTraceContext } from './trace-context.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Log files of each kind to keep */
  maxFiles: number;
  level: pino.Level;
  /** Pretty console output (development) */
  pretty: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

const MAIN_LOG_PREFIX = 'conductor-';
const DECISION_LOG_PREFIX = 'decisions-';

function timestampedFilename(prefix: string): string {
  return `${prefix}${new Date().toISOString().replace(/[:.]/g, '-')}.log`;
}

interface CleanupFailure {
  file: string;
  error: string;
}

/**
 * Remove empty log files with the given prefix and all but the newest
 * `maxFiles` non-empty ones. Returns the files that could not be removed.
 */
export function cleanupOldLogs(logDir: string, prefix: string, maxFiles: number): CleanupFailure[] {
  if (!fs.existsSync(logDir)) {
    return [];
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(prefix) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const empty = files.filter((f) => f.size === 0);
  const stale = files
    .filter((f) => f.size > 0)
    .sort((a, b) => b.mtime - a.mtime)
    .slice(maxFiles);

  const failures: CleanupFailure[] = [];
  for (const file of [...empty, ...stale]) {
    try {
      fs.rmSync(file.path, { force: true });
    } catch (error) {
      failures.push({ file: file.path, error: error instanceof Error ? error.message : String(error) });
    }
  }
  return failures;
}

function ensureLogDir(logDir: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

/**
 * Pino mixin that copies the active trace context (cycle id, span) into every
 * entry. Fields passed explicitly to a log call win over these.
 */
function createTraceMixin(): () => Record<string, unknown> {
  const TRACE_KEYS = ['traceId', 'correlationId', 'parentId', 'spanId'] as const;

  return () => {
    const ctx = getTraceContext();
    if (!ctx) return {};

    const result: Record<string, unknown> = {};
    for (const key of TRACE_KEYS) {
      if (ctx[key]) {
        result[key] = ctx[key];
      }
    }
    return result;
  };
}

/**
 * Create the main application logger.
 *
 * Console output goes through pino-pretty in development and raw JSON to
 * stdout otherwise; every run also gets its own timestamped file under
 * `logDir`.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty } = { ...DEFAULT_CONFIG, ...config };

  ensureLogDir(logDir);
  const cleanupFailures = cleanupOldLogs(logDir, MAIN_LOG_PREFIX, maxFiles);

  const targets: pino.TransportTargetOptions[] = [
    pretty
      ? { target: 'pino-pretty', level, options: { colorize: true } }
      : { target: 'pino/file', level, options: { destination: 1 } },
    {
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logDir, timestampedFilename(MAIN_LOG_PREFIX)),
        mkdir: true,
        colorize: false,
      },
    },
  ];

  const logger = pino({
    level,
    transport: { targets },
    mixin: createTraceMixin(),
  });

  for (const failure of cleanupFailures) {
    logger.warn(failure, 'Could not remove old log file');
  }

  return logger;
}

/**
 * Create the decision logger: a plain-text file holding every prompt sent to
 * the decision service and every raw response, prefixed with time and cycle id.
 */
export function createDecisionLogger(
  logDir = './data/logs',
  level: pino.Level = 'info',
  maxFiles = 10
): pino.Logger {
  ensureLogDir(logDir);
  cleanupOldLogs(logDir, DECISION_LOG_PREFIX, maxFiles);

  const stream = fs.createWriteStream(path.join(logDir, timestampedFilename(DECISION_LOG_PREFIX)), {
    flags: 'a',
  });

  const destination = {
    write(chunk: string): void {
      let parsed: unknown;
      try {
        parsed = JSON.parse(chunk);
      } catch {
        stream.write(chunk);
        return;
      }
      if (typeof parsed !== 'object' || parsed === null) return;
      const entry: Record<string, unknown> = { ...parsed };
      const { msg, time, traceId } = entry;
      if (typeof msg !== 'string') return;

      let prefix = typeof time === 'number' ? `[${new Date(time).toISOString().slice(11, 23)}] ` : '';
      if (typeof traceId === 'string') {
        prefix += `[${traceId.slice(0, 8)}] `;
      }
      stream.write(prefix + msg + '\n');
    },
  };

  return pino({ level, mixin: createTraceMixin() }, destination);
}

let decisionLogger: pino.Logger | null = null;

/**
 * Install the decision logger. Called once by the container.
 */
export function setDecisionLogger(logger: pino.Logger | null): void {
  decisionLogger = logger;
}

/**
 * Write to the decision log; a no-op until a decision logger is installed.
 */
export function logDecision(obj: object, msg: string): void {
  decisionLogger?.info(obj, msg);
}
