/**
 * Logger port.
 *
 * Mirrors the subset of pino's API the orchestrator uses, so components take
 * a logger by injection and tests can hand in a recording fake.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;

  /** Derive a logger whose entries carry the extra bindings */
  child(bindings: Record<string, unknown>): Logger;
}

