import { Logger, LogLevel } from '../types/index.js';

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const LEVEL_TAGS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '[debug]',
  [LogLevel.INFO]: '[info] ',
  [LogLevel.WARN]: '[warn] ',
  [LogLevel.ERROR]: '[error]'
};

/**
 * Pick the starting level from `PREREQ_LOG_LEVEL`, falling back to the
 * older `PREREQ_VERBOSE=1` switch. Diagnostics stay quiet otherwise so the
 * progress lines on stdout are all a build log shows.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const named = LEVEL_ORDER.find(level => level === env.PREREQ_LOG_LEVEL?.toLowerCase());
  if (named) {
    return named;
  }
  return env.PREREQ_VERBOSE === '1' ? LogLevel.DEBUG : LogLevel.ERROR;
}

function renderMeta(meta: unknown): string {
  if (meta === undefined || meta === null || meta === '') {
    return '';
  }
  if (meta instanceof Error) {
    return `\n${meta.stack ?? `${meta.name}: ${meta.message}`}`;
  }
  if (typeof meta === 'object') {
    // errors nested in meta serialize to {} without this
    return `\n${JSON.stringify(meta, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value, 2)}`;
  }
  return ` ${String(meta)}`;
}

/**
 * Diagnostic logger writing to stderr. Components get a scoped child so a
 * line names the prerequisite it concerns.
 */
class StderrLogger implements Logger {
  constructor(private state: { level: LogLevel }, private readonly scope?: string) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.state.level);
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.enabled(level)) {
      return;
    }
    const scope = this.scope ? ` (${this.scope})` : '';
    process.stderr.write(`${new Date().toISOString()} ${LEVEL_TAGS[level]}${scope} ${message}${renderMeta(meta)}\n`);
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  /** Shares the level with its parent. */
  child(scope: string): StderrLogger {
    return new StderrLogger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }
}

export const logger = new StderrLogger({ level: resolveLogLevel() });
