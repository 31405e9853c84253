/**
 * logger.ts — Human-readable progress logger for the harvesting pipeline.
 *
 * Every line carries an ISO timestamp, the level and the module context:
 *
 *   [2026-10-19T08:30:00.000Z] [INFO ] [HarvestCoordinator] Batch 3/12 done…
 *
 * `debug` lines are only written when LOG_LEVEL=debug.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function thresholdFromEnv(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return LEVEL_ORDER[raw];
  }
  return LEVEL_ORDER.info;
}

/**
 * Lightweight logger that emits timestamped messages tagged with a context.
 *
 * Usage:
 *   const logger = new Logger('TickerDiscovery');
 *   logger.info('Region us: 4 200 tickers advertised, paging by 100…');
 */
export class Logger {
  /** A label prepended to every message so you can tell which module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  /** Request-level detail: page offsets, individual retries. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: session acquired, page fetched, batch written. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Unexpected but non-fatal: throttled request, total drift, missing symbol. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: acquisition failed, writer error, aborted run. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private emit(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < thresholdFromEnv()) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}
