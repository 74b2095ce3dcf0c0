import pino from "pino";

export interface LoggerSink {
  debug?(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

const PREFIX = "[strata]";

function pinoSink(): LoggerSink {
  const logger = pino({ name: "strata", level: "debug" });
  return {
    debug: (msg) => logger.debug(msg),
    info: (msg) => logger.info(msg),
    warn: (msg) => logger.warn(msg),
    error: (msg) => logger.error(msg),
  };
}

let sink: LoggerSink | null = null;
let debugEnabled = false;

function activeSink(): LoggerSink {
  if (!sink) sink = pinoSink();
  return sink;
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.stack ?? err.message;
  return String(err);
}

/**
 * Route all substrate logging through `next` (a host logger) or, when the
 * host supplies none, through a pino logger on stdout.
 */
export function initLogger(next: LoggerSink | undefined, debug: boolean): void {
  sink = next ?? null;
  debugEnabled = debug;
}

export const log = {
  debug(msg: string): void {
    if (!debugEnabled) return;
    const s = activeSink();
    (s.debug ?? s.info).call(s, `${PREFIX} ${msg}`);
  },
  info(msg: string): void {
    activeSink().info(`${PREFIX} ${msg}`);
  },
  warn(msg: string, err?: unknown): void {
    activeSink().warn(err === undefined ? `${PREFIX} ${msg}` : `${PREFIX} ${msg}: ${describe(err)}`);
  },
  error(msg: string, err?: unknown): void {
    activeSink().error(err === undefined ? `${PREFIX} ${msg}` : `${PREFIX} ${msg}: ${describe(err)}`);
  },
};
