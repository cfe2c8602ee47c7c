import pino, { type Logger } from "pino";

export type { Logger };

export function createLogger(opts: { level?: string; name?: string } = {}): Logger {
  const level = String(opts.level || process.env.LOG_LEVEL || "info").trim().toLowerCase();
  return pino({
    name: opts.name ?? "reply-orchestrator",
    level,
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
