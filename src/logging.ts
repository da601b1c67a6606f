import pino from "pino";

export interface ILogger {
  debug: (obj: object, msg?: string) => void;
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  child: (bindings: Record<string, unknown>) => ILogger;
}

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

const envLevel = (): string => {
  const lvl = process.env.LOG_LEVEL;
  return lvl && LEVELS.includes(lvl) ? lvl : "info";
};

export const makeLogger = (
  opts: { level?: pino.LevelWithSilent | string; pretty?: boolean } = {},
): ILogger => {
  const level = opts.level ?? envLevel();
  if (!opts.pretty) return pino({ level });
  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss.l" },
    },
  });
};

/** bigints do not survive pino's JSON serializer */
export const big = (v: bigint): string => v.toString();
