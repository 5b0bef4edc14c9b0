import pino from "pino";
import { bytesToHex } from "./utils/bytes";

export type LogLevel = pino.LevelWithSilent;

export type ILogger = Pick<pino.Logger, "debug" | "info" | "warn" | "error" | "child">;

export const makeLogger = (level: LogLevel = "info", pretty = false): pino.Logger =>
  pretty && level !== "silent"
    ? pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      })
    : pino({ level });

/** bigint → decimal string, bytes → hex, recursively. */
export const loggable = (v: unknown): unknown => {
  if (typeof v === "bigint") return v.toString();
  if (v instanceof Uint8Array) return bytesToHex(v);
  if (Array.isArray(v)) return v.map(loggable);
  if (v !== null && typeof v === "object")
    return Object.fromEntries(Object.entries(v).map(([k, x]) => [k, loggable(x)]));
  return v;
};
