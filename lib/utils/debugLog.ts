// lib/utils/debugLog.ts

import fs from "fs";
import path from "path";

type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const isDebug = () => process.env.DEBUG === "true";
const toFile = () => process.env.LOG_TO_FILE === "true";

// 📁 Ruta del archivo de log (relativa al cwd si no es absoluta)
function logPath(): string {
  const file = process.env.LOG_FILE || "log.txt";
  return path.isAbsolute(file) ? file : path.join(process.cwd(), file);
}

function render(arg: unknown): string {
  if (arg instanceof Error) return arg.stack || `${arg.name}: ${arg.message}`;
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg, null, 2);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

// 📝 Escribe en el archivo de log con marca temporal
function writeLog(type: LogLevel, ...args: unknown[]) {
  if (!toFile()) return;
  const time = new Date().toISOString();
  const full = `[${time}] [${type.toUpperCase()}] ${args.map(render).join(" ")}\n`;
  try {
    fs.appendFileSync(logPath(), full);
  } catch (err) {
    console.error("❌ Error writing to log file:", err);
  }
}

export function debugLog(...args: unknown[]) {
  if (isDebug()) {
    console.log("🐞 DEBUG:", ...args);
    writeLog("debug", ...args);
  }
}

/** Logger con etiqueta de componente: `[booking-analyzer] ...`. */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => debugLog(prefix, ...args),
    info: (...args) => {
      console.log(prefix, ...args);
      writeLog("info", prefix, ...args);
    },
    warn: (...args) => {
      console.warn(prefix, ...args);
      writeLog("warn", prefix, ...args);
    },
    error: (...args) => {
      console.error(prefix, ...args);
      writeLog("error", prefix, ...args);
    },
  };
}
