export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
};

const ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function isLevel(value: string): value is LogLevel {
  return value in ORDER;
}

export function currentLevel(): LogLevel {
  const raw = (process.env.KEYLINE_LOG ?? "").trim().toLowerCase();
  return isLevel(raw) ? raw : "info";
}

export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, "silent">, message: string, data?: unknown) => {
    if (ORDER[level] < ORDER[currentLevel()]) return;
    const line = `[${scope}] ${message}`;
    const sink = level === "debug" ? console.debug : level === "info" ? console.log : level === "warn" ? console.warn : console.error;
    if (data === undefined) sink(line);
    else sink(line, data);
  };
  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data)
  };
}
