type LevelName = "DEBUG" | "INFO" | "WARNING" | "ERROR";

const LEVEL_PRIORITY: Record<LevelName, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

// stdout carries the MCP stdio stream, so every record goes to stderr
function getLogLevel(): LevelName {
  const logLevel = process.env.LOG_LEVEL?.toLowerCase() || "info";

  switch (logLevel) {
    case "debug":
      return "DEBUG";
    case "info":
      return "INFO";
    case "warn":
      return "WARNING";
    case "error":
      return "ERROR";
    default:
      return "INFO";
  }
}

function write(level: LevelName, message: string): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[getLogLevel()]) {
    return;
  }
  process.stderr.write(`[${level}] ${message}\n`);
}

export function debug(message: string): void {
  write("DEBUG", message);
}

export function info(message: string): void {
  write("INFO", message);
}

export function warn(message: string): void {
  write("WARNING", message);
}

export function error(message: string): void {
  write("ERROR", message);
}
