/**
 * Console logging with component tags.
 *
 * Every line is prefixed with the component in brackets, e.g.
 * `[Estructurador_Plan] Created 4 stages`. Only log values the code itself
 * produced (counts, names, labels); never log credentials or raw model output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = process.env.ROADMAP_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(component: string): Logger {
  const tag = `[${component}]`;
  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.debug(`${tag} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.log(`${tag} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(`${tag} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(`${tag} ${message}`, ...details);
    },
  };
}

/**
 * Log that a secret was found without exposing its value.
 * @param secretName - Name of the secret (e.g., "ANTHROPIC_API_KEY")
 */
export function logSecretStatus(secretName: string, value: string | undefined) {
  if (value) {
    if (enabled("debug")) console.debug(`[security] ${secretName}: ✓ loaded (${value.length} chars)`);
  } else if (enabled("warn")) {
    console.warn(`[security] ${secretName}: ✗ not found`);
  }
}

/**
 * Log application events with only safe, known values.
 * @param details - Numbers, booleans and predefined strings only
 */
export function logApplicationEvent(
  component: string,
  event: string,
  details?: Record<string, string | number | boolean>
) {
  if (!enabled("info")) return;
  const logEntry = {
    component,
    event,
    timestamp: new Date().toISOString(),
    ...details,
  };
  console.log(`[${component}] ${event}`, logEntry);
}
