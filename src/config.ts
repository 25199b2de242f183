import "dotenv/config";

export type ConfigKey =
  | "model-name"
  | "planning-model"
  | "research-model"
  | "validation-model"
  | "tracer-project"
  | "generation-timeout-ms"
  | "output-dir";

let config: Record<ConfigKey, string> = {
  "model-name": process.env.ROADMAP_MODEL_NAME || "",
  "planning-model": process.env.ROADMAP_PLANNING_MODEL || "",
  "research-model": process.env.ROADMAP_RESEARCH_MODEL || "",
  "validation-model": process.env.ROADMAP_VALIDATION_MODEL || "",
  "tracer-project": process.env.ROADMAP_TRACER_PROJECT || "",
  "generation-timeout-ms": process.env.ROADMAP_GENERATION_TIMEOUT_MS || "60000",
  "output-dir": process.env.ROADMAP_OUTPUT_DIR || ".",
};

export function getConfig(configKey: ConfigKey): string {
  return config[configKey];
}

export function setConfig(configKey: ConfigKey, configValue: string): void {
  config[configKey] = configValue;
}

/**
 * Reads a numeric setting, falling back when the configured value is not a
 * positive integer.
 */
export function getNumericConfig(configKey: ConfigKey, fallback: number): number {
  const parsed = Number.parseInt(config[configKey], 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}
