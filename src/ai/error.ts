/**
 * Error types raised by the roadmap workflow and its collaborators.
 *
 * Generation errors are recovered inside nodes. Configuration errors surface
 * before a run starts. Manifest and invariant violations are programming
 * errors and always propagate.
 */

export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class GenerationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export class GenerationTimeoutError extends GenerationError {
  constructor(public readonly timeoutMs: number, options?: ErrorOptions) {
    super(`Generation did not finish within ${timeoutMs}ms`, options);
    this.name = "GenerationTimeoutError";
  }
}

export class ManifestViolationError extends Error {
  constructor(
    public readonly node: string,
    public readonly fields: string[],
    public readonly access: "read" | "write"
  ) {
    super(`[${node}] ${access === "read" ? "read" : "wrote"} undeclared fields: ${fields.join(", ")}`);
    this.name = "ManifestViolationError";
  }
}

export class InvariantViolationError extends Error {
  constructor(
    public readonly node: string,
    public readonly violations: string[]
  ) {
    super(`[${node}] left the state invalid: ${violations.join("; ")}`);
    this.name = "InvariantViolationError";
  }
}

export class RunBudgetExceededError extends Error {
  constructor(
    public readonly budgetMs: number,
    public readonly nextNode: string
  ) {
    super(`Run exceeded its ${budgetMs}ms budget before ${nextNode}`);
    this.name = "RunBudgetExceededError";
  }
}
