export class DrugDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DrugDataError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// only raised when strict mode is on; the default is to emit fewer options
export class InsufficientDistractorsError extends Error {
  readonly correct: string;
  readonly requested: number;
  readonly available: number;

  constructor(correct: string, requested: number, available: number) {
    super(
      `Only ${available} distractor(s) available for "${correct}", ${requested} requested`
    );
    this.name = "InsufficientDistractorsError";
    this.correct = correct;
    this.requested = requested;
    this.available = available;
  }
}
