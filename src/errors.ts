/**
 * Raised when a feature vector contains entries that are not numbers.
 *
 * The HTTP layer maps this to a 400.
 */
export class ValidationError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

/**
 * Raised at startup when configuration cannot be used.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
