/**
 * Errors surfaced at the engine's boundaries.
 *
 * The rule engine itself never throws: anomalies in tag data become
 * missing markers. Only configuration and input-shape problems are errors.
 */

/** A ConfigTables document is missing or does not validate */
export class ConfigError extends Error {
  readonly status = 404;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** An input record lacks an identifying field or a usable geometry */
export class InputValidationError extends Error {
  readonly status = 422;

  constructor(
    message: string,
    readonly issues: string[],
  ) {
    super(message);
    this.name = "InputValidationError";
  }
}
