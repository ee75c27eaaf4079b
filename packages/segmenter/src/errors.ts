/**
 * Error types raised by the segmenter.
 *
 * Only configuration problems are raised here. Failures while reading a line
 * source (I/O, decoding) are never wrapped: they reach the caller unchanged.
 */

export class PhaselogError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PhaselogError";
  }
}

/**
 * A boundary rule or rules file that cannot be used.
 * Fatal: the engine cannot name a step without a valid rule.
 */
export class ConfigurationError extends PhaselogError {
  /** Label of the offending rule, when known */
  readonly label: string | undefined;
  /** Pattern source of the offending rule, when known */
  readonly pattern: string | undefined;

  constructor(
    message: string,
    details: { label?: string; pattern?: string } = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ConfigurationError";
    this.label = details.label;
    this.pattern = details.pattern;
  }
}
