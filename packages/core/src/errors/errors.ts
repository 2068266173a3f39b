/**
 * Base class for every error the simulator raises on purpose.
 * Anything else reaching the caller is an environment problem.
 */
export class SimulationError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed card definition or tracked combination.
 * `field` names the offending key (or the whole input when it is empty).
 */
export class InvalidConfigurationError extends SimulationError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('INVALID_CONFIGURATION', message);
    this.field = field;
  }
}

/**
 * Out-of-range numeric argument such as a negative draw or trial count.
 */
export class InvalidArgumentError extends SimulationError {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super('INVALID_ARGUMENT', message);
    this.argument = argument;
  }
}

/** Throw unless `value` is a non-negative integer */
export function assertNonNegativeInteger(argument: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(
      argument,
      `${argument} must be a non-negative integer. Found: ${value}`
    );
  }
}
