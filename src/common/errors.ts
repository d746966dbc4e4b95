/**
 * Domain errors raised by the analytics utilities.
 *
 * Pricing and Greeks never throw for valid inputs. Only implied-volatility
 * inversion and data-insufficiency paths fail, and callers treat those as
 * "value unknown".
 */
export class AnalyticsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidOptionTypeError extends AnalyticsError {
  constructor(readonly value: unknown) {
    super(`Invalid option type: ${String(value)}. Must be 'call' or 'put'`);
  }
}

export class UndeterminableVolatilityError extends AnalyticsError {}

export class InsufficientDataError extends AnalyticsError {
  constructor(
    message: string,
    readonly required: number,
    readonly available: number,
  ) {
    super(`${message} (required ${required}, available ${available})`);
  }
}

export class InvalidInputError extends AnalyticsError {}
