export type DecimalErrorCode = "ARITHMETIC_OVERFLOW" | "DIVISION_BY_ZERO" | "INVALID_DECIMAL";

/**
 * Raised on misuse of fixed-point arithmetic. These are programming or
 * configuration faults, not normal trade rejections.
 */
export class DecimalError extends Error {
  public override readonly name = "DecimalError";

  constructor(
    message: string,
    public readonly code: DecimalErrorCode,
  ) {
    super(message);
  }
}
