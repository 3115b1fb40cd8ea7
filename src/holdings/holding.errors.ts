// Raised when a raw field cannot be coerced into a holding value.
// The parser records it as a line failure; the HTTP layer maps it to 400.
export class HoldingConversionError extends Error {
  constructor(
    readonly field: string,
    readonly value: unknown,
    reason: string,
  ) {
    super(`Invalid ${field} '${String(value)}': ${reason}`);
    this.name = 'HoldingConversionError';
  }
}
