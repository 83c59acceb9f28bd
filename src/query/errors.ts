/**
 * ContractViolationError is thrown when a caller breaks the contract of a
 * prefix-sum index: a range with end < start, an index outside [0, N-1], a
 * non-integer index, a borrowed window outside its data, a fixed input of
 * the wrong length, non-number elements given without a numeric type, or
 * any use of an index after it was decomposed.
 *
 * These are programming errors. The library never catches them and never
 * clamps a range or returns a sentinel in their place. Callers that take
 * indices from user input should check them first with isValidRange.
 *
 * @see isValidRange
 */
export class ContractViolationError extends Error {
  readonly operation: string;
  readonly reason: string;

  constructor(operation: string, reason: string) {
    super(`${operation}: ${reason}`);
    this.name = "ContractViolationError";
    this.operation = operation;
    this.reason = reason;
  }
}
