import { ContractViolationError } from "./errors";

export function isValidRange(
  length: number,
  start: number,
  end: number,
): boolean {
  return (
    Number.isSafeInteger(start) &&
    Number.isSafeInteger(end) &&
    start >= 0 &&
    end >= start &&
    end < length
  );
}

function violation(
  operation: string,
  args: number[],
  reason: string,
): ContractViolationError {
  return new ContractViolationError(`${operation}(${args.join(", ")})`, reason);
}

function outside(length: number): string {
  return length > 0 ? `outside [0, ${length - 1}]` : "outside an empty sequence";
}

export function assertRange(
  operation: string,
  length: number,
  start: number,
  end: number,
  minStart: number,
): void {
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw violation(operation, [start, end], "indices must be integers");
  }

  if (end < start) {
    throw violation(operation, [start, end], "end must be >= start");
  }

  if (start < minStart) {
    throw violation(operation, [start, end], `start must be >= ${minStart}`);
  }

  if (end >= length) {
    throw violation(operation, [start, end], `end is ${outside(length)}`);
  }
}

export function assertIndex(
  operation: string,
  length: number,
  index: number,
): void {
  if (!Number.isSafeInteger(index)) {
    throw violation(operation, [index], "index must be an integer");
  }

  if (index < 0 || index >= length) {
    throw violation(operation, [index], `index is ${outside(length)}`);
  }
}

export function assertWindow(
  dataLength: number,
  offset: number,
  length: number,
): void {
  const call = `borrowed(offset ${offset}, length ${length})`;

  if (!Number.isSafeInteger(offset) || !Number.isSafeInteger(length)) {
    throw new ContractViolationError(call, "window must be integers");
  }

  if (offset < 0 || length < 0 || offset + length > dataLength) {
    throw new ContractViolationError(
      call,
      `window is outside data of length ${dataLength}`,
    );
  }
}
