export enum NumericKind {
  Float64 = 0,
  Float32 = 1,
  Int8 = 2,
  Int16 = 3,
  Int32 = 4,
  Uint8 = 5,
  Uint16 = 6,
  Uint32 = 7,
  Int64 = 8,
  Uint64 = 9,
  Custom = 10,
}

export function numericKindToString(k: NumericKind): string {
  switch (k) {
    case NumericKind.Float64:
      return "Float64";

    case NumericKind.Float32:
      return "Float32";

    case NumericKind.Int8:
      return "Int8";

    case NumericKind.Int16:
      return "Int16";

    case NumericKind.Int32:
      return "Int32";

    case NumericKind.Uint8:
      return "Uint8";

    case NumericKind.Uint16:
      return "Uint16";
    case NumericKind.Uint32:
      return "Uint32";
    case NumericKind.Int64:
      return "Int64";
    case NumericKind.Uint64:
      return "Uint64";
    case NumericKind.Custom:
      return "Custom";
  }
}

/**
 * Block is a contiguous, fixed-length run of elements. The typed arrays
 * (Float64Array, Int8Array, BigInt64Array, ...) are blocks, and so is a
 * plain array that is never grown.
 */
export type Block<T> = {
  readonly length: number;
  [index: number]: T;
};

/**
 * NumericType describes an element type a prefix table can be built over:
 * an additive identity, addition and subtraction, and a numeric ordering.
 *
 * add and sub follow the type's native overflow semantics. The integer
 * kinds wrap around and the float kinds round, nothing is checked. Pick a
 * type whose range covers the largest sum you expect.
 */
export type NumericType<T> = {
  readonly kind: NumericKind;
  readonly name: string;
  readonly zero: T;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  compare(a: T, b: T): number;
  equals(a: T, b: T): boolean;
  block(length: number): Block<T>;
};

export type NumericDefinition<T> = {
  name: string;
  zero: T;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  compare(a: T, b: T): number;
  equals?: (a: T, b: T) => boolean;
  block?: (length: number) => Block<T>;
};

export function defineNumeric<T>(def: NumericDefinition<T>): NumericType<T> {
  const { name, zero, add, sub, compare } = def;
  return {
    kind: NumericKind.Custom,
    name,
    zero,
    add,
    sub,
    compare,
    equals: def.equals ?? ((a, b) => compare(a, b) === 0),
    block: def.block ?? ((length) => new Array<T>(length).fill(zero)),
  };
}

// NaN is unordered: it compares as 0 against everything but equals nothing
function ordered<T extends number | bigint>(a: T, b: T): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}

function same<T extends number | bigint>(a: T, b: T): boolean {
  return a === b;
}

function native(
  kind: NumericKind,
  name: string,
  narrow: (n: number) => number,
  block: (length: number) => Block<number>,
): NumericType<number> {
  return {
    kind,
    name,
    zero: 0,
    add: (a, b) => narrow(a + b),
    sub: (a, b) => narrow(a - b),
    compare: ordered,
    equals: same,
    block,
  };
}

export const float64: NumericType<number> = {
  kind: NumericKind.Float64,
  name: "float64",
  zero: 0,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  compare: ordered,
  equals: same,
  block: (length) => new Float64Array(length),
};

export const float32 = native(
  NumericKind.Float32,
  "float32",
  Math.fround,
  (length) => new Float32Array(length),
);

export const int8 = native(
  NumericKind.Int8,
  "int8",
  (n) => (n << 24) >> 24,
  (length) => new Int8Array(length),
);

export const int16 = native(
  NumericKind.Int16,
  "int16",
  (n) => (n << 16) >> 16,
  (length) => new Int16Array(length),
);

export const int32 = native(
  NumericKind.Int32,
  "int32",
  (n) => n | 0,
  (length) => new Int32Array(length),
);

export const uint8 = native(
  NumericKind.Uint8,
  "uint8",
  (n) => n & 0xff,
  (length) => new Uint8Array(length),
);

export const uint16 = native(
  NumericKind.Uint16,
  "uint16",
  (n) => n & 0xffff,
  (length) => new Uint16Array(length),
);

export const uint32 = native(
  NumericKind.Uint32,
  "uint32",
  (n) => n >>> 0,
  (length) => new Uint32Array(length),
);

export const int64: NumericType<bigint> = {
  kind: NumericKind.Int64,
  name: "int64",
  zero: 0n,
  add: (a, b) => BigInt.asIntN(64, a + b),
  sub: (a, b) => BigInt.asIntN(64, a - b),
  compare: ordered,
  equals: same,
  block: (length) => new BigInt64Array(length),
};

export const uint64: NumericType<bigint> = {
  kind: NumericKind.Uint64,
  name: "uint64",
  zero: 0n,
  add: (a, b) => BigInt.asUintN(64, a + b),
  sub: (a, b) => BigInt.asUintN(64, a - b),
  compare: ordered,
  equals: same,
  block: (length) => new BigUint64Array(length),
};

export function isNumberSequence(
  data: ArrayLike<unknown>,
): data is ArrayLike<number> {
  for (let idx = 0; idx < data.length; idx++) {
    if (typeof data[idx] !== "number") {
      return false;
    }
  }
  return true;
}

export function isNumberArray(data: readonly unknown[]): data is number[] {
  return isNumberSequence(data);
}
