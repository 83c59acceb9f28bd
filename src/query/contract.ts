import { Block, NumericType, numericKindToString } from "../numeric/numeric";
import { ContractViolationError } from "./errors";
import { assertIndex, assertRange } from "./validation";

export type StorageKind = "fixed" | "owned" | "borrowed";

export type Options<T> = {
  numeric?: NumericType<T>;
  verbose?: boolean;
};

/**
 * Storage is how a variant holds its source and allocates its prefix
 * table. The prefix-sum logic never touches a source directly, only through
 * size and read, so the same PrefixSumIndex serves every variant.
 */
export type Storage<T, Source, Table extends Block<T>> = {
  readonly kind: StorageKind;
  size(source: Source): number;
  read(source: Source, index: number): T;
  allocate(numeric: NumericType<T>, length: number): Table;
  copy(numeric: NumericType<T>, source: Source): Source;
};

/**
 * SumQuery answers inclusive range-sum queries over an immutable sequence
 * in O(1) after an O(N) construction. Indices are 0-based and both ends of
 * a range are included.
 */
export interface SumQuery<T, Source = unknown, Table = unknown> {
  readonly kind: StorageKind;
  readonly length: number;
  readonly numeric: NumericType<T>;

  /**
   * Sum of the source elements in [start, end]. Requires
   * 0 <= start <= end <= length - 1.
   */
  query(start: number, end: number): T;

  /**
   * Same as query, for callers that know start >= 1. Skips the start == 0
   * branch.
   */
  queryPositive(start: number, end: number): T;

  /**
   * Hands the source and the prefix table back to the caller without
   * copying them. The index cannot be used afterwards.
   */
  decompose(): [source: Source, table: Table];

  prefixAt(index: number): T;
  sourceAt(index: number): T;
  prefixSums(): T[];

  equals(other: SumQuery<T>): boolean;
  compare(other: SumQuery<T>): number;
}

export function buildPrefixSums<T>(
  numeric: NumericType<T>,
  length: number,
  read: (index: number) => T,
  table: Block<T>,
): void {
  for (let idx = 0; idx < length; idx++) {
    // stored the way the element type's block would hold it
    const value = numeric.add(numeric.zero, read(idx));
    if (idx === 0) {
      table[idx] = value;
    } else {
      table[idx] = numeric.add(value, table[idx - 1]);
    }
  }
}

export function rangeSum<T>(
  numeric: NumericType<T>,
  table: Block<T>,
  start: number,
  end: number,
): T {
  if (start === 0) {
    return table[end];
  }

  return numeric.sub(table[end], table[start - 1]);
}

function lexicographic<T>(
  compare: (a: T, b: T) => number,
  aLength: number,
  a: (index: number) => T,
  bLength: number,
  b: (index: number) => T,
): number {
  const shared = Math.min(aLength, bLength);
  for (let idx = 0; idx < shared; idx++) {
    const order = compare(a(idx), b(idx));
    if (order !== 0) {
      return order;
    }
  }
  return Math.sign(aLength - bLength);
}

export class PrefixSumIndex<T, Source, Table extends Block<T>>
  implements SumQuery<T, Source, Table>
{
  readonly kind: StorageKind;
  readonly length: number;
  readonly numeric: NumericType<T>;
  private readonly storage: Storage<T, Source, Table>;
  private readonly source: Source;
  private readonly table: Table;
  private consumed = false;

  private constructor(
    storage: Storage<T, Source, Table>,
    numeric: NumericType<T>,
    source: Source,
    table: Table,
  ) {
    this.kind = storage.kind;
    this.length = storage.size(source);
    this.numeric = numeric;
    this.storage = storage;
    this.source = source;
    this.table = table;
  }

  static build<T, Source, Table extends Block<T>>(
    storage: Storage<T, Source, Table>,
    numeric: NumericType<T>,
    source: Source,
    options?: Options<T>,
  ): PrefixSumIndex<T, Source, Table> {
    const length = storage.size(source);
    const table = storage.allocate(numeric, length);
    buildPrefixSums(
      numeric,
      length,
      (idx) => storage.read(source, idx),
      table,
    );

    if (options?.verbose) {
      console.log(
        `built ${storage.kind} prefix table of ${length} ${numeric.name} elements`,
      );
    }

    return new PrefixSumIndex(storage, numeric, source, table);
  }

  query(start: number, end: number): T {
    this.ensureLive("query");
    assertRange("query", this.length, start, end, 0);
    return rangeSum(this.numeric, this.table, start, end);
  }

  queryPositive(start: number, end: number): T {
    this.ensureLive("queryPositive");
    assertRange("queryPositive", this.length, start, end, 1);
    return this.numeric.sub(this.prefix[end], this.prefix[start - 1]);
  }

  decompose(): [source: Source, table: Table] {
    this.ensureLive("decompose");
    this.consumed = true;
    return [this.source, this.table];
  }

  prefixAt(index: number): T {
    this.ensureLive("prefixAt");
    assertIndex("prefixAt", this.length, index);
    return this.prefix[index];
  }

  sourceAt(index: number): T {
    this.ensureLive("sourceAt");
    assertIndex("sourceAt", this.length, index);
    return this.numeric.add(
      this.numeric.zero,
      this.storage.read(this.source, index),
    );
  }

  prefixSums(): T[] {
    this.ensureLive("prefixSums");
    return Array.from({ length: this.length }, (_, idx) => this.prefix[idx]);
  }

  /**
   * Two indexes are equal when their sources and tables hold the same
   * elements, whatever storage backs them. Elements are matched with
   * numeric.equals, so an index holding NaN equals nothing.
   */
  equals(other: SumQuery<T>): boolean {
    this.ensureLive("equals");
    if (this.length !== other.length) {
      return false;
    }

    for (let idx = 0; idx < this.length; idx++) {
      if (
        !this.numeric.equals(this.sourceAt(idx), other.sourceAt(idx)) ||
        !this.numeric.equals(this.prefix[idx], other.prefixAt(idx))
      ) {
        return false;
      }
    }
    return true;
  }

  compare(other: SumQuery<T>): number {
    this.ensureLive("compare");
    const bySource = lexicographic(
      this.numeric.compare,
      this.length,
      (idx) => this.sourceAt(idx),
      other.length,
      (idx) => other.sourceAt(idx),
    );
    if (bySource !== 0) {
      return bySource;
    }

    return lexicographic(
      this.numeric.compare,
      this.length,
      (idx) => this.prefix[idx],
      other.length,
      (idx) => other.prefixAt(idx),
    );
  }

  clone(): PrefixSumIndex<T, Source, Table> {
    this.ensureLive("clone");
    const table = this.storage.allocate(this.numeric, this.length);
    const target: Block<T> = table;
    for (let idx = 0; idx < this.length; idx++) {
      target[idx] = this.prefix[idx];
    }

    return new PrefixSumIndex(
      this.storage,
      this.numeric,
      this.storage.copy(this.numeric, this.source),
      table,
    );
  }

  toString(): string {
    return `PrefixSumIndex<${numericKindToString(this.numeric.kind)}, ${this.kind}>(${this.length})`;
  }

  private get prefix(): Block<T> {
    return this.table;
  }

  private ensureLive(operation: string) {
    if (this.consumed) {
      throw new ContractViolationError(operation, "index was decomposed");
    }
  }
}
