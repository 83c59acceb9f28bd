import {
  Block,
  NumericType,
  float64,
  isNumberSequence,
} from "../numeric/numeric";
import { Options, PrefixSumIndex, Storage } from "../query/contract";
import { ContractViolationError } from "../query/errors";

/**
 * FixedBlock is a block whose length is part of its type.
 */
export type FixedBlock<T, N extends number> = Block<T> & { readonly length: N };

export type FixedInput<T, N extends number> = ArrayLike<T> & {
  readonly length: N;
};

export type FixedOptions<T, N extends number> = Options<T> & {
  length?: N;
};

export type FixedSumQuery<T, N extends number = number> = PrefixSumIndex<
  T,
  FixedBlock<T, N>,
  FixedBlock<T, N>
>;

function hasLength<T, N extends number>(
  block: Block<T>,
  length: N,
): block is FixedBlock<T, N> {
  return block.length === length;
}

function fixedBlock<T, N extends number>(
  numeric: NumericType<T>,
  length: N,
): FixedBlock<T, N> {
  const block = numeric.block(length);
  if (!hasLength(block, length)) {
    throw new Error(
      `${numeric.name} block has length ${block.length}, want ${length}`,
    );
  }
  return block;
}

function copyBlock<T, N extends number>(
  numeric: NumericType<T>,
  length: N,
  data: ArrayLike<T>,
): FixedBlock<T, N> {
  const block = fixedBlock(numeric, length);
  const target: Block<T> = block;
  for (let idx = 0; idx < length; idx++) {
    target[idx] = data[idx];
  }
  return block;
}

function fixedStorage<T, N extends number>(
  length: N,
): Storage<T, FixedBlock<T, N>, FixedBlock<T, N>> {
  return {
    kind: "fixed",
    size: (source) => source.length,
    read: (source, idx) => source[idx],
    allocate: (numeric) => fixedBlock(numeric, length),
    copy: (numeric, source) => copyBlock(numeric, length, source),
  };
}

function buildFixed<T, N extends number>(
  numeric: NumericType<T>,
  data: FixedInput<T, N>,
  options?: FixedOptions<T, N>,
): FixedSumQuery<T, N> {
  const length = data.length;
  if (options?.length !== undefined && options.length !== length) {
    throw new ContractViolationError(
      "fixed",
      `expected ${options.length} elements, got ${length}`,
    );
  }

  // the source is copied once into its own block; the input stays the caller's
  const source = copyBlock(numeric, length, data);
  return PrefixSumIndex.build(
    fixedStorage<T, N>(length),
    numeric,
    source,
    options,
  );
}

/**
 * fixed builds an index over a contiguous block of the sequence's length.
 * The source and the prefix table live in blocks allocated by the numeric
 * type (typed arrays for the built-in types) and never grow.
 *
 * #### Usage
 * ```ts
 * const sum = fixed([1, 3, 4, 8, 6, 1, 4, 2], { length: 8 });
 * sum.query(3, 6); // 19
 * ```
 */
export function fixed<N extends number>(
  data: FixedInput<number, N>,
  options?: FixedOptions<number, N>,
): FixedSumQuery<number, N>;
export function fixed<T, N extends number>(
  data: FixedInput<T, N>,
  options: FixedOptions<T, N> & { numeric: NumericType<T> },
): FixedSumQuery<T, N>;
export function fixed<T, N extends number>(
  data: FixedInput<T, N>,
  options?: FixedOptions<T, N>,
): FixedSumQuery<T, N> | FixedSumQuery<number, N> {
  if (options?.numeric) {
    return buildFixed(options.numeric, data, options);
  }

  if (!isNumberSequence(data)) {
    throw new ContractViolationError(
      "fixed",
      "a numeric type is required for non-number elements",
    );
  }

  return buildFixed<number, N>(float64, data, {
    length: options?.length,
    verbose: options?.verbose,
  });
}
