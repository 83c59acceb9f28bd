import { NumericType, float64, isNumberArray } from "../numeric/numeric";
import { Options, PrefixSumIndex, Storage } from "../query/contract";
import { ContractViolationError } from "../query/errors";

export type OwnedInput<T> = Iterable<T> | ArrayLike<T>;

export type OwnedSumQuery<T> = PrefixSumIndex<T, T[], T[]>;

function ownedStorage<T>(): Storage<T, T[], T[]> {
  return {
    kind: "owned",
    size: (source) => source.length,
    read: (source, idx) => source[idx],
    // sized up front so the build pass never reallocates
    allocate: (_, length) => new Array<T>(length),
    copy: (_, source) => source.slice(),
  };
}

/**
 * owned copies the sequence into an array it owns and builds the prefix
 * table next to it. Takes anything Array.from takes.
 *
 * #### Usage
 * ```ts
 * const sum = owned(new Set([1, 3, 4, 8]));
 * sum.query(1, 3); // 15
 * ```
 */
export function owned(
  data: OwnedInput<number>,
  options?: Options<number>,
): OwnedSumQuery<number>;
export function owned<T>(
  data: OwnedInput<T>,
  options: Options<T> & { numeric: NumericType<T> },
): OwnedSumQuery<T>;
export function owned<T>(
  data: OwnedInput<T>,
  options?: Options<T>,
): OwnedSumQuery<T> | OwnedSumQuery<number> {
  const source = Array.from(data);

  if (options?.numeric) {
    const numeric = options.numeric;
    // the copy holds values as the element type stores them
    for (let idx = 0; idx < source.length; idx++) {
      source[idx] = numeric.add(numeric.zero, source[idx]);
    }
    return PrefixSumIndex.build(ownedStorage<T>(), numeric, source, options);
  }

  if (!isNumberArray(source)) {
    throw new ContractViolationError(
      "owned",
      "a numeric type is required for non-number elements",
    );
  }

  return PrefixSumIndex.build<number, number[], number[]>(
    ownedStorage<number>(),
    float64,
    source,
    { verbose: options?.verbose },
  );
}
