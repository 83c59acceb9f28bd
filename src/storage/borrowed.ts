import { NumericType, float64 } from "../numeric/numeric";
import { Options, PrefixSumIndex, Storage } from "../query/contract";
import { ContractViolationError } from "../query/errors";
import { assertWindow } from "../query/validation";

/**
 * BorrowedView is a window over data the caller owns: elements
 * data[offset] through data[offset + length - 1]. Nothing is copied.
 */
export type BorrowedView<T> = {
  readonly data: ArrayLike<T>;
  readonly offset: number;
  readonly length: number;
};

export type BorrowWindow = {
  offset?: number;
  length?: number;
};

export type BorrowedSumQuery<T> = PrefixSumIndex<T, BorrowedView<T>, T[]>;

function borrowedStorage<T>(): Storage<T, BorrowedView<T>, T[]> {
  return {
    kind: "borrowed",
    size: (view) => view.length,
    read: (view, idx) => view.data[view.offset + idx],
    allocate: (_, length) => new Array<T>(length),
    // a clone borrows the same data
    copy: (_, view) => view,
  };
}

function viewOf<T>(
  data: ArrayLike<T>,
  window?: BorrowWindow,
): BorrowedView<T> {
  const offset = window?.offset ?? 0;
  const length = window?.length ?? data.length - offset;
  assertWindow(data.length, offset, length);
  return { data, offset, length };
}

// only the window is checked, the rest of data is never read
function isNumberView(
  view: BorrowedView<unknown>,
): view is BorrowedView<number> {
  for (let idx = 0; idx < view.length; idx++) {
    if (typeof view.data[view.offset + idx] !== "number") {
      return false;
    }
  }
  return true;
}

/**
 * borrowed builds an index over data the caller keeps owning, such as an
 * array, a typed array or a slice of either selected with a window. Only
 * the prefix table is allocated.
 *
 * The table is computed once, so mutating the data afterwards does not
 * change query results. sourceAt and decompose read the data as it is now.
 *
 * #### Usage
 * ```ts
 * const samples = new Float64Array([1, 3, 4, 8, 6, 1, 4, 2]);
 * const sum = borrowed(samples, { offset: 2, length: 4 });
 * sum.query(0, 3); // 19
 * ```
 */
export function borrowed(
  data: ArrayLike<number>,
  window?: BorrowWindow,
  options?: Options<number>,
): BorrowedSumQuery<number>;
export function borrowed<T>(
  data: ArrayLike<T>,
  window: BorrowWindow | undefined,
  options: Options<T> & { numeric: NumericType<T> },
): BorrowedSumQuery<T>;
export function borrowed<T>(
  data: ArrayLike<T>,
  window?: BorrowWindow,
  options?: Options<T>,
): BorrowedSumQuery<T> | BorrowedSumQuery<number> {
  const view = viewOf(data, window);

  if (options?.numeric) {
    return PrefixSumIndex.build(
      borrowedStorage<T>(),
      options.numeric,
      view,
      options,
    );
  }

  if (!isNumberView(view)) {
    throw new ContractViolationError(
      "borrowed",
      "a numeric type is required for non-number elements",
    );
  }

  return PrefixSumIndex.build<number, BorrowedView<number>, number[]>(
    borrowedStorage<number>(),
    float64,
    view,
    { verbose: options?.verbose },
  );
}
