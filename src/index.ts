export {
  NumericKind,
  numericKindToString,
  defineNumeric,
  float64,
  float32,
  int8,
  int16,
  int32,
  uint8,
  uint16,
  uint32,
  int64,
  uint64,
} from "./numeric/numeric";
export type { Block, NumericType, NumericDefinition } from "./numeric/numeric";

export {
  PrefixSumIndex,
  buildPrefixSums,
  rangeSum,
} from "./query/contract";
export type {
  Options,
  Storage,
  StorageKind,
  SumQuery,
} from "./query/contract";
export { ContractViolationError } from "./query/errors";
export { isValidRange } from "./query/validation";

export { fixed } from "./storage/fixed";
export type {
  FixedBlock,
  FixedInput,
  FixedOptions,
  FixedSumQuery,
} from "./storage/fixed";
export { owned } from "./storage/owned";
export type { OwnedInput, OwnedSumQuery } from "./storage/owned";
export { borrowed } from "./storage/borrowed";
export type {
  BorrowedSumQuery,
  BorrowedView,
  BorrowWindow,
} from "./storage/borrowed";
