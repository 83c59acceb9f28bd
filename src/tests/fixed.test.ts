import { float32, int32, int64, int8, uint8 } from "../numeric/numeric";
import { ContractViolationError } from "../query/errors";
import { fixed } from "../storage/fixed";
import { scenario, scenarioQueries, scenarioTable, vec2 } from "./test-util";

describe("fixed index", () => {
  it("keeps source and table in typed-array blocks", () => {
    const [source, table] = fixed(scenario, { length: 8 }).decompose();

    expect(source).toBeInstanceOf(Float64Array);
    expect(table).toBeInstanceOf(Float64Array);
    expect(Array.from(source)).toEqual(scenario);
    expect(Array.from(table)).toEqual(scenarioTable);
  });

  it("uses the block of the numeric type", () => {
    const [source, table] = fixed(scenario, { numeric: int32 }).decompose();

    expect(source).toBeInstanceOf(Int32Array);
    expect(table).toBeInstanceOf(Int32Array);
  });

  it("copies the input", () => {
    const data = scenario.slice();
    const sum = fixed(data);
    data[3] = 100;

    expect(sum.sourceAt(3)).toEqual(8);
    expect(sum.query(3, 6)).toEqual(19);
  });

  it("rejects an input of the wrong length", () => {
    expect(() => fixed([1, 2, 3], { length: 4 })).toThrow(
      ContractViolationError,
    );
    expect(() => fixed([1, 2, 3], { length: 4 })).toThrow(
      "fixed: expected 4 elements, got 3",
    );
  });

  test.each([
    { name: "int8", numeric: int8 },
    { name: "uint8", numeric: uint8 },
    { name: "float32", numeric: float32 },
  ])("answers the scenario queries over $name", ({ numeric }) => {
    const sum = fixed(scenario, { numeric });
    for (const { start, end, expected } of scenarioQueries) {
      expect(sum.query(start, end)).toEqual(expected);
    }
  });

  it("answers the scenario queries over int64", () => {
    const sum = fixed([1n, 3n, 4n, 8n, 6n, 1n, 4n, 2n], { numeric: int64 });

    expect(sum.query(3, 6)).toEqual(19n);
    expect(sum.query(0, 7)).toEqual(29n);
    expect(sum.query(2, 7)).toEqual(25n);
    expect(sum.query(6, 6)).toEqual(4n);
  });

  it("falls back to an array block for custom types", () => {
    const sum = fixed(
      [
        { x: 1, y: 2 },
        { x: 3, y: 4 },
      ],
      { numeric: vec2 },
    );
    const [source, table] = sum.clone().decompose();

    expect(Array.isArray(source)).toBe(true);
    expect(table[1]).toEqual({ x: 4, y: 6 });
    expect(sum.query(1, 1)).toEqual({ x: 3, y: 4 });
  });

  it("clones into independent blocks", () => {
    const sum = fixed(scenario);
    const copy = sum.clone();

    expect(copy.equals(sum)).toBe(true);

    const [source] = sum.decompose();
    source[3] = 100;
    expect(copy.sourceAt(3)).toEqual(8);
    expect(copy.query(3, 6)).toEqual(19);
  });

  it("logs construction when verbose", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => {});

    fixed(scenario, { verbose: true });
    expect(log).toHaveBeenCalledWith(
      "built fixed prefix table of 8 float64 elements",
    );

    log.mockRestore();
  });

  it("describes itself", () => {
    expect(fixed(scenario).toString()).toEqual(
      "PrefixSumIndex<Float64, fixed>(8)",
    );
  });
});
