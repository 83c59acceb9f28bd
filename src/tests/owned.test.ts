import { int8, uint8 } from "../numeric/numeric";
import { owned } from "../storage/owned";
import { scenario, scenarioTable, vec2 } from "./test-util";

describe("owned index", () => {
  it("accepts any iterable", () => {
    expect(owned(new Set([1, 3, 4, 8])).query(1, 3)).toEqual(15);

    function* evens() {
      for (let n = 2; n <= 10; n += 2) {
        yield n;
      }
    }
    const sum = owned(evens());
    expect(sum.length).toEqual(5);
    expect(sum.query(0, 4)).toEqual(30);
  });

  it("owns a copy of the source", () => {
    const data = scenario.slice();
    const sum = owned(data);
    data[0] = 50;

    const [source, table] = sum.decompose();
    expect(source).not.toBe(data);
    expect(source).toEqual(scenario);
    expect(table).toEqual(scenarioTable);
  });

  it("keeps range sums exact through uint8 wraparound", () => {
    const sum = owned([200, 100, 50], { numeric: uint8 });

    expect(sum.prefixSums()).toEqual([200, 44, 94]);
    expect(sum.query(1, 2)).toEqual(150);
    expect(sum.query(0, 2)).toEqual(94);
  });

  it("stores its copy as the element type holds it", () => {
    const [source, table] = owned([200, 1], { numeric: int8 }).decompose();

    expect(source).toEqual([-56, 1]);
    expect(table).toEqual([-56, -55]);
  });

  it("sums custom element types", () => {
    const sum = owned(
      [
        { x: 1, y: 2 },
        { x: 3, y: 4 },
        { x: 5, y: 6 },
      ],
      { numeric: vec2 },
    );

    expect(sum.query(1, 2)).toEqual({ x: 8, y: 10 });
    expect(sum.query(0, 2)).toEqual({ x: 9, y: 12 });
  });

  it("clones its source and table", () => {
    const sum = owned(scenario);
    const copy = sum.clone();

    const [source, table] = sum.decompose();
    const [copySource, copyTable] = copy.decompose();
    expect(copySource).not.toBe(source);
    expect(copyTable).not.toBe(table);
    expect(copyTable).toEqual(table);
  });
});
