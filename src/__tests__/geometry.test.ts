import { describe, expect, it } from "vitest";
import { computeBounds, dashSegments, parseShapeAttribute, segmentLength } from "../network/geometry";

describe("computeBounds", () => {
  it("returns null for no points", () => {
    expect(computeBounds([])).toBeNull();
  });

  it("spans every point", () => {
    expect(
      computeBounds([
        { x: 3, y: -1 },
        { x: -2, y: 4 },
        { x: 0, y: 0 }
      ])
    ).toEqual({ minX: -2, minY: -1, maxX: 3, maxY: 4 });
  });
});

describe("parseShapeAttribute", () => {
  it("parses coordinate pairs", () => {
    expect(parseShapeAttribute(" 0,0  10.5,-2 ")).toEqual([
      { x: 0, y: 0 },
      { x: 10.5, y: -2 }
    ]);
  });

  it("drops a third coordinate", () => {
    expect(parseShapeAttribute("1,2,3")).toEqual([{ x: 1, y: 2 }]);
  });

  it("rejects malformed pairs", () => {
    expect(parseShapeAttribute("1,2 bad")).toBeNull();
    expect(parseShapeAttribute("1,x")).toBeNull();
  });

  it("returns no points for an empty attribute", () => {
    expect(parseShapeAttribute("")).toEqual([]);
  });
});

describe("dashSegments", () => {
  it("measures segments", () => {
    expect(segmentLength({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
  });

  it("alternates dashes and gaps and clips the last dash", () => {
    expect(dashSegments({ x: 0, y: 0 }, { x: 12, y: 0 }, 5, 5)).toEqual([
      [
        { x: 0, y: 0 },
        { x: 5, y: 0 }
      ],
      [
        { x: 10, y: 0 },
        { x: 12, y: 0 }
      ]
    ]);
  });

  it("returns nothing for degenerate input", () => {
    expect(dashSegments({ x: 1, y: 1 }, { x: 1, y: 1 }, 5, 5)).toEqual([]);
    expect(dashSegments({ x: 0, y: 0 }, { x: 10, y: 0 }, 0, 5)).toEqual([]);
  });
});
