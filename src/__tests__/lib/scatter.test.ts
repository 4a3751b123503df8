import { describe, it, expect } from "vitest";
import {
  axisExtent,
  configureScatter,
  projectScatter,
  rowsInBox,
  rowsInLasso,
  scaleSize,
} from "../../lib/scatter.ts";
import { classify } from "../../lib/columnProfiler.ts";
import { computeMask, fullMask } from "../../lib/mask.ts";
import type { ScatterPoint } from "../../types/scatter.ts";
import { catchEngineError, smallDataset } from "../fixtures.ts";

const dataset = smallDataset();
const { profiles } = classify(dataset);

describe("configureScatter", () => {
  it("fills in defaults", () => {
    expect(configureScatter({ x: "score", y: "group" }, dataset, profiles)).toEqual({
      x: "score",
      y: "group",
      size: null,
      minSize: 5,
      maxSize: 20,
      gammaSize: 1,
      color: null,
      palette: "viridis",
      colorMode: "discrete",
    });
  });

  it("accepts a numeric size column and passes the palette through", () => {
    const spec = configureScatter(
      { x: "score", y: "score", size: "score", palette: "not-a-real-palette" },
      dataset,
      profiles,
    );
    expect(spec.size).toBe("score");
    expect(spec.palette).toBe("not-a-real-palette");
  });

  it("rejects a non-numeric size column", () => {
    const error = catchEngineError(() =>
      configureScatter({ x: "score", y: "score", size: "group" }, dataset, profiles),
    );
    expect(error.kind).toBe("InvalidSizeColumn");
  });

  it("rejects an unclassifiable size column", () => {
    expect(
      catchEngineError(() =>
        configureScatter({ x: "score", y: "score", size: "empty" }, dataset, profiles),
      ).kind,
    ).toBe("InvalidSizeColumn");
  });

  it("rejects continuous color on a non-numeric column", () => {
    const error = catchEngineError(() =>
      configureScatter(
        { x: "score", y: "score", color: "name", colorMode: "continuous" },
        dataset,
        profiles,
      ),
    );
    expect(error.kind).toBe("InvalidColorMode");
  });

  it("accepts discrete color on any column", () => {
    const spec = configureScatter(
      { x: "score", y: "score", color: "name", colorMode: "discrete" },
      dataset,
      profiles,
    );
    expect(spec.colorMode).toBe("discrete");
  });

  it("defaults color mode by column kind", () => {
    expect(configureScatter({ x: "score", y: "score", color: "score" }, dataset, profiles).colorMode).toBe(
      "continuous",
    );
    expect(configureScatter({ x: "score", y: "score", color: "group" }, dataset, profiles).colorMode).toBe(
      "discrete",
    );
  });

  it("rejects unknown columns", () => {
    expect(catchEngineError(() => configureScatter({ x: "nope", y: "score" }, dataset, profiles)).kind).toBe(
      "UnknownColumn",
    );
    expect(
      catchEngineError(() => configureScatter({ x: "score", y: "score", color: "nope" }, dataset, profiles))
        .subject,
    ).toBe("nope");
  });

  it("rejects an invalid size range or gamma", () => {
    expect(
      catchEngineError(() => configureScatter({ x: "score", y: "score", minSize: 0 }, dataset, profiles)).kind,
    ).toBe("OutOfDomainParameter");
    expect(
      catchEngineError(() =>
        configureScatter({ x: "score", y: "score", minSize: 10, maxSize: 5 }, dataset, profiles),
      ).kind,
    ).toBe("OutOfDomainParameter");
    expect(
      catchEngineError(() => configureScatter({ x: "score", y: "score", gammaSize: 0 }, dataset, profiles)).kind,
    ).toBe("OutOfDomainParameter");
  });
});

describe("scaleSize", () => {
  const spec = { minSize: 5, maxSize: 20, gammaSize: 1 };

  it("maps linearly with gamma 1", () => {
    expect(scaleSize(0, 0, 80, spec)).toBe(5);
    expect(scaleSize(40, 0, 80, spec)).toBe(12.5);
    expect(scaleSize(80, 0, 80, spec)).toBe(20);
  });

  it("applies gamma to the normalized value", () => {
    expect(scaleSize(40, 0, 80, { ...spec, gammaSize: 2 })).toBe(8.75);
  });

  it("maps a flat column to minSize", () => {
    expect(scaleSize(3, 3, 3, spec)).toBe(5);
  });

  it("maps missing values to minSize", () => {
    expect(scaleSize(null, 0, 80, spec)).toBe(5);
    expect(scaleSize(Number.NaN, 0, 80, spec)).toBe(5);
  });
});

describe("projectScatter", () => {
  const spec = configureScatter(
    { x: "score", y: "group", size: "score", color: "group" },
    dataset,
    profiles,
  );

  it("places categorical axes by category index", () => {
    const projection = projectScatter(dataset, spec, profiles, fullMask(dataset), new Set());
    expect(projection.points).toHaveLength(10);
    expect(projection.points[0]).toEqual({
      rowId: 0,
      x: 5,
      y: 0,
      size: 5,
      color: "a",
      highlighted: false,
      dimmed: false,
    });
    expect(projection.points[3].y).toBe(2);
    expect(projection.points[9].size).toBe(20);
    expect(projection.yAxis).toEqual({ kind: "band", categories: ["a", "b", "c"] });
    expect(projection.colorCategories).toEqual(["a", "b", "c"]);
    expect(projection.colorDomain).toBeNull();
  });

  it("highlights only selected rows the mask shows", () => {
    const mask = computeMask(dataset, [
      {
        id: "filter-1",
        column: "name",
        kind: "text",
        params: { kind: "text", pattern: "^(?!hotel)" },
        order: 1,
      },
    ]);
    const projection = projectScatter(dataset, spec, profiles, mask, new Set([3, 7, 9]));
    const highlighted = projection.points.filter((p) => p.highlighted).map((p) => p.rowId);
    expect(highlighted).toEqual([3, 9]);
    expect([...projection.hiddenSelection]).toEqual([7]);
    expect(projection.points).toHaveLength(10);
    expect(projection.points.filter((p) => p.dimmed).map((p) => p.rowId)).toEqual([7]);
  });

  it("leaves out hidden rows that are not selected", () => {
    const mask = computeMask(dataset, [
      {
        id: "filter-1",
        column: "group",
        kind: "categorical",
        params: { kind: "categorical", allowed: ["a"] },
        order: 1,
      },
    ]);
    const projection = projectScatter(dataset, spec, profiles, mask, new Set([1]));
    expect(projection.points.map((p) => p.rowId)).toEqual([0, 1, 2, 5, 8]);
    expect(projection.points[1]).toMatchObject({ rowId: 1, highlighted: false, dimmed: true });
  });

  it("reports a continuous color domain for numeric color", () => {
    const continuous = configureScatter({ x: "score", y: "score", color: "score" }, dataset, profiles);
    const projection = projectScatter(dataset, continuous, profiles, fullMask(dataset), new Set());
    expect(projection.colorDomain).toEqual({ min: 5, max: 70 });
    expect(projection.colorCategories).toBeNull();
  });
});

describe("brushing", () => {
  const points: ScatterPoint[] = [
    { rowId: 1, x: 0, y: 0, size: 5, color: null, highlighted: false, dimmed: false },
    { rowId: 2, x: 5, y: 5, size: 5, color: null, highlighted: false, dimmed: false },
    { rowId: 3, x: 10, y: 0, size: 5, color: null, highlighted: false, dimmed: false },
    { rowId: 4, x: 6, y: 1, size: 5, color: null, highlighted: false, dimmed: true },
  ];

  it("rowsInBox includes edges and accepts corners in any order", () => {
    expect(rowsInBox(points, { x0: 5, y0: 5, x1: 0, y1: 0 })).toEqual([1, 2]);
  });

  it("rowsInLasso selects points inside the polygon", () => {
    const quad = [
      [3, -1],
      [12, -1],
      [12, 6],
      [3, 6],
    ] as const;
    expect(rowsInLasso(points, quad)).toEqual([2, 3]);
  });

  it("never brushes dimmed points", () => {
    expect(rowsInBox(points, { x0: 0, y0: 0, x1: 10, y1: 10 })).toEqual([1, 2, 3]);
  });

  it("rowsInLasso needs at least three vertices", () => {
    expect(rowsInLasso(points, [[0, 0], [1, 1]])).toEqual([]);
  });
});

describe("axisExtent", () => {
  it("pads band axes by half a band", () => {
    expect(axisExtent({ kind: "band", categories: ["a", "b", "c"] })).toEqual([-0.5, 2.5]);
  });

  it("widens a flat linear axis", () => {
    expect(axisExtent({ kind: "linear", min: 4, max: 4 })).toEqual([3.5, 4.5]);
  });
});
