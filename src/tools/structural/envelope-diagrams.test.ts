import { describe, it, expect } from "vitest";
import { niceTicks, paddedRange, renderEnvelopeDiagrams } from "./envelope-diagrams.js";
import { DegenerateSpanError, DomainError } from "../../errors.js";

function seriesPoints(svg: string): string[][] {
  const matches = [...svg.matchAll(/<polyline class="series" points="([^"]+)"/g)];
  return matches.map((m) => m[1]!.split(" "));
}

describe("renderEnvelopeDiagrams", () => {
  it("plots 100 samples in each of the two panels", () => {
    const { svg } = renderEnvelopeDiagrams("simply_supported", 30, 20);
    const series = seriesPoints(svg);
    expect(series).toHaveLength(2);
    expect(series[0]).toHaveLength(100);
    expect(series[1]).toHaveLength(100);
  });

  it("scales the shear series into the top panel", () => {
    const { svg } = renderEnvelopeDiagrams("simply_supported", 30, 20);
    const shear = seriesPoints(svg)[0]!;
    expect(shear[0]).toBe("97.05,57.27");
    expect(shear[99]).toBe("637.95,202.73");
  });

  it("labels both panels and the shared length axis", () => {
    const { svg } = renderEnvelopeDiagrams("cantilever", 12, 4);
    expect(svg).toContain(">Shear Force Diagram</text>");
    expect(svg).toContain(">Bending Moment Diagram</text>");
    expect(svg).toContain(">Shear (kN)</text>");
    expect(svg).toContain(">Moment (kN·m)</text>");
    expect(svg.split(`class="xlabel"`)).toHaveLength(2);
    expect(svg).toContain(">Length (m)</text>");
  });

  it("draws grid lines in both panels", () => {
    const { svg } = renderEnvelopeDiagrams("fixed_end", 30, 20);
    expect(svg.split(`class="panel"`)).toHaveLength(3);
    expect(svg.split(`class="grid"`).length - 1).toBeGreaterThan(8);
  });

  it("plots a zero load without failing", () => {
    const { svg } = renderEnvelopeDiagrams("overhang", 0, 5);
    expect(seriesPoints(svg)[1]).toHaveLength(100);
  });

  it("refuses a zero span", () => {
    expect(() => renderEnvelopeDiagrams("simply_supported", 30, 0)).toThrow(DegenerateSpanError);
  });

  it("refuses a load case too large to plot", () => {
    expect(() => renderEnvelopeDiagrams("cantilever", 1e200, 1e60)).toThrow(
      "Load case overflows: w = 1e+200 kN/m over L = 1e+60 m is too large to evaluate.",
    );
    expect(() => renderEnvelopeDiagrams("fixed_end", 1e200, 1e60)).toThrow(DomainError);
  });

  it("is a pure function of its inputs", () => {
    expect(renderEnvelopeDiagrams("overhang", 22, 9).svg).toBe(renderEnvelopeDiagrams("overhang", 22, 9).svg);
  });
});

describe("axis helpers", () => {
  it("niceTicks picks round steps", () => {
    expect(niceTicks(0, 10)).toEqual([0, 2, 4, 6, 8, 10]);
    expect(niceTicks(-1, 21)).toEqual([0, 5, 10, 15, 20]);
  });

  it("paddedRange adds 5% either side", () => {
    expect(paddedRange([0, 10])).toEqual([-0.5, 10.5]);
  });

  it("paddedRange widens a flat series", () => {
    expect(paddedRange([5, 5, 5])).toEqual([4, 6]);
  });
});
