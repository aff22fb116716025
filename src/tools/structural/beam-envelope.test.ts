import { describe, it, expect } from "vitest";
import { createEnvelope, parseBeamVariant, sampleEnvelope, BEAM_VARIANTS } from "./beam-envelope.js";
import { DegenerateSpanError, DomainError, UnknownVariantError } from "../../errors.js";

describe("createEnvelope", () => {
  it("gives the tabulated design moment for w = 30 kN/m, L = 20 m", () => {
    expect(createEnvelope("simply_supported", 30, 20).maxMoment()).toBe(1500);
    expect(createEnvelope("fixed_end", 30, 20).maxMoment()).toBe(1000);
    expect(createEnvelope("cantilever", 30, 20).maxMoment()).toBe(6000);
    expect(createEnvelope("overhang", 30, 20).maxMoment()).toBe(1200);
  });

  it("simply supported: zero end moments, antisymmetric end shears", () => {
    const env = createEnvelope("simply_supported", 30, 20);
    expect(env.momentAt(0)).toBe(0);
    expect(env.momentAt(20)).toBe(0);
    expect(env.shearAt(0)).toBe(300);
    expect(env.shearAt(20)).toBe(-300);
    expect(env.momentAt(10)).toBe(1500);
  });

  it("cantilever: zero shear and moment at the free end", () => {
    const env = createEnvelope("cantilever", 30, 20);
    expect(env.shearAt(20)).toBe(0);
    expect(env.momentAt(20)).toBe(0);
    expect(env.shearAt(0)).toBe(600);
    expect(env.momentAt(0)).toBe(6000);
  });

  it("fixed end and overhang reuse the simply supported shear with their own moment divisor", () => {
    const fixed = createEnvelope("fixed_end", 30, 20);
    const overhang = createEnvelope("overhang", 30, 20);
    expect(fixed.shearAt(0)).toBe(300);
    expect(overhang.shearAt(20)).toBe(-300);
    expect(fixed.momentAt(10)).toBe(250);
    expect(overhang.momentAt(10)).toBe(300);
    expect(fixed.momentAt(0)).toBe(0);
    expect(overhang.momentAt(20)).toBe(0);
  });

  it("rejects a zero or negative span", () => {
    expect(() => createEnvelope("simply_supported", 30, 0)).toThrow(DegenerateSpanError);
    expect(() => createEnvelope("cantilever", 30, -2)).toThrow(DegenerateSpanError);
    expect(() => createEnvelope("overhang", 30, Number.NaN)).toThrow(DegenerateSpanError);
  });

  it("rejects a negative or non-finite load", () => {
    expect(() => createEnvelope("simply_supported", -1, 10)).toThrow(DomainError);
    expect(() => createEnvelope("simply_supported", Infinity, 10)).toThrow(DomainError);
    expect(() => createEnvelope("overhang", 1e300, 1e10)).toThrow(DomainError);
  });

  it("allows a zero load", () => {
    const env = createEnvelope("fixed_end", 0, 6);
    expect(env.maxMoment()).toBe(0);
    expect(env.shearAt(3)).toBe(0);
  });

  it("rejects positions outside the span", () => {
    const env = createEnvelope("simply_supported", 30, 20);
    expect(() => env.shearAt(-0.1)).toThrow(DomainError);
    expect(() => env.momentAt(20.5)).toThrow(DomainError);
  });
});

describe("parseBeamVariant", () => {
  it("accepts display labels and keys", () => {
    expect(parseBeamVariant("Simply Supported")).toBe("simply_supported");
    expect(parseBeamVariant("Fixed End")).toBe("fixed_end");
    expect(parseBeamVariant("fixed-end")).toBe("fixed_end");
    expect(parseBeamVariant("  CANTILEVER ")).toBe("cantilever");
    expect(parseBeamVariant("overhang")).toBe("overhang");
  });

  it("rejects anything else", () => {
    expect(() => parseBeamVariant("Propped Cantilever")).toThrow(UnknownVariantError);
    expect(() => parseBeamVariant(undefined)).toThrow(UnknownVariantError);
    expect(() => parseBeamVariant("")).toThrow(
      "Unknown beam type ''. Must be one of: Simply Supported, Fixed End, Cantilever, Overhang",
    );
  });
});

describe("sampleEnvelope", () => {
  it("takes 100 evenly spaced samples including both ends", () => {
    const points = sampleEnvelope(createEnvelope("simply_supported", 30, 20));
    expect(points).toHaveLength(100);
    expect(points[0]).toEqual({ x_m: 0, shear_kn: 300, moment_knm: 0 });
    expect(points[99]).toEqual({ x_m: 20, shear_kn: -300, moment_knm: 0 });
    expect(points[1]!.x_m).toBeCloseTo(20 / 99, 12);
  });

  it("honours a custom sample count", () => {
    const points = sampleEnvelope(createEnvelope("cantilever", 10, 4), 5);
    expect(points.map((p) => p.x_m)).toEqual([0, 1, 2, 3, 4]);
    expect(points.map((p) => p.shear_kn)).toEqual([40, 30, 20, 10, 0]);
  });

  it("rejects fewer than two samples", () => {
    expect(() => sampleEnvelope(createEnvelope("cantilever", 10, 4), 1)).toThrow(DomainError);
  });

  it("samples every variant without leaving the span", () => {
    for (const variant of BEAM_VARIANTS) {
      const points = sampleEnvelope(createEnvelope(variant, 12.5, 7.3));
      expect(points[points.length - 1]!.x_m).toBe(7.3);
    }
  });
});
