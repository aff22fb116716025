import { describe, it, expect } from "vitest";
import {
  computeDesign,
  concreteShearCapacity,
  formatDesignReport,
  requiredSteelArea,
  round2,
} from "./section-design.js";
import { DegenerateSpanError, DomainError } from "../../errors.js";

describe("computeDesign", () => {
  it("designs the default simply supported beam", () => {
    expect(computeDesign("simply_supported", 30, 20, 300, 500, 30, 420)).toEqual({
      beam_type: "simply_supported",
      Mu_knm: 1500,
      As_mm2: 8818.34,
      Vu_kn: 300,
      phiVc_kn: 104.75,
      shear_status: "STIRRUPS_REQUIRED",
    });
  });

  it("takes the variant's design moment", () => {
    expect(computeDesign("fixed_end", 30, 20, 300, 500, 30, 420).Mu_knm).toBe(1000);
    expect(computeDesign("cantilever", 30, 20, 300, 500, 30, 420).Mu_knm).toBe(6000);
    expect(computeDesign("overhang", 30, 20, 300, 500, 30, 420).Mu_knm).toBe(1200);
  });

  it("uses w·L/2 for the design shear of every variant by default", () => {
    expect(computeDesign("cantilever", 30, 20, 300, 500, 30, 420).Vu_kn).toBe(300);
    expect(computeDesign("fixed_end", 30, 20, 300, 500, 30, 420).Vu_kn).toBe(300);
  });

  it("takes the end shear of the envelope when asked to", () => {
    const options = { shearReaction: "envelope" as const };
    expect(computeDesign("cantilever", 30, 20, 300, 500, 30, 420, options).Vu_kn).toBe(600);
    expect(computeDesign("simply_supported", 30, 20, 300, 500, 30, 420, options).Vu_kn).toBe(300);
  });

  it("turns safe as the section deepens and stays safe", () => {
    const statuses = [500, 800, 1200, 2000].map(
      (d) => computeDesign("simply_supported", 30, 20, 600, d, 30, 420).shear_status,
    );
    expect(statuses).toEqual(["STIRRUPS_REQUIRED", "SAFE", "SAFE", "SAFE"]);
  });

  it("turns safe as the section widens", () => {
    expect(computeDesign("simply_supported", 30, 20, 300, 800, 30, 420).shear_status).toBe("STIRRUPS_REQUIRED");
    expect(computeDesign("simply_supported", 30, 20, 900, 800, 30, 420).shear_status).toBe("SAFE");
  });

  it("returns identical frozen results for identical inputs", () => {
    const a = computeDesign("overhang", 18.5, 7.2, 250, 450, 28, 500);
    const b = computeDesign("overhang", 18.5, 7.2, 250, 450, 28, 500);
    expect(a).toEqual(b);
    expect(Object.isFrozen(a)).toBe(true);
  });

  it("gives zero concrete capacity for f'c = 0", () => {
    expect(computeDesign("simply_supported", 30, 20, 300, 500, 0, 420).phiVc_kn).toBe(0);
  });

  it("rejects out-of-domain section values", () => {
    expect(() => computeDesign("simply_supported", 30, 20, 300, 500, -5, 420)).toThrow(DomainError);
    expect(() => computeDesign("simply_supported", 30, 20, 300, 0, 30, 420)).toThrow(DomainError);
    expect(() => computeDesign("simply_supported", 30, 20, 300, 500, 30, 0)).toThrow(DomainError);
    expect(() => computeDesign("simply_supported", 30, 20, 0, 500, 30, 420)).toThrow(DomainError);
    expect(() => computeDesign("simply_supported", 30, 20, 300, 500, 30, 0)).toThrow(
      "fy_mpa must be a positive number (got 0).",
    );
  });

  it("refuses finite inputs whose results overflow", () => {
    expect(() => computeDesign("cantilever", 1e200, 1e60, 300, 500, 30, 420)).toThrow(DomainError);
    expect(() => computeDesign("simply_supported", 30, 20, 300, 1e-200, 30, 1e-200)).toThrow(
      "As is not finite for these inputs (got Infinity).",
    );
    expect(() => computeDesign("simply_supported", 30, 20, 1e300, 1e300, 30, 420)).toThrow(
      "phiVc is not finite for these inputs (got Infinity).",
    );
  });

  it("rejects a zero span", () => {
    expect(() => computeDesign("simply_supported", 30, 0, 300, 500, 30, 420)).toThrow(DegenerateSpanError);
  });
});

describe("formulas", () => {
  it("requiredSteelArea keeps full precision", () => {
    expect(requiredSteelArea(1500, 420, 500)).toBeCloseTo(1.5e9 / 170100, 9);
  });

  it("concreteShearCapacity follows 0.17·√f'c·b·d", () => {
    expect(concreteShearCapacity(25, 1000, 1000)).toBeCloseTo(850, 9);
  });

  it("round2 rounds to two decimals", () => {
    expect(round2(104.7519391)).toBe(104.75);
    expect(round2(8818.342151675)).toBe(8818.34);
  });
});

describe("formatDesignReport", () => {
  it("prints the flexure and shear blocks", () => {
    const result = computeDesign("simply_supported", 30, 20, 300, 500, 30, 420);
    expect(formatDesignReport(result).split("\n")).toEqual([
      "Flexural Design",
      "Mu = 1500.00 kN-m",
      "As = 8818.34 mm²",
      "",
      "Shear Design",
      "Vu = 300.00 kN",
      "φVc = 104.75 kN",
      "Status: STIRRUPS REQUIRED",
    ]);
  });

  it("prints SAFE when the concrete carries the shear", () => {
    const result = computeDesign("simply_supported", 10, 4, 300, 500, 30, 420);
    expect(formatDesignReport(result).split("\n")[7]).toBe("Status: SAFE");
  });
});
