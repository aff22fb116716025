/**
 * Simplified ACI 318 section design for a rectangular reinforced-concrete beam:
 * required tension steel from the design moment, and a concrete-only shear
 * capacity check.
 */
import { DomainError } from "../../errors.js";
import { createEnvelope, type BeamVariant, type Envelope } from "./beam-envelope.js";

// ─── Constants ───────────────────────────────────────────────────────────────

export const PHI_FLEXURE = 0.9;
export const PHI_SHEAR = 0.75;
/** Lever arm taken as 0.9·d. */
export const LEVER_ARM_FACTOR = 0.9;
/** λ = 1 normal-weight concrete, SI units. */
export const VC_COEFFICIENT = 0.17;

// ─── Types ───────────────────────────────────────────────────────────────────

export type ShearStatus = "SAFE" | "STIRRUPS_REQUIRED";

/**
 * Where the design shear comes from. `simply_supported` always uses w·L/2;
 * `envelope` takes the larger end shear of the variant's envelope.
 */
export type ShearReactionMode = "simply_supported" | "envelope";

export const SHEAR_REACTION_MODES: readonly ShearReactionMode[] = ["simply_supported", "envelope"];

export interface SectionProperties {
  width_mm: number;
  depth_mm: number;
  fc_mpa: number;
  fy_mpa: number;
}

export interface DesignOptions {
  shearReaction?: ShearReactionMode;
}

export interface DesignResult {
  readonly beam_type: BeamVariant;
  readonly Mu_knm: number;
  readonly As_mm2: number;
  readonly Vu_kn: number;
  readonly phiVc_kn: number;
  readonly shear_status: ShearStatus;
}

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Width and concrete strength only feed the shear check; depth and yield
 * strength are divisors in the flexure formula.
 */
function assertSection(section: SectionProperties): void {
  const { width_mm: b, depth_mm: d, fc_mpa: fc, fy_mpa: fy } = section;
  if (!Number.isFinite(b) || b <= 0) throw new DomainError(`width_mm must be a positive number (got ${b}).`);
  if (!Number.isFinite(d) || d <= 0) throw new DomainError(`depth_mm must be a positive number (got ${d}).`);
  if (!Number.isFinite(fc) || fc < 0) {
    throw new DomainError(`fc_mpa must be a non-negative number (got ${fc}).`);
  }
  if (!Number.isFinite(fy) || fy <= 0) throw new DomainError(`fy_mpa must be a positive number (got ${fy}).`);
}

// ─── Formulas ────────────────────────────────────────────────────────────────

/** As in mm² for Mu in kN·m. */
export function requiredSteelArea(Mu_knm: number, fy_mpa: number, depth_mm: number): number {
  return (Mu_knm * 1e6) / (PHI_FLEXURE * fy_mpa * depth_mm * LEVER_ARM_FACTOR);
}

/** Nominal concrete shear capacity Vc in kN. */
export function concreteShearCapacity(fc_mpa: number, width_mm: number, depth_mm: number): number {
  return (VC_COEFFICIENT * Math.sqrt(fc_mpa) * width_mm * depth_mm) / 1000;
}

export function designShear(envelope: Envelope, mode: ShearReactionMode): number {
  switch (mode) {
    case "simply_supported":
      return (envelope.load_kn_per_m * envelope.span_m) / 2;
    case "envelope":
      return Math.max(Math.abs(envelope.shearAt(0)), Math.abs(envelope.shearAt(envelope.span_m)));
  }
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

// ─── Design ──────────────────────────────────────────────────────────────────

export function designSection(
  envelope: Envelope,
  section: SectionProperties,
  options: DesignOptions = {},
): DesignResult {
  assertSection(section);

  const Mu = envelope.maxMoment();
  const As = requiredSteelArea(Mu, section.fy_mpa, section.depth_mm);

  const Vu = designShear(envelope, options.shearReaction ?? "simply_supported");
  const phiVc = PHI_SHEAR * concreteShearCapacity(section.fc_mpa, section.width_mm, section.depth_mm);
  for (const [name, value] of [["Mu", Mu], ["As", As], ["Vu", Vu], ["phiVc", phiVc]] as const) {
    if (!Number.isFinite(value)) {
      throw new DomainError(`${name} is not finite for these inputs (got ${value}).`);
    }
  }
  const status: ShearStatus = phiVc >= Vu ? "SAFE" : "STIRRUPS_REQUIRED";

  return Object.freeze({
    beam_type: envelope.variant,
    Mu_knm: round2(Mu),
    As_mm2: round2(As),
    Vu_kn: round2(Vu),
    phiVc_kn: round2(phiVc),
    shear_status: status,
  });
}

export function computeDesign(
  variant: BeamVariant,
  w: number,
  L: number,
  b: number,
  d: number,
  fc: number,
  fy: number,
  options: DesignOptions = {},
): DesignResult {
  const envelope = createEnvelope(variant, w, L);
  return designSection(envelope, { width_mm: b, depth_mm: d, fc_mpa: fc, fy_mpa: fy }, options);
}

// ─── Report ──────────────────────────────────────────────────────────────────

export function formatDesignReport(result: DesignResult): string {
  return [
    `Flexural Design`,
    `Mu = ${result.Mu_knm.toFixed(2)} kN-m`,
    `As = ${result.As_mm2.toFixed(2)} mm²`,
    ``,
    `Shear Design`,
    `Vu = ${result.Vu_kn.toFixed(2)} kN`,
    `φVc = ${result.phiVc_kn.toFixed(2)} kN`,
    `Status: ${result.shear_status === "SAFE" ? "SAFE" : "STIRRUPS REQUIRED"}`,
  ].join("\n");
}
