/**
 * Envelope model for single-span beams under a full-length uniform load.
 *
 * Each support condition maps to closed-form shear and moment functions plus a
 * design moment. The distribution functions for fixed-end and overhang beams
 * reuse the simply supported shear shape with a different moment divisor, and
 * do not peak at the tabulated design moment. Both tables are kept as they are.
 */
import { DegenerateSpanError, DomainError, UnknownVariantError } from "../../errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export const BEAM_VARIANTS = ["simply_supported", "fixed_end", "cantilever", "overhang"] as const;

export type BeamVariant = (typeof BEAM_VARIANTS)[number];

export const BEAM_VARIANT_LABELS: Record<BeamVariant, string> = {
  simply_supported: "Simply Supported",
  fixed_end: "Fixed End",
  cantilever: "Cantilever",
  overhang: "Overhang",
};

export interface Envelope {
  readonly variant: BeamVariant;
  readonly load_kn_per_m: number;
  readonly span_m: number;
  /** Design moment Mu in kN·m. */
  maxMoment(): number;
  /** Shear in kN at x metres from the left end. */
  shearAt(x: number): number;
  /** Moment in kN·m at x metres from the left end. */
  momentAt(x: number): number;
}

export interface EnvelopePoint {
  x_m: number;
  shear_kn: number;
  moment_knm: number;
}

export const DEFAULT_SAMPLE_COUNT = 100;

// ─── Variant parsing ─────────────────────────────────────────────────────────

/**
 * Accepts either the display label ("Fixed End") or the key ("fixed_end"),
 * ignoring case and treating spaces and hyphens as underscores.
 */
export function parseBeamVariant(raw: unknown): BeamVariant {
  const text = String(raw ?? "").trim();
  const key = text.toLowerCase().replace(/[\s-]+/g, "_");
  for (const variant of BEAM_VARIANTS) {
    if (variant === key) return variant;
  }
  throw new UnknownVariantError(text, Object.values(BEAM_VARIANT_LABELS));
}

// ─── Envelope construction ───────────────────────────────────────────────────

function assertLoadCase(w: number, L: number): void {
  if (!Number.isFinite(L) || L <= 0) {
    throw new DegenerateSpanError(L);
  }
  if (!Number.isFinite(w) || w < 0) {
    throw new DomainError(`load_kn_per_m must be a non-negative number (got ${w}).`);
  }
}

export function createEnvelope(variant: BeamVariant, w: number, L: number): Envelope {
  assertLoadCase(w, L);

  let maxMoment: () => number;
  let shear: (x: number) => number;
  let moment: (x: number) => number;

  switch (variant) {
    case "simply_supported":
      maxMoment = () => (w * L * L) / 8;
      shear = (x) => w * (L / 2 - x);
      moment = (x) => (w * x * (L - x)) / 2;
      break;
    case "fixed_end":
      maxMoment = () => (w * L * L) / 12;
      shear = (x) => w * (L / 2 - x);
      moment = (x) => (w * x * (L - x)) / 12;
      break;
    case "cantilever":
      maxMoment = () => (w * L * L) / 2;
      shear = (x) => w * (L - x);
      moment = (x) => (w * (L - x) * (L - x)) / 2;
      break;
    case "overhang":
      maxMoment = () => (w * L * L) / 10;
      shear = (x) => w * (L / 2 - x);
      moment = (x) => (w * x * (L - x)) / 10;
      break;
    default: {
      const unreachable: never = variant;
      throw new UnknownVariantError(String(unreachable), Object.values(BEAM_VARIANT_LABELS));
    }
  }

  // |V| peaks at a support and |M| never exceeds maxMoment, so these bound every sample.
  if (!Number.isFinite(maxMoment()) || !Number.isFinite(shear(0)) || !Number.isFinite(shear(L))) {
    throw new DomainError(`Load case overflows: w = ${w} kN/m over L = ${L} m is too large to evaluate.`);
  }

  const checkPosition = (x: number) => {
    if (!Number.isFinite(x) || x < 0 || x > L) {
      throw new DomainError(`x must lie within [0, ${L}] m (got ${x}).`);
    }
  };

  return {
    variant,
    load_kn_per_m: w,
    span_m: L,
    maxMoment,
    shearAt(x) {
      checkPosition(x);
      return shear(x);
    },
    momentAt(x) {
      checkPosition(x);
      return moment(x);
    },
  };
}

// ─── Sampling ────────────────────────────────────────────────────────────────

/** Evenly spaced samples over [0, L], both ends included. */
export function sampleEnvelope(envelope: Envelope, numPoints: number = DEFAULT_SAMPLE_COUNT): EnvelopePoint[] {
  if (!Number.isInteger(numPoints) || numPoints < 2) {
    throw new DomainError(`numPoints must be an integer of at least 2 (got ${numPoints}).`);
  }
  const L = envelope.span_m;
  const points: EnvelopePoint[] = [];
  for (let i = 0; i < numPoints; i++) {
    // pin the last sample to L so floating error cannot push it outside the span
    const x = i === numPoints - 1 ? L : (i * L) / (numPoints - 1);
    points.push({ x_m: x, shear_kn: envelope.shearAt(x), moment_knm: envelope.momentAt(x) });
  }
  return points;
}
