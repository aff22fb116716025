/**
 * RC beam design tools.
 *
 * Wraps the envelope model, section designer and the two renderers as tool
 * definitions: each takes a loose JSON arguments object, validates it, and
 * answers with a text summary plus structured details. The HTTP server and the
 * REPL both go through these.
 */
import { InvalidInputError } from "../../errors.js";
import type { ToolDefinition } from "../types.js";
import {
  BEAM_VARIANTS,
  BEAM_VARIANT_LABELS,
  createEnvelope,
  parseBeamVariant,
  sampleEnvelope,
  type BeamVariant,
} from "./beam-envelope.js";
import { renderSchematic } from "./beam-schematic.js";
import { plotEnvelope } from "./envelope-diagrams.js";
import {
  computeDesign,
  formatDesignReport,
  round2,
  SHEAR_REACTION_MODES,
  type DesignResult,
  type ShearReactionMode,
} from "./section-design.js";
import { saveSvg } from "./svg-image.js";

// ─── Input parsing ───────────────────────────────────────────────────────────

export interface DesignInput {
  beam_type: BeamVariant;
  load_kn_per_m: number;
  span_m: number;
  width_mm: number;
  depth_mm: number;
  fc_mpa: number;
  fy_mpa: number;
  shear_reaction?: ShearReactionMode;
}

/** Starting values of the design form. */
export const DEFAULT_DESIGN_INPUT: DesignInput = {
  beam_type: "simply_supported",
  load_kn_per_m: 30,
  span_m: 20,
  width_mm: 300,
  depth_mm: 500,
  fc_mpa: 30,
  fy_mpa: 420,
};

export function toRecord(args: unknown): Record<string, unknown> {
  if (typeof args !== "object" || args === null || Array.isArray(args)) return {};
  return Object.fromEntries(Object.entries(args));
}

/** Numbers may arrive as strings from HTML forms and query strings. */
export function readNumber(params: Record<string, unknown>, key: string): number {
  const raw = params[key];
  if (raw === undefined || raw === null || (typeof raw === "string" && raw.trim() === "")) {
    throw new InvalidInputError(`${key} is required.`);
  }
  const value = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw.trim()) : NaN;
  if (Number.isNaN(value)) {
    throw new InvalidInputError(`${key} must be a number (got '${String(raw)}').`);
  }
  return value;
}

export function parseShearReaction(raw: unknown): ShearReactionMode | undefined {
  if (raw === undefined || raw === null || raw === "") return undefined;
  const key = String(raw).trim().toLowerCase();
  for (const mode of SHEAR_REACTION_MODES) {
    if (mode === key) return mode;
  }
  throw new InvalidInputError(
    `Invalid shear_reaction '${String(raw)}'. Must be one of: ${SHEAR_REACTION_MODES.join(", ")}`,
  );
}

export function parseDesignInput(args: unknown): DesignInput {
  const params = toRecord(args);
  return {
    beam_type: parseBeamVariant(params.beam_type),
    load_kn_per_m: readNumber(params, "load_kn_per_m"),
    span_m: readNumber(params, "span_m"),
    width_mm: readNumber(params, "width_mm"),
    depth_mm: readNumber(params, "depth_mm"),
    fc_mpa: readNumber(params, "fc_mpa"),
    fy_mpa: readNumber(params, "fy_mpa"),
    shear_reaction: parseShearReaction(params.shear_reaction),
  };
}

export function runDesign(input: DesignInput, fallbackShearReaction?: ShearReactionMode): DesignResult {
  return computeDesign(
    input.beam_type,
    input.load_kn_per_m,
    input.span_m,
    input.width_mm,
    input.depth_mm,
    input.fc_mpa,
    input.fy_mpa,
    { shearReaction: input.shear_reaction ?? fallbackShearReaction },
  );
}

function optionalOutputPath(params: Record<string, unknown>): string | undefined {
  return typeof params.output_path === "string" ? params.output_path.trim() || undefined : undefined;
}

// ─── Shared schema fragments ─────────────────────────────────────────────────

const beamTypeSchema = {
  type: "string",
  enum: [...BEAM_VARIANTS],
  description:
    "Support condition. 'simply_supported' = pin left, roller right. 'fixed_end' = fixed at both ends. " +
    "'cantilever' = fixed left, free right. 'overhang' = pin inset from the left end, roller right. " +
    "Display labels such as 'Simply Supported' are accepted too.",
};

const loadSchema = { type: "number", description: "Uniform distributed load w in kN/m.", minimum: 0 };
const spanSchema = { type: "number", description: "Span L in meters.", exclusiveMinimum: 0 };

// ─── rc_beam_design ──────────────────────────────────────────────────────────

export interface RcBeamDesignToolOptions {
  /** Used when the call does not name a shear_reaction. */
  shearReaction?: ShearReactionMode;
}

export function createRcBeamDesignToolDefinition(
  options: RcBeamDesignToolOptions = {},
): ToolDefinition<DesignResult> {
  return {
    name: "rc_beam_design",
    label: "RC Beam Design",
    description:
      "Preliminary ACI 318 design of a reinforced-concrete beam under a uniform load. " +
      "Returns the design moment Mu, required tension steel As, design shear Vu, " +
      "concrete shear capacity φVc, and whether stirrups are required.",
    parameters: {
      type: "object",
      properties: {
        beam_type: beamTypeSchema,
        load_kn_per_m: loadSchema,
        span_m: spanSchema,
        width_mm: { type: "number", description: "Section width b in mm.", exclusiveMinimum: 0 },
        depth_mm: { type: "number", description: "Effective depth d in mm.", exclusiveMinimum: 0 },
        fc_mpa: { type: "number", description: "Concrete compressive strength f'c in MPa.", minimum: 0 },
        fy_mpa: { type: "number", description: "Steel yield strength fy in MPa.", exclusiveMinimum: 0 },
        shear_reaction: {
          type: "string",
          enum: [...SHEAR_REACTION_MODES],
          description:
            "'simply_supported' (server default unless configured otherwise) takes Vu = w·L/2 for every beam type. " +
            "'envelope' takes the larger end shear of the beam type's shear diagram.",
        },
      },
      required: ["beam_type", "load_kn_per_m", "span_m", "width_mm", "depth_mm", "fc_mpa", "fy_mpa"],
    },
    execute: async (_toolCallId, args) => {
      const input = parseDesignInput(args);
      const result = runDesign(input, options.shearReaction);

      const summary = [
        `RC Beam Design: ${BEAM_VARIANT_LABELS[input.beam_type]} | w = ${input.load_kn_per_m} kN/m | L = ${input.span_m} m`,
        `Section: b = ${input.width_mm} mm, d = ${input.depth_mm} mm | f'c = ${input.fc_mpa} MPa, fy = ${input.fy_mpa} MPa`,
        ``,
        formatDesignReport(result),
      ];

      return {
        content: [
          { type: "text", text: summary.join("\n") },
          { type: "text", text: JSON.stringify(result, null, 2) },
        ],
        details: result,
      };
    },
  };
}

// ─── beam_schematic ──────────────────────────────────────────────────────────

export interface SchematicDetails {
  beam_type: BeamVariant;
  output_path?: string;
  svg: string;
}

export function createBeamSchematicToolDefinition(): ToolDefinition<SchematicDetails> {
  return {
    name: "beam_schematic",
    label: "Beam Schematic",
    description:
      "Draw an illustrative sketch of a beam with the support symbols for its support condition " +
      "(pins, rollers, fixed blocks) as SVG. Span and load do not affect the drawing.",
    parameters: {
      type: "object",
      properties: {
        beam_type: beamTypeSchema,
        output_path: { type: "string", description: "File path to save the SVG. If omitted, nothing is written." },
      },
      required: ["beam_type"],
    },
    execute: async (_toolCallId, args) => {
      const params = toRecord(args);
      const beamType = parseBeamVariant(params.beam_type);
      const image = renderSchematic(beamType);

      const outputPath = optionalOutputPath(params);
      const savedPath = outputPath ? saveSvg(image, outputPath) : undefined;

      const text = [`Beam schematic: ${BEAM_VARIANT_LABELS[beamType]}`];
      if (savedPath) text.push(`Schematic saved to: ${savedPath}`);

      return {
        content: [{ type: "text", text: text.join("\n") }],
        details: { beam_type: beamType, output_path: savedPath, svg: image.svg },
      };
    },
  };
}

// ─── beam_diagrams ───────────────────────────────────────────────────────────

export interface DiagramDetails {
  beam_type: BeamVariant;
  load_kn_per_m: number;
  span_m: number;
  max_shear_kn: number;
  max_moment_knm: number;
  output_path?: string;
  svg: string;
}

export function createBeamDiagramsToolDefinition(): ToolDefinition<DiagramDetails> {
  return {
    name: "beam_diagrams",
    label: "Shear & Moment Diagrams",
    description:
      "Plot the shear force and bending moment diagrams of a uniformly loaded beam " +
      "(100 samples along the span) as a stacked SVG figure.",
    parameters: {
      type: "object",
      properties: {
        beam_type: beamTypeSchema,
        load_kn_per_m: loadSchema,
        span_m: spanSchema,
        output_path: { type: "string", description: "File path to save the SVG. If omitted, nothing is written." },
      },
      required: ["beam_type", "load_kn_per_m", "span_m"],
    },
    execute: async (_toolCallId, args) => {
      const params = toRecord(args);
      const beamType = parseBeamVariant(params.beam_type);
      const w = readNumber(params, "load_kn_per_m");
      const L = readNumber(params, "span_m");

      const points = sampleEnvelope(createEnvelope(beamType, w, L));
      const image = plotEnvelope(points, L);

      let maxShear = 0;
      let maxMoment = 0;
      for (const p of points) {
        if (Math.abs(p.shear_kn) > maxShear) maxShear = Math.abs(p.shear_kn);
        if (Math.abs(p.moment_knm) > maxMoment) maxMoment = Math.abs(p.moment_knm);
      }

      const outputPath = optionalOutputPath(params);
      const savedPath = outputPath ? saveSvg(image, outputPath) : undefined;

      const text = [
        `Shear & moment diagrams: ${BEAM_VARIANT_LABELS[beamType]} | w = ${w} kN/m | L = ${L} m`,
        `  Max |V|: ${maxShear.toFixed(2)} kN`,
        `  Max |M|: ${maxMoment.toFixed(2)} kN·m`,
      ];
      if (savedPath) text.push(`Diagrams saved to: ${savedPath}`);

      return {
        content: [{ type: "text", text: text.join("\n") }],
        details: {
          beam_type: beamType,
          load_kn_per_m: w,
          span_m: L,
          max_shear_kn: round2(maxShear),
          max_moment_knm: round2(maxMoment),
          output_path: savedPath,
          svg: image.svg,
        },
      };
    },
  };
}
