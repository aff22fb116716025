/**
 * Line parser for the interactive REPL.
 *
 *   cantilever w=12 L=4 b=250 d=400 fc=25 fy=420
 *   /shear envelope
 */
import { InvalidInputError } from "./errors.js";
import { parseBeamVariant } from "./tools/structural/beam-envelope.js";
import { DEFAULT_DESIGN_INPUT, readNumber, type DesignInput } from "./tools/structural/rc-beam-design.js";

export type ReplLine =
  | { kind: "empty" }
  | { kind: "command"; name: string; arg: string }
  | { kind: "design"; input: DesignInput };

type NumericKey = Exclude<keyof DesignInput, "beam_type" | "shear_reaction">;

const SHORT_KEYS: Record<string, NumericKey> = {
  w: "load_kn_per_m",
  l: "span_m",
  b: "width_mm",
  d: "depth_mm",
  fc: "fc_mpa",
  fy: "fy_mpa",
};

export function parseReplLine(line: string): ReplLine {
  const trimmed = line.trim();
  if (!trimmed) return { kind: "empty" };

  if (trimmed.startsWith("/")) {
    const spaceIdx = trimmed.indexOf(" ");
    const name = (spaceIdx === -1 ? trimmed.slice(1) : trimmed.slice(1, spaceIdx)).toLowerCase();
    const arg = spaceIdx === -1 ? "" : trimmed.slice(spaceIdx + 1).trim();
    return { kind: "command", name, arg };
  }

  const input: DesignInput = { ...DEFAULT_DESIGN_INPUT };
  for (const token of trimmed.split(/\s+/)) {
    const eqIdx = token.indexOf("=");
    if (eqIdx === -1) {
      input.beam_type = parseBeamVariant(token);
      continue;
    }
    const rawKey = token.slice(0, eqIdx).toLowerCase();
    const key = Object.hasOwn(SHORT_KEYS, rawKey) ? SHORT_KEYS[rawKey] : undefined;
    if (!key) {
      throw new InvalidInputError(`Unknown key '${rawKey}'. Use w, L, b, d, fc, fy.`);
    }
    input[key] = readNumber({ [rawKey]: token.slice(eqIdx + 1) }, rawKey);
  }
  return { kind: "design", input };
}
