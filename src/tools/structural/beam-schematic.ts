/**
 * Illustrative beam sketch with support symbols for each support condition.
 *
 * The drawing lives on a fixed 10 × 3 unit canvas (y up) and ignores span and
 * load: it shows which supports a variant has, nothing more.
 */
import { BEAM_VARIANT_LABELS, type BeamVariant } from "./beam-envelope.js";
import { escapeXml, px, svgImage, type SvgImage } from "./svg-image.js";

// ─── Canvas ──────────────────────────────────────────────────────────────────

const CANVAS_UNITS = { width: 10, height: 3 };
const UNIT_PX = 70;

const BEAM_START = 1;
const BEAM_END = 9;
const BEAM_Y = 2;
const SUPPORT_Y = 1.75;
const OVERHANG_PIN_X = 2.5;

const FIXED_BLOCK_LENGTH = 0.22;
const FIXED_BLOCK_HEIGHT = 1.2;

const PIN_HALF_WIDTH_PX = 8;
const ROLLER_RADIUS_PX = 5;

const toX = (u: number) => u * UNIT_PX;
const toY = (v: number) => (CANVAS_UNITS.height - v) * UNIT_PX;

export type SupportSymbol = "pin" | "roller" | "fixed";

export interface SupportPlacement {
  symbol: SupportSymbol;
  /** Canvas units; for fixed blocks, the block's left edge. */
  x: number;
}

// ─── Layout ──────────────────────────────────────────────────────────────────

export function supportLayout(variant: BeamVariant): SupportPlacement[] {
  switch (variant) {
    case "simply_supported":
      return [
        { symbol: "pin", x: BEAM_START },
        { symbol: "roller", x: BEAM_END },
      ];
    case "fixed_end":
      return [
        { symbol: "fixed", x: BEAM_START - FIXED_BLOCK_LENGTH },
        { symbol: "fixed", x: BEAM_END },
      ];
    case "cantilever":
      return [{ symbol: "fixed", x: BEAM_START - FIXED_BLOCK_LENGTH }];
    case "overhang":
      return [
        { symbol: "pin", x: OVERHANG_PIN_X },
        { symbol: "roller", x: BEAM_END },
      ];
  }
}

function drawSupport(lines: string[], support: SupportPlacement): void {
  const cx = toX(support.x);
  const cy = toY(SUPPORT_Y);
  switch (support.symbol) {
    case "pin": {
      const h = PIN_HALF_WIDTH_PX;
      lines.push(
        `<polygon class="support support-pin" points="${px(cx)},${px(cy - h)} ${px(cx - h)},${px(cy + h * 0.75)} ${px(cx + h)},${px(cy + h * 0.75)}" fill="#ff7f0e"/>`,
      );
      break;
    }
    case "roller":
      lines.push(`<circle class="support support-roller" cx="${px(cx)}" cy="${px(cy)}" r="${ROLLER_RADIUS_PX}" fill="#2ca02c"/>`);
      break;
    case "fixed":
      lines.push(
        `<rect class="support support-fixed" x="${px(cx)}" y="${px(toY(BEAM_Y + FIXED_BLOCK_HEIGHT / 2))}" width="${px(FIXED_BLOCK_LENGTH * UNIT_PX)}" height="${px(FIXED_BLOCK_HEIGHT * UNIT_PX)}" fill="black"/>`,
      );
      break;
  }
}

// ─── Render ──────────────────────────────────────────────────────────────────

export function renderSchematic(variant: BeamVariant): SvgImage {
  const width = CANVAS_UNITS.width * UNIT_PX;
  const height = CANVAS_UNITS.height * UNIT_PX;
  const lines: string[] = [];

  lines.push(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}" font-family="Arial, sans-serif">`);
  lines.push(`<rect width="${width}" height="${height}" fill="white"/>`);

  lines.push(`<line class="beam" x1="${px(toX(BEAM_START))}" y1="${px(toY(BEAM_Y))}" x2="${px(toX(BEAM_END))}" y2="${px(toY(BEAM_Y))}" stroke="#1f77b4" stroke-width="8"/>`);

  // supports paint over the beam ends
  for (const support of supportLayout(variant)) {
    drawSupport(lines, support);
  }

  const title = `${BEAM_VARIANT_LABELS[variant]} Beam`;
  lines.push(`<text x="${px(toX(5))}" y="${px(toY(2.6))}" text-anchor="middle" font-size="15">${escapeXml(title)}</text>`);

  lines.push(`</svg>`);
  return svgImage(width, height, lines);
}
