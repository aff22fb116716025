/**
 * Shear force and bending moment diagrams as two stacked line plots.
 *
 * Both plots share the x domain [0, L]; the shear plot sits on top, the moment
 * plot below it carries the "Length (m)" axis label.
 */
import {
  createEnvelope,
  sampleEnvelope,
  DEFAULT_SAMPLE_COUNT,
  type BeamVariant,
  type EnvelopePoint,
} from "./beam-envelope.js";
import { escapeXml, px, svgImage, type SvgImage } from "./svg-image.js";

// ─── Layout ──────────────────────────────────────────────────────────────────

const WIDTH = 700;
const HEIGHT = 500;

interface PlotBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

interface PanelSpec {
  box: PlotBox;
  title: string;
  yLabel: string;
  xLabel?: string;
  values: number[];
}

// Fractions of the figure, measured from the bottom-left corner
const SHEAR_BOX = figureBox(0.1, 0.58, 0.85, 0.32);
const MOMENT_BOX = figureBox(0.1, 0.1, 0.85, 0.32);

function figureBox(left: number, bottom: number, width: number, height: number): PlotBox {
  return {
    left: left * WIDTH,
    top: (1 - bottom - height) * HEIGHT,
    width: width * WIDTH,
    height: height * HEIGHT,
  };
}

// ─── Axis helpers ────────────────────────────────────────────────────────────

/** Data limits with a 5% margin; a flat series gets ±1 around its value. */
export function paddedRange(values: number[]): [number, number] {
  let lo = Infinity;
  let hi = -Infinity;
  for (const v of values) {
    if (v < lo) lo = v;
    if (v > hi) hi = v;
  }
  if (!Number.isFinite(lo) || !Number.isFinite(hi)) return [-1, 1];
  const span = hi - lo;
  if (span < 1e-12) return [lo - 1, hi + 1];
  return [lo - span * 0.05, hi + span * 0.05];
}

/** Round-number tick positions (1, 2, 2.5 or 5 × 10ⁿ) covering [lo, hi]. */
export function niceTicks(lo: number, hi: number, target: number = 6): number[] {
  const raw = (hi - lo) / target;
  const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
  let step = magnitude * 10;
  for (const m of [1, 2, 2.5, 5]) {
    if (raw <= m * magnitude) {
      step = m * magnitude;
      break;
    }
  }

  const ticks: number[] = [];
  const first = Math.ceil(lo / step);
  const last = Math.floor(hi / step);
  for (let k = first; k <= last; k++) {
    const t = k * step;
    ticks.push(Math.abs(t) < step * 1e-9 ? 0 : t);
  }
  return ticks;
}

function formatTick(value: number, step: number): string {
  const decimals = Math.min(6, Math.max(0, -Math.floor(Math.log10(step) + 1e-9)));
  const text = value.toFixed(decimals);
  return text === `-${(0).toFixed(decimals)}` ? (0).toFixed(decimals) : text;
}

// ─── Panels ──────────────────────────────────────────────────────────────────

function drawPanel(lines: string[], panel: PanelSpec, xs: number[], span: number): void {
  const { box, values } = panel;
  const [xLo, xHi] = [-span * 0.05, span * 1.05];
  const [yLo, yHi] = paddedRange(values);

  const sx = (x: number) => box.left + ((x - xLo) / (xHi - xLo)) * box.width;
  const sy = (y: number) => box.top + box.height - ((y - yLo) / (yHi - yLo)) * box.height;
  const bottom = box.top + box.height;
  const right = box.left + box.width;

  lines.push(`<g class="panel">`);
  lines.push(`<rect x="${px(box.left)}" y="${px(box.top)}" width="${px(box.width)}" height="${px(box.height)}" fill="white" stroke="#333" stroke-width="1"/>`);

  const xTicks = niceTicks(xLo, xHi);
  const xStep = xTicks.length > 1 ? xTicks[1]! - xTicks[0]! : span;
  for (const t of xTicks) {
    const gx = px(sx(t));
    lines.push(`<line class="grid" x1="${gx}" y1="${px(box.top)}" x2="${gx}" y2="${px(bottom)}" stroke="#b0b0b0" stroke-width="0.8"/>`);
    lines.push(`<text x="${gx}" y="${px(bottom + 14)}" text-anchor="middle" font-size="10">${formatTick(t, xStep)}</text>`);
  }

  const yTicks = niceTicks(yLo, yHi);
  const yStep = yTicks.length > 1 ? yTicks[1]! - yTicks[0]! : Math.abs(yHi - yLo);
  for (const t of yTicks) {
    const gy = px(sy(t));
    lines.push(`<line class="grid" x1="${px(box.left)}" y1="${gy}" x2="${px(right)}" y2="${gy}" stroke="#b0b0b0" stroke-width="0.8"/>`);
    lines.push(`<text x="${px(box.left - 4)}" y="${px(sy(t) + 3)}" text-anchor="end" font-size="10">${formatTick(t, yStep)}</text>`);
  }

  const pointList = xs.map((x, i) => `${px(sx(x))},${px(sy(values[i]!))}`).join(" ");
  lines.push(`<polyline class="series" points="${pointList}" fill="none" stroke="#1f77b4" stroke-width="1.5"/>`);

  lines.push(`<text class="title" x="${px(box.left + box.width / 2)}" y="${px(box.top - 8)}" text-anchor="middle" font-size="13">${escapeXml(panel.title)}</text>`);
  const yLabelX = px(box.left - 48);
  const yLabelY = px(box.top + box.height / 2);
  lines.push(`<text class="ylabel" x="${yLabelX}" y="${yLabelY}" transform="rotate(-90 ${yLabelX} ${yLabelY})" text-anchor="middle" font-size="11">${escapeXml(panel.yLabel)}</text>`);
  if (panel.xLabel) {
    lines.push(`<text class="xlabel" x="${px(box.left + box.width / 2)}" y="${px(bottom + 32)}" text-anchor="middle" font-size="11">${escapeXml(panel.xLabel)}</text>`);
  }
  lines.push(`</g>`);
}

// ─── Render ──────────────────────────────────────────────────────────────────

export function plotEnvelope(points: EnvelopePoint[], span: number): SvgImage {
  const xs = points.map((p) => p.x_m);
  const lines: string[] = [];

  lines.push(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${WIDTH} ${HEIGHT}" width="${WIDTH}" height="${HEIGHT}" font-family="Arial, sans-serif">`);
  lines.push(`<rect width="${WIDTH}" height="${HEIGHT}" fill="white"/>`);

  drawPanel(
    lines,
    { box: SHEAR_BOX, title: "Shear Force Diagram", yLabel: "Shear (kN)", values: points.map((p) => p.shear_kn) },
    xs,
    span,
  );
  drawPanel(
    lines,
    {
      box: MOMENT_BOX,
      title: "Bending Moment Diagram",
      yLabel: "Moment (kN·m)",
      xLabel: "Length (m)",
      values: points.map((p) => p.moment_knm),
    },
    xs,
    span,
  );

  lines.push(`</svg>`);
  return svgImage(WIDTH, HEIGHT, lines);
}

export function renderEnvelopeDiagrams(
  variant: BeamVariant,
  w: number,
  L: number,
  numPoints: number = DEFAULT_SAMPLE_COUNT,
): SvgImage {
  const envelope = createEnvelope(variant, w, L);
  return plotEnvelope(sampleEnvelope(envelope, numPoints), L);
}
