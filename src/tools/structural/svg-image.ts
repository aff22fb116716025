import fs from "node:fs";
import path from "node:path";

export interface SvgImage {
  mimeType: "image/svg+xml";
  width: number;
  height: number;
  svg: string;
}

export function svgImage(width: number, height: number, lines: string[]): SvgImage {
  return { mimeType: "image/svg+xml", width, height, svg: lines.join("\n") };
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** Coordinates rounded to 2 dp keep the markup short. */
export function px(n: number): string {
  return String(Math.round(n * 100) / 100);
}

/** Writes the image and returns the resolved path. */
export function saveSvg(image: SvgImage, outputPath: string): string {
  const resolvedPath = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
  fs.writeFileSync(resolvedPath, image.svg, "utf-8");
  return resolvedPath;
}
