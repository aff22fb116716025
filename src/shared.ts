/**
 * Shared setup code used by both the CLI (entry.ts) and the web server (server.ts).
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { ConfigError } from "./errors.js";
import type { ShearReactionMode } from "./tools/structural/section-design.js";
import { parseShearReaction } from "./tools/structural/rc-beam-design.js";

// ─── .env loading ────────────────────────────────────────────────────────────

/** Values already present in the environment win over the file. */
export function loadDotEnv(envPath: string = path.join(process.cwd(), ".env")): void {
  let content: string;
  try {
    content = fs.readFileSync(envPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return;
    throw err;
  }
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim().replace(/^(["'])(.*)\1$/, "$2");
    if (key && !(key in process.env)) {
      process.env[key] = value;
    }
  }
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface RcBeamConfig {
  port: number;
  home: string;
  outputDir: string;
  shearReaction: ShearReactionMode;
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): RcBeamConfig {
  const port = parseInt(env.PORT ?? "3001", 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be a port number (got '${env.PORT}').`);
  }

  const home = env.RCBEAM_HOME?.trim() || path.join(os.homedir(), ".rcbeam");

  let shearReaction: ShearReactionMode;
  try {
    shearReaction = parseShearReaction(env.RCBEAM_SHEAR_REACTION) ?? "simply_supported";
  } catch (err) {
    throw new ConfigError(`RCBEAM_SHEAR_REACTION: ${err instanceof Error ? err.message : String(err)}`);
  }

  return { port, home, outputDir: path.join(home, "output"), shearReaction };
}

// ─── Ensure directories ─────────────────────────────────────────────────────

export function ensureDirs(config: RcBeamConfig): void {
  for (const dir of [config.home, config.outputDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

// ─── Console styling ─────────────────────────────────────────────────────────

export const dim = (text: string) => `\x1b[2m${text}\x1b[0m`;
export const red = (text: string) => `\x1b[31m${text}\x1b[0m`;
export const bold = (text: string) => `\x1b[1m${text}\x1b[0m`;
