#!/usr/bin/env node
/**
 * rcbeam web server: HTTP JSON/form API over the beam design tools.
 *
 * Every request is computed from scratch; the server keeps no state between
 * calls beyond its configuration.
 */
import fs from "node:fs";
import http from "node:http";
import type { Readable } from "node:stream";
import { pathToFileURL } from "node:url";
import { Busboy } from "@fastify/busboy";
import { isBeamDesignError } from "./errors.js";
import { loadDotEnv, resolveConfig, dim, red } from "./shared.js";
import { createAllToolDefinitions } from "./tools/index.js";
import { BEAM_VARIANTS, parseBeamVariant } from "./tools/structural/beam-envelope.js";
import { renderSchematic } from "./tools/structural/beam-schematic.js";
import { renderEnvelopeDiagrams } from "./tools/structural/envelope-diagrams.js";
import { formatDesignReport, type ShearReactionMode } from "./tools/structural/section-design.js";
import { parseDesignInput, readNumber, runDesign, toRecord } from "./tools/structural/rc-beam-design.js";
import type { SvgImage } from "./tools/structural/svg-image.js";

export interface DesignServerOptions {
  shearReaction?: ShearReactionMode;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function corsHeaders(): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": "*",
    "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
  };
}

function jsonResponse(res: http.ServerResponse, status: number, data: unknown) {
  res.writeHead(status, { ...corsHeaders(), "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

function svgResponse(res: http.ServerResponse, image: SvgImage) {
  res.writeHead(200, { ...corsHeaders(), "Content-Type": image.mimeType });
  res.end(image.svg);
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk: Buffer) => (body += chunk.toString()));
    req.on("end", () => resolve(body));
    req.on("error", reject);
  });
}

class BadRequestError extends Error {}

/** HTML form posts, urlencoded or multipart. File parts are drained and ignored. */
function readFormFields(req: http.IncomingMessage, contentType: string): Promise<Record<string, string>> {
  return new Promise((resolve, reject) => {
    let busboy: ReturnType<typeof Busboy>;
    try {
      busboy = Busboy({ headers: { ...req.headers, "content-type": contentType } });
    } catch (err) {
      reject(new BadRequestError(err instanceof Error ? err.message : String(err)));
      return;
    }
    const fields: Record<string, string> = {};

    busboy.on("field", (fieldname: string, value: string) => {
      fields[fieldname] = value;
    });
    busboy.on("file", (_fieldname: string, stream: Readable) => {
      stream.resume();
    });
    busboy.on("finish", () => resolve(fields));
    busboy.on("error", (err: unknown) => reject(err instanceof Error ? err : new Error(String(err))));

    req.pipe(busboy);
  });
}

async function readArguments(req: http.IncomingMessage): Promise<Record<string, unknown>> {
  const contentType = req.headers["content-type"] ?? "";
  if (contentType.includes("multipart/form-data") || contentType.includes("application/x-www-form-urlencoded")) {
    return readFormFields(req, contentType);
  }

  const body = await readBody(req);
  if (!body.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new BadRequestError("Invalid JSON body.");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new BadRequestError("Expected a JSON object.");
  }
  return toRecord(parsed);
}

function sendError(res: http.ServerResponse, err: unknown) {
  if (isBeamDesignError(err)) {
    jsonResponse(res, 400, { error: err.message, code: err.code });
  } else if (err instanceof BadRequestError) {
    jsonResponse(res, 400, { error: err.message, code: "invalid_input" });
  } else {
    const message = err instanceof Error ? err.message : String(err);
    console.error(red(`Error: ${message}`));
    jsonResponse(res, 500, { error: message });
  }
}

// ─── Server ──────────────────────────────────────────────────────────────────

export function createDesignServer(options: DesignServerOptions = {}): http.Server {
  const shearReaction = options.shearReaction ?? "simply_supported";
  const tools = createAllToolDefinitions({ shearReaction });

  async function handleDesign(req: http.IncomingMessage, res: http.ServerResponse) {
    const input = parseDesignInput(await readArguments(req));
    const result = runDesign(input, shearReaction);
    jsonResponse(res, 200, {
      result,
      report: formatDesignReport(result),
      schematic_svg: renderSchematic(input.beam_type).svg,
      diagrams_svg: renderEnvelopeDiagrams(input.beam_type, input.load_kn_per_m, input.span_m).svg,
    });
  }

  function handleStatus(res: http.ServerResponse) {
    jsonResponse(res, 200, {
      name: "rcbeam",
      tools: tools.map((t) => t.name),
      variants: BEAM_VARIANTS,
      shearReaction,
    });
  }

  async function handleTool(req: http.IncomingMessage, res: http.ServerResponse, name: string) {
    const tool = tools.find((t) => t.name === name);
    if (!tool) {
      jsonResponse(res, 404, { error: `Unknown tool '${name}'` });
      return;
    }
    const args = await readArguments(req);
    const result = await tool.execute(`http-${Date.now()}`, args);
    jsonResponse(res, 200, result);
  }

  return http.createServer(async (req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method?.toUpperCase();

    // CORS preflight
    if (method === "OPTIONS") {
      res.writeHead(204, corsHeaders());
      res.end();
      return;
    }

    try {
      const query = Object.fromEntries(url.searchParams);
      if (method === "POST" && url.pathname === "/api/design") {
        await handleDesign(req, res);
      } else if (method === "GET" && url.pathname === "/api/status") {
        handleStatus(res);
      } else if (method === "GET" && url.pathname === "/api/schematic") {
        svgResponse(res, renderSchematic(parseBeamVariant(query.beam_type)));
      } else if (method === "GET" && url.pathname === "/api/diagrams") {
        svgResponse(
          res,
          renderEnvelopeDiagrams(
            parseBeamVariant(query.beam_type),
            readNumber(query, "load_kn_per_m"),
            readNumber(query, "span_m"),
          ),
        );
      } else if (method === "POST" && url.pathname.startsWith("/api/tools/")) {
        await handleTool(req, res, decodeURIComponent(url.pathname.slice("/api/tools/".length)));
      } else {
        jsonResponse(res, 404, { error: "Not found" });
      }
    } catch (err) {
      sendError(res, err);
    }
  });
}

// ─── Main ────────────────────────────────────────────────────────────────────

function main() {
  loadDotEnv();
  const config = resolveConfig();
  const server = createDesignServer({ shearReaction: config.shearReaction });

  server.listen(config.port, () => {
    console.log(dim(`┌ rcbeam web server`));
    console.log(dim(`│ http://localhost:${config.port}`));
    console.log(dim(`└ shear reaction: ${config.shearReaction}`));
  });
}

const entryPath = process.argv[1];
if (entryPath !== undefined && import.meta.url === pathToFileURL(fs.realpathSync(entryPath)).href) {
  try {
    main();
  } catch (err) {
    console.error(red(`Fatal: ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  }
}
