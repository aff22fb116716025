#!/usr/bin/env node
/**
 * rcbeam: terminal REPL for preliminary RC beam design.
 *
 * Each line is one design request; the report is printed and the schematic
 * and shear/moment diagrams are written as SVG files to the output directory.
 */
import readline from "node:readline/promises";
import path from "node:path";
import { stdin, stdout } from "node:process";
import { isBeamDesignError } from "./errors.js";
import { parseReplLine } from "./repl-input.js";
import { loadDotEnv, resolveConfig, ensureDirs, dim, red, bold } from "./shared.js";
import { createAllToolDefinitions, type ToolDefinition } from "./tools/index.js";
import { BEAM_VARIANTS, BEAM_VARIANT_LABELS } from "./tools/structural/beam-envelope.js";
import { parseShearReaction, type DesignInput } from "./tools/structural/rc-beam-design.js";
import type { ShearReactionMode } from "./tools/structural/section-design.js";

const HELP = [
  `<beam_type> w=<kN/m> L=<m> b=<mm> d=<mm> fc=<MPa> fy=<MPa>`,
  `  e.g. cantilever w=12 L=4 b=250 d=400 fc=25 fy=420`,
  `  omitted values: simply_supported w=30 L=20 b=300 d=500 fc=30 fy=420`,
  `/variants                      list beam types`,
  `/shear [simply_supported|envelope]  show or set the design shear source`,
  `/out <dir>                     write SVGs to <dir>`,
  `/status                        show current settings`,
  `/quit                          exit`,
];

function findTool(tools: ToolDefinition[], name: string): ToolDefinition {
  const tool = tools.find((t) => t.name === name);
  if (!tool) throw new Error(`Tool '${name}' is not registered.`);
  return tool;
}

function printContent(result: { content: Array<{ text: string }> }) {
  const first = result.content[0];
  if (first) console.log(first.text);
}

async function runRequest(input: DesignInput, shearReaction: ShearReactionMode, outputDir: string) {
  const tools = createAllToolDefinitions({ shearReaction });
  const callId = `repl-${Date.now()}`;

  printContent(await findTool(tools, "rc_beam_design").execute(callId, input));
  console.log();

  const schematic = await findTool(tools, "beam_schematic").execute(callId, {
    beam_type: input.beam_type,
    output_path: path.join(outputDir, `${input.beam_type}-schematic.svg`),
  });
  const diagrams = await findTool(tools, "beam_diagrams").execute(callId, {
    beam_type: input.beam_type,
    load_kn_per_m: input.load_kn_per_m,
    span_m: input.span_m,
    output_path: path.join(outputDir, `${input.beam_type}-diagrams.svg`),
  });
  console.log(dim(schematic.content.map((c) => c.text).join("\n")));
  console.log(dim(diagrams.content.map((c) => c.text).join("\n")));
}

// ─── REPL ────────────────────────────────────────────────────────────────────

async function main() {
  loadDotEnv();
  const config = resolveConfig();
  ensureDirs(config);

  let shearReaction = config.shearReaction;
  let outputDir = config.outputDir;

  console.log(dim(`┌ rcbeam`));
  console.log(dim(`│ shear reaction: ${shearReaction}`));
  console.log(dim(`│ output: ${outputDir}`));
  console.log(dim(`└ /help /variants /shear /out /quit`));
  console.log();

  const rl = readline.createInterface({ input: stdin, output: stdout });

  while (true) {
    let line: string;
    try {
      line = await rl.question(bold("> "));
    } catch {
      break; // EOF
    }

    try {
      const parsed = parseReplLine(line);
      if (parsed.kind === "empty") continue;

      if (parsed.kind === "command") {
        if (parsed.name === "quit" || parsed.name === "exit") break;
        switch (parsed.name) {
          case "help":
            console.log(dim(HELP.join("\n")) + "\n");
            break;
          case "variants":
            for (const v of BEAM_VARIANTS) console.log(dim(`${v.padEnd(18)}${BEAM_VARIANT_LABELS[v]}`));
            console.log();
            break;
          case "shear":
            shearReaction = parseShearReaction(parsed.arg) ?? shearReaction;
            console.log(dim(`Shear reaction: ${shearReaction}`) + "\n");
            break;
          case "out":
            if (!parsed.arg) {
              console.log(dim(`Output: ${outputDir}`) + "\n");
              break;
            }
            outputDir = path.resolve(parsed.arg);
            console.log(dim(`Output: ${outputDir}`) + "\n");
            break;
          case "status":
            console.log(dim(`Shear reaction: ${shearReaction}`));
            console.log(dim(`Output: ${outputDir}`) + "\n");
            break;
          default:
            console.log(red(`Unknown command /${parsed.name}. Try /help.`) + "\n");
        }
        continue;
      }

      const startTime = Date.now();
      await runRequest(parsed.input, shearReaction, outputDir);
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
      console.log(dim(`(${elapsed}s)`) + "\n");
    } catch (err) {
      if (isBeamDesignError(err)) {
        console.error(red(`Error: ${err.message}`) + "\n");
      } else {
        console.error(red(`Error: ${err instanceof Error ? err.message : String(err)}`));
        if (err instanceof Error && err.cause) {
          console.error(dim(String(err.cause)));
        }
        console.log();
      }
    }
  }

  rl.close();
  console.log(dim("Bye."));
}

main().catch((err: unknown) => {
  console.error(red(`Fatal: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
