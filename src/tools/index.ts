/**
 * Barrel file — exports all tool definitions for rcbeam.
 *
 * Each tool follows the pattern: createXxxToolDefinition() → ToolDefinition
 */
import type { ToolDefinition } from "./types.js";

// ─── Structural ─────────────────────────────────────────────────────────────
import {
  createRcBeamDesignToolDefinition,
  createBeamSchematicToolDefinition,
  createBeamDiagramsToolDefinition,
  type RcBeamDesignToolOptions,
} from "./structural/rc-beam-design.js";

// ─── Re-export all individual creators ──────────────────────────────────────
export {
  createRcBeamDesignToolDefinition,
  createBeamSchematicToolDefinition,
  createBeamDiagramsToolDefinition,
};
export type { ToolDefinition, ToolResult } from "./types.js";

// ─── Convenience: build all tools at once ───────────────────────────────────

export function createAllToolDefinitions(options: RcBeamDesignToolOptions = {}): ToolDefinition[] {
  return [
    createRcBeamDesignToolDefinition(options),
    createBeamSchematicToolDefinition(),
    createBeamDiagramsToolDefinition(),
  ];
}
