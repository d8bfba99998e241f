import type { Runtime } from "../bootstrap.js";
import type { SafetyGate } from "../safety/gate.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared server context, created once at startup and passed to every tool module.
 * Each tool call builds its own RunContext from it, with a fresh LogReporter.
 */
export interface ToolContext {
  readonly runtime: Runtime;
  readonly safetyGate: SafetyGate;
  readonly registry: ToolRegistry;
  readonly targetHost: string;
}
