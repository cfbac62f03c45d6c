/**
 * loadAppContext resolves config + paths for app entrypoints.
 * Purpose: centralize config discovery without mutating process.env.
 * Assumptions: the loader validates the schema and resolves `home`.
 * Usage: const { appContext } = loadAppContext({ explicitConfigPath }).
 */

import { loadAppConfig, resolveConfigPath } from "../../core/config-loader.js";
import { createAppContext, type AppContext } from "../context.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadAppContextArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export type LoadAppContextResult = {
  appContext: AppContext;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadAppContext(args: LoadAppContextArgs = {}): LoadAppContextResult {
  const cwd = args.cwd ?? process.cwd();
  const configPath = resolveConfigPath({ explicitPath: args.explicitConfigPath, cwd });
  const config = loadAppConfig({ configPath: args.explicitConfigPath, cwd });

  return { appContext: createAppContext({ configPath, config }) };
}
