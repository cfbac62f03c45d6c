import { compareDependencyFiles, renderComparison, type DependencyComparison } from "../core/comparison.js";
import { EmptyInputError, MalformedInputError } from "../core/errors.js";

import { renderCliError } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CompareCommandOptions = {
  tree: string;
  sbom: string;
  json?: boolean;
};

export const COMPARE_EXIT_CODES = {
  ok: 0,
  emptyInput: 2,
  malformedInput: 3,
} as const;

// =============================================================================
// COMPARE COMMAND
// =============================================================================

/** Offline reconciliation of a resolver tree against an SBOM. Returns the exit code. */
export async function compareCommand(opts: CompareCommandOptions): Promise<number> {
  let comparison: DependencyComparison;
  try {
    comparison = await compareDependencyFiles(opts.tree, opts.sbom);
  } catch (err) {
    if (err instanceof EmptyInputError) {
      console.error(renderCliError(err));
      return COMPARE_EXIT_CODES.emptyInput;
    }
    if (err instanceof MalformedInputError) {
      console.error(renderCliError(err));
      return COMPARE_EXIT_CODES.malformedInput;
    }
    throw err;
  }

  if (opts.json) {
    console.log(JSON.stringify(comparison, null, 2));
    return COMPARE_EXIT_CODES.ok;
  }

  console.log(renderComparison(comparison.result));
  for (const conflict of comparison.conflicts) {
    console.log(`Warning: ${conflict.name} appears at versions ${conflict.versions.join(", ")}`);
  }
  return COMPARE_EXIT_CODES.ok;
}
