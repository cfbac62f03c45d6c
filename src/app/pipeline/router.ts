/**
 * Routes a detected (language, dependency manager) pair to its pipeline variant.
 * Purpose: keep ecosystem branching in one exhaustive table.
 * Assumptions: a pair with no route is reported as unsupported, never raised.
 * Usage: const variant = selectVariant(detection, collaborators);
 */

import type { StageOutcome } from "../../core/report.js";

import type { DependencyManager, Detection, Language, PipelineCollaborators, StageContext } from "./ports.js";
import { runStages, type PipelineState, type RunStagesOptions, type Stage } from "./stages.js";
import { createGoState, goStages } from "./variants/go.js";
import { createMavenState, mavenStages } from "./variants/maven.js";
import { createPythonState, pythonStages } from "./variants/python.js";

// =============================================================================
// TYPES
// =============================================================================

export type VariantName = "python" | "go" | "maven";

export type VariantRun = {
  state: PipelineState;
  stages: StageOutcome[];
};

export type PipelineVariant = {
  name: VariantName;
  stageNames: string[];
  execute(base: PipelineState, ctx: StageContext, opts?: RunStagesOptions): Promise<VariantRun>;
};

type Route = {
  language: Exclude<Language, "unknown">;
  /** "any" accepts every manager detected for the language, including unknown. */
  managers: readonly DependencyManager[] | "any";
  variant: VariantName;
};

// =============================================================================
// ROUTES
// =============================================================================

export const ROUTES: readonly Route[] = [
  { language: "python", managers: "any", variant: "python" },
  { language: "go", managers: ["go-modules"], variant: "go" },
  { language: "java", managers: ["maven"], variant: "maven" },
];

const VARIANTS: Record<VariantName, (collaborators: PipelineCollaborators) => PipelineVariant> = {
  python: (c) => defineVariant("python", createPythonState, pythonStages(c.python, c.scanner)),
  go: (c) => defineVariant("go", createGoState, goStages(c.go, c.scanner)),
  maven: (c) => defineVariant("maven", createMavenState, mavenStages(c.maven, c.scanner)),
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function routeFor(detection: Detection): VariantName | null {
  const route = ROUTES.find(
    (candidate) =>
      candidate.language === detection.language &&
      (candidate.managers === "any" || candidate.managers.includes(detection.dependencyManager)),
  );
  return route?.variant ?? null;
}

export function selectVariant(
  detection: Detection,
  collaborators: PipelineCollaborators,
): PipelineVariant | null {
  const name = routeFor(detection);
  return name ? VARIANTS[name](collaborators) : null;
}

// =============================================================================
// INTERNALS
// =============================================================================

function defineVariant<S extends PipelineState>(
  name: VariantName,
  createState: (base: PipelineState) => S,
  stages: ReadonlyArray<Stage<S>>,
): PipelineVariant {
  return {
    name,
    stageNames: stages.map((stage) => stage.name),
    async execute(base, ctx, opts) {
      const state = createState(base);
      const outcomes = await runStages(stages, state, ctx, opts);
      return { state, stages: outcomes };
    },
  };
}
