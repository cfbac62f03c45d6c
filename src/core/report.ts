import { z } from "zod";

import type { ReconciliationResult } from "./reconcile.js";

// =============================================================================
// ARTIFACTS
// =============================================================================

export const ArtifactKindSchema = z.enum([
  "source",
  "environment",
  "dependency-manifest",
  "resolved-dependencies",
  "dependency-tree",
  "upgrade-listing",
  "tree-tool",
  "build-tool",
  "sbom",
  "sbom-cyclonedx",
  "scan-report",
  "scan-table",
  "reconciliation",
]);
export type ArtifactKind = z.infer<typeof ArtifactKindSchema>;

export const PipelineArtifactSchema = z.object({
  kind: ArtifactKindSchema,
  location: z.string(),
  payload: z.unknown().optional(),
});
export type PipelineArtifact = z.infer<typeof PipelineArtifactSchema>;

export const StageOutcomeSchema = z.object({
  name: z.string(),
  status: z.enum(["completed", "skipped"]),
  reason: z.string().optional(),
  artifacts: z.array(z.string()).default([]),
});
export type StageOutcome = z.infer<typeof StageOutcomeSchema>;

// =============================================================================
// RECONCILIATION
// =============================================================================

const DependencyEntrySchema = z.object({ name: z.string(), version: z.string() });

export const ReconciliationResultSchema: z.ZodType<ReconciliationResult> = z.object({
  missing_in_b: z.array(DependencyEntrySchema),
  version_mismatch: z.array(
    z.object({ name: z.string(), tree_version: z.string(), sbom_version: z.string() }),
  ),
  same: z.array(DependencyEntrySchema),
  extra_in_b: z.array(DependencyEntrySchema),
});

export const ReconciliationOutcomeSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("available"),
    result: ReconciliationResultSchema,
    conflicts: z.array(z.object({ name: z.string(), versions: z.array(z.string()) })),
  }),
  z.object({
    status: z.literal("unavailable"),
    reason: z.string(),
  }),
]);
export type ReconciliationOutcome = z.infer<typeof ReconciliationOutcomeSchema>;

// =============================================================================
// REPORT
// =============================================================================

export const SystemInfoSchema = z.object({
  platform: z.string(),
  arch: z.string(),
  release: z.string(),
});
export type SystemInfo = z.infer<typeof SystemInfoSchema>;

export const JobReportSchema = z.object({
  job_id: z.string(),
  repo: z.string(),
  system: SystemInfoSchema,
  repo_path: z.string(),
  language: z.string(),
  dependency_manager: z.string(),
  unsupported: z.boolean(),
  stages: z.array(StageOutcomeSchema),
  artifacts: z.array(PipelineArtifactSchema),
  result_files: z.record(z.string()),
  results: z.object({
    trivy_report_json: z.unknown().nullable(),
    trivy_cyclonedx_json: z.unknown().nullable(),
    reconciliation: ReconciliationResultSchema.nullable(),
  }),
  reconciliation: ReconciliationOutcomeSchema,
  generated_at: z.string(),
});
export type JobReport = z.infer<typeof JobReportSchema>;

export function findArtifact(
  artifacts: readonly PipelineArtifact[],
  kind: ArtifactKind,
): PipelineArtifact | undefined {
  // Later stages may supersede an earlier artifact of the same kind.
  for (let i = artifacts.length - 1; i >= 0; i -= 1) {
    const artifact = artifacts[i];
    if (artifact && artifact.kind === kind) return artifact;
  }
  return undefined;
}
