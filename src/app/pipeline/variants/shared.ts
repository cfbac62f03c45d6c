import path from "node:path";

import fse from "fs-extra";

import {
  compareDependencyFiles,
  writeComparison,
  type DependencyComparison,
} from "../../../core/comparison.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logJobEvent } from "../../../core/logger.js";
import { findArtifact, type ArtifactKind } from "../../../core/report.js";
import type { ScanOutputNames, VulnerabilityScanner } from "../ports.js";
import { artifact, type Stage } from "../stages.js";

export const COMPARISON_FILE = "comparison.txt";

/** Scans the latest `sbom` artifact; skipped when no SBOM was produced. */
export function scanStage(scanner: VulnerabilityScanner, outputs: ScanOutputNames): Stage {
  return {
    name: "scan-sbom",
    async skipReason(state) {
      const sbom = findArtifact(state.artifacts, "sbom");
      if (!sbom) return "no SBOM to scan";
      return (await fse.pathExists(sbom.location)) ? null : `SBOM ${sbom.location} does not exist`;
    },
    async run(state, ctx) {
      const sbom = findArtifact(state.artifacts, "sbom");
      if (!sbom) return { skipped: true, reason: "no SBOM to scan" };

      const reports = await scanner.scan(sbom.location, outputs, ctx);
      return {
        artifacts: [
          artifact("sbom-cyclonedx", reports.structured),
          artifact("scan-report", reports.flat),
          artifact("scan-table", reports.table),
        ],
        resultFiles: {
          trivy_cyclonedx_json: reports.structured,
          trivy_report_json: reports.flat,
          trivy_table: reports.table,
        },
      };
    },
  };
}

/**
 * Diffs the dependency tree against an SBOM view. Never fails the job: any
 * problem with either input becomes an `unavailable` outcome on the state.
 */
export function reconcileStage(sbomKind: ArtifactKind): Stage {
  return {
    name: "reconcile",
    async run(state, ctx) {
      const unavailable = (reason: string) => {
        state.reconciliation = { status: "unavailable", reason };
        logJobEvent(ctx.events, "reconcile.unavailable", ctx.jobId, { reason });
        return { skipped: true, reason };
      };

      const tree = findArtifact(state.artifacts, "dependency-tree");
      if (!tree) return unavailable("no dependency tree");
      const sbom = findArtifact(state.artifacts, sbomKind);
      if (!sbom) return unavailable(`no ${sbomKind} artifact`);

      let comparison: DependencyComparison;
      try {
        comparison = await compareDependencyFiles(tree.location, sbom.location);
      } catch (err) {
        return unavailable(formatErrorMessage(err));
      }

      const output = path.join(ctx.jobDir, COMPARISON_FILE);
      try {
        await writeComparison(output, comparison.result);
      } catch (err) {
        return unavailable(`Failed to write ${output}: ${formatErrorMessage(err)}`);
      }
      state.reconciliation = {
        status: "available",
        result: comparison.result,
        conflicts: comparison.conflicts,
      };

      return {
        artifacts: [artifact("reconciliation", output, comparison.result)],
        resultFiles: { comparison: output },
      };
    },
  };
}

