import type { JobView } from "../app/jobs/registry.js";
import { countReconciliation } from "../core/reconcile.js";

// =============================================================================
// JOB SUMMARY
// =============================================================================

export function formatJobSummary(view: JobView): string[] {
  const lines = [`Job: ${view.id}`, `Status: ${view.status}`];

  if (view.language) {
    const manager = view.dependency_manager ? ` (${view.dependency_manager})` : "";
    lines.push(`Language: ${view.language}${manager}`);
  }
  if (view.started_at) lines.push(`Started: ${view.started_at}`);
  if (view.finished_at) lines.push(`Finished: ${view.finished_at}`);

  const report = view.report;
  if (report) {
    if (report.unsupported) {
      lines.push("Unsupported ecosystem: no SBOM was produced");
    }

    if (report.stages.length > 0) {
      const width = Math.max(...report.stages.map((stage) => stage.name.length));
      lines.push("Stages:");
      for (const stage of report.stages) {
        const reason = stage.reason ? `  ${stage.reason}` : "";
        lines.push(`  ${stage.name.padEnd(width)}  ${stage.status}${reason}`);
      }
    }

    const reconciliation = report.reconciliation;
    if (reconciliation.status === "available") {
      const counts = countReconciliation(reconciliation.result);
      lines.push(
        `Reconciliation: ${counts.missing_in_b} missing, ${counts.version_mismatch} mismatched, ` +
          `${counts.same} same, ${counts.extra_in_b} extra`,
      );
    } else {
      lines.push(`Reconciliation unavailable: ${reconciliation.reason}`);
    }

    const resultFiles = Object.entries(report.result_files);
    if (resultFiles.length > 0) {
      lines.push("Result files:");
      for (const [name, location] of resultFiles) {
        lines.push(`  ${name}: ${location}`);
      }
    }
  }

  if (view.error) {
    const [first] = view.error.split("\n");
    const kind = view.error_kind ? ` [${view.error_kind}]` : "";
    lines.push(`Error${kind}: ${first}`);
  }

  return lines;
}
