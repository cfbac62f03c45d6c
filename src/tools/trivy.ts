import path from "node:path";

import { ScanError } from "../core/errors.js";
import type {
  ScanOutputNames,
  ScanReportLocations,
  StageContext,
  VulnerabilityScanner,
} from "../app/pipeline/ports.js";

type TrivyFormat = "cyclonedx" | "json" | "table";

export function buildTrivyArgs(
  sbomPath: string,
  format: TrivyFormat,
  output: string,
  scanners: readonly string[],
): string[] {
  return ["sbom", sbomPath, "--format", format, "--scanners", scanners.join(","), "-o", output];
}

export class TrivyScanner implements VulnerabilityScanner {
  constructor(
    private readonly trivyBin: string = "trivy",
    private readonly scanners: readonly string[] = ["vuln"],
  ) {}

  async scan(sbomPath: string, outputs: ScanOutputNames, ctx: StageContext): Promise<ScanReportLocations> {
    const locations: ScanReportLocations = {
      structured: path.join(ctx.jobDir, outputs.structured),
      flat: path.join(ctx.jobDir, outputs.flat),
      table: path.join(ctx.jobDir, outputs.table),
    };

    const passes: Array<[TrivyFormat, string]> = [
      ["cyclonedx", locations.structured],
      ["json", locations.flat],
      ["table", locations.table],
    ];

    for (const [format, output] of passes) {
      await ctx.run(
        {
          command: this.trivyBin,
          args: buildTrivyArgs(sbomPath, format, output, this.scanners),
          cwd: ctx.jobDir,
          signal: ctx.signal,
        },
        (message, cause) => new ScanError(message, cause),
      );
    }

    return locations;
  }
}
