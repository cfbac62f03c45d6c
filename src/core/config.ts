import { z } from "zod";

const ServerSchema = z
  .object({
    host: z.string().min(1).default("127.0.0.1"),
    port: z.number().int().min(0).max(65535).default(5000),
  })
  .strict();

const JobsSchema = z
  .object({
    max_concurrent: z.number().int().positive().default(2),
    // 0 disables the per-stage timeout.
    stage_timeout_seconds: z.number().int().min(0).default(1800),
  })
  .strict();

const ToolsSchema = z
  .object({
    git: z.string().min(1).default("git"),
    python: z.string().min(1).default("python3"),
    go: z.string().min(1).default("go"),
    trivy: z.string().min(1).default("trivy"),
    cyclonedx_gomod: z.string().min(1).default("cyclonedx-gomod"),
    mvn: z.string().min(1).optional(),
    deptree_module: z.string().min(1).default("github.com/vc60er/deptree@latest"),
  })
  .strict();

const MavenSchema = z
  .object({
    version: z.string().min(1).default("3.9.9"),
    base_url: z.string().url().default("https://archive.apache.org/dist/maven/maven-3"),
    cyclonedx_plugin: z
      .string()
      .min(1)
      .default("org.cyclonedx:cyclonedx-maven-plugin:2.9.1"),
  })
  .strict();

const TrivySchema = z
  .object({
    scanners: z.array(z.string().min(1)).min(1).default(["vuln"]),
  })
  .strict();

export const AppConfigSchema = z
  .object({
    home: z.string().min(1).optional(),
    server: ServerSchema.default({}),
    jobs: JobsSchema.default({}),
    tools: ToolsSchema.default({}),
    maven: MavenSchema.default({}),
    trivy: TrivySchema.default({}),
  })
  .strict();

export type AppConfigInput = z.input<typeof AppConfigSchema>;

export type AppConfig = Omit<z.infer<typeof AppConfigSchema>, "home"> & {
  home: string;
};

export type ToolsConfig = AppConfig["tools"];
export type MavenConfig = AppConfig["maven"];
export type TrivyConfig = AppConfig["trivy"];

export function stageTimeoutMs(config: AppConfig): number | undefined {
  const seconds = config.jobs.stage_timeout_seconds;
  return seconds > 0 ? seconds * 1000 : undefined;
}
