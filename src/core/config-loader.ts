import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";

import { AppConfigSchema, type AppConfig } from "./config.js";
import { formatZodIssues } from "./error-format.js";
import { ConfigError } from "./errors.js";
import { resolveBomkeeperHome } from "./paths.js";

export const DEFAULT_CONFIG_FILE = "bomkeeper.yaml";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const { line, column } = error.mark;
  return { line: line + 1, column: column + 1 };
}

// =============================================================================
// PUBLIC API
// =============================================================================

export type ResolveConfigPathOptions = {
  explicitPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Explicit path first, then BOMKEEPER_CONFIG, then bomkeeper.yaml in the cwd.
 * Returns null when nothing applies so callers fall back to defaults.
 */
export function resolveConfigPath(opts: ResolveConfigPathOptions = {}): string | null {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;

  if (opts.explicitPath) {
    return path.resolve(cwd, opts.explicitPath);
  }
  if (env.BOMKEEPER_CONFIG) {
    return path.resolve(cwd, env.BOMKEEPER_CONFIG);
  }

  const local = path.join(cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(local) ? local : null;
}

export function parseAppConfig(doc: unknown, opts: { file: string; cwd: string }): AppConfig {
  const expanded = expandEnv(doc ?? {}, { file: opts.file, trail: [] });

  const parsed = AppConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    const details = formatZodIssues(parsed.error.issues);
    throw new ConfigError(`Invalid config at ${opts.file}:\n${details}`, parsed.error);
  }

  const cfg = parsed.data;
  const baseDir = opts.file === "<defaults>" ? opts.cwd : path.dirname(opts.file);
  const home = cfg.home
    ? path.resolve(baseDir, cfg.home)
    : resolveBomkeeperHome({ cwd: opts.cwd });

  return { ...cfg, home };
}

export function loadAppConfig(opts: { configPath?: string; cwd?: string } = {}): AppConfig {
  const cwd = opts.cwd ?? process.cwd();
  const configPath = resolveConfigPath({ explicitPath: opts.configPath, cwd });

  if (configPath === null) {
    return parseAppConfig({}, { file: "<defaults>", cwd });
  }

  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config not found at ${configPath}.`);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${configPath}`, err);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const location = resolveYamlErrorLocation(err);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigError(`Failed to parse YAML config at ${configPath}${locationDetail}: ${detail}`, err);
  }

  return parseAppConfig(doc, { file: configPath, cwd });
}
