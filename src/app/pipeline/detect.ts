import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import type { DependencyManager, Detection, Language, RepositoryDetector } from "./ports.js";

// =============================================================================
// CONSTANTS
// =============================================================================

// Declaration order doubles as the tie-break order.
const LANGUAGE_EXTENSIONS: Array<[Exclude<Language, "unknown">, string]> = [
  ["python", ".py"],
  ["java", ".java"],
  ["go", ".go"],
];

const IGNORE = ["**/.git/**"];

type ManagerRule = {
  file: string;
  manager: DependencyManager | "inspect-pyproject";
};

// Within one directory the first matching rule wins.
const MANAGER_RULES: Record<Exclude<Language, "unknown">, { caseSensitive: boolean; rules: ManagerRule[] }> = {
  python: {
    caseSensitive: false,
    rules: [
      { file: "poetry.lock", manager: "poetry" },
      { file: "uv.lock", manager: "uv" },
      { file: "pipfile.lock", manager: "pipenv" },
      { file: "requirements.txt", manager: "pip" },
      { file: "pipfile", manager: "pipenv" },
      { file: "setup.py", manager: "setuptools" },
      { file: "pyproject.toml", manager: "inspect-pyproject" },
    ],
  },
  java: {
    caseSensitive: true,
    rules: [
      { file: "pom.xml", manager: "maven" },
      { file: "build.gradle", manager: "gradle" },
      { file: "build.gradle.kts", manager: "gradle" },
    ],
  },
  go: {
    caseSensitive: true,
    rules: [{ file: "go.mod", manager: "go-modules" }],
  },
};

const PYPROJECT_TOOLS: Array<[string, DependencyManager]> = [
  ["poetry", "poetry"],
  ["uv", "uv"],
  ["flit", "flit"],
];

// =============================================================================
// PUBLIC API
// =============================================================================

export async function detectLanguage(repoPath: string): Promise<Language> {
  const files = await fg(
    LANGUAGE_EXTENSIONS.map(([, ext]) => `**/*${ext}`),
    { cwd: repoPath, ignore: IGNORE, dot: true, onlyFiles: true },
  );

  let best: Language = "unknown";
  let bestCount = 0;
  for (const [language, ext] of LANGUAGE_EXTENSIONS) {
    const count = files.filter((file) => file.endsWith(ext)).length;
    if (count > bestCount) {
      best = language;
      bestCount = count;
    }
  }

  return best;
}

/** Walks directories shallowest first; the first directory holding a marker decides. */
export async function detectDependencyManager(
  repoPath: string,
  language: Language,
): Promise<DependencyManager> {
  if (language === "unknown") return "unknown";

  const { caseSensitive, rules } = MANAGER_RULES[language];
  const files = await fg(
    rules.map((rule) => `**/${rule.file}`),
    {
      cwd: repoPath,
      ignore: IGNORE,
      dot: true,
      onlyFiles: true,
      caseSensitiveMatch: caseSensitive,
    },
  );

  for (const [dir, names] of groupByDirectory(files)) {
    const present = new Map(
      names.map((name) => [caseSensitive ? name : name.toLowerCase(), name]),
    );

    for (const rule of rules) {
      const actual = present.get(rule.file);
      if (actual === undefined) continue;

      if (rule.manager === "inspect-pyproject") {
        return inspectPyproject(path.join(repoPath, dir, actual));
      }
      return rule.manager;
    }
  }

  return "unknown";
}

export class FileSystemDetector implements RepositoryDetector {
  async detect(repoPath: string): Promise<Detection> {
    const language = await detectLanguage(repoPath);
    const dependencyManager = await detectDependencyManager(repoPath, language);
    return { language, dependencyManager };
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function groupByDirectory(files: string[]): Array<[string, string[]]> {
  const groups = new Map<string, string[]>();
  for (const file of files) {
    const dir = path.posix.dirname(file);
    const names = groups.get(dir) ?? [];
    names.push(path.posix.basename(file));
    groups.set(dir, names);
  }

  return [...groups.entries()].sort(([a], [b]) => {
    const depth = directoryDepth(a) - directoryDepth(b);
    return depth !== 0 ? depth : a.localeCompare(b);
  });
}

function directoryDepth(dir: string): number {
  return dir === "." ? 0 : dir.split("/").length;
}

async function inspectPyproject(filePath: string): Promise<DependencyManager> {
  const content = await fse.readFile(filePath, "utf8");
  for (const [tool, manager] of PYPROJECT_TOOLS) {
    const table = new RegExp(`^\\s*\\[\\s*tool\\.${tool}\\s*[\\].]`, "m");
    if (table.test(content)) return manager;
  }
  return "pyproject";
}
