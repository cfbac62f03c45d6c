// =============================================================================
// TYPES
// =============================================================================

export type DependencyEntry = {
  name: string;
  version: string;
};

export type VersionMismatch = {
  name: string;
  tree_version: string;
  sbom_version: string;
};

/**
 * Classification of every name in A ∪ B. The four lists are disjoint; a name in
 * both inputs lands in exactly one of `version_mismatch` and `same`.
 */
export type ReconciliationResult = {
  missing_in_b: DependencyEntry[];
  version_mismatch: VersionMismatch[];
  same: DependencyEntry[];
  extra_in_b: DependencyEntry[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Compares the resolver view `a` with the SBOM view `b`. Lists keep the
 * insertion order of the map they were read from.
 */
export function reconcile(
  a: ReadonlyMap<string, string>,
  b: ReadonlyMap<string, string>,
): ReconciliationResult {
  const result: ReconciliationResult = {
    missing_in_b: [],
    version_mismatch: [],
    same: [],
    extra_in_b: [],
  };

  for (const [name, version] of a) {
    const other = b.get(name);
    if (other === undefined) {
      result.missing_in_b.push({ name, version });
    } else if (other !== version) {
      result.version_mismatch.push({ name, tree_version: version, sbom_version: other });
    } else {
      result.same.push({ name, version });
    }
  }

  for (const [name, version] of b) {
    if (!a.has(name)) {
      result.extra_in_b.push({ name, version });
    }
  }

  return result;
}

export function formatEntry(entry: DependencyEntry): string {
  return `${entry.name}@${entry.version}`;
}

export function formatMismatch(entry: VersionMismatch): string {
  return `${entry.name} (tree: ${entry.tree_version}, sbom: ${entry.sbom_version})`;
}

export function countReconciliation(result: ReconciliationResult): Record<keyof ReconciliationResult, number> {
  return {
    missing_in_b: result.missing_in_b.length,
    version_mismatch: result.version_mismatch.length,
    same: result.same.length,
    extra_in_b: result.extra_in_b.length,
  };
}
