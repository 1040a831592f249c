/**
 * Package index - derives package names from wheel file names and groups artifacts
 */

import type { Artifact } from "./release-client";

export interface PackageGroup {
  readonly name: string;
  readonly artifacts: readonly Artifact[];
}

const VALID_PACKAGE_NAME = /^[a-z0-9]([a-z0-9._-]*[a-z0-9])?$/;

// Entries of the output root that a package directory must not replace
const RESERVED_NAMES = new Set(["index.html"]);

/**
 * Compare file names by code unit so ordering never depends on locale
 */
export function compareFileNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Derive the normalized package name from a wheel file name.
 *
 * The name runs up to the first segment that starts with a digit (the
 * version); for a well-formed wheel that is the text before the first
 * hyphen. Returns undefined when no valid name can be derived, or when
 * the name would collide with the top-level index page.
 */
export function packageNameOf(fileName: string): string | undefined {
  const parts = fileName.split("-");
  if (parts.length < 2) return undefined;

  const versionIndex = parts.findIndex((part, i) => i > 0 && /^[0-9]/.test(part));
  const nameParts = versionIndex > 0 ? parts.slice(0, versionIndex) : parts.slice(0, 1);
  const name = nameParts.join("-").replace(/_/g, "-").toLowerCase();

  return VALID_PACKAGE_NAME.test(name) && !RESERVED_NAMES.has(name) ? name : undefined;
}

/**
 * PackageIndex class for grouping artifacts by package
 */
export class PackageIndex {
  public readonly artifacts: readonly Artifact[];

  constructor(artifacts: readonly Artifact[]) {
    this.artifacts = artifacts;
  }

  /**
   * Group artifacts by package name, each group sorted by file name
   */
  groupByPackage(): Map<string, PackageGroup> {
    const byName = new Map<string, Artifact[]>();

    for (const artifact of this.artifacts) {
      const name = packageNameOf(artifact.fileName);
      if (!name) {
        console.warn(
          `WARNING: Could not parse package name from wheel: ${artifact.fileName}`
        );
        continue;
      }

      const existing = byName.get(name);
      if (existing) {
        existing.push(artifact);
      } else {
        byName.set(name, [artifact]);
      }
    }

    const groups = new Map<string, PackageGroup>();
    for (const [name, artifacts] of byName) {
      groups.set(name, {
        name,
        artifacts: [...artifacts].sort((a, b) => compareFileNames(a.fileName, b.fileName)),
      });
    }

    console.log(`INFO: Grouped wheels into ${groups.size} packages`);
    return groups;
  }

  /**
   * Get unique package names, sorted
   */
  getPackageNames(): string[] {
    const names = new Set<string>();
    for (const artifact of this.artifacts) {
      const name = packageNameOf(artifact.fileName);
      if (name) names.add(name);
    }
    return Array.from(names).sort(compareFileNames);
  }
}

/**
 * Group artifacts by normalized package name
 */
export function groupByPackage(artifacts: readonly Artifact[]): Map<string, PackageGroup> {
  return new PackageIndex(artifacts).groupByPackage();
}
