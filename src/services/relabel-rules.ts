/**
 * Relabel rules decide which artifacts are mirrored under a new name
 */

export interface RelabelRule {
  readonly name: string;
  matches(fileName: string): boolean;
  relabel(fileName: string): string;
}

export interface PlatformTagRuleOptions {
  name: string;
  /** Platform tag found in the original file name, e.g. linux_aarch64 */
  fromTag: string;
  toTag: string;
  /** Substring marking the packages that must be hosted locally */
  packageMarker: string;
}

/**
 * Replace one platform tag with another for file names that carry both
 * the tag and the package marker
 */
export function platformTagRule(options: PlatformTagRuleOptions): RelabelRule {
  const { name, fromTag, toTag, packageMarker } = options;
  if (!fromTag) {
    throw new Error(`Relabel rule '${name}' needs a non-empty platform tag`);
  }

  return {
    name,
    matches: (fileName) => fileName.includes(fromTag) && fileName.includes(packageMarker),
    relabel: (fileName) => fileName.split(fromTag).join(toTag),
  };
}

/**
 * Return the first rule matching a file name
 */
export function findRule(
  rules: readonly RelabelRule[],
  fileName: string
): RelabelRule | undefined {
  return rules.find((rule) => rule.matches(fileName));
}
