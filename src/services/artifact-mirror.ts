/**
 * Artifact mirror - resolves the link for each artifact, downloading the
 * relabelled ones into the output root
 */

import { access } from "node:fs/promises";
import path from "node:path";
import type { HttpClient } from "./http-client";
import type { Artifact } from "./release-client";
import { findRule, type RelabelRule } from "./relabel-rules";
import { DownloadError } from "./errors";

export interface LinkEntry {
  readonly displayName: string;
  readonly href: string;
  readonly hashFragment?: string;
}

export interface ArtifactMirrorOptions {
  outputRoot: string;
  timeoutMs: number;
  rules: readonly RelabelRule[];
}

const HASH_FRAGMENT = /#(md5|sha1|sha224|sha256|sha384|sha512)=[0-9a-fA-F]+$/;

/**
 * Extract a trailing digest fragment such as #sha256=abc from a URL
 */
export function parseHashFragment(url: string): string | undefined {
  const match = HASH_FRAGMENT.exec(url);
  return match ? match[0] : undefined;
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class ArtifactMirror {
  private readonly http: HttpClient;
  private readonly options: ArtifactMirrorOptions;

  constructor(http: HttpClient, options: ArtifactMirrorOptions) {
    this.http = http;
    this.options = options;
  }

  /**
   * Resolve the link entry for an artifact of the given package.
   * Throws DownloadError when a required mirror download fails.
   */
  async resolveLink(artifact: Artifact, packageName: string): Promise<LinkEntry> {
    const hashFragment = parseHashFragment(artifact.sourceUrl);
    const rule = findRule(this.options.rules, artifact.fileName);

    if (!rule) {
      return { displayName: artifact.fileName, href: artifact.sourceUrl, hashFragment };
    }

    const displayName = rule.relabel(artifact.fileName);
    const destination = path.join(this.options.outputRoot, displayName);

    if (displayName.includes("/") || displayName.includes("\\") || displayName.startsWith(".")) {
      throw new DownloadError(
        `Rule '${rule.name}' produced an unsafe file name for ${packageName}: ${displayName}`,
        artifact.sourceUrl,
        destination
      );
    }

    if (await pathExists(destination)) {
      console.log(`INFO: Already mirrored ${displayName}`);
    } else {
      console.log(`INFO: Mirroring ${artifact.fileName} as ${displayName} (rule '${rule.name}')`);
      await this.http.download(artifact.sourceUrl, destination, this.options.timeoutMs);
    }

    return {
      displayName,
      href: `../${encodeURIComponent(displayName)}${hashFragment ?? ""}`,
      hashFragment,
    };
  }
}
