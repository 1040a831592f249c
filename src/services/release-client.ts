/**
 * Release client service for listing wheel assets of the latest release
 */

import { z } from "zod";
import type { HttpClient } from "./http-client";
import { MalformedResponseError } from "./errors";

export interface Artifact {
  readonly fileName: string;
  readonly sourceUrl: string;
}

export interface ReleaseClientOptions {
  releaseUrl: string;
  timeoutMs: number;
  archiveSuffix: string;
}

const ReleaseSchema = z.object({
  assets: z.array(z.unknown()),
});

const AssetSchema = z.object({
  name: z.string().min(1),
  browser_download_url: z.string().min(1),
});

/**
 * Check if an asset name carries the expected archive suffix
 */
function hasArchiveSuffix(name: string, suffix: string): boolean {
  return name.endsWith(suffix);
}

export class ReleaseClient {
  private readonly http: HttpClient;
  private readonly options: ReleaseClientOptions;

  constructor(http: HttpClient, options: ReleaseClientOptions) {
    this.http = http;
    this.options = options;
  }

  /**
   * Fetch the latest release and extract its wheel artifacts.
   * Throws NetworkError or MalformedResponseError.
   */
  async listArtifacts(): Promise<Artifact[]> {
    const { releaseUrl, timeoutMs, archiveSuffix } = this.options;

    console.log(`INFO: Fetching release info from ${releaseUrl}`);
    const body = await this.http.fetchJson(releaseUrl, timeoutMs);

    const release = ReleaseSchema.safeParse(body);
    if (!release.success) {
      throw new MalformedResponseError(
        `Release info from ${releaseUrl} has no 'assets' collection`
      );
    }

    const artifacts: Artifact[] = [];
    for (const raw of release.data.assets) {
      const asset = AssetSchema.safeParse(raw);
      if (!asset.success) {
        // Non-matching suffixes are skipped silently, even with a missing URL
        const name = AssetSchema.pick({ name: true }).safeParse(raw);
        if (name.success && !hasArchiveSuffix(name.data.name, archiveSuffix)) {
          continue;
        }
        console.warn(
          `WARNING: Skipping asset with missing name or URL: ${JSON.stringify(raw)}`
        );
        continue;
      }

      if (!hasArchiveSuffix(asset.data.name, archiveSuffix)) continue;

      artifacts.push({
        fileName: asset.data.name,
        sourceUrl: asset.data.browser_download_url,
      });
    }

    console.log(`INFO: Found ${artifacts.length} wheel files`);
    return artifacts;
  }
}
