/**
 * Index generation pipeline: list release assets, group them by package,
 * mirror relabelled wheels and write the simple index pages
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Config } from "./config";
import type { HttpClient } from "./services/http-client";
import { ReleaseClient, type Artifact } from "./services/release-client";
import { PackageIndex, type PackageGroup } from "./services/index-generator";
import { ArtifactMirror, type LinkEntry } from "./services/artifact-mirror";
import { DownloadError, IndexGenerationError, describeError } from "./services/errors";
import { generateSimplePackageHtml } from "./generators/simple-package-html";
import { generateSimplePackagesHtml } from "./generators/simple-packages-html";

export interface GenerationDeps {
  http: HttpClient;
}

export type GenerationResult =
  | { status: "aborted"; reason: string }
  | { status: "empty" }
  | {
      status: "completed";
      packages: number;
      pagesWritten: number;
      failedPackages: string[];
      omittedLinks: string[];
      duration: number;
    };

/**
 * Resolve every link of a package; failed mirrors are left out
 */
async function resolveLinks(
  mirror: ArtifactMirror,
  group: PackageGroup,
  omittedLinks: string[]
): Promise<LinkEntry[]> {
  const links: LinkEntry[] = [];

  for (const artifact of group.artifacts) {
    try {
      links.push(await mirror.resolveLink(artifact, group.name));
    } catch (error) {
      if (!(error instanceof DownloadError)) throw error;
      console.error(`ERROR: Omitting ${artifact.fileName} from ${group.name}:`, error.message);
      omittedLinks.push(artifact.fileName);
    }
  }

  return links;
}

/**
 * Write one package page, creating its directory
 */
async function writePackagePage(
  outputDir: string,
  group: PackageGroup,
  links: LinkEntry[]
): Promise<void> {
  const packageDir = path.join(outputDir, group.name);
  await mkdir(packageDir, { recursive: true });
  await writeFile(
    path.join(packageDir, "index.html"),
    generateSimplePackageHtml(group.name, links),
    "utf8"
  );
}

/**
 * Run the whole pipeline once
 */
export async function generateIndex(
  config: Config,
  deps: GenerationDeps
): Promise<GenerationResult> {
  const startTime = performance.now();
  console.log(`INFO: Starting index generation at ${new Date().toISOString()}`);

  const releaseClient = new ReleaseClient(deps.http, {
    releaseUrl: config.releaseUrl,
    timeoutMs: config.listTimeoutMs,
    archiveSuffix: config.archiveSuffix,
  });

  let artifacts: Artifact[];
  try {
    artifacts = await releaseClient.listArtifacts();
  } catch (error) {
    if (!(error instanceof IndexGenerationError)) throw error;
    console.error("ERROR: Failed to list release assets:", error.message);
    return { status: "aborted", reason: error.message };
  }

  const index = new PackageIndex(artifacts);
  const groups = index.groupByPackage();
  if (groups.size === 0) {
    console.log("INFO: No packages found, nothing to generate");
    return { status: "empty" };
  }

  // Failing to create the root is fatal for the run
  await mkdir(config.outputDir, { recursive: true });

  const mirror = new ArtifactMirror(deps.http, {
    outputRoot: config.outputDir,
    timeoutMs: config.downloadTimeoutMs,
    rules: config.relabelRules,
  });

  const packageNames = index.getPackageNames();
  const failedPackages: string[] = [];
  const omittedLinks: string[] = [];
  let pagesWritten = 0;

  for (const name of packageNames) {
    const group = groups.get(name);
    if (!group) continue;

    const links = await resolveLinks(mirror, group, omittedLinks);
    try {
      await writePackagePage(config.outputDir, group, links);
      pagesWritten++;
      console.log(`INFO: Wrote ${name}/index.html (${links.length} links)`);
    } catch (error) {
      console.error(`ERROR: Failed to write page for '${name}':`, describeError(error));
      failedPackages.push(name);
    }
  }

  await writeFile(
    path.join(config.outputDir, "index.html"),
    generateSimplePackagesHtml(packageNames, config.siteInfo),
    "utf8"
  );
  console.log("INFO: Wrote index.html");

  const duration = (performance.now() - startTime) / 1000;
  console.log(
    `INFO: Generated ${pagesWritten} of ${packageNames.length} package pages in ${duration.toFixed(2)}s`
  );
  if (omittedLinks.length > 0) {
    console.warn(`WARNING: ${omittedLinks.length} links omitted after failed downloads`);
  }
  if (failedPackages.length > 0) {
    console.error(`ERROR: ${failedPackages.length} packages failed:`, failedPackages);
  }

  return {
    status: "completed",
    packages: packageNames.length,
    pagesWritten,
    failedPackages,
    omittedLinks,
    duration,
  };
}
