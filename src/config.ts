/**
 * Configuration for the wheel index generator
 */

import { platformTagRule, type RelabelRule } from "./services/relabel-rules";
import type { SiteInfo } from "./generators/simple-packages-html";

export interface Env {
  // Publishing site, used in the install instructions
  PAGES_OWNER?: string;
  PAGES_SITE?: string;

  // Source and destination overrides
  RELEASE_API_URL?: string;
  OUTPUT_DIR?: string;

  // Timeouts in milliseconds
  LIST_TIMEOUT_MS?: string;
  DOWNLOAD_TIMEOUT_MS?: string;
}

export interface Config {
  releaseUrl: string;
  outputDir: string;
  archiveSuffix: string;
  listTimeoutMs: number;
  downloadTimeoutMs: number;
  relabelRules: readonly RelabelRule[];
  siteInfo: SiteInfo;
}

const DEFAULT_RELEASE_URL =
  "https://api.github.com/repos/termux-user-repository/pypi-wheel-builder/releases/latest";
const DEFAULT_OUTPUT_DIR = "docs";
const DEFAULT_LIST_TIMEOUT_MS = 30_000;
const DEFAULT_DOWNLOAD_TIMEOUT_MS = 120_000;
// Largest delay AbortSignal.timeout accepts
const MAX_TIMEOUT_MS = 2 ** 32 - 1;

// Wheels built for Termux carry the linux tag; these are served under the Android one
const DEFAULT_RELABEL_RULES: readonly RelabelRule[] = [
  platformTagRule({
    name: "pydantic-core-android",
    fromTag: "linux_aarch64",
    toTag: "android_24_aarch64",
    packageMarker: "pydantic_core",
  }),
];

function parseTimeout(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  if (!/^[0-9]+$/.test(value) || Number(value) <= 0 || Number(value) > MAX_TIMEOUT_MS) {
    throw new Error(
      `${name} must be a positive integer (milliseconds) up to ${MAX_TIMEOUT_MS}, got '${value}'`
    );
  }
  return Number(value);
}

function parseUrl(name: string, value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`${name} must be an absolute URL, got '${value}'`);
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new Error(`${name} must use http or https, got '${value}'`);
  }
  return value;
}

export function loadConfig(env: Env): Config {
  const releaseUrl = parseUrl("RELEASE_API_URL", env.RELEASE_API_URL || DEFAULT_RELEASE_URL);

  return {
    releaseUrl,
    outputDir: env.OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
    archiveSuffix: ".whl",
    listTimeoutMs: parseTimeout("LIST_TIMEOUT_MS", env.LIST_TIMEOUT_MS, DEFAULT_LIST_TIMEOUT_MS),
    downloadTimeoutMs: parseTimeout(
      "DOWNLOAD_TIMEOUT_MS",
      env.DOWNLOAD_TIMEOUT_MS,
      DEFAULT_DOWNLOAD_TIMEOUT_MS
    ),
    relabelRules: DEFAULT_RELABEL_RULES,
    siteInfo: {
      owner: env.PAGES_OWNER || "OWNER",
      site: env.PAGES_SITE || "SITE",
    },
  };
}
