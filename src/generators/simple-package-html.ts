/**
 * Generate PEP 503 simple package HTML index
 */

import type { LinkEntry } from "../services/artifact-mirror";
import { escapeHtml, htmlHead, HTML_FOOTER } from "./html";

/**
 * Generate HTML index for a single package.
 * Links are written in the order given.
 */
export function generateSimplePackageHtml(
  packageName: string,
  links: readonly LinkEntry[]
): string {
  const lines: string[] = [];

  lines.push(...htmlHead(`Links for ${packageName}`));
  lines.push(`<h1>Links for ${escapeHtml(packageName)}</h1>`);

  for (const link of links) {
    // Simple-index metadata, only for links that carry a digest
    const attributes = link.hashFragment
      ? ` data-requires-python="" data-yanked="false" ${escapeHtml(link.hashFragment)}`
      : "";

    lines.push(
      `    <a href="${escapeHtml(link.href)}"${attributes}>${escapeHtml(link.displayName)}</a><br/>`
    );
  }

  lines.push(...HTML_FOOTER);

  return lines.join("\n");
}
