/**
 * Generate PEP 503 simple packages HTML index (package listing)
 */

import { escapeHtml, htmlHead, HTML_FOOTER } from "./html";

export interface SiteInfo {
  owner: string;
  site: string;
}

/**
 * Generate HTML index listing all packages, with pip usage instructions
 */
export function generateSimplePackagesHtml(
  packageNames: Iterable<string>,
  siteInfo: SiteInfo
): string {
  const lines: string[] = [];
  const indexUrl = `https://${siteInfo.owner}.github.io/${siteInfo.site}/`;

  lines.push(
    ...htmlHead("Python Wheel Index", [
      "    pre { background-color: #f0f0f0; padding: 10px; border-radius: 5px; }",
    ])
  );
  lines.push("    <h1>Python Wheel Index</h1>");
  lines.push("    <p>Pre-compiled Python wheels published as release assets.</p>");
  lines.push("    <p>Use this index with pip:</p>");
  lines.push(
    `    <pre>pip install --upgrade pip\npip install --extra-index-url ${escapeHtml(indexUrl)} SomePackage</pre>`
  );
  lines.push("    <h2>Packages</h2>");

  // Sort and dedupe package names
  const sortedNames = Array.from(new Set(packageNames)).sort();

  for (const pkgName of sortedNames) {
    const name = escapeHtml(pkgName);
    lines.push(`    <a href="${name}/">${name}</a><br/>`);
  }

  lines.push(...HTML_FOOTER);

  return lines.join("\n");
}
