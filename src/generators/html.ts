/**
 * Shared pieces of the generated HTML pages
 */

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

const BASE_STYLE = [
  "    body{margin:40px auto;max-width:650px;line-height:1.6;font-size:18px;color:#444;padding:0 10px}",
  "    h1,h2,h3{line-height:1.2}",
  "    a { display: block; margin-bottom: 5px; }",
];

/**
 * Document head shared by every page
 */
export function htmlHead(title: string, extraStyle: string[] = []): string[] {
  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '    <meta charset="utf-8">',
    '    <meta name="viewport" content="width=device-width, initial-scale=1.0">',
    "    <style>",
    ...BASE_STYLE,
    ...extraStyle,
    "    </style>",
    `    <title>${escapeHtml(title)}</title>`,
    "</head>",
    "<body>",
  ];
}

export const HTML_FOOTER = ["</body>", "</html>", ""];
