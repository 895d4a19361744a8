import { DEFAULT_CODE_LANGUAGE, type Backend } from "../backend.js";

export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");

const clampLevel = (level: number): number => Math.min(Math.max(level, 1), 6);

const renderPage = (title: string, body: string): string => `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width,initial-scale=1" />
  <title>${escapeHtml(title)}</title>
  <style>
    :root {
      --bg: #f8f9f3;
      --surface: #ffffff;
      --ink: #1f2a2c;
      --muted: #5d6a6f;
      --line: #d7ddd7;
      --accent: #0f766e;
      --code-bg: #eef2ec;
    }
    * { box-sizing: border-box; }
    body {
      margin: 0;
      padding: 2rem 1rem 4rem;
      background: var(--bg);
      color: var(--ink);
      font-family: "IBM Plex Sans", "Avenir Next", "Segoe UI", sans-serif;
      line-height: 1.55;
    }
    main {
      max-width: 980px;
      margin: 0 auto;
      padding: 1rem 1.5rem;
      background: var(--surface);
      border: 1px solid var(--line);
      border-radius: 18px;
    }
    a { color: var(--accent); text-decoration: none; }
    a:hover { text-decoration: underline; }
    table { border-collapse: collapse; width: 100%; }
    th, td { border-bottom: 1px solid var(--line); padding: 0.4rem; text-align: left; }
    code {
      font-family: "JetBrains Mono", "SFMono-Regular", Menlo, monospace;
      background: var(--code-bg);
      border-radius: 6px;
      padding: 0.12rem 0.35rem;
      font-size: 0.92em;
    }
    pre code { display: block; overflow-x: auto; padding: 0.8rem; }
    .badge { color: var(--muted); border: 1px solid var(--line); border-radius: 6px; padding: 0 0.3rem; }
  </style>
</head>
<body>
  <main>
${body.trimEnd()}
  </main>
</body>
</html>
`;

const classAttribute = (name: string | undefined): string =>
  name ? ` class="${escapeHtml(name)}"` : "";

export const createHtmlBackend = (): Backend => ({
  extension: "html",
  preformatted: (text) => `<pre>${escapeHtml(text)}</pre>\n`,
  block: (text) => `<p>${text.replace(/\n/g, "<br />\n")}</p>\n`,
  italics: (text, styleHint) => `<em${classAttribute(styleHint)}>${text}</em>`,
  bold: (text, styleHint) => `<strong${classAttribute(styleHint)}>${text}</strong>`,
  inlineCode: (text, styleHint) =>
    `<code${classAttribute(styleHint && `language-${styleHint}`)}>${escapeHtml(text)}</code>`,
  table: (headerLeft, headerRight, rows) =>
    [
      "<table>",
      `<thead><tr><th>${headerLeft}</th><th>${headerRight}</th></tr></thead>`,
      "<tbody>",
      ...rows.map(([left, right]) => `<tr><td>${left}</td><td>${right}</td></tr>`),
      "</tbody>",
      "</table>",
    ].join("\n") + "\n",
  header: (level, text) => `<h${clampLevel(level)}>${text}</h${clampLevel(level)}>\n`,
  code: (text, language = DEFAULT_CODE_LANGUAGE) =>
    `<pre><code class="language-${escapeHtml(language)}">${escapeHtml(text)}</code></pre>\n`,
  link: (text, target) => `<a href="${escapeHtml(target)}">${text}</a>`,
  badge: (text) => `<span class="badge">${escapeHtml(text)}</span>`,
  small: (text) => `<small>${text}</small>`,
  divider: () => "<hr />\n",
  escape: escapeHtml,
  page: renderPage,
});

export const htmlBackend: Backend = createHtmlBackend();
