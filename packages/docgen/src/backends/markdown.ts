import { DEFAULT_CODE_LANGUAGE, type Backend } from "../backend.js";

const MARKDOWN_SPECIALS = /([\\`*_{}[\]()#+!|<>])/g;

const escapeMarkdown = (value: string): string =>
  value.replace(MARKDOWN_SPECIALS, "\\$1");

// Pipes split table cells even inside code spans; already escaped ones stay.
const tableCell = (value: string): string =>
  value.replace(/\r?\n/g, " ").replace(/(?<!\\)\|/g, "\\|").trim();

const codeSpan = (value: string): string => {
  if (!value.includes("`")) {
    return `\`${value}\``;
  }
  return `\`\` ${value} \`\``;
};

const fence = (value: string): string => {
  const runs = value.match(/`+/g) ?? [];
  const longest = runs.reduce((max, run) => Math.max(max, run.length), 0);
  return "`".repeat(Math.max(3, longest + 1));
};

export const createMarkdownBackend = (): Backend => ({
  extension: "md",
  preformatted: (text) => `${fence(text)}\n${text}\n${fence(text)}\n\n`,
  block: (text) => `${text}\n\n`,
  italics: (text) => `*${text}*`,
  bold: (text) => `**${text}**`,
  inlineCode: codeSpan,
  table: (headerLeft, headerRight, rows) =>
    [
      `| ${tableCell(headerLeft)} | ${tableCell(headerRight)} |`,
      "| --- | --- |",
      ...rows.map(([left, right]) => `| ${tableCell(left)} | ${tableCell(right)} |`),
    ].join("\n") + "\n\n",
  header: (level, text) =>
    `${"#".repeat(Math.min(Math.max(level, 1), 6))} ${text}\n\n`,
  code: (text, language = DEFAULT_CODE_LANGUAGE) =>
    `${fence(text)}${language}\n${text}\n${fence(text)}\n\n`,
  link: (text, target) => `[${text}](${target.replace(/ /g, "%20")})`,
  badge: codeSpan,
  small: (text) => `<small>${text}</small>`,
  divider: () => "---\n\n",
  escape: escapeMarkdown,
  page: (_title, body) => `${body.trimEnd()}\n`,
});

export const markdownBackend: Backend = createMarkdownBackend();
