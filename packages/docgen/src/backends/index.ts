import type { Backend } from "../backend.js";
import { htmlBackend } from "./html.js";
import { markdownBackend } from "./markdown.js";

export type BackendFormat = "markdown" | "html";

export const BACKEND_FORMATS: readonly BackendFormat[] = ["markdown", "html"];

export const backendForFormat = (format: BackendFormat): Backend =>
  format === "html" ? htmlBackend : markdownBackend;

export { createHtmlBackend, escapeHtml, htmlBackend } from "./html.js";
export { createMarkdownBackend, markdownBackend } from "./markdown.js";
