export type { Backend, TableRow } from "./backend.js";
export { DEFAULT_CODE_LANGUAGE } from "./backend.js";
export {
  BACKEND_FORMATS,
  backendForFormat,
  createHtmlBackend,
  createMarkdownBackend,
  escapeHtml,
  htmlBackend,
  markdownBackend,
} from "./backends/index.js";
export type { BackendFormat } from "./backends/index.js";
export { composeBadges, renderBadges } from "./badges.js";
export { createDocCommentRenderer } from "./doc-comment-renderer.js";
export type { DocCommentRenderer } from "./doc-comment-renderer.js";
export {
  memberDocumentTitle,
  renderMemberDocument,
  renderTypeDocument,
  typeDocumentTitle,
} from "./documents.js";
export type { DocumentContext } from "./documents.js";
export { createDocumentGenerator, groupOverloads } from "./generator.js";
export type {
  DocumentGenerator,
  GenerationResult,
  GeneratorState,
  OverloadGroup,
} from "./generator.js";
export * from "./hosts/index.js";
export { isVisibleProperty, selectType } from "./introspector.js";
export type { TypeSelection } from "./introspector.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
export type { DocumentationLogger, LogContext } from "./logger.js";
export {
  createPathResolver,
  DEFAULT_OUTPUT_ROOT,
  sanitizeFileName,
} from "./paths.js";
export type { PathResolver } from "./paths.js";
export * from "./signatures.js";
