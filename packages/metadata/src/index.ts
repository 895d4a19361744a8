export * from "./types.js";
export * from "./diagnostics/index.js";
export {
  createAssemblyInfo,
  parseManifest,
  parseTypeRefShorthand,
  readManifest,
  TypeLibraryManifestSchema,
} from "./manifest.js";
export type { TypeLibraryManifest, TypeLibraryManifestInput } from "./manifest.js";
export {
  childElement,
  childElements,
  parseDocumentationXml,
  readDocumentationFile,
} from "./doc-comments.js";
export type {
  DocCommentTree,
  DocElementNode,
  DocNode,
  DocTextNode,
  DocumentationFile,
} from "./doc-comments.js";
export {
  crefKeyOf,
  memberCrefKey,
  qualifiedTypeName,
  typeCrefKey,
} from "./cref.js";
export { createDocumentation, isVisibleType } from "./documentation.js";
export type { Documentation } from "./documentation.js";
