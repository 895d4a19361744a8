export type { DocumentHost } from "./types.js";
export { createFsDocumentHost } from "./fs-host.js";
export {
  createMemoryDocumentHost,
  type MemoryDocumentHost,
} from "./memory-host.js";
