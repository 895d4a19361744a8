import { posix } from "node:path";
import {
  DiagnosticError,
  failWith,
  fileSpan,
  normalizeErrorMessage,
  type AssemblyInfo,
  type Documentation,
  type MemberInfo,
  type TypeInfo,
} from "@apiref/metadata";
import type { Backend } from "./backend.js";
import { createDocCommentRenderer } from "./doc-comment-renderer.js";
import {
  renderMemberDocument,
  renderTypeDocument,
  type DocumentContext,
} from "./documents.js";
import { createFsDocumentHost } from "./hosts/fs-host.js";
import type { DocumentHost } from "./hosts/types.js";
import { selectType } from "./introspector.js";
import { silentLogger, type DocumentationLogger } from "./logger.js";
import { createPathResolver } from "./paths.js";
import { memberName } from "./signatures.js";

export type GeneratorState = "idle" | "assembly-selected" | "type-selected";

export type GenerationResult = {
  assembly: string;
  root: string;
  /** Written document paths, in write order. */
  files: readonly string[];
};

export type DocumentGenerator = {
  generate(assembly: AssemblyInfo): GenerationResult;
};

export type OverloadGroup = readonly [MemberInfo, ...MemberInfo[]];

/** Groups members by display name, keeping first-appearance order. */
export const groupOverloads = (members: readonly MemberInfo[]): OverloadGroup[] => {
  const groups = new Map<string, [MemberInfo, ...MemberInfo[]]>();
  members.forEach((member) => {
    const name = memberName(member);
    const group = groups.get(name);
    if (group) {
      group.push(member);
    } else {
      groups.set(name, [member]);
    }
  });
  return [...groups.values()];
};

// Enums and delegates have no members worth a document of their own.
const hasMemberDocuments = (type: TypeInfo): boolean =>
  type.typeKind !== "enum" && type.typeKind !== "delegate";

type HostOperation = "remove-directory" | "create-directory" | "write-file";

const runHostOperation = (kind: HostOperation, path: string, operation: () => void) => {
  try {
    operation();
  } catch (error) {
    if (error instanceof DiagnosticError) {
      throw error;
    }
    failWith({
      code: "IO0001",
      params: { kind, errorMessage: normalizeErrorMessage(error) },
      span: fileSpan(path),
    });
  }
};

export const createDocumentGenerator = ({
  backend,
  documentation,
  host = createFsDocumentHost(),
  outputRoot,
  logger = silentLogger,
}: {
  backend: Backend;
  documentation: Documentation;
  host?: DocumentHost;
  outputRoot?: string;
  logger?: DocumentationLogger;
}): DocumentGenerator => {
  const paths = createPathResolver({ extension: backend.extension, outputRoot });
  const context: DocumentContext = {
    backend,
    comments: createDocCommentRenderer({ backend, documentation }),
    paths,
  };

  let state: GeneratorState = "idle";
  const transition = (next: GeneratorState, details: Record<string, unknown>) => {
    logger.debug(`generator ${state} -> ${next}`, details);
    state = next;
  };

  const write = (path: string, contents: string, files: string[]) => {
    runHostOperation("create-directory", path, () =>
      host.ensureDirectory(posix.dirname(path)),
    );
    runHostOperation("write-file", path, () => host.writeFile(path, contents));
    files.push(path);
    logger.debug("wrote document", { path });
  };

  const generate = (assembly: AssemblyInfo): GenerationResult => {
    const root = paths.rootDirectory(assembly.name);
    const files: string[] = [];

    transition("assembly-selected", { assembly: assembly.name });
    try {
      if (host.exists(root)) {
        logger.info("removing previous output", { root });
        runHostOperation("remove-directory", root, () => host.removeDirectory(root));
      }

      documentation.getVisibleTypes(assembly).forEach((type) => {
        const selection = selectType(type);
        transition("type-selected", { type: type.name });

        write(paths.pathFor(type), renderTypeDocument(selection, context), files);

        if (!hasMemberDocuments(type)) {
          return;
        }
        groupOverloads(selection.members).forEach((group) => {
          write(paths.pathFor(group[0]), renderMemberDocument(group, context), files);
        });
      });
    } finally {
      transition("idle", { assembly: assembly.name });
    }

    logger.info("generated documentation", {
      assembly: assembly.name,
      documents: files.length,
    });
    return { assembly: assembly.name, root, files };
  };

  return { generate };
};
