import {
  failWith,
  fileSpan,
  type AnyMemberInfo,
  type TypeInfo,
} from "@apiref/metadata";
import { humanTypeName, memberName } from "./signatures.js";

export const DEFAULT_OUTPUT_ROOT = "./Generated";

// Characters no common filesystem accepts inside a file name.
const ILLEGAL_FILE_NAME_CHARS = /[<>:"|?*\\/\u0000-\u001f]/g;
const EXTENSION_PATTERN = /^[A-Za-z0-9_-]+$/;

export const sanitizeFileName = (name: string): string => {
  const sanitized = name.replace(ILLEGAL_FILE_NAME_CHARS, "_");
  if (sanitized === "" || sanitized === "." || sanitized === "..") {
    return failWith({
      code: "PT0001",
      params: { kind: "illegal-segment", segment: name },
      span: fileSpan(name),
    });
  }
  return sanitized;
};

const normalizeExtension = (extension: string): string => {
  const trimmed = extension.startsWith(".") ? extension.slice(1) : extension;
  if (!EXTENSION_PATTERN.test(trimmed)) {
    return failWith({
      code: "PT0001",
      params: { kind: "illegal-extension", extension },
      span: fileSpan(extension),
    });
  }
  return trimmed;
};

const trimTrailingSlashes = (path: string): string => {
  const trimmed = path.replace(/[\\/]+$/, "");
  return trimmed === "" ? "/" : trimmed;
};

export type PathResolver = {
  readonly outputRoot: string;
  readonly extension: string;
  rootDirectory(assemblyName: string): string;
  /** Base name of the document for `entity`, without any directory. */
  fileNameFor(entity: TypeInfo | AnyMemberInfo): string;
  pathFor(entity: TypeInfo | AnyMemberInfo): string;
};

/**
 * Maps types and members onto `<outputRoot>/<Assembly>/<Namespace>.<Type>[.<Member>].<ext>`.
 * Equal logical identities always produce equal paths, which is what collapses
 * an overload group onto a single file.
 */
export const createPathResolver = ({
  extension,
  outputRoot = DEFAULT_OUTPUT_ROOT,
}: {
  extension: string;
  outputRoot?: string;
}): PathResolver => {
  const ext = normalizeExtension(extension);
  const root = trimTrailingSlashes(outputRoot);

  const rootDirectory = (assemblyName: string): string =>
    root === "/"
      ? `/${sanitizeFileName(assemblyName)}`
      : `${root}/${sanitizeFileName(assemblyName)}`;

  const fileNameFor = (entity: TypeInfo | AnyMemberInfo): string => {
    const type = entity.kind === "type" ? entity : entity.declaringType;
    const segments = [
      ...(type.namespace ? [type.namespace] : []),
      humanTypeName(type),
      ...(entity.kind === "type" ? [] : [memberName(entity)]),
    ];
    return `${sanitizeFileName(segments.join("."))}.${ext}`;
  };

  return {
    outputRoot: root,
    extension: ext,
    rootDirectory,
    fileNameFor,
    pathFor: (entity) => {
      const type = entity.kind === "type" ? entity : entity.declaringType;
      return `${rootDirectory(type.assembly.name)}/${fileNameFor(entity)}`;
    },
  };
};
