import { crefKeyOf, memberCrefKey, typeCrefKey } from "./cref.js";
import type { DocCommentTree, DocumentationFile } from "./doc-comments.js";
import type {
  AnyMemberInfo,
  AssemblyInfo,
  DocumentedEntity,
  TypeInfo,
} from "./types.js";

/**
 * Answers which types of an assembly are documented and which documentation
 * comment belongs to a type or member. Lookups that miss return `undefined`.
 */
export interface Documentation {
  getVisibleTypes(assembly: AssemblyInfo): readonly TypeInfo[];
  tryGetType(cref: string): TypeInfo | undefined;
  tryGetMember(cref: string): AnyMemberInfo | undefined;
  getDocumentation(entity: DocumentedEntity): DocCommentTree | undefined;
}

export const isVisibleType = (type: TypeInfo): boolean =>
  type.accessibility === "public";

export const createDocumentation = ({
  assemblies,
  files = [],
}: {
  assemblies: readonly AssemblyInfo[];
  files?: readonly DocumentationFile[];
}): Documentation => {
  const types = new Map<string, TypeInfo>();
  const members = new Map<string, AnyMemberInfo>();
  const comments = new Map<string, DocCommentTree>();

  assemblies.forEach((assembly) => {
    assembly.types.forEach((type) => {
      types.set(typeCrefKey(type), type);
      [...type.constructors, ...type.members].forEach((member) => {
        const key = memberCrefKey(member);
        // First declaration wins when two members share a key.
        if (!members.has(key)) {
          members.set(key, member);
        }
      });
    });
  });

  files.forEach((file) => {
    file.members.forEach((tree, key) => comments.set(key, tree));
  });

  return {
    getVisibleTypes: (assembly) => assembly.types.filter(isVisibleType),
    tryGetType: (cref) => types.get(cref),
    tryGetMember: (cref) => members.get(cref),
    getDocumentation: (entity) => comments.get(crefKeyOf(entity)),
  };
};
