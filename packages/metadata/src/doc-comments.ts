import { readFileSync } from "node:fs";
import { JSDOM } from "jsdom";
import {
  failWith,
  fileSpan,
  normalizeErrorMessage,
} from "./diagnostics/index.js";

export type DocTextNode = {
  kind: "text";
  /** The text as written in the file; entities such as `&lt;` stay escaped. */
  text: string;
};

export type DocElementNode = {
  kind: "element";
  tag: string;
  attributes: Readonly<Record<string, string>>;
  children: readonly DocNode[];
  /** The element exactly as it appeared in the documentation file. */
  source: string;
};

export type DocNode = DocTextNode | DocElementNode;

/** The `<member>` element documenting one type or member. */
export type DocCommentTree = DocElementNode;

export type DocumentationFile = {
  assemblyName?: string;
  members: ReadonlyMap<string, DocCommentTree>;
};

const isElement = (node: Node): node is Element =>
  node.nodeType === node.ELEMENT_NODE;

const isText = (node: Node): boolean =>
  node.nodeType === node.TEXT_NODE || node.nodeType === node.CDATA_SECTION_NODE;

const collectAttributes = (element: Element): Record<string, string> =>
  Object.fromEntries(
    Array.from(element.attributes).map((attribute) => [
      attribute.name,
      attribute.value,
    ]),
  );

const toDocElement = (
  element: Element,
  serialize: (node: Node) => string,
): DocElementNode =>
  Object.freeze({
    kind: "element" as const,
    tag: element.tagName,
    attributes: Object.freeze(collectAttributes(element)),
    children: Object.freeze(
      Array.from(element.childNodes).flatMap((child): DocNode[] => {
        if (isElement(child)) {
          return [toDocElement(child, serialize)];
        }
        if (isText(child)) {
          return [Object.freeze({ kind: "text" as const, text: serialize(child) })];
        }
        return [];
      }),
    ),
    source: serialize(element),
  });

/** Finds the first direct child element named `tag`. */
export const childElement = (
  element: DocElementNode | undefined,
  tag: string,
): DocElementNode | undefined =>
  element?.children.find(
    (child): child is DocElementNode =>
      child.kind === "element" && child.tag === tag,
  );

export const childElements = (
  element: DocElementNode | undefined,
  tag: string,
): readonly DocElementNode[] =>
  element?.children.filter(
    (child): child is DocElementNode =>
      child.kind === "element" && child.tag === tag,
  ) ?? [];

export const parseDocumentationXml = ({
  source,
  file,
}: {
  source: string;
  file: string;
}): DocumentationFile => {
  let dom: JSDOM;
  try {
    dom = new JSDOM(source, { contentType: "text/xml" });
  } catch (error) {
    return failWith({
      code: "DC0001",
      params: { kind: "malformed-xml", errorMessage: normalizeErrorMessage(error) },
      span: fileSpan(file),
    });
  }

  const { document, XMLSerializer } = dom.window;
  const serializer = new XMLSerializer();
  const serialize = (node: Node) => serializer.serializeToString(node);

  const assemblyName =
    document.querySelector("doc > assembly > name")?.textContent?.trim() ||
    undefined;
  const members = new Map<string, DocCommentTree>();

  document.querySelectorAll("doc > members > member").forEach((element) => {
    const key = element.getAttribute("name");
    if (!key) {
      return;
    }
    members.set(key, toDocElement(element, serialize));
  });

  return { assemblyName, members };
};

export const readDocumentationFile = (file: string): DocumentationFile => {
  let source: string;
  try {
    source = readFileSync(file, "utf8");
  } catch (error) {
    return failWith({
      code: "DC0001",
      params: { kind: "unreadable", errorMessage: normalizeErrorMessage(error) },
      span: fileSpan(file),
    });
  }
  return parseDocumentationXml({ source, file });
};
