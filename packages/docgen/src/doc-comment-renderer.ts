import {
  childElement,
  childElements,
  type DocElementNode,
  type DocNode,
  type Documentation,
  type DocumentedEntity,
} from "@apiref/metadata";
import type { Backend } from "./backend.js";
import { humanTypeName, memberName, normalizeSpaces } from "./signatures.js";

type RenderContext = {
  backend: Backend;
  documentation: Documentation;
};

type ElementRenderer = (element: DocElementNode, context: RenderContext) => string;

const attributeOf = (
  element: DocElementNode,
  name: string,
): string | undefined =>
  Object.hasOwn(element.attributes, name) ? element.attributes[name] : undefined;

const renderSee: ElementRenderer = (element, { backend, documentation }) => {
  const key = attributeOf(element, "cref");
  if (key === undefined) {
    return element.source;
  }

  const type = documentation.tryGetType(key);
  if (type) {
    return backend.inlineCode(humanTypeName(type));
  }

  const member = documentation.tryGetMember(key);
  if (member) {
    return backend.inlineCode(memberName(member));
  }

  return backend.inlineCode(key);
};

const elementRenderers: Readonly<Record<string, ElementRenderer | undefined>> = {
  summary: (element, context) => renderChildren(element, context),
  remarks: (element, context) => renderChildren(element, context),
  para: (element, context) => `${renderChildren(element, context)}\n`,
  code: (element, context) => context.backend.code(renderChildren(element, context)),
  paramref: (element, { backend }) => backend.inlineCode(attributeOf(element, "name") ?? ""),
  see: renderSee,
};

const renderNode = (node: DocNode, context: RenderContext): string => {
  if (node.kind === "text") {
    return normalizeSpaces(node.text).trim();
  }
  const renderer = Object.hasOwn(elementRenderers, node.tag)
    ? elementRenderers[node.tag]
    : undefined;
  return renderer ? renderer(node, context) : node.source;
};

const renderChildren = (element: DocElementNode, context: RenderContext): string =>
  element.children
    .map((child) => renderNode(child, context))
    .join(" ")
    .trim();

export type DocCommentRenderer = {
  /** Renders the children of `element` as inline prose; "" for no element. */
  render(element: DocElementNode | undefined): string;
  summaryOf(entity: DocumentedEntity): string;
  remarksOf(entity: DocumentedEntity): string;
  exampleOf(entity: DocumentedEntity): string;
  returnsOf(entity: DocumentedEntity): string;
  parameterOf(entity: DocumentedEntity, name: string): string;
};

export const createDocCommentRenderer = ({
  backend,
  documentation,
}: {
  backend: Backend;
  documentation: Documentation;
}): DocCommentRenderer => {
  const context: RenderContext = { backend, documentation };
  const render = (element: DocElementNode | undefined): string =>
    element ? renderChildren(element, context) : "";
  const section = (entity: DocumentedEntity, tag: string): string =>
    render(childElement(documentation.getDocumentation(entity), tag));

  return {
    render,
    summaryOf: (entity) => section(entity, "summary"),
    remarksOf: (entity) => section(entity, "remarks"),
    exampleOf: (entity) => section(entity, "example"),
    returnsOf: (entity) => section(entity, "returns"),
    parameterOf: (entity, name) =>
      render(
        childElements(documentation.getDocumentation(entity), "param").find(
          (param) => param.attributes.name === name,
        ),
      ),
  };
};
