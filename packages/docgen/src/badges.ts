import {
  isVisibleAccessibility,
  type DocumentedEntity,
  type TypeRef,
} from "@apiref/metadata";
import type { Backend } from "./backend.js";
import { humanTypeRefName } from "./signatures.js";

const attributeBadges = (attributes: readonly TypeRef[]): string[] =>
  attributes.map(humanTypeRefName);

/**
 * Labels for an entity in display order: scope, then modality, then
 * visibility, then attributes. `isStatic` defaults to the member's own flag.
 */
export const composeBadges = (
  entity: DocumentedEntity,
  isStatic = entity.kind !== "type" && entity.isStatic,
): readonly string[] => {
  const badges: string[] = [];

  switch (entity.kind) {
    case "type":
    case "constructor":
      break;
    case "property": {
      if (isStatic) badges.push("Static");
      const canRead =
        entity.getter !== undefined &&
        isVisibleAccessibility(entity.getter.accessibility);
      const canWrite =
        entity.setter !== undefined &&
        isVisibleAccessibility(entity.setter.accessibility);
      if (canRead && !canWrite) badges.push("Read Only");
      if (canWrite && !canRead) badges.push("Write Only");
      break;
    }
    case "field":
      if (isStatic) badges.push("Static");
      if (entity.isInitOnly) badges.push("Read Only");
      break;
    case "method":
      if (isStatic) badges.push("Static");
      if (entity.isAbstract) {
        badges.push("Abstract");
      } else if (entity.isVirtual) {
        badges.push("Virtual");
      }
      if (entity.accessibility === "protected") badges.push("Protected");
      break;
    case "event":
      if (isStatic) badges.push("Static");
      break;
  }

  badges.push(...attributeBadges(entity.attributes));
  return badges;
};

/** One backend token list followed by a newline, or "" without badges. */
export const renderBadges = (
  badges: readonly string[],
  backend: Backend,
): string =>
  badges.length > 0
    ? `${backend.small(badges.map((badge) => backend.badge(badge)).join(", ").trim())}\n`
    : "";
