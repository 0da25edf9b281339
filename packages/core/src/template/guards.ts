import type { Resource, Template, TemplateMapping, TemplateValue } from "@autolayer/types";

export function isTemplateMapping(value: unknown): value is TemplateMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isTemplateList(value: TemplateValue | undefined): value is TemplateValue[] {
  return Array.isArray(value);
}

export function isResource(value: unknown): value is Resource {
  if (!isTemplateMapping(value)) return false;
  if (typeof value.Type !== "string") return false;
  return value.Properties === undefined || isTemplateMapping(value.Properties);
}

/**
 * Shallow structural check of a parsed document: a mapping whose `Resources`
 * section, when present, maps logical ids to typed resource declarations.
 */
export function isTemplate(value: unknown): value is Template {
  if (!isTemplateMapping(value)) return false;
  const resources = value.Resources;
  if (resources === undefined) return true;
  return isTemplateMapping(resources) && Object.values(resources).every(isResource);
}

export function stringProperty(
  mapping: TemplateMapping | undefined,
  key: string,
): string | undefined {
  const value = mapping?.[key];
  return typeof value === "string" ? value : undefined;
}
