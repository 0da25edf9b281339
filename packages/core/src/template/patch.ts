import type { Resource, Template, TemplateValue } from "@autolayer/types";
import { isTemplateList } from "./guards";

/**
 * Whether a layer reference can be appended to the function's `Layers`
 * property: the property is either absent or a plain list.
 */
export function canAppendLayer(template: Template, functionId: string): boolean {
  const resource = template.Resources?.[functionId];
  if (!resource) return false;
  const layers = resource.Properties?.Layers;
  return layers === undefined || isTemplateList(layers);
}

/**
 * Returns a new template in which `layerRef` is appended to the `Layers` list
 * of resource `functionId`. Only the path to that list is copied; every other
 * value is shared with `template`.
 */
export function appendFunctionLayer(
  template: Template,
  functionId: string,
  layerRef: TemplateValue,
): Template {
  const resource = template.Resources?.[functionId];
  if (!resource) {
    throw new Error(`Resource "${functionId}" not found in template`);
  }
  const properties = resource.Properties ?? {};
  const layers = properties.Layers;
  if (layers !== undefined && !isTemplateList(layers)) {
    throw new Error(`Layers of resource "${functionId}" is not a list`);
  }

  const patched: Resource = {
    ...resource,
    Properties: { ...properties, Layers: [...(layers ?? []), layerRef] },
  };
  return withResource(template, functionId, patched);
}

/** Returns a new template with `resource` set under `logicalId`. */
export function withResource(template: Template, logicalId: string, resource: Resource): Template {
  return {
    ...template,
    Resources: { ...template.Resources, [logicalId]: resource },
  };
}
