import type { FunctionDefinition, PackageType, Template, TemplateMapping } from "@autolayer/types";
import { isResourceTypeSupported } from "../build/eligibility";
import { isTemplateMapping, stringProperty } from "../template/guards";

export type FunctionResolver = (template: Template) => FunctionDefinition[];

/**
 * Lists the function resources of a template in declaration order.
 *
 * Serverless functions inherit `Runtime`, `PackageType`, `Handler` and
 * `CodeUri` from `Globals.Function` when they omit them. A runtime given as an
 * intrinsic function cannot be known ahead of deployment and resolves to
 * `undefined`.
 */
export const resolveFunctions: FunctionResolver = (template) => {
  const globals = globalFunctionProperties(template);
  const functions: FunctionDefinition[] = [];

  for (const [name, resource] of Object.entries(template.Resources ?? {})) {
    if (!isResourceTypeSupported(resource.Type)) continue;

    const properties = resource.Properties ?? {};
    const inherited = resource.Type === "AWS::Serverless::Function" ? globals : undefined;
    const property = (key: string): string | undefined =>
      stringProperty(properties, key) ?? stringProperty(inherited, key);

    functions.push({
      name,
      resourceType: resource.Type,
      packageType: toPackageType(property("PackageType")),
      runtime: property("Runtime"),
      handler: property("Handler"),
      codeUri: resource.Type === "AWS::Serverless::Function" ? property("CodeUri") : undefined,
    });
  }

  return functions;
};

function globalFunctionProperties(template: Template): TemplateMapping | undefined {
  const fn = template.Globals?.Function;
  return isTemplateMapping(fn) ? fn : undefined;
}

function toPackageType(value: string | undefined): PackageType {
  return value === "Image" ? "Image" : "Zip";
}
