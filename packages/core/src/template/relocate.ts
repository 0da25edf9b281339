import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import createDebug from "debug";
import { rebaseRelativePath } from "@autolayer/common";
import type { Resource, Template, TemplateMapping, TemplateValue } from "@autolayer/types";
import { isTemplateMapping } from "./guards";
import { dumpTemplate } from "./io";

const debug = createDebug("autolayer:core");

/**
 * Writes a template to a new location. Receives the location the template's
 * relative paths were written against and the destination path.
 */
export type TemplateRelocator = (
  sourceTemplatePath: string,
  destinationTemplatePath: string,
  template: Template,
) => void;

/** Property paths, per resource type, that may point at local artifacts. */
export const RESOURCES_WITH_LOCAL_PATHS: Readonly<Record<string, readonly string[]>> = {
  "AWS::Serverless::Function": ["CodeUri"],
  "AWS::Serverless::LayerVersion": ["ContentUri"],
  "AWS::Serverless::Api": ["DefinitionUri"],
  "AWS::Serverless::HttpApi": ["DefinitionUri"],
  "AWS::Serverless::StateMachine": ["DefinitionUri"],
  "AWS::Serverless::Application": ["Location"],
  "AWS::Serverless::GraphQLApi": ["SchemaUri"],
  "AWS::Lambda::Function": ["Code"],
  "AWS::Lambda::LayerVersion": ["Content"],
  "AWS::ApiGateway::RestApi": ["BodyS3Location"],
  "AWS::ApiGatewayV2::Api": ["BodyS3Location"],
  "AWS::AppSync::GraphQLSchema": ["DefinitionS3Location"],
  "AWS::AppSync::Resolver": [
    "RequestMappingTemplateS3Location",
    "ResponseMappingTemplateS3Location",
    "CodeS3Location",
  ],
  "AWS::AppSync::FunctionConfiguration": [
    "RequestMappingTemplateS3Location",
    "ResponseMappingTemplateS3Location",
    "CodeS3Location",
  ],
  "AWS::CloudFormation::Stack": ["TemplateURL"],
  "AWS::CloudFormation::ModuleVersion": ["ModulePackage"],
  "AWS::CloudFormation::ResourceVersion": ["SchemaHandlerPackage"],
  "AWS::ElasticBeanstalk::ApplicationVersion": ["SourceBundle"],
  "AWS::Glue::Job": ["Command.ScriptLocation"],
  "AWS::StepFunctions::StateMachine": ["DefinitionS3Location"],
};

/**
 * Returns a copy of `template` whose local relative artifact paths, written
 * relative to `originalRoot`, resolve to the same files from `newRoot`.
 */
export function rebaseTemplatePaths(
  template: Template,
  originalRoot: string,
  newRoot: string,
): Template {
  const copy = structuredClone(template);
  for (const [logicalId, resource] of Object.entries(copy.Resources ?? {})) {
    const propertyPaths = RESOURCES_WITH_LOCAL_PATHS[resource.Type] ?? [];
    for (const propertyPath of propertyPaths) {
      rebaseProperty(resource.Properties, propertyPath.split("."), originalRoot, newRoot);
    }
    rebaseDockerContext(resource, originalRoot, newRoot);
    debug("relocate: %s (%s) rebased", logicalId, resource.Type);
  }
  return copy;
}

/**
 * Default relocation: rebases the template's relative paths from the source
 * template's directory to the destination's and writes it as YAML.
 */
export const moveTemplate: TemplateRelocator = (
  sourceTemplatePath,
  destinationTemplatePath,
  template,
) => {
  const originalRoot = dirname(resolve(sourceTemplatePath));
  const newRoot = dirname(resolve(destinationTemplatePath));
  const relocated = rebaseTemplatePaths(template, originalRoot, newRoot);

  mkdirSync(newRoot, { recursive: true });
  writeFileSync(destinationTemplatePath, dumpTemplate(relocated));
  debug("relocate: wrote %s", destinationTemplatePath);
};

function rebaseProperty(
  mapping: TemplateMapping | undefined,
  path: string[],
  originalRoot: string,
  newRoot: string,
): void {
  const [head, ...rest] = path;
  if (!mapping || head === undefined) return;

  const value: TemplateValue | undefined = mapping[head];
  if (rest.length > 0) {
    if (isTemplateMapping(value)) rebaseProperty(value, rest, originalRoot, newRoot);
    return;
  }
  if (typeof value === "string") {
    mapping[head] = rebaseRelativePath(value, originalRoot, newRoot);
  }
}

// Image functions build from a Docker context given in the resource metadata
function rebaseDockerContext(resource: Resource, originalRoot: string, newRoot: string): void {
  const context = resource.Metadata?.DockerContext;
  if (resource.Metadata && typeof context === "string") {
    resource.Metadata.DockerContext = rebaseRelativePath(context, originalRoot, newRoot);
  }
}
