export type {
  TemplateValue,
  TemplateMapping,
  RefIntrinsic,
  GetAttIntrinsic,
  Resource,
  Output,
  Template,
} from "./template";

export type { FunctionResourceType, PackageType, FunctionDefinition } from "./function";

export type { BuildArtifacts, FunctionBuildDefinition } from "./build";

export type { LogLevel, Logger } from "./logger";
