// Orchestration
export { DependencyLayerManager } from "./manager/dependency-layer-manager";
export type { DependencyLayerManagerOptions } from "./manager/dependency-layer-manager";

// Constants
export {
  NESTED_STACK_NAME,
  NESTED_TEMPLATE_FILE,
  SUPPORTED_RESOURCE_TYPES,
  SUPPORTED_PACKAGE_TYPE,
  LAYER_README_FILE,
} from "./constants";

// Runtime layout
export {
  SUPPORTED_RUNTIME_FAMILIES,
  runtimeFamilyOf,
  layerSubfolderFor,
  type RuntimeFamily,
} from "./runtime/layout";

// Layer folders
export { buildLayerFolder, layerReadmeText, type LayerFolderOptions } from "./layer-folder/builder";

// Build results
export { BuildGraph, type ApplicationBuildResult } from "./build/build-graph";
export {
  checkEligibility,
  isEligible,
  isFunctionBuilt,
  isRuntimeSupported,
  isResourceTypeSupported,
  isPackageTypeSupported,
  type Eligibility,
  type SkipReason,
} from "./build/eligibility";

// Nested stack
export { NestedStackAssembler } from "./nested-stack/assembler";
export { layerLogicalIdFor, layerNameFor, toLogicalIdCompliant } from "./nested-stack/identity";

// Functions
export { resolveFunctions, type FunctionResolver } from "./functions/resolver";

// Templates
export { parseTemplate, dumpTemplate } from "./template/io";
export { appendFunctionLayer, withResource, canAppendLayer } from "./template/patch";
export {
  moveTemplate,
  rebaseTemplatePaths,
  RESOURCES_WITH_LOCAL_PATHS,
  type TemplateRelocator,
} from "./template/relocate";
export { isTemplate, isResource, isTemplateMapping } from "./template/guards";

// Errors
export {
  AutolayerError,
  MissingRuntimeError,
  UnsupportedRuntimeError,
  InvalidTemplateError,
} from "./errors/layer-errors";
