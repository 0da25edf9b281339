import type { FunctionResourceType, PackageType } from "@autolayer/types";

/** Logical id of the nested stack resource added to the patched template. */
export const NESTED_STACK_NAME = "AwsSamAutoDependencyLayerNestedStack";

/** File name of the nested template, written inside the build directory. */
export const NESTED_TEMPLATE_FILE = "nested_template.yaml";

export const SUPPORTED_RESOURCE_TYPES: readonly FunctionResourceType[] = [
  "AWS::Serverless::Function",
  "AWS::Lambda::Function",
];

export const SUPPORTED_PACKAGE_TYPE: PackageType = "Zip";

export const CREATED_BY = "autolayer";

export const LAYER_README_FILE = "AUTOLAYER_README";

export const BUILD_DIR_PERMISSIONS = 0o755;
