export type FunctionResourceType = "AWS::Serverless::Function" | "AWS::Lambda::Function";

export type PackageType = "Zip" | "Image";

/** A deployable function resolved from a template's resource graph. */
export type FunctionDefinition = {
  /** Logical id of the function resource. */
  name: string;
  resourceType: string;
  packageType: PackageType;
  runtime?: string;
  handler?: string;
  codeUri?: string;
};
