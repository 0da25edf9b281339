// Values that may appear anywhere inside a template document.
export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | TemplateValue[]
  | { [key: string]: TemplateValue };

export type TemplateMapping = { [key: string]: TemplateValue };

// Intrinsic function shapes produced and consumed by the layer wiring
export type RefIntrinsic = { Ref: string };

export type GetAttIntrinsic = { "Fn::GetAtt": [string, string] };

export type Resource = {
  Type: string;
  Properties?: TemplateMapping;
  Metadata?: TemplateMapping;
  DeletionPolicy?: string;
  UpdateReplacePolicy?: string;
  Condition?: string;
  DependsOn?: string | string[];
};

export type Output = {
  Value: TemplateValue;
  Description?: string;
  Export?: { Name: TemplateValue };
  Condition?: string;
};

/**
 * A parsed infrastructure template. Only the sections the layer extraction
 * reads or writes are typed; every other top-level section is carried through
 * untouched.
 */
export type Template = {
  AWSTemplateFormatVersion?: string;
  Transform?: TemplateValue;
  Description?: string;
  Metadata?: TemplateMapping;
  Parameters?: TemplateMapping;
  Globals?: TemplateMapping;
  Conditions?: TemplateMapping;
  Mappings?: TemplateMapping;
  Resources?: Record<string, Resource>;
  Outputs?: Record<string, Output>;
};
