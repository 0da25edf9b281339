import { parse, stringify } from "yaml";
import type { CollectionTag, ScalarTag } from "yaml";
import type { Template } from "@autolayer/types";
import { InvalidTemplateError } from "../errors/layer-errors";
import { isTemplate } from "./guards";

type IntrinsicTag = ScalarTag | CollectionTag;

// Templates are read as YAML 1.1, like the deploy tooling does, but dates stay strings
const TIMESTAMP_TAG = "tag:yaml.org,2002:timestamp";

// Short-form tags whose long form is { "Fn::<Name>": <value> }
const FN_TAGS = [
  "And",
  "Base64",
  "Cidr",
  "Equals",
  "FindInMap",
  "GetAZs",
  "If",
  "ImportValue",
  "Join",
  "Not",
  "Or",
  "Select",
  "Split",
  "Sub",
  "Transform",
] as const;

function fnTags(name: string): IntrinsicTag[] {
  const key = `Fn::${name}`;
  return [
    { tag: `!${name}`, resolve: (value: string) => ({ [key]: value }) },
    { tag: `!${name}`, collection: "seq", resolve: (seq) => ({ [key]: seq.toJSON() }) },
    { tag: `!${name}`, collection: "map", resolve: (map) => ({ [key]: map.toJSON() }) },
  ];
}

/** Splits `Resource.Attribute` at the first dot; attributes may contain dots themselves. */
function splitGetAtt(value: string): [string, string] {
  const dot = value.indexOf(".");
  return dot === -1 ? [value, ""] : [value.slice(0, dot), value.slice(dot + 1)];
}

const INTRINSIC_TAGS: IntrinsicTag[] = [
  { tag: "!Ref", resolve: (value: string) => ({ Ref: value }) },
  { tag: "!Condition", resolve: (value: string) => ({ Condition: value }) },
  { tag: "!GetAtt", resolve: (value: string) => ({ "Fn::GetAtt": splitGetAtt(value) }) },
  { tag: "!GetAtt", collection: "seq", resolve: (seq) => ({ "Fn::GetAtt": seq.toJSON() }) },
  ...FN_TAGS.flatMap(fnTags),
];

/**
 * Parses a YAML or JSON template. Short-form intrinsic tags are read into
 * their long form so that the result is plain data. Plain scalars follow
 * YAML 1.1, so `yes` and `off` are booleans.
 */
export function parseTemplate(text: string): Template {
  const document: unknown = parse(text, {
    version: "1.1",
    customTags: (tags) => [
      ...tags.filter((tag) => typeof tag === "string" || tag.tag !== TIMESTAMP_TAG),
      ...INTRINSIC_TAGS,
    ],
  });
  if (!isTemplate(document)) {
    throw new InvalidTemplateError(
      "Template must be a mapping whose Resources map logical ids to resources with a Type",
    );
  }
  return document;
}

/**
 * Serializes a template as YAML, with intrinsic functions in long form.
 * Strings a YAML 1.1 reader would take for another type are quoted.
 */
export function dumpTemplate(template: Template): string {
  return stringify(template, { version: "1.1", lineWidth: 0 });
}
