import type { FunctionDefinition, Output, Resource, Template } from "@autolayer/types";
import { CREATED_BY } from "../constants";
import { MissingRuntimeError } from "../errors/layer-errors";
import { layerLogicalIdFor, layerNameFor } from "./identity";

const NESTED_STACK_DESCRIPTION = `Nested stack holding the dependency layers created by ${CREATED_BY}`;

type LayerEntry = {
  logicalId: string;
  resource: Resource;
  output: Output;
};

/**
 * Accumulates one layer resource and one matching output per function and
 * renders them as a nested template. Entries are only ever appended.
 */
export class NestedStackAssembler {
  private readonly entries: LayerEntry[] = [];

  /**
   * Registers a dependency layer for `fn` and returns the output key that
   * exports the layer's reference. Each call appends a new entry; callers add
   * a function at most once.
   */
  addFunction(stackName: string, layerRootPath: string, fn: FunctionDefinition): string {
    if (!fn.runtime) {
      throw new MissingRuntimeError(fn.name);
    }
    const logicalId = layerLogicalIdFor(fn.name);

    this.entries.push({
      logicalId,
      resource: {
        Type: "AWS::Serverless::LayerVersion",
        Properties: {
          LayerName: layerNameFor(stackName, fn.name),
          Description: `Dependency layer for function ${fn.name}`,
          ContentUri: layerRootPath,
          RetentionPolicy: "Delete",
          CompatibleRuntimes: [fn.runtime],
        },
        Metadata: { CreatedBy: CREATED_BY },
      },
      output: { Value: { Ref: logicalId } },
    });

    return logicalId;
  }

  get functionCount(): number {
    return this.entries.length;
  }

  isAnyFunctionAdded(): boolean {
    return this.functionCount > 0;
  }

  /** Renders the nested template from the entries added so far. */
  serialize(): Template {
    const resources: Record<string, Resource> = {};
    const outputs: Record<string, Output> = {};
    for (const entry of this.entries) {
      resources[entry.logicalId] = structuredClone(entry.resource);
      outputs[entry.logicalId] = structuredClone(entry.output);
    }

    return {
      AWSTemplateFormatVersion: "2010-09-09",
      Transform: "AWS::Serverless-2016-10-31",
      Description: NESTED_STACK_DESCRIPTION,
      Metadata: { CreatedBy: CREATED_BY },
      Resources: resources,
      Outputs: outputs,
    };
  }

  /** The parent-template resource that deploys the nested template at `templateLocation`. */
  nestedStackReferenceResource(templateLocation: string): Resource {
    return {
      Type: "AWS::CloudFormation::Stack",
      DeletionPolicy: "Delete",
      Properties: { TemplateURL: templateLocation },
      Metadata: { CreatedBy: CREATED_BY },
    };
  }
}
