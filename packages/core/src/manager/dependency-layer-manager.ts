import { join } from "node:path";
import createDebug from "debug";
import { NOOP_LOGGER } from "@autolayer/logger";
import type { FunctionDefinition, GetAttIntrinsic, Logger, Template } from "@autolayer/types";
import type { ApplicationBuildResult } from "../build/build-graph";
import { checkEligibility } from "../build/eligibility";
import { NESTED_STACK_NAME, NESTED_TEMPLATE_FILE, SUPPORTED_PACKAGE_TYPE } from "../constants";
import { resolveFunctions as defaultResolveFunctions } from "../functions/resolver";
import type { FunctionResolver } from "../functions/resolver";
import { buildLayerFolder } from "../layer-folder/builder";
import { NestedStackAssembler } from "../nested-stack/assembler";
import { layerLogicalIdFor } from "../nested-stack/identity";
import { appendFunctionLayer, canAppendLayer, withResource } from "../template/patch";
import { moveTemplate } from "../template/relocate";
import type { TemplateRelocator } from "../template/relocate";

const debug = createDebug("autolayer:core");

export type DependencyLayerManagerOptions = {
  /** Name of the deployed stack; scopes the generated layer names. */
  stackName: string;
  /** Directory that receives the layer folders and the nested template. */
  buildDir: string;
  /** Path of the template the relative paths of `template` are written against. */
  stackLocation: string;
  template: Template;
  buildResult: ApplicationBuildResult;
  logger?: Logger;
  relocateTemplate?: TemplateRelocator;
  resolveFunctions?: FunctionResolver;
};

/**
 * Moves the dependencies of every eligible function into its own layer and
 * wires the layers into the template through a nested stack.
 */
export class DependencyLayerManager {
  private readonly logger: Logger;
  private readonly relocateTemplate: TemplateRelocator;
  private readonly resolveFunctions: FunctionResolver;

  constructor(private readonly options: DependencyLayerManagerOptions) {
    this.logger = options.logger ?? NOOP_LOGGER;
    this.relocateTemplate = options.relocateTemplate ?? moveTemplate;
    this.resolveFunctions = options.resolveFunctions ?? defaultResolveFunctions;
  }

  /**
   * Returns a patched copy of the template. The caller's template is never
   * mutated; when no function qualifies the copy is returned unchanged and no
   * nested template is written.
   */
  generateDependencyLayerStack(): Template {
    const { stackName, buildDir, stackLocation, buildResult } = this.options;
    let template = structuredClone(this.options.template);
    const assembler = new NestedStackAssembler();

    const zipFunctions = this.resolveFunctions(template).filter(
      (fn) => fn.packageType === SUPPORTED_PACKAGE_TYPE,
    );
    debug("manager: %d zip functions in %s", zipFunctions.length, stackName);

    for (const fn of zipFunctions) {
      const eligibility = checkEligibility(fn, buildResult);
      if (!eligibility.eligible) {
        this.logger.debug("Skipping dependency layer creation", {
          functionId: fn.name,
          reason: eligibility.reason,
        });
        continue;
      }

      if (!canAppendLayer(template, fn.name)) {
        this.logger.warn("Skipping dependency layer creation: Layers is not a list", {
          functionId: fn.name,
        });
        continue;
      }

      template = this.addLayer(template, assembler, fn, eligibility.dependenciesDir);
    }

    if (!assembler.isAnyFunctionAdded()) {
      this.logger.debug("No function qualified for dependency layer creation");
      return template;
    }

    const nestedTemplateLocation = join(buildDir, NESTED_TEMPLATE_FILE);
    this.relocateTemplate(stackLocation, nestedTemplateLocation, assembler.serialize());
    this.logger.info("Wrote dependency layer nested template", {
      location: nestedTemplateLocation,
      layers: assembler.functionCount,
    });

    return withResource(
      template,
      NESTED_STACK_NAME,
      assembler.nestedStackReferenceResource(nestedTemplateLocation),
    );
  }

  private addLayer(
    template: Template,
    assembler: NestedStackAssembler,
    fn: FunctionDefinition,
    dependenciesDir: string,
  ): Template {
    const { stackName, buildDir } = this.options;
    const layerRoot = buildLayerFolder({
      buildDir,
      dependenciesDir,
      layerLogicalId: layerLogicalIdFor(fn.name),
      functionId: fn.name,
      runtime: fn.runtime,
    });

    const outputKey = assembler.addFunction(stackName, layerRoot, fn);
    this.logger.info("Created dependency layer", { functionId: fn.name, layerRoot });

    const layerRef: GetAttIntrinsic = { "Fn::GetAtt": [NESTED_STACK_NAME, `Outputs.${outputKey}`] };
    return appendFunctionLayer(template, fn.name, layerRef);
  }
}
