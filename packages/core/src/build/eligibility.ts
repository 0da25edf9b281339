import createDebug from "debug";
import type { BuildArtifacts, FunctionDefinition, FunctionResourceType } from "@autolayer/types";
import { SUPPORTED_PACKAGE_TYPE, SUPPORTED_RESOURCE_TYPES } from "../constants";
import { runtimeFamilyOf } from "../runtime/layout";
import type { ApplicationBuildResult } from "./build-graph";

const debug = createDebug("autolayer:core");

export type SkipReason =
  | "unsupported-resource-type"
  | "unsupported-package-type"
  | "not-built"
  | "unsupported-runtime"
  | "missing-dependencies-dir";

export type Eligibility =
  | { eligible: true; dependenciesDir: string }
  | { eligible: false; reason: SkipReason };

export function isResourceTypeSupported(resourceType: string): resourceType is FunctionResourceType {
  return SUPPORTED_RESOURCE_TYPES.some((supported) => supported === resourceType);
}

export function isPackageTypeSupported(fn: FunctionDefinition): boolean {
  return fn.packageType === SUPPORTED_PACKAGE_TYPE;
}

/** Whether the function was built in the current build session. */
export function isFunctionBuilt(fn: FunctionDefinition, artifacts: BuildArtifacts): boolean {
  return Object.hasOwn(artifacts, fn.name);
}

export function isRuntimeSupported(runtime: string | undefined): runtime is string {
  return runtimeFamilyOf(runtime) !== undefined;
}

/**
 * Decides whether a function's dependencies can be moved into a layer.
 * Checks run in a fixed order and the first failing one names the reason.
 */
export function checkEligibility(
  fn: FunctionDefinition,
  buildResult: ApplicationBuildResult,
): Eligibility {
  if (!isResourceTypeSupported(fn.resourceType)) {
    return skip(fn, "unsupported-resource-type");
  }
  if (!isPackageTypeSupported(fn)) {
    return skip(fn, "unsupported-package-type");
  }
  if (!isFunctionBuilt(fn, buildResult.artifacts)) {
    return skip(fn, "not-built");
  }
  if (!isRuntimeSupported(fn.runtime)) {
    return skip(fn, "unsupported-runtime");
  }

  const dependenciesDir = buildResult.buildGraph.getFunctionBuildDefinition(fn.name)?.dependenciesDir;
  if (!dependenciesDir) {
    return skip(fn, "missing-dependencies-dir");
  }

  return { eligible: true, dependenciesDir };
}

export function isEligible(fn: FunctionDefinition, buildResult: ApplicationBuildResult): boolean {
  return checkEligibility(fn, buildResult).eligible;
}

function skip(fn: FunctionDefinition, reason: SkipReason): Eligibility {
  debug("eligibility: %s skipped (%s, runtime=%s)", fn.name, reason, fn.runtime);
  return { eligible: false, reason };
}
