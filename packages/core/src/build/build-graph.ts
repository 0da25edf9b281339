import type { BuildArtifacts, FunctionBuildDefinition } from "@autolayer/types";

/**
 * Read-only view over the function build definitions of one build session.
 */
export class BuildGraph {
  private readonly definitions: readonly FunctionBuildDefinition[];

  constructor(definitions: readonly FunctionBuildDefinition[] = []) {
    this.definitions = definitions;
  }

  getFunctionBuildDefinitions(): readonly FunctionBuildDefinition[] {
    return this.definitions;
  }

  getFunctionBuildDefinition(functionId: string): FunctionBuildDefinition | undefined {
    return this.definitions.find((definition) => definition.functions.includes(functionId));
  }
}

export type ApplicationBuildResult = {
  artifacts: BuildArtifacts;
  buildGraph: BuildGraph;
};
