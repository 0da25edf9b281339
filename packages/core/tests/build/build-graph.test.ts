import { describe, it, expect } from "vitest";
import { BuildGraph } from "../../src/build/build-graph";

describe("BuildGraph", () => {
  const shared = { functions: ["Fn1", "Fn2"], runtime: "python3.11", dependenciesDir: "/deps/a" };
  const single = { functions: ["Fn3"], runtime: "nodejs20.x", dependenciesDir: "/deps/b" };

  it("finds the definition that builds a function", () => {
    const graph = new BuildGraph([shared, single]);

    expect(graph.getFunctionBuildDefinition("Fn3")).toBe(single);
  });

  it("returns the shared definition for every function it builds", () => {
    const graph = new BuildGraph([shared, single]);

    expect(graph.getFunctionBuildDefinition("Fn1")).toBe(shared);
    expect(graph.getFunctionBuildDefinition("Fn2")).toBe(shared);
  });

  it("returns undefined for an unknown function", () => {
    expect(new BuildGraph([shared]).getFunctionBuildDefinition("Missing")).toBeUndefined();
  });

  it("defaults to an empty graph", () => {
    const graph = new BuildGraph();

    expect(graph.getFunctionBuildDefinitions()).toEqual([]);
    expect(graph.getFunctionBuildDefinition("Fn1")).toBeUndefined();
  });
});
