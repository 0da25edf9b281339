import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import createDebug from "debug";
import { z } from "zod";
import { BuildGraph } from "@autolayer/core";
import type { ApplicationBuildResult } from "@autolayer/core";
import { InvalidBuildResultError } from "./errors";

const debug = createDebug("autolayer:cli");

const functionBuildDefinitionSchema = z.object({
  functions: z.array(z.string().min(1)).min(1),
  runtime: z.string().optional(),
  codeUri: z.string().optional(),
  dependenciesDir: z.string().optional(),
});

export const buildResultFileSchema = z.object({
  artifacts: z.record(z.string()),
  buildGraph: z
    .object({ functionBuildDefinitions: z.array(functionBuildDefinitionSchema) })
    .default({ functionBuildDefinitions: [] }),
});

export type BuildResultFile = z.infer<typeof buildResultFileSchema>;

/**
 * Parses the contents of a build result file. Relative directories are
 * resolved against `baseDir`, the directory the file lives in.
 */
export function parseBuildResult(text: string, baseDir: string): ApplicationBuildResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidBuildResultError(`Build result is not valid JSON: ${reason}`);
  }

  const parsed = buildResultFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const details = issues.map(({ path, message }) => `  ${path || "(root)"}: ${message}`).join("\n");
    throw new InvalidBuildResultError(`Build result does not match its schema:\n${details}`, issues);
  }

  const { artifacts, buildGraph } = parsed.data;
  const resolvedArtifacts = Object.fromEntries(
    Object.entries(artifacts).map(([functionId, dir]) => [functionId, resolve(baseDir, dir)]),
  );
  const definitions = buildGraph.functionBuildDefinitions.map((definition) => ({
    ...definition,
    ...(definition.dependenciesDir
      ? { dependenciesDir: resolve(baseDir, definition.dependenciesDir) }
      : {}),
  }));
  debug(
    "build-result: %d artifacts, %d build definitions",
    Object.keys(resolvedArtifacts).length,
    definitions.length,
  );

  return { artifacts: resolvedArtifacts, buildGraph: new BuildGraph(definitions) };
}

export function loadBuildResult(path: string): ApplicationBuildResult {
  return parseBuildResult(readFileSync(path, "utf8"), dirname(path));
}
