export { parseArgs, USAGE, type CliConfig, type ParsedArgs } from "./args";
export {
  parseBuildResult,
  loadBuildResult,
  buildResultFileSchema,
  type BuildResultFile,
} from "./build-result";
export { runGenerate } from "./run";
export { CliArgumentError, InvalidBuildResultError, type BuildResultIssue } from "./errors";
