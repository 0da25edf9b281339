/** Function logical id -> directory holding that function's build output. */
export type BuildArtifacts = Readonly<Record<string, string>>;

/**
 * One build step of the upstream build. Functions sharing source, runtime and
 * build options are built once, so a definition can list several functions.
 */
export type FunctionBuildDefinition = {
  functions: string[];
  runtime?: string;
  codeUri?: string;
  dependenciesDir?: string;
};
