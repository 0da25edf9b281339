import { resolve } from "node:path";
import { z } from "zod";
import { CliArgumentError } from "./errors";

export type CliConfig = {
  template: string;
  buildDir: string;
  buildResult: string;
  stackName: string;
  output?: string;
};

export type ParsedArgs = { help: true } | { help: false; config: CliConfig };

type OptionSpec = {
  flag: string;
  env: string;
  key: keyof CliConfig;
  placeholder: string;
};

const OPTIONS: readonly OptionSpec[] = [
  { flag: "--template", env: "AUTOLAYER_TEMPLATE", key: "template", placeholder: "<path>" },
  { flag: "--build-dir", env: "AUTOLAYER_BUILD_DIR", key: "buildDir", placeholder: "<dir>" },
  { flag: "--build-result", env: "AUTOLAYER_BUILD_RESULT", key: "buildResult", placeholder: "<path>" },
  { flag: "--stack-name", env: "AUTOLAYER_STACK_NAME", key: "stackName", placeholder: "<name>" },
  { flag: "--output", env: "AUTOLAYER_OUTPUT", key: "output", placeholder: "<path>" },
];

const STACK_NAME_PATTERN = /^[a-zA-Z][-a-zA-Z0-9]*$/;

const cliConfigSchema = z.object({
  template: z.string().min(1),
  buildDir: z.string().min(1),
  buildResult: z.string().min(1),
  stackName: z
    .string()
    .min(1)
    .max(128, "stack name must be at most 128 characters")
    .regex(
      STACK_NAME_PATTERN,
      "stack name must start with a letter and contain only letters, digits and hyphens",
    ),
  output: z.string().min(1).optional(),
});

export const USAGE = [
  "Usage: autolayer [options]",
  "",
  "Moves the dependencies of built functions into per-function layers and",
  "wires them into the template through a nested stack.",
  "",
  "Options:",
  ...OPTIONS.map(
    ({ flag, env, placeholder }) => `  ${`${flag} ${placeholder}`.padEnd(24)} (env: ${env})`,
  ),
  "  --help                   Show this message",
].join("\n");

/**
 * Reads the CLI configuration from `argv` (as in `process.argv`), falling back
 * to environment variables for options that are not given as flags. Paths are
 * resolved against `cwd`.
 */
export function parseArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ParsedArgs {
  const raw: Partial<Record<keyof CliConfig, string>> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      return { help: true };
    }
    const option = OPTIONS.find((candidate) => candidate.flag === arg);
    const value = argv[i + 1];
    if (!option) {
      throw new CliArgumentError(`Unknown argument: ${arg}`);
    }
    if (value === undefined || value.startsWith("--")) {
      throw new CliArgumentError(`Missing value for ${option.flag} ${option.placeholder}`);
    }
    raw[option.key] = value;
    i++;
  }

  for (const option of OPTIONS) {
    raw[option.key] ??= env[option.env] || undefined;
  }

  for (const option of OPTIONS) {
    if (option.key !== "output" && raw[option.key] === undefined) {
      throw new CliArgumentError(
        `Missing required argument: ${option.flag} ${option.placeholder} (or ${option.env})`,
      );
    }
  }

  const parsed = cliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new CliArgumentError(`Invalid arguments: ${details}`);
  }

  const config = parsed.data;
  return {
    help: false,
    config: {
      template: resolve(cwd, config.template),
      buildDir: resolve(cwd, config.buildDir),
      buildResult: resolve(cwd, config.buildResult),
      stackName: config.stackName,
      ...(config.output ? { output: resolve(cwd, config.output) } : {}),
    },
  };
}
