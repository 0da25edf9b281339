import { readFileSync } from "node:fs";
import createDebug from "debug";
import { DependencyLayerManager, dumpTemplate, moveTemplate, parseTemplate } from "@autolayer/core";
import type { Logger, Template } from "@autolayer/types";
import type { CliConfig } from "./args";
import { loadBuildResult } from "./build-result";

const debug = createDebug("autolayer:cli");

/**
 * Runs one extraction: reads the template and build result named by `config`,
 * generates the dependency layers and writes the patched template to
 * `config.output`, or through `write` when no output path is set.
 */
export function runGenerate(
  config: CliConfig,
  logger: Logger,
  write: (text: string) => void,
): Template {
  debug("run: template=%s buildDir=%s", config.template, config.buildDir);
  const template = parseTemplate(readFileSync(config.template, "utf8"));
  const buildResult = loadBuildResult(config.buildResult);

  const manager = new DependencyLayerManager({
    stackName: config.stackName,
    buildDir: config.buildDir,
    stackLocation: config.template,
    template,
    buildResult,
    logger: logger.child("layers", { stackName: config.stackName }),
  });
  const patched = manager.generateDependencyLayerStack();

  if (config.output) {
    moveTemplate(config.template, config.output, patched);
    logger.info("Wrote patched template", { location: config.output });
  } else {
    write(dumpTemplate(patched));
  }

  return patched;
}
