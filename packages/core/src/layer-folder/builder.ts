import { cpSync, existsSync, mkdirSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import createDebug from "debug";
import { BUILD_DIR_PERMISSIONS, CREATED_BY, LAYER_README_FILE } from "../constants";
import { MissingRuntimeError } from "../errors/layer-errors";
import { layerSubfolderFor } from "../runtime/layout";

const debug = createDebug("autolayer:core");

export type LayerFolderOptions = {
  buildDir: string;
  dependenciesDir: string;
  layerLogicalId: string;
  functionId: string;
  runtime: string | undefined;
};

/**
 * Builds `<buildDir>/<layerLogicalId>` from scratch: the previous folder is
 * removed, the dependencies are copied under the runtime's layer subfolder and
 * a marker file naming the owning function is written at the root.
 *
 * If any step fails the partially built folder is removed before the error
 * is rethrown, so a layer folder on disk is always complete.
 *
 * @returns the layer root folder.
 */
export function buildLayerFolder(options: LayerFolderOptions): string {
  const { buildDir, dependenciesDir, layerLogicalId, functionId, runtime } = options;
  if (!runtime) {
    throw new MissingRuntimeError(functionId);
  }
  const subfolder = layerSubfolderFor(runtime);

  const layerRoot = join(buildDir, layerLogicalId);
  if (existsSync(layerRoot)) {
    debug("layer-folder: removing previous %s", layerRoot);
    rmSync(layerRoot, { recursive: true, force: true });
  }

  try {
    const contentsDir = join(layerRoot, subfolder);
    mkdirSync(contentsDir, { recursive: true, mode: BUILD_DIR_PERMISSIONS });

    if (isDirectory(dependenciesDir)) {
      debug("layer-folder: copying %s -> %s", dependenciesDir, contentsDir);
      cpSync(dependenciesDir, contentsDir, { recursive: true, dereference: true });
    } else {
      debug("layer-folder: no dependencies at %s for %s", dependenciesDir, functionId);
    }

    writeLayerReadme(layerRoot, functionId);
  } catch (error) {
    if (existsSync(layerRoot)) rmSync(layerRoot, { recursive: true, force: true });
    throw error;
  }

  return layerRoot;
}

export function layerReadmeText(functionId: string): string {
  return (
    `This layer contains dependencies of function ${functionId} ` +
    `and was automatically added by ${CREATED_BY}`
  );
}

function writeLayerReadme(layerRoot: string, functionId: string): void {
  writeFileSync(join(layerRoot, LAYER_README_FILE), layerReadmeText(functionId));
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}
