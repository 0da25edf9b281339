import { UnsupportedRuntimeError } from "../errors/layer-errors";

export const SUPPORTED_RUNTIME_FAMILIES = ["python", "nodejs", "java"] as const;

export type RuntimeFamily = (typeof SUPPORTED_RUNTIME_FAMILIES)[number];

/**
 * Folder, relative to the layer root, that a layer's contents must live under
 * for the function runtime to find them.
 */
const LAYER_SUBFOLDERS: Record<RuntimeFamily, (runtime: string) => string> = {
  python: (runtime) => `python/lib/${runtime}/site-packages`,
  // dependency dirs of Node.js builds already contain node_modules/
  nodejs: () => "nodejs",
  // dependency dirs of Java builds already contain lib/
  java: () => "java",
};

export function runtimeFamilyOf(runtime: string | undefined): RuntimeFamily | undefined {
  if (!runtime) return undefined;
  return SUPPORTED_RUNTIME_FAMILIES.find((family) => runtime.startsWith(family));
}

/**
 * @example
 * layerSubfolderFor("python3.11") => "python/lib/python3.11/site-packages"
 * layerSubfolderFor("nodejs20.x") => "nodejs"
 */
export function layerSubfolderFor(runtime: string): string {
  const family = runtimeFamilyOf(runtime);
  if (!family) {
    throw new UnsupportedRuntimeError(runtime);
  }
  return LAYER_SUBFOLDERS[family](runtime);
}
