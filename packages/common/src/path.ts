import { isAbsolute, join, normalize, relative } from "node:path";

const REMOTE_PREFIXES = ["s3://", "http://", "https://"];

/**
 * Whether a template property value points at something on the local disk,
 * as opposed to a remote object or a non-path value.
 *
 * @example
 * isLocalPath("src/handlers") => true
 * isLocalPath("s3://bucket/key.zip") => false
 */
export function isLocalPath(value: unknown): value is string {
  if (typeof value !== "string" || value.length === 0) return false;
  return !REMOTE_PREFIXES.some((prefix) => value.startsWith(prefix));
}

/**
 * Rewrites a path that is relative to `originalRoot` so that it resolves to
 * the same location from `newRoot`. Absolute and remote paths are returned
 * unchanged.
 *
 * @example
 * rebaseRelativePath("src", "/project", "/project/.build") => "../src"
 * rebaseRelativePath("/opt/deps", "/project", "/project/.build") => "/opt/deps"
 */
export function rebaseRelativePath(path: string, originalRoot: string, newRoot: string): string {
  if (!isLocalPath(path) || isAbsolute(path)) return path;
  return relative(newRoot, normalize(join(originalRoot, path))) || ".";
}
