import { checksum } from "@autolayer/common";

const NON_ALPHANUMERIC = /[^A-Za-z0-9]/g;

/** Strips every character that is not allowed in a logical id. */
export function toLogicalIdCompliant(value: string): string {
  return value.replace(NON_ALPHANUMERIC, "");
}

/**
 * Derives the logical id of a function's dependency layer. The hash suffix
 * keeps ids distinct for function names that sanitize or truncate to the
 * same prefix.
 *
 * @example layerLogicalIdFor("Fn1") => "Fn1362b6916DepLayer"
 */
export function layerLogicalIdFor(functionId: string): string {
  const sanitized = toLogicalIdCompliant(functionId);
  return `${sanitized.slice(0, 48)}${checksum(functionId).slice(0, 8)}DepLayer`;
}

/**
 * Derives the deployed layer name, scoped by the owning stack.
 *
 * @example layerNameFor("MyStack", "Fn1") => "MyStack6ab0e0e1-Fn1362b6916-DepLayer"
 */
export function layerNameFor(stackName: string, functionId: string): string {
  const sanitized = toLogicalIdCompliant(functionId);
  const stackPart = `${stackName.slice(0, 16)}${checksum(stackName).slice(0, 8)}`;
  const functionPart = `${sanitized.slice(0, 22)}${checksum(functionId).slice(0, 8)}`;
  return `${stackPart}-${functionPart}-DepLayer`;
}
