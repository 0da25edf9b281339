import { createHash } from "node:crypto";

/** Hex MD5 digest of a UTF-8 string. Used for stable, short identifiers. */
export function checksum(value: string): string {
  return createHash("md5").update(value, "utf8").digest("hex");
}
