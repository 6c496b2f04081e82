import { createHash } from "node:crypto";
import { stableStringify } from "./json.js";

/**
 * SHA-256 of raw bytes. Returns "sha256:" + lowercase hex.
 */
export function sha256Hex(bytes: Buffer | string): string {
  return `sha256:${createHash("sha256").update(bytes).digest("hex")}`;
}

/** SHA-256 of the stable JSON encoding of `value`. */
export function hashStable(value: unknown): string {
  return sha256Hex(stableStringify(value));
}
