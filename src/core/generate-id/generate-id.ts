import { getRandomValues } from "node:crypto";

interface GenerateIdOptions {
  /** Optional prefix to prepend to the ID */
  prefix?: string;
  /** Total length of the returned ID including prefix (default 16) */
  size?: number;
}

/**
 * @description
 * Generates a random hexadecimal identifier, used for peer ids, observer
 * client ids and snapshot request ids.
 *
 * @param options Optional configuration: prefix and total size
 *
 * @example
 * generateId(); // "f3a2b1c4d5e67890"
 * generateId({ prefix: "peer_" }); // "peer_f3a2b1c4d5e"
 * generateId({ prefix: "observer_", size: 24 }); // "observer_0f3a2b1c4d5e678"
 */
export function generateId(options: GenerateIdOptions = {}): string {
  const { prefix = "", size = 16 } = options;

  // at least 8 hex characters after the prefix
  const hexLength = Math.max(size - prefix.length, 8);

  const words = getRandomValues(new Uint32Array(Math.ceil(hexLength / 8)));
  const hex = Array.from(words, (word) => word.toString(16).padStart(8, "0")).join("");

  return `${prefix}${hex.slice(0, hexLength)}`;
}
