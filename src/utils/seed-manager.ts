import crypto from "crypto";

export function hashStringToSeed(seed: string): number {
  // Convert seed string to SHA-256 hash
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // First 8 hex characters as the numeric seed
  return parseInt(hash.slice(0, 8), 16);
}

export function toNumericSeed(seed: string | number): number {
  return typeof seed === "string" ? hashStringToSeed(seed) : seed;
}

/**
 * Derive an independent seed for one named component from a shared base
 * seed, so that each collection gets its own reproducible sequence.
 */
export function deriveSeed(
  base: string | number | undefined,
  scope: string,
): number | undefined {
  if (base === undefined) return undefined;
  return hashStringToSeed(`${base}:${scope}`);
}
