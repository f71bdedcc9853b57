import crypto from "crypto";

export function hashStringToSeed(seed: string): number {
  // Convert seed string to SHA-256 hash
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // First 8 hex characters become the numeric faker seed
  return parseInt(hash.slice(0, 8), 16);
}

export function generateRandomSeed(): string {
  return crypto.randomBytes(16).toString("hex");
}

/**
 * Normalize a caller-supplied seed to its canonical string form.
 * Numbers and their decimal strings are the same seed.
 */
export function normalizeSeed(seed: string | number): string {
  return typeof seed === "number" ? String(seed) : seed.trim();
}

/**
 * Derive a child seed for the n-th request of a multi-request run
 */
export function deriveSeed(seed: string, index: number): string {
  return `${seed}:${index}`;
}
