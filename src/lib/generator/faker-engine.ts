/**
 * Request-local faker instances
 *
 * Every batch gets its own seeded Faker so that concurrent requests never
 * share random state and the same seed always replays the same values.
 */

import { Faker, base, en } from "@faker-js/faker";
import { logger } from "../../utils/logger.js";
import { generateRandomSeed, hashStringToSeed, normalizeSeed } from "../../utils/seed-manager.js";

export interface SeededFaker {
  faker: Faker;
  /** Canonical seed string; replaying it reproduces the batch */
  seed: string;
  numericSeed: number;
}

/**
 * Create a faker instance seeded from the given seed, or from a fresh random
 * seed when none is supplied
 */
export function createSeededFaker(seed?: string | number): SeededFaker {
  const canonical = seed !== undefined ? normalizeSeed(seed) : generateRandomSeed();
  const numericSeed = hashStringToSeed(canonical);

  const faker = new Faker({ locale: [en, base] });
  faker.seed(numericSeed);

  logger.debug("Faker seeded", { seed: canonical, numericSeed });

  return { faker, seed: canonical, numericSeed };
}
