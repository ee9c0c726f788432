import { CATEGORIES, Category } from "../dtos/vehicle.dto";
import { PricingTier } from "../interfaces/feeCalculator";
import { InvalidConfigurationError } from "../errors";
import { RandomSource, seededRandom } from "../infra/random";

export type Capacities = Record<Category, number>;

export const DEFAULT_CAPACITIES: Readonly<Capacities> = {
  BIKE: 20,
  CAR: 30,
  EV: 10,
  HEAVY: 5,
  VIP: 5
};

// First fixedHours are covered by fixedRate, every further started hour adds perHourRate
export const PRICING: Readonly<Record<Category, PricingTier>> = {
  BIKE: { fixedHours: 2, fixedRate: 5, perHourRate: 2 },
  CAR: { fixedHours: 2, fixedRate: 10, perHourRate: 5 },
  EV: { fixedHours: 2, fixedRate: 12, perHourRate: 6 },
  HEAVY: { fixedHours: 1, fixedRate: 15, perHourRate: 8 },
  VIP: { fixedHours: 3, fixedRate: 15, perHourRate: 4 }
};

export interface LotConfig {
  capacities: Capacities;
  /** Null keeps slots in construction order. */
  random: RandomSource | null;
  debug: boolean;
}

function parseInteger(name: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidConfigurationError(`${name} must be a non-negative integer, got "${raw}".`, { name, value: raw });
  }
  return Number(trimmed);
}

/**
 * Reads lot settings from the environment.
 *
 * PARKING_CAPACITY_<CATEGORY> overrides a capacity, PARKING_SHUFFLE=off keeps
 * construction order and PARKING_SHUFFLE_SEED pins the shuffle. PARKING_DEBUG
 * turns on service logging.
 */
export function loadLotConfig(env: NodeJS.ProcessEnv = process.env): LotConfig {
  const capacities: Capacities = { ...DEFAULT_CAPACITIES };
  for (const category of CATEGORIES) {
    const name = `PARKING_CAPACITY_${category}`;
    const raw = env[name];
    if (raw !== undefined && raw !== '') capacities[category] = parseInteger(name, raw);
  }

  let random: RandomSource | null = Math.random;
  if (env.PARKING_SHUFFLE?.toLowerCase() === 'off') {
    random = null;
  } else if (env.PARKING_SHUFFLE_SEED !== undefined && env.PARKING_SHUFFLE_SEED !== '') {
    random = seededRandom(parseInteger('PARKING_SHUFFLE_SEED', env.PARKING_SHUFFLE_SEED));
  }

  const debug = env.PARKING_DEBUG === '1' || env.PARKING_DEBUG?.toLowerCase() === 'true';
  return { capacities, random, debug };
}
