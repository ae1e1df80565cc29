import { z } from 'zod';
import { InvalidConfigError } from '../utils/errors';
import type { DemandScenario, PricingStrategy } from '../types/revenue.types';

const ratio = z.number().finite().min(0).max(1);
const positive = z.number().finite().positive();

export const EngineConfigSchema = z
     .object({
          // Velocity signal
          targetSellRatio: ratio,
          velocityWindowHours: positive,

          // Rule-based pricing
          brakeThreshold: positive,
          brakeStrengthPct: positive.max(1),
          maxDiscountPct: ratio,
          maxMarkupPct: z.number().finite().min(0),

          // Demand-elasticity pricing
          decaySteepness: positive,
          decayMidpoint: ratio,
          defaultHorizonDays: positive,

          // Forecast
          forecastWindowDays: positive,
          theoreticalSellRatio: ratio,
          defaultCostRatio: ratio,
          scenarioMultipliers: z.object({
               pessimistic: z.number().finite().min(0),
               base: z.number().finite().min(0),
               optimistic: z.number().finite().min(0),
          }),

          // Bundling
          urgencyHorizonDays: positive,
          bundleMaxDiscountShare: ratio,
          bundleDynamicCapShare: ratio,
          bundleVelocityBoost: positive,
          bundleDiscountRate: ratio,
          bundleGainThreshold: z.number().finite().min(0),
          referenceDiscount: positive,
          cannibalizationBaseRate: ratio,
     })
     .refine(
          (c) =>
               c.scenarioMultipliers.pessimistic <= c.scenarioMultipliers.base &&
               c.scenarioMultipliers.base <= c.scenarioMultipliers.optimistic,
          {
               message: 'scenario multipliers must satisfy pessimistic <= base <= optimistic',
               path: ['scenarioMultipliers'],
          }
     );

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export type EngineConfigOverrides = Partial<Omit<EngineConfig, 'scenarioMultipliers'>> & {
     scenarioMultipliers?: Partial<EngineConfig['scenarioMultipliers']>;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
     targetSellRatio: 0.9,
     velocityWindowHours: 24,

     brakeThreshold: 1.5,
     brakeStrengthPct: 0.05,
     maxDiscountPct: 0.3,
     maxMarkupPct: 0.5,

     decaySteepness: 20,
     decayMidpoint: 0.12,
     defaultHorizonDays: 90,

     forecastWindowDays: 14,
     theoreticalSellRatio: 0.7,
     defaultCostRatio: 0.7,
     scenarioMultipliers: Object.freeze({ pessimistic: 0.7, base: 1.0, optimistic: 1.3 }),

     urgencyHorizonDays: 30,
     bundleMaxDiscountShare: 0.25,
     bundleDynamicCapShare: 0.3,
     bundleVelocityBoost: 1.5,
     bundleDiscountRate: 0.08,
     bundleGainThreshold: 5000,
     referenceDiscount: 10000,
     cannibalizationBaseRate: 0.15,
});

/**
 * Merge per-call overrides onto a base configuration and validate the result.
 */
export function resolveEngineConfig(
     overrides: EngineConfigOverrides = {},
     base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
     const merged = {
          ...base,
          ...overrides,
          scenarioMultipliers: {
               ...base.scenarioMultipliers,
               ...overrides.scenarioMultipliers,
          },
     };

     const parsed = EngineConfigSchema.safeParse(merged);
     if (!parsed.success) {
          const issues = parsed.error.issues.map(
               (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`
          );
          throw new InvalidConfigError(`Invalid engine configuration: ${issues.join('; ')}`, issues);
     }
     return parsed.data;
}

const ENV_KEYS: Record<string, keyof Omit<EngineConfig, 'scenarioMultipliers'>> = {
     YIELD_TARGET_SELL_RATIO: 'targetSellRatio',
     YIELD_VELOCITY_WINDOW_HOURS: 'velocityWindowHours',
     YIELD_BRAKE_THRESHOLD: 'brakeThreshold',
     YIELD_BRAKE_STRENGTH_PCT: 'brakeStrengthPct',
     YIELD_MAX_DISCOUNT_PCT: 'maxDiscountPct',
     YIELD_MAX_MARKUP_PCT: 'maxMarkupPct',
     YIELD_DECAY_STEEPNESS: 'decaySteepness',
     YIELD_DECAY_MIDPOINT: 'decayMidpoint',
     YIELD_FORECAST_WINDOW_DAYS: 'forecastWindowDays',
     YIELD_DEFAULT_COST_RATIO: 'defaultCostRatio',
     YIELD_BUNDLE_VELOCITY_BOOST: 'bundleVelocityBoost',
     YIELD_BUNDLE_DISCOUNT_RATE: 'bundleDiscountRate',
     YIELD_BUNDLE_GAIN_THRESHOLD: 'bundleGainThreshold',
     YIELD_CANNIBALIZATION_BASE_RATE: 'cannibalizationBaseRate',
};

/**
 * Read `YIELD_*` overrides from the environment. Unset or blank variables keep
 * their defaults; values that do not parse as numbers are rejected.
 */
export function loadEngineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
     const overrides: EngineConfigOverrides = {};

     for (const [variable, key] of Object.entries(ENV_KEYS)) {
          const raw = env[variable];
          if (raw === undefined || raw.trim() === '') continue;

          const value = Number(raw);
          if (!Number.isFinite(value)) {
               throw new InvalidConfigError(`${variable} must be a number, got "${raw}"`, [variable]);
          }
          overrides[key] = value;
     }

     return resolveEngineConfig(overrides);
}

export const PricingStrategySchema = z.enum(['RULE_BASED', 'DEMAND_ELASTICITY']);
export const DemandScenarioSchema = z.enum(['pessimistic', 'base', 'optimistic']);

function invalidChoice(name: string, options: readonly string[], raw: string): InvalidConfigError {
     return new InvalidConfigError(`${name} must be one of ${options.join(', ')}, got "${raw}"`, [name]);
}

export function parsePricingStrategy(raw: string | undefined): PricingStrategy {
     const parsed = PricingStrategySchema.safeParse(raw ?? 'RULE_BASED');
     if (!parsed.success) {
          throw invalidChoice('pricing strategy', PricingStrategySchema.options, String(raw));
     }
     return parsed.data;
}

export function parseDemandScenario(raw: string | undefined): DemandScenario {
     const parsed = DemandScenarioSchema.safeParse(raw ?? 'base');
     if (!parsed.success) {
          throw invalidChoice('scenario', DemandScenarioSchema.options, String(raw));
     }
     return parsed.data;
}
