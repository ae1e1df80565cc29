import {
     DEFAULT_ENGINE_CONFIG,
     loadEngineConfigFromEnv,
     parseDemandScenario,
     parsePricingStrategy,
     resolveEngineConfig,
} from '@yield-engine/shared/src/config/engine-config';
import { InvalidConfigError } from '@yield-engine/shared/src/utils/errors';

describe('Engine Configuration', () => {
     describe('resolveEngineConfig', () => {
          it('should return the defaults without overrides', () => {
               expect(resolveEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
               expect(DEFAULT_ENGINE_CONFIG.brakeThreshold).toBe(1.5);
               expect(DEFAULT_ENGINE_CONFIG.scenarioMultipliers).toEqual({
                    pessimistic: 0.7,
                    base: 1,
                    optimistic: 1.3,
               });
          });

          it('should merge overrides onto the defaults', () => {
               const config = resolveEngineConfig({
                    brakeThreshold: 2,
                    scenarioMultipliers: { optimistic: 1.5 },
               });

               expect(config.brakeThreshold).toBe(2);
               expect(config.maxDiscountPct).toBe(0.3);
               expect(config.scenarioMultipliers).toEqual({ pessimistic: 0.7, base: 1, optimistic: 1.5 });
          });

          it('should not modify the base configuration', () => {
               resolveEngineConfig({ maxMarkupPct: 0.8 });
               expect(DEFAULT_ENGINE_CONFIG.maxMarkupPct).toBe(0.5);
          });

          it('should reject out-of-range values', () => {
               expect(() => resolveEngineConfig({ maxDiscountPct: 1.2 })).toThrow(InvalidConfigError);
          });

          it('should require a positive brake strength', () => {
               expect(() => resolveEngineConfig({ brakeStrengthPct: 0 })).toThrow(InvalidConfigError);
               expect(resolveEngineConfig({ brakeStrengthPct: 0.01 }).brakeStrengthPct).toBe(0.01);
          });

          it('should list every issue', () => {
               try {
                    resolveEngineConfig({ targetSellRatio: -1, velocityWindowHours: 0 });
                    throw new Error('expected resolveEngineConfig to throw');
               } catch (error) {
                    expect(error).toBeInstanceOf(InvalidConfigError);
                    if (error instanceof InvalidConfigError) {
                         expect(error.code).toBe('INVALID_CONFIG');
                         expect(error.issues).toHaveLength(2);
                         expect(error.issues[0].startsWith('targetSellRatio: ')).toBe(true);
                         expect(error.issues[1].startsWith('velocityWindowHours: ')).toBe(true);
                    }
               }
          });

          it('should reject unordered scenario multipliers', () => {
               expect(() => resolveEngineConfig({ scenarioMultipliers: { pessimistic: 1.2 } })).toThrow(
                    'scenario multipliers must satisfy pessimistic <= base <= optimistic'
               );
          });
     });

     describe('loadEngineConfigFromEnv', () => {
          it('should read numeric overrides', () => {
               const config = loadEngineConfigFromEnv({
                    YIELD_BRAKE_THRESHOLD: '1.8',
                    YIELD_BUNDLE_GAIN_THRESHOLD: '12000',
               });

               expect(config.brakeThreshold).toBe(1.8);
               expect(config.bundleGainThreshold).toBe(12000);
          });

          it('should skip blank variables', () => {
               expect(loadEngineConfigFromEnv({ YIELD_BRAKE_THRESHOLD: '  ' })).toEqual(
                    DEFAULT_ENGINE_CONFIG
               );
          });

          it('should reject values that are not numbers', () => {
               expect(() => loadEngineConfigFromEnv({ YIELD_MAX_MARKUP_PCT: 'high' })).toThrow(
                    'YIELD_MAX_MARKUP_PCT must be a number, got "high"'
               );
          });
     });

     describe('choice parsing', () => {
          it('should default the pricing strategy and scenario', () => {
               expect(parsePricingStrategy(undefined)).toBe('RULE_BASED');
               expect(parseDemandScenario(undefined)).toBe('base');
          });

          it('should accept known values', () => {
               expect(parsePricingStrategy('DEMAND_ELASTICITY')).toBe('DEMAND_ELASTICITY');
               expect(parseDemandScenario('pessimistic')).toBe('pessimistic');
          });

          it('should reject unknown values', () => {
               expect(() => parseDemandScenario('booming')).toThrow(
                    'scenario must be one of pessimistic, base, optimistic, got "booming"'
               );
               expect(() => parsePricingStrategy('auction')).toThrow(InvalidConfigError);
          });
     });
});
