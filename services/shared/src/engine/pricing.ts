import { EngineConfig } from '../config/engine-config';
import {
     InventoryUnit,
     PriceAdjustment,
     PricingResult,
     PricingStrategy,
     VelocitySignal,
     WaterfallStep,
} from '../types/revenue.types';
import { daysBetween, leadDaysUntil } from '../utils/dates';
import { assertNever } from '../utils/assert';
import { clamp, formatYen, percent, roundTo, roundToCurrency } from '../utils/numbers';
import { EngineContext } from './context';
import { inventoryDecayFactor } from './decay';
import { baselineDailyPace } from './forecast';
import { velocityRatio } from './velocity';

const MIN_PACE_RATIO = 0.2;
const MAX_PACE_RATIO = 5.0;

function pctOf(basePrice: number, pct: number): number {
     // Symmetric rounding so that discounts mirror markups
     return Math.sign(pct) * Math.round(basePrice * Math.abs(pct));
}

export function inventoryRatio(remaining: number, total: number): number {
     return total > 0 ? remaining / total : 0;
}

// Rule-based factors

export function scarcityAdjustment(basePrice: number, ratio: number): PriceAdjustment {
     const left = `${percent(ratio)}% of stock left`;
     const base = { factor: 'SCARCITY' as const, label: 'Scarcity', applicable: true };

     if (ratio < 0.2) {
          const amount = pctOf(basePrice, 0.3);
          return { ...base, amount, reason: `${left}: scarcity premium (${formatYen(amount)})` };
     }
     if (ratio < 0.5) {
          const amount = pctOf(basePrice, 0.1);
          return {
               ...base,
               amount,
               reason: `${left}: demand pressure markup (${formatYen(amount)})`,
          };
     }
     if (ratio < 0.7) {
          return { ...base, amount: 0, reason: `${left}: standard price (no adjustment)` };
     }
     const amount = pctOf(basePrice, -0.15);
     return { ...base, amount, reason: `${left}: surplus discount (${formatYen(amount)})` };
}

export function leadTimeAdjustment(basePrice: number, leadDays: number | null): PriceAdjustment {
     const base = { factor: 'LEAD_TIME' as const, label: 'Lead time' };

     if (leadDays === null) {
          return {
               ...base,
               amount: 0,
               applicable: false,
               reason: 'no departure date set: lead-time adjustment not applicable',
          };
     }
     if (leadDays < 0) {
          return {
               ...base,
               amount: 0,
               applicable: true,
               reason: 'already departed (outside pricing scope)',
          };
     }

     const until = `${leadDays} days to departure`;
     if (leadDays <= 7) {
          const amount = pctOf(basePrice, -0.15);
          return {
               ...base,
               amount,
               applicable: true,
               reason: `${until}: last-minute discount (${formatYen(amount)})`,
          };
     }
     if (leadDays <= 30) {
          const amount = pctOf(basePrice, 0.1);
          return {
               ...base,
               amount,
               applicable: true,
               reason: `${until}: peak-decision markup (${formatYen(amount)})`,
          };
     }
     if (leadDays <= 90) {
          return {
               ...base,
               amount: 0,
               applicable: true,
               reason: `${until}: standard price (no adjustment)`,
          };
     }
     const amount = pctOf(basePrice, -0.1);
     return {
          ...base,
          amount,
          applicable: true,
          reason: `${until}: early-bird discount (${formatYen(amount)})`,
     };
}

export function isBrakeEngaged(signal: VelocitySignal, config: EngineConfig): boolean {
     return signal.kind === 'RATIO' && signal.ratio >= config.brakeThreshold;
}

export function velocityBrakeAdjustment(
     basePrice: number,
     signal: VelocitySignal,
     config: EngineConfig
): PriceAdjustment {
     const base = { factor: 'VELOCITY_BRAKE' as const, label: 'Velocity brake' };

     if (signal.kind === 'NO_SIGNAL') {
          return {
               ...base,
               amount: 0,
               applicable: false,
               reason: `insufficient data (${signal.reason}): no velocity adjustment`,
          };
     }

     const pace = `sales pace ${signal.ratio.toFixed(1)}x expected`;
     if (isBrakeEngaged(signal, config)) {
          // At least one currency unit once engaged, even on very low base prices
          const amount = Math.max(pctOf(basePrice, config.brakeStrengthPct), 1);
          return {
               ...base,
               amount,
               applicable: true,
               reason: `${pace}: velocity brake engaged (${formatYen(amount)})`,
          };
     }
     return { ...base, amount: 0, applicable: true, reason: `${pace}: within normal range` };
}

// Demand-elasticity factors

/**
 * Recent sales pace when the forecast window holds sales, then the average
 * sell-through since procurement, then the theoretical pace.
 */
function currentDailyPace(unit: InventoryUnit, leadDays: number, ctx: EngineContext): number {
     const baseline = baselineDailyPace(
          ctx.events,
          { unitId: unit.id, leadDays, total: unit.totalCapacity },
          ctx.referenceTime,
          ctx.config
     );
     if (baseline.source === 'RECENT_SALES') return baseline.pace;

     const sold = Math.max(unit.totalCapacity - unit.remainingCapacity, 0);
     if (unit.procurementDate && sold > 0) {
          const ageDays = Math.max(daysBetween(unit.procurementDate, ctx.referenceTime), 1);
          return sold / ageDays;
     }
     return baseline.pace;
}

export function elasticityAdjustment(
     unit: InventoryUnit,
     leadDays: number | null,
     ctx: EngineContext
): PriceAdjustment {
     const base = { factor: 'DEMAND_ELASTICITY' as const, label: 'Demand elasticity' };

     if (leadDays === null) {
          return {
               ...base,
               amount: 0,
               applicable: false,
               reason: 'no departure date set: demand elasticity not applicable',
          };
     }
     if (unit.elasticity === 0) {
          return { ...base, amount: 0, applicable: false, reason: 'elasticity coefficient not set' };
     }

     const currentPace = currentDailyPace(unit, leadDays, ctx);
     if (currentPace <= 0) {
          return { ...base, amount: 0, applicable: false, reason: 'no sales pace available' };
     }

     const targetPace = unit.remainingCapacity / Math.max(leadDays, 1);
     const paceRatio = clamp(targetPace / currentPace, MIN_PACE_RATIO, MAX_PACE_RATIO);
     const multiplier = paceRatio ** (1 / unit.elasticity);
     const amount = Math.round(unit.basePrice * multiplier - unit.basePrice);

     return {
          ...base,
          amount,
          applicable: true,
          reason:
               `target pace ${targetPace.toFixed(2)}/day vs current ${currentPace.toFixed(2)}/day: ` +
               `x${multiplier.toFixed(3)} (${formatYen(amount)})`,
     };
}

export function decayAdjustment(
     unit: InventoryUnit,
     leadDays: number | null,
     priceBeforeDecay: number,
     config: EngineConfig
): { adjustment: PriceAdjustment; decayFactor: number | null } {
     const base = { factor: 'INVENTORY_DECAY' as const, label: 'Inventory decay' };

     if (leadDays === null || !unit.departureDate) {
          return {
               adjustment: {
                    ...base,
                    amount: 0,
                    applicable: false,
                    reason: 'no departure date set: inventory decay not applicable',
               },
               decayFactor: null,
          };
     }

     const horizonDays = unit.procurementDate
          ? daysBetween(unit.procurementDate, unit.departureDate)
          : config.defaultHorizonDays;
     const decayFactor = inventoryDecayFactor(leadDays, horizonDays, {
          steepness: config.decaySteepness,
          midpoint: config.decayMidpoint,
     });
     const amount = Math.round(priceBeforeDecay * decayFactor - priceBeforeDecay);

     return {
          adjustment: {
               ...base,
               amount,
               applicable: true,
               reason:
                    `residual value ${(decayFactor * 100).toFixed(1)}% ` +
                    `with ${leadDays} of ${horizonDays} days left (${formatYen(amount)})`,
          },
          decayFactor,
     };
}

// Assembly

export function priceBounds(
     basePrice: number,
     config: EngineConfig
): { floor: number; ceiling: number } {
     return {
          floor: roundTo(basePrice * (1 - config.maxDiscountPct), 2),
          ceiling: roundTo(basePrice * (1 + config.maxMarkupPct), 2),
     };
}

function buildWaterfall(
     basePrice: number,
     adjustments: PriceAdjustment[],
     theoreticalPrice: number,
     finalPrice: number
): WaterfallStep[] {
     const steps: WaterfallStep[] = [{ label: 'Base price', value: basePrice, measure: 'absolute' }];
     for (const adjustment of adjustments) {
          steps.push({ label: adjustment.label, value: adjustment.amount, measure: 'relative' });
     }
     if (finalPrice !== theoreticalPrice) {
          steps.push({
               label: 'Rounding & guardrails',
               value: roundTo(finalPrice - theoreticalPrice, 2),
               measure: 'relative',
          });
     }
     steps.push({ label: 'Final price', value: finalPrice, measure: 'total' });
     return steps;
}

function assemble(
     unit: InventoryUnit,
     strategy: PricingStrategy,
     adjustments: PriceAdjustment[],
     extras: {
          leadDays: number | null;
          velocity: VelocitySignal;
          isBrakeActive: boolean;
          decayFactor: number | null;
     },
     config: EngineConfig
): PricingResult {
     const theoreticalPrice = unit.basePrice + adjustments.reduce((sum, a) => sum + a.amount, 0);
     const { floor, ceiling } = priceBounds(unit.basePrice, config);
     const finalPrice = clamp(roundToCurrency(theoreticalPrice), floor, ceiling);

     const reasons = adjustments.map((a) => a.reason);
     if (finalPrice === floor && roundToCurrency(theoreticalPrice) < floor) {
          reasons.push(`held at the discount floor (¥${floor.toLocaleString('en-US')})`);
     } else if (finalPrice === ceiling && roundToCurrency(theoreticalPrice) > ceiling) {
          reasons.push(`held at the markup ceiling (¥${ceiling.toLocaleString('en-US')})`);
     }

     return {
          unitId: unit.id,
          name: unit.name,
          strategy,
          basePrice: unit.basePrice,
          adjustments,
          theoreticalPrice,
          finalPrice,
          inventoryRatio: roundTo(inventoryRatio(unit.remainingCapacity, unit.totalCapacity), 3),
          leadDays: extras.leadDays,
          velocity: extras.velocity,
          isBrakeActive: extras.isBrakeActive,
          decayFactor: extras.decayFactor,
          justification: `${reasons.join('. ')}.`,
          waterfall: buildWaterfall(unit.basePrice, adjustments, theoreticalPrice, finalPrice),
     };
}

function signalFor(unit: InventoryUnit, leadDays: number | null, ctx: EngineContext): VelocitySignal {
     return velocityRatio(
          ctx.events,
          {
               unitId: unit.id,
               totalStock: unit.totalCapacity,
               leadDays,
               referenceTime: ctx.referenceTime,
          },
          ctx.config
     );
}

export function priceRuleBased(unit: InventoryUnit, ctx: EngineContext): PricingResult {
     const leadDays = leadDaysUntil(unit.departureDate, ctx.referenceTime);
     const velocity = signalFor(unit, leadDays, ctx);
     const brake = velocityBrakeAdjustment(unit.basePrice, velocity, ctx.config);

     const adjustments = [
          scarcityAdjustment(unit.basePrice, inventoryRatio(unit.remainingCapacity, unit.totalCapacity)),
          leadTimeAdjustment(unit.basePrice, leadDays),
          brake,
     ];

     return assemble(
          unit,
          'RULE_BASED',
          adjustments,
          {
               leadDays,
               velocity,
               isBrakeActive: isBrakeEngaged(velocity, ctx.config),
               decayFactor: null,
          },
          ctx.config
     );
}

export function priceDemandElasticity(unit: InventoryUnit, ctx: EngineContext): PricingResult {
     const leadDays = leadDaysUntil(unit.departureDate, ctx.referenceTime);
     const velocity = signalFor(unit, leadDays, ctx);

     const elasticity = elasticityAdjustment(unit, leadDays, ctx);
     const { adjustment: decay, decayFactor } = decayAdjustment(
          unit,
          leadDays,
          unit.basePrice + elasticity.amount,
          ctx.config
     );

     return assemble(
          unit,
          'DEMAND_ELASTICITY',
          [elasticity, decay],
          { leadDays, velocity, isBrakeActive: false, decayFactor },
          ctx.config
     );
}

/**
 * Explainable price for one unit. Pure: reads only the unit, the context's
 * event window, configuration and reference time.
 */
export function priceUnit(
     unit: InventoryUnit,
     ctx: EngineContext,
     strategy: PricingStrategy = 'RULE_BASED'
): PricingResult {
     switch (strategy) {
          case 'RULE_BASED':
               return priceRuleBased(unit, ctx);
          case 'DEMAND_ELASTICITY':
               return priceDemandElasticity(unit, ctx);
          default:
               return assertNever(strategy);
     }
}
