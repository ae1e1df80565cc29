import { EngineConfig } from '../config/engine-config';
import {
     DemandScenario,
     InventoryUnit,
     SimulationDay,
     SimulationLeg,
     SimulationResult,
     UnitKind,
} from '../types/revenue.types';
import { UnitKindMismatchError } from '../utils/errors';
import { EngineContext } from './context';
import { inventoryDecayFactor } from './decay';
import { forecastUnit, unitCost } from './forecast';
import { priceUnit } from './pricing';

export interface SimulationOptions {
     /** Package discount amount; the sign is ignored. */
     discount: number;
     horizonDays: number;
}

/**
 * Turns a fractional daily pace into whole-unit sales. The fractional
 * remainder carries over to the next day.
 */
class PaceAccumulator {
     private carry = 0;

     constructor(private readonly dailyPace: number) {}

     take(stock: number): number {
          this.carry += Math.max(this.dailyPace, 0);
          const whole = Math.floor(this.carry + 1e-9);
          this.carry -= whole;
          return Math.max(Math.min(stock, whole), 0);
     }
}

function margin(leg: SimulationLeg): number {
     return leg.price - leg.cost;
}

/**
 * Package profit lost to diverting flight seats that would have sold on
 * their own: proportional to how far the flight is over-pacing, or a flat
 * base rate when the flight has no velocity signal.
 */
export function cannibalizationCost(flight: SimulationLeg, config: EngineConfig): number {
     const flightMargin = margin(flight);
     if (flight.velocity.kind === 'NO_SIGNAL') {
          return flightMargin * config.cannibalizationBaseRate;
     }
     return flightMargin * Math.max(0, flight.velocity.ratio - 1);
}

export function packagePace(
     hotel: SimulationLeg,
     flight: SimulationLeg,
     discount: number,
     config: EngineConfig
): number {
     const basePackagePace = Math.max(hotel.dailyPace, flight.dailyPace) * config.bundleVelocityBoost;
     return basePackagePace * (1 + discount / config.referenceDiscount);
}

/**
 * Profit of one leg sold on its own until departure, unsold stock written off at cost.
 */
export function standaloneProfit(leg: SimulationLeg, horizonDays: number): number {
     const pace = new PaceAccumulator(leg.dailyPace);
     let stock = leg.remaining;
     let profit = 0;

     for (let t = horizonDays; t > 0; t--) {
          const sold = pace.take(stock);
          stock -= sold;
          profit = Math.round(profit + sold * margin(leg));
     }
     return Math.round(profit - stock * leg.cost);
}

/**
 * Deterministic day-by-day comparison of selling both legs standalone (A)
 * against bundling them first and reverting to standalone once either leg is
 * empty (B). Days run from `horizonDays` down to departure at 0; the trace's
 * `dayIndex` counts elapsed days.
 */
export function runSalesSimulation(
     hotel: SimulationLeg,
     flight: SimulationLeg,
     options: SimulationOptions,
     config: EngineConfig
): SimulationResult {
     const horizonDays = Math.max(Math.floor(options.horizonDays), 0);
     const discount = Math.abs(options.discount);
     const curve = { steepness: config.decaySteepness, midpoint: config.decayMidpoint };

     const packageProfit = margin(hotel) + margin(flight) - discount - cannibalizationCost(flight, config);

     const hotelPaceA = new PaceAccumulator(hotel.dailyPace);
     const flightPaceA = new PaceAccumulator(flight.dailyPace);
     const hotelPaceB = new PaceAccumulator(hotel.dailyPace);
     const flightPaceB = new PaceAccumulator(flight.dailyPace);
     const packages = new PaceAccumulator(packagePace(hotel, flight, discount, config));

     let hotelStockA = hotel.remaining;
     let flightStockA = flight.remaining;
     let hotelStockB = hotel.remaining;
     let flightStockB = flight.remaining;
     let hotelProfitA = 0;
     let flightProfitA = 0;
     let profitB = 0;
     let packagesSold = 0;

     const trace: SimulationDay[] = [];

     for (let t = horizonDays; t >= 0; t--) {
          if (t > 0) {
               const hotelSold = hotelPaceA.take(hotelStockA);
               const flightSold = flightPaceA.take(flightStockA);
               hotelStockA -= hotelSold;
               flightStockA -= flightSold;
               hotelProfitA = Math.round(hotelProfitA + hotelSold * margin(hotel));
               flightProfitA = Math.round(flightProfitA + flightSold * margin(flight));

               if (hotelStockB > 0 && flightStockB > 0) {
                    const sets = packages.take(Math.min(hotelStockB, flightStockB));
                    hotelStockB -= sets;
                    flightStockB -= sets;
                    packagesSold += sets;
                    profitB = Math.round(profitB + sets * packageProfit);
               } else {
                    const hotelSoldB = hotelPaceB.take(hotelStockB);
                    const flightSoldB = flightPaceB.take(flightStockB);
                    hotelStockB -= hotelSoldB;
                    flightStockB -= flightSoldB;
                    profitB = Math.round(profitB + hotelSoldB * margin(hotel) + flightSoldB * margin(flight));
               }
          } else {
               // Departure: whatever is left is waste
               hotelProfitA = Math.round(hotelProfitA - hotelStockA * hotel.cost);
               flightProfitA = Math.round(flightProfitA - flightStockA * flight.cost);
               profitB = Math.round(profitB - hotelStockB * hotel.cost - flightStockB * flight.cost);
          }

          const decayFactor = inventoryDecayFactor(t, horizonDays, curve);
          trace.push({
               dayIndex: horizonDays - t,
               profitA: hotelProfitA + flightProfitA,
               profitB,
               hotelStockA,
               flightStockA,
               hotelStockB,
               flightStockB,
               hotelSoldA: hotel.remaining - hotelStockA,
               flightSoldA: flight.remaining - flightStockA,
               packagesSold,
               decayFactor,
               residualAssetValueB: Math.round(hotelStockB * hotel.cost * decayFactor),
          });
     }

     const profitA = hotelProfitA + flightProfitA;
     return {
          hotelUnitId: hotel.unitId,
          flightUnitId: flight.unitId,
          discount,
          horizonDays,
          profitA,
          profitB,
          gain: profitB - profitA,
          packagesSold,
          standaloneProfitHotel: hotelProfitA,
          standaloneProfitFlight: flightProfitA,
          trace,
     };
}

function requireKind(unit: InventoryUnit, expected: UnitKind): void {
     if (unit.kind !== expected) {
          throw new UnitKindMismatchError(unit.id, expected, unit.kind);
     }
}

/**
 * Simulation input for one unit: rule-based price, cost, the scenario's
 * forecast pace and the unit's velocity signal.
 */
export function simulationLeg(
     unit: InventoryUnit,
     scenario: DemandScenario,
     ctx: EngineContext
): SimulationLeg {
     const pricing = priceUnit(unit, ctx);
     const forecast = forecastUnit(unit, ctx, pricing.finalPrice)[scenario];

     return {
          unitId: unit.id,
          remaining: unit.remainingCapacity,
          price: pricing.finalPrice,
          cost: unitCost(unit, ctx.config),
          dailyPace: forecast.dailyPace,
          velocity: pricing.velocity,
     };
}

export function simulateBundle(
     hotel: InventoryUnit,
     flight: InventoryUnit,
     discount: number,
     horizonDays: number,
     scenario: DemandScenario,
     ctx: EngineContext
): SimulationResult {
     requireKind(hotel, 'HOTEL');
     requireKind(flight, 'FLIGHT');

     return runSalesSimulation(
          simulationLeg(hotel, scenario, ctx),
          simulationLeg(flight, scenario, ctx),
          { discount, horizonDays },
          ctx.config
     );
}
