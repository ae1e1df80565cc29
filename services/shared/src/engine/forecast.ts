import { EngineConfig } from '../config/engine-config';
import { EventLogReader } from '../events/event-log';
import {
     DemandScenario,
     ForecastResult,
     InventoryUnit,
     ScenarioForecast,
} from '../types/revenue.types';
import { daysBefore, leadDaysUntil } from '../utils/dates';
import { EngineContext } from './context';

export interface ForecastInput {
     unitId: number;
     leadDays: number | null;
     remaining: number;
     total: number;
     price: number;
     cost: number;
}

export type PaceSource = 'RECENT_SALES' | 'THEORETICAL';

export interface BaselinePace {
     pace: number;
     source: PaceSource;
}

const MIN_THEORETICAL_LEAD_DAYS = 30;

export function unitCost(unit: InventoryUnit, config: EngineConfig): number {
     return unit.unitCost ?? Math.round(unit.basePrice * config.defaultCostRatio);
}

/**
 * Average daily units sold over the forecast window, or the theoretical pace
 * when the window holds no sales.
 */
export function baselineDailyPace(
     events: EventLogReader,
     input: Pick<ForecastInput, 'unitId' | 'leadDays' | 'total'>,
     referenceTime: Date,
     config: EngineConfig
): BaselinePace {
     const windowDays = config.forecastWindowDays;
     const sold = events.sumQuantities(
          input.unitId,
          daysBefore(referenceTime, windowDays),
          referenceTime
     );

     if (sold > 0) {
          return { pace: sold / windowDays, source: 'RECENT_SALES' };
     }

     const horizon = Math.max(input.leadDays ?? 0, MIN_THEORETICAL_LEAD_DAYS);
     return {
          pace: (input.total * config.theoreticalSellRatio) / horizon,
          source: 'THEORETICAL',
     };
}

function forecastScenario(
     scenario: DemandScenario,
     baseline: number,
     input: ForecastInput,
     config: EngineConfig
): ForecastResult {
     const dailyPace = baseline * config.scenarioMultipliers[scenario];
     const sellingDays = Math.max(input.leadDays ?? 0, 0);
     const remaining = Math.max(input.remaining, 0);
     const predictedSold = Math.min(remaining, dailyPace * sellingDays);
     const predictedUnsold = remaining - predictedSold;

     // Unsold stock is written off at cost on departure
     const expectedNetProfit = Math.round(
          predictedSold * (input.price - input.cost) - predictedUnsold * input.cost
     );

     return { scenario, dailyPace, predictedSold, predictedUnsold, expectedNetProfit };
}

export function forecastDemand(
     events: EventLogReader,
     input: ForecastInput,
     referenceTime: Date,
     config: EngineConfig
): ScenarioForecast {
     const { pace } = baselineDailyPace(events, input, referenceTime, config);

     return {
          pessimistic: forecastScenario('pessimistic', pace, input, config),
          base: forecastScenario('base', pace, input, config),
          optimistic: forecastScenario('optimistic', pace, input, config),
     };
}

/**
 * Scenario forecast for one unit at the context's reference time.
 * `price` defaults to the unit's base price.
 */
export function forecastUnit(
     unit: InventoryUnit,
     ctx: EngineContext,
     price: number = unit.basePrice
): ScenarioForecast {
     return forecastDemand(
          ctx.events,
          {
               unitId: unit.id,
               leadDays: leadDaysUntil(unit.departureDate, ctx.referenceTime),
               remaining: unit.remainingCapacity,
               total: unit.totalCapacity,
               price,
               cost: unitCost(unit, ctx.config),
          },
          ctx.referenceTime,
          ctx.config
     );
}
