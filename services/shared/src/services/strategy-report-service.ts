import { EngineConfig } from '../config/engine-config';
import { rankPackages } from '../engine/bundle-scoring';
import { createEngineContext } from '../engine/context';
import { forecastUnit } from '../engine/forecast';
import { computeRescueRate, computeRevenueLift } from '../engine/metrics';
import { recommendStrategy } from '../engine/optimizer';
import { InMemoryEventLog } from '../events/event-log';
import {
     DemandScenario,
     PackageOffer,
     RescueRate,
     RevenueLift,
     StrategyReport,
} from '../types/revenue.types';
import { logger } from '../utils/logger';
import { InventoryRepository } from './inventory-repository';

export type ForecastTotals = Record<DemandScenario, number>;

export interface PortfolioReport {
     referenceTime: Date;
     forecastTotals: ForecastTotals;
     strategy: StrategyReport;
     packages: PackageOffer[];
     revenueLift: RevenueLift;
     rescueRate: RescueRate;
}

const EPOCH = new Date(0);

export class StrategyReportService {
     constructor(private readonly config: EngineConfig) {}

     async buildReport(
          repository: InventoryRepository,
          scenario: DemandScenario,
          referenceTime: Date
     ): Promise<PortfolioReport> {
          const units = await repository.fetchSnapshot();
          const events = await repository.queryEventWindow(EPOCH, referenceTime);
          const ctx = createEngineContext({
               events: new InMemoryEventLog(events),
               referenceTime,
               config: this.config,
          });

          const forecastTotals: ForecastTotals = { pessimistic: 0, base: 0, optimistic: 0 };
          for (const unit of units) {
               const forecast = forecastUnit(unit, ctx);
               forecastTotals.pessimistic += forecast.pessimistic.expectedNetProfit;
               forecastTotals.base += forecast.base.expectedNetProfit;
               forecastTotals.optimistic += forecast.optimistic.expectedNetProfit;
          }

          const strategy = recommendStrategy(units, scenario, ctx);

          logger.info(
               {
                    scenario,
                    unitCount: units.length,
                    recommendations: strategy.recommendations.length,
                    uplift: strategy.uplift,
               },
               'Strategy report built'
          );

          return {
               referenceTime,
               forecastTotals,
               strategy,
               packages: rankPackages(units, ctx),
               revenueLift: computeRevenueLift(events),
               rescueRate: computeRescueRate(events, units),
          };
     }
}
