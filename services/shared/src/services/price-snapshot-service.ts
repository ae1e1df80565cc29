import { EngineConfig } from '../config/engine-config';
import { createEngineContext } from '../engine/context';
import { priceUnit } from '../engine/pricing';
import { InMemoryEventLog } from '../events/event-log';
import { PricingResult, PricingStrategy } from '../types/revenue.types';
import { hoursBefore } from '../utils/dates';
import { logger } from '../utils/logger';
import { InventoryRepository } from './inventory-repository';

export class PriceSnapshotService {
     constructor(
          private readonly config: EngineConfig,
          private readonly strategy: PricingStrategy = 'RULE_BASED'
     ) {}

     /**
      * Price every unit in the snapshot, then append one price_history row per
      * unit. Nothing is written until every price has been computed.
      */
     async recordSnapshot(
          repository: InventoryRepository,
          referenceTime: Date
     ): Promise<PricingResult[]> {
          const units = await repository.fetchSnapshot();
          const lookbackHours = Math.max(
               this.config.velocityWindowHours,
               this.config.forecastWindowDays * 24
          );
          const events = await repository.queryEventWindow(
               hoursBefore(referenceTime, lookbackHours),
               referenceTime
          );

          logger.info(
               { unitCount: units.length, eventCount: events.length, strategy: this.strategy },
               'Pricing inventory snapshot'
          );

          const ctx = createEngineContext({
               events: new InMemoryEventLog(events),
               referenceTime,
               config: this.config,
          });
          const results = units.map((unit) => priceUnit(unit, ctx, this.strategy));

          for (const [index, result] of results.entries()) {
               await repository.appendPriceSnapshot({
                    unitId: result.unitId,
                    recordedAt: referenceTime,
                    remainingCapacity: units[index].remainingCapacity,
                    finalPrice: result.finalPrice,
                    leadDays: result.leadDays,
                    strategy: result.strategy,
                    isBrakeActive: result.isBrakeActive,
               });
          }

          logger.info(
               {
                    recorded: results.length,
                    brakeActive: results.filter((r) => r.isBrakeActive).length,
               },
               'Price snapshot recorded'
          );

          return results;
     }
}
