import dotenv from 'dotenv';
import { loadEngineConfigFromEnv, parsePricingStrategy } from '@yield-engine/shared/src/config/engine-config';
import { closePool, withTransaction } from '@yield-engine/shared/src/db/client';
import { PgInventoryRepository } from '@yield-engine/shared/src/services/inventory-repository';
import { PriceSnapshotService } from '@yield-engine/shared/src/services/price-snapshot-service';
import { logger } from '@yield-engine/shared/src/utils/logger';

dotenv.config();

async function main() {
     const config = loadEngineConfigFromEnv();
     const strategy = parsePricingStrategy(process.env.PRICING_STRATEGY);
     const service = new PriceSnapshotService(config, strategy);
     const referenceTime = new Date();

     logger.info({ strategy, referenceTime }, 'Starting price snapshot recorder');

     const results = await withTransaction((client) =>
          service.recordSnapshot(new PgInventoryRepository(client), referenceTime)
     );

     for (const result of results) {
          logger.info(
               {
                    unitId: result.unitId,
                    finalPrice: result.finalPrice,
                    isBrakeActive: result.isBrakeActive,
               },
               result.justification
          );
     }

     await closePool();
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in price snapshot recorder');
     process.exit(1);
});
