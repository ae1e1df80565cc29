import dotenv from 'dotenv';
import { parseArgs } from 'node:util';
import { loadEngineConfigFromEnv, parseDemandScenario } from '@yield-engine/shared/src/config/engine-config';
import { closePool, withConnection } from '@yield-engine/shared/src/db/client';
import { PgInventoryRepository } from '@yield-engine/shared/src/services/inventory-repository';
import { StrategyReportService } from '@yield-engine/shared/src/services/strategy-report-service';
import { logger } from '@yield-engine/shared/src/utils/logger';

dotenv.config();

async function main() {
     const { values } = parseArgs({
          args: process.argv.slice(2),
          options: {
               scenario: { type: 'string' },
          },
     });

     const scenario = parseDemandScenario(values.scenario);
     const service = new StrategyReportService(loadEngineConfigFromEnv());

     const report = await withConnection((client) =>
          service.buildReport(new PgInventoryRepository(client), scenario, new Date())
     );

     logger.info({ forecastTotals: report.forecastTotals }, 'Scenario forecast totals');
     for (const recommendation of report.strategy.recommendations) {
          logger.info({ recommendation }, recommendation.justification);
     }
     logger.info(
          {
               totalStandaloneProfit: report.strategy.totalStandaloneProfit,
               totalOptimizedProfit: report.strategy.totalOptimizedProfit,
               uplift: report.strategy.uplift,
          },
          'Bundle optimisation'
     );
     logger.info({ packages: report.packages.slice(0, 10) }, 'Top package offers');
     logger.info({ revenueLift: report.revenueLift, rescueRate: report.rescueRate }, 'Sales metrics');

     await closePool();
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in strategy report');
     process.exit(1);
});
