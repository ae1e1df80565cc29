import { EngineConfig } from '../config/engine-config';
import { EventLogReader } from '../events/event-log';
import { VelocitySignal } from '../types/revenue.types';
import { hoursBefore } from '../utils/dates';
import { roundTo } from '../utils/numbers';

export interface VelocityInput {
     unitId: number;
     totalStock: number;
     leadDays: number | null;
     referenceTime: Date;
     windowHours?: number;
}

export function noSignal(reason: string): VelocitySignal {
     return { kind: 'NO_SIGNAL', reason };
}

/**
 * Ratio of the recent daily sales pace to the pace needed to sell
 * `targetSellRatio` of total stock by departure.
 *
 * An empty window is reported as NO_SIGNAL, never as a ratio of 0.
 */
export function velocityRatio(
     events: EventLogReader,
     input: VelocityInput,
     config: EngineConfig
): VelocitySignal {
     const windowHours = input.windowHours ?? config.velocityWindowHours;
     const from = hoursBefore(input.referenceTime, windowHours);
     const sold = events.sumQuantities(input.unitId, from, input.referenceTime);

     if (sold <= 0) {
          return noSignal(`no bookings in the last ${windowHours}h`);
     }

     const actualDaily = sold * (24 / windowHours);

     if (input.leadDays === null || input.leadDays <= 0) {
          return noSignal('no remaining selling days');
     }

     const expectedDaily = (input.totalStock * config.targetSellRatio) / input.leadDays;
     if (expectedDaily <= 0) {
          return noSignal('no expected pace');
     }

     return { kind: 'RATIO', ratio: roundTo(actualDaily / expectedDaily, 3) };
}
