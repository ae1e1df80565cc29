import { BookingEvent } from '../types/revenue.types';

/**
 * Read side of the booking event log, as seen by one computation pass.
 * Windows are inclusive at both ends.
 */
export interface EventLogReader {
     sumQuantities(unitId: number, from: Date, to: Date): number;
     eventsFor(unitId: number, from: Date, to: Date): BookingEvent[];
}

/**
 * Event window fetched once up front and held in memory for the pass.
 * Appends made after construction are never visible here.
 */
export class InMemoryEventLog implements EventLogReader {
     private readonly byUnit = new Map<number, BookingEvent[]>();

     constructor(events: readonly BookingEvent[]) {
          const sorted = [...events].sort((a, b) => a.bookedAt.getTime() - b.bookedAt.getTime());
          for (const event of sorted) {
               const bucket = this.byUnit.get(event.unitId);
               if (bucket) {
                    bucket.push(event);
               } else {
                    this.byUnit.set(event.unitId, [event]);
               }
          }
     }

     sumQuantities(unitId: number, from: Date, to: Date): number {
          return this.eventsFor(unitId, from, to).reduce((sum, e) => sum + e.quantity, 0);
     }

     eventsFor(unitId: number, from: Date, to: Date): BookingEvent[] {
          const start = from.getTime();
          const end = to.getTime();
          return (this.byUnit.get(unitId) ?? []).filter((e) => {
               const at = e.bookedAt.getTime();
               return at >= start && at <= end;
          });
     }
}
