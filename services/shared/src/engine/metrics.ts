import { BookingEvent, DailyRevenue, InventoryUnit, RescueRate, RevenueLift } from '../types/revenue.types';
import { isoDate } from '../utils/dates';
import { roundTo } from '../utils/numbers';

function share(part: number, whole: number): number {
     return whole > 0 ? roundTo((part / whole) * 100, 1) : 0;
}

/**
 * Revenue actually earned at dynamic prices against the same sales at the
 * list price in force when each sale was made.
 */
export function computeRevenueLift(events: readonly BookingEvent[]): RevenueLift {
     const byDay = new Map<string, DailyRevenue>();
     let totalDynamic = 0;
     let totalFixed = 0;
     let totalUnits = 0;

     for (const event of events) {
          const dynamicRevenue = event.quantity * event.soldPrice;
          const fixedRevenue = event.quantity * event.basePriceAtSale;
          totalDynamic += dynamicRevenue;
          totalFixed += fixedRevenue;
          totalUnits += event.quantity;

          const day = isoDate(event.bookedAt);
          const entry = byDay.get(day) ?? { day, dynamicRevenue: 0, fixedRevenue: 0 };
          entry.dynamicRevenue += dynamicRevenue;
          entry.fixedRevenue += fixedRevenue;
          byDay.set(day, entry);
     }

     const lift = totalDynamic - totalFixed;
     return {
          totalDynamic,
          totalFixed,
          lift,
          liftPct: share(lift, totalFixed),
          totalUnits,
          daily: [...byDay.values()].sort((a, b) => a.day.localeCompare(b.day)),
     };
}

/**
 * Share of units sold inside packages, overall and for hotel stock.
 * Events for units missing from `units` count towards the overall rate only.
 */
export function computeRescueRate(
     events: readonly BookingEvent[],
     units: readonly InventoryUnit[]
): RescueRate {
     const hotelIds = new Set(units.filter((u) => u.kind === 'HOTEL').map((u) => u.id));
     let totalUnits = 0;
     let rescuedUnits = 0;
     let hotelUnits = 0;
     let hotelRescued = 0;

     for (const event of events) {
          totalUnits += event.quantity;
          if (event.isBundle) rescuedUnits += event.quantity;

          if (hotelIds.has(event.unitId)) {
               hotelUnits += event.quantity;
               if (event.isBundle) hotelRescued += event.quantity;
          }
     }

     return {
          overallRescueRate: share(rescuedUnits, totalUnits),
          rescuedUnits,
          hotelRescueRate: share(hotelRescued, hotelUnits),
          totalUnits,
     };
}
