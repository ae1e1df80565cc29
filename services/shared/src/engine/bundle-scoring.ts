import { EngineConfig } from '../config/engine-config';
import { InventoryUnit, PackageOffer, PricingResult } from '../types/revenue.types';
import { assertNever } from '../utils/assert';
import { leadDaysUntil } from '../utils/dates';
import { clamp01, floorToCurrency, formatYen, percent, roundTo, roundToCurrency } from '../utils/numbers';
import { EngineContext } from './context';
import { priceUnit } from './pricing';

const TIME_URGENCY_WEIGHT = 0.6;
const SURPLUS_WEIGHT = 0.4;
const URGENCY_WEIGHT = 0.7;
const FLIGHT_DEMAND_WEIGHT = 0.3;

/**
 * How strongly a unit's remaining stock and shrinking window argue for
 * promotion, in [0, 1]. An unknown or past departure contributes no time urgency.
 */
export function urgencyScore(
     remaining: number,
     total: number,
     leadDays: number | null,
     horizonDays = 30
): number {
     const timeUrgency =
          leadDays === null || leadDays < 0 ? 0 : Math.max(0, 1 - leadDays / horizonDays);
     const surplusRatio = total > 0 ? remaining / total : 0;

     return roundTo(clamp01(TIME_URGENCY_WEIGHT * timeUrgency + SURPLUS_WEIGHT * surplusRatio), 4);
}

/**
 * Package discount applied to the hotel leg, as a non-positive delta.
 * Bounded by a share of the list price and a share of the current dynamic price.
 */
export function bundleDiscount(
     hotelBasePrice: number,
     hotelDynamicPrice: number,
     urgency: number,
     config: Pick<EngineConfig, 'bundleMaxDiscountShare' | 'bundleDynamicCapShare'>
): number {
     const byUrgency = roundToCurrency(hotelBasePrice * config.bundleMaxDiscountShare * urgency);
     const listCap = floorToCurrency(hotelBasePrice * config.bundleMaxDiscountShare);
     const dynamicCap = floorToCurrency(Math.max(hotelDynamicPrice, 0) * config.bundleDynamicCapShare);

     const size = Math.max(Math.min(byUrgency, listCap, dynamicCap), 0);
     return size === 0 ? 0 : -size;
}

export function strategyScore(urgency: number, flightRemaining: number, flightTotal: number): number {
     const flightDemand = flightTotal > 0 ? 1 - flightRemaining / flightTotal : 0;
     return roundTo(clamp01(URGENCY_WEIGHT * urgency + FLIGHT_DEMAND_WEIGHT * flightDemand), 4);
}

export interface UnitsByKind {
     hotels: InventoryUnit[];
     flights: InventoryUnit[];
}

export function partitionByKind(units: readonly InventoryUnit[]): UnitsByKind {
     const partition: UnitsByKind = { hotels: [], flights: [] };
     for (const unit of units) {
          switch (unit.kind) {
               case 'HOTEL':
                    partition.hotels.push(unit);
                    break;
               case 'FLIGHT':
                    partition.flights.push(unit);
                    break;
               default:
                    assertNever(unit.kind);
          }
     }
     return partition;
}

function offerJustification(
     hotel: InventoryUnit,
     flight: InventoryUnit,
     leadDays: number | null,
     urgency: number,
     discount: number
): string {
     const window = leadDays === null ? 'no departure date' : `${leadDays} days to departure`;
     const hotelLeft = percent(hotel.totalCapacity > 0 ? hotel.remainingCapacity / hotel.totalCapacity : 0);
     const flightSold = percent(
          flight.totalCapacity > 0 ? 1 - flight.remainingCapacity / flight.totalCapacity : 0
     );

     return (
          `${hotel.name}: ${hotelLeft}% of rooms left, ${window} (urgency ${urgency.toFixed(2)}). ` +
          `${flight.name}: ${flightSold}% of seats sold. Package discount ${formatYen(discount)}.`
     );
}

/**
 * Every flight × hotel combination as a priced package offer, ranked by
 * strategy score (ties by hotel id, then flight id).
 */
export function rankPackages(units: readonly InventoryUnit[], ctx: EngineContext): PackageOffer[] {
     const { hotels, flights } = partitionByKind(units);
     const pricing = new Map<number, PricingResult>();
     const priceOf = (unit: InventoryUnit): PricingResult => {
          let result = pricing.get(unit.id);
          if (!result) {
               result = priceUnit(unit, ctx);
               pricing.set(unit.id, result);
          }
          return result;
     };

     const offers: Omit<PackageOffer, 'rank'>[] = [];

     for (const flight of flights) {
          const flightPrice = priceOf(flight).finalPrice;

          for (const hotel of hotels) {
               const hotelPrice = priceOf(hotel).finalPrice;
               const leadDays = leadDaysUntil(hotel.departureDate, ctx.referenceTime);
               const urgency = urgencyScore(
                    hotel.remainingCapacity,
                    hotel.totalCapacity,
                    leadDays,
                    ctx.config.urgencyHorizonDays
               );
               const discount = bundleDiscount(hotel.basePrice, hotelPrice, urgency, ctx.config);

               offers.push({
                    hotelUnitId: hotel.id,
                    hotelName: hotel.name,
                    flightUnitId: flight.id,
                    flightName: flight.name,
                    hotelPrice,
                    flightPrice,
                    bundleDiscount: discount,
                    packagePrice: flightPrice + hotelPrice + discount,
                    urgencyScore: urgency,
                    strategyScore: strategyScore(urgency, flight.remainingCapacity, flight.totalCapacity),
                    justification: offerJustification(hotel, flight, leadDays, urgency, discount),
               });
          }
     }

     return offers
          .sort(
               (a, b) =>
                    b.strategyScore - a.strategyScore ||
                    a.hotelUnitId - b.hotelUnitId ||
                    a.flightUnitId - b.flightUnitId
          )
          .map((offer, index) => ({ rank: index + 1, ...offer }));
}
