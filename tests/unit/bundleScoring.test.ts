import { DEFAULT_ENGINE_CONFIG } from '@yield-engine/shared/src/config/engine-config';
import {
     bundleDiscount,
     partitionByKind,
     rankPackages,
     strategyScore,
     urgencyScore,
} from '@yield-engine/shared/src/engine/bundle-scoring';
import { floorToCurrency } from '@yield-engine/shared/src/utils/numbers';
import { createTestContext, createTestFlight, createTestHotel } from '../helpers/testUtils';

describe('Bundle Scoring', () => {
     describe('urgencyScore', () => {
          it('should weight surplus stock when departure is a month away', () => {
               expect(urgencyScore(45, 50, 30)).toBe(0.36);
          });

          it('should add time urgency as departure approaches', () => {
               // 0.6 × (1 − 15/30) + 0.4 × 0.5
               expect(urgencyScore(25, 50, 15)).toBe(0.5);
               expect(urgencyScore(10, 50, 0)).toBe(0.68);
          });

          it('should reach 1 for a full unit on departure day', () => {
               expect(urgencyScore(50, 50, 0)).toBe(1);
          });

          it('should ignore time urgency for unknown or past departures', () => {
               expect(urgencyScore(45, 50, null)).toBe(0.36);
               expect(urgencyScore(45, 50, -3)).toBe(0.36);
          });

          it('should treat zero total stock as no surplus', () => {
               expect(urgencyScore(0, 0, 15)).toBe(0.3);
          });
     });

     describe('bundleDiscount', () => {
          it('should size the discount from urgency', () => {
               expect(bundleDiscount(60000, 55000, 0.36, DEFAULT_ENGINE_CONFIG)).toBe(-5400);
          });

          it('should cap the discount at a share of the dynamic price', () => {
               expect(bundleDiscount(60000, 40000, 1, DEFAULT_ENGINE_CONFIG)).toBe(-12000);
          });

          it('should cap the discount at a share of the list price', () => {
               expect(bundleDiscount(60000, 90000, 1, DEFAULT_ENGINE_CONFIG)).toBe(-15000);
          });

          it('should return zero without urgency', () => {
               expect(bundleDiscount(60000, 55000, 0, DEFAULT_ENGINE_CONFIG)).toBe(0);
          });

          it('should never exceed either ceiling', () => {
               for (let step = 0; step <= 20; step++) {
                    const urgency = step / 20;
                    for (const dynamic of [10000, 33000, 55000, 72000, 90000]) {
                         const discount = bundleDiscount(60000, dynamic, urgency, DEFAULT_ENGINE_CONFIG);

                         expect(discount).toBeLessThanOrEqual(0);
                         expect(Math.abs(discount)).toBeLessThanOrEqual(
                              Math.min(60000 * 0.25, floorToCurrency(dynamic * 0.3))
                         );
                         expect(Math.abs(discount) % 100).toBe(0);
                    }
               }
          });
     });

     describe('strategyScore', () => {
          it('should favour urgent hotels paired with busy flights', () => {
               expect(strategyScore(0.36, 40, 100)).toBe(0.432);
               expect(strategyScore(1, 0, 100)).toBe(1);
          });

          it('should ignore flight demand when the flight has no capacity', () => {
               expect(strategyScore(0.5, 0, 0)).toBe(0.35);
          });
     });

     describe('partitionByKind', () => {
          it('should split hotels from flights', () => {
               const hotel = createTestHotel();
               const flight = createTestFlight();

               expect(partitionByKind([flight, hotel])).toEqual({ hotels: [hotel], flights: [flight] });
          });
     });

     describe('rankPackages', () => {
          const slowHotel = createTestHotel();
          const busyHotel = createTestHotel({
               id: 2,
               name: 'Station Inn',
               remainingCapacity: 10,
               basePrice: 40000,
          });
          const flight = createTestFlight();

          it('should rank every hotel and flight pair by strategy score', () => {
               const offers = rankPackages([busyHotel, flight, slowHotel], createTestContext());

               expect(offers.map((o) => [o.rank, o.hotelUnitId, o.flightUnitId])).toEqual([
                    [1, 1, 101],
                    [2, 2, 101],
               ]);
          });

          it('should price the package from rule-based leg prices', () => {
               const [top, second] = rankPackages([slowHotel, busyHotel, flight], createTestContext());

               expect(top).toEqual({
                    rank: 1,
                    hotelUnitId: 1,
                    hotelName: 'Harbor View Hotel',
                    flightUnitId: 101,
                    flightName: 'Morning Flight',
                    hotelPrice: 57000,
                    flightPrice: 36000,
                    bundleDiscount: -5400,
                    packagePrice: 87600,
                    urgencyScore: 0.36,
                    strategyScore: 0.432,
                    justification:
                         'Harbor View Hotel: 90% of rooms left, 30 days to departure (urgency 0.36). ' +
                         'Morning Flight: 60% of seats sold. Package discount -¥5,400.',
               });
               expect(second.hotelPrice).toBe(48000);
               expect(second.bundleDiscount).toBe(-800);
               expect(second.packagePrice).toBe(83200);
          });

          it('should return no offers without flights', () => {
               expect(rankPackages([slowHotel, busyHotel], createTestContext())).toEqual([]);
          });
     });
});
