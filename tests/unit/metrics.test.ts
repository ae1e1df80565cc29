import { computeRescueRate, computeRevenueLift } from '@yield-engine/shared/src/engine/metrics';
import { createTestEvent, createTestFlight, createTestHotel } from '../helpers/testUtils';

describe('Sales Metrics', () => {
     const events = [
          createTestEvent({
               unitId: 1,
               quantity: 2,
               soldPrice: 11000,
               basePriceAtSale: 10000,
               bookedAt: new Date('2026-05-30T09:00:00Z'),
          }),
          createTestEvent({
               unitId: 101,
               quantity: 1,
               soldPrice: 8000,
               basePriceAtSale: 9000,
               isBundle: true,
               bookedAt: new Date('2026-05-29T22:00:00Z'),
          }),
          createTestEvent({
               unitId: 1,
               quantity: 3,
               soldPrice: 9500,
               basePriceAtSale: 10000,
               isBundle: true,
               bookedAt: new Date('2026-05-30T23:30:00Z'),
          }),
     ];

     describe('computeRevenueLift', () => {
          it('should compare dynamic revenue against list-price revenue', () => {
               const lift = computeRevenueLift(events);

               expect(lift.totalDynamic).toBe(58500);
               expect(lift.totalFixed).toBe(59000);
               expect(lift.lift).toBe(-500);
               expect(lift.liftPct).toBe(-0.8);
               expect(lift.totalUnits).toBe(6);
          });

          it('should break revenue down by day in date order', () => {
               expect(computeRevenueLift(events).daily).toEqual([
                    { day: '2026-05-29', dynamicRevenue: 8000, fixedRevenue: 9000 },
                    { day: '2026-05-30', dynamicRevenue: 50500, fixedRevenue: 50000 },
               ]);
          });

          it('should report zeros without sales', () => {
               expect(computeRevenueLift([])).toEqual({
                    totalDynamic: 0,
                    totalFixed: 0,
                    lift: 0,
                    liftPct: 0,
                    totalUnits: 0,
                    daily: [],
               });
          });
     });

     describe('computeRescueRate', () => {
          it('should report the share of units sold in packages', () => {
               const rate = computeRescueRate(events, [createTestHotel(), createTestFlight()]);

               expect(rate).toEqual({
                    overallRescueRate: 66.7,
                    rescuedUnits: 4,
                    hotelRescueRate: 60,
                    totalUnits: 6,
               });
          });

          it('should report zero rates without sales', () => {
               expect(computeRescueRate([], [createTestHotel()])).toEqual({
                    overallRescueRate: 0,
                    rescuedUnits: 0,
                    hotelRescueRate: 0,
                    totalUnits: 0,
               });
          });
     });
});
