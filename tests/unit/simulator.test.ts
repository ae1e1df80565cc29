import { DEFAULT_ENGINE_CONFIG } from '@yield-engine/shared/src/config/engine-config';
import {
     cannibalizationCost,
     packagePace,
     runSalesSimulation,
     simulateBundle,
     standaloneProfit,
} from '@yield-engine/shared/src/engine/simulator';
import { SimulationLeg } from '@yield-engine/shared/src/types/revenue.types';
import { UnitKindMismatchError } from '@yield-engine/shared/src/utils/errors';
import { createTestContext, createTestFlight, createTestHotel } from '../helpers/testUtils';

describe('Sales Simulator', () => {
     const hotel: SimulationLeg = {
          unitId: 1,
          remaining: 10,
          price: 10000,
          cost: 7000,
          dailyPace: 1,
          velocity: { kind: 'NO_SIGNAL', reason: 'no bookings in the last 24h' },
     };
     const flight: SimulationLeg = {
          unitId: 101,
          remaining: 10,
          price: 9000,
          cost: 5000,
          dailyPace: 1,
          velocity: { kind: 'NO_SIGNAL', reason: 'no bookings in the last 24h' },
     };

     describe('runSalesSimulation', () => {
          const result = runSalesSimulation(
               hotel,
               flight,
               { discount: 1000, horizonDays: 5 },
               DEFAULT_ENGINE_CONFIG
          );

          it('should compare standalone against bundling', () => {
               expect(result.profitA).toBe(-25000);
               expect(result.profitB).toBe(19200);
               expect(result.gain).toBe(44200);
               expect(Number.isInteger(result.gain)).toBe(true);
          });

          it('should sell whole packages within the smaller stock', () => {
               expect(result.packagesSold).toBe(8);
               expect(result.packagesSold).toBeLessThanOrEqual(10);
          });

          it('should report standalone profit per leg', () => {
               expect(result.standaloneProfitHotel).toBe(-20000);
               expect(result.standaloneProfitFlight).toBe(-5000);
               expect(standaloneProfit(hotel, 5)).toBe(-20000);
          });

          it('should trace every day through departure', () => {
               expect(result.trace).toHaveLength(6);
               expect(result.trace[0]).toEqual({
                    dayIndex: 0,
                    profitA: 7000,
                    profitB: 5400,
                    hotelStockA: 9,
                    flightStockA: 9,
                    hotelStockB: 9,
                    flightStockB: 9,
                    hotelSoldA: 1,
                    flightSoldA: 1,
                    packagesSold: 1,
                    decayFactor: 1,
                    residualAssetValueB: 63000,
               });

               const departure = result.trace[5];
               expect(departure.dayIndex).toBe(5);
               expect(departure.decayFactor).toBe(0);
               expect(departure.residualAssetValueB).toBe(0);
               expect(departure.profitA).toBe(result.profitA);
               expect(departure.profitB).toBe(result.profitB);
          });

          it('should conserve standalone stock every day', () => {
               for (const day of result.trace) {
                    expect(day.hotelSoldA + day.hotelStockA).toBe(hotel.remaining);
                    expect(day.flightSoldA + day.flightStockA).toBe(flight.remaining);
               }
          });

          it('should be deterministic', () => {
               const again = runSalesSimulation(
                    hotel,
                    flight,
                    { discount: 1000, horizonDays: 5 },
                    DEFAULT_ENGINE_CONFIG
               );
               expect(again).toEqual(result);
          });
     });

     it('should revert the surviving leg to standalone once the other runs out', () => {
          const result = runSalesSimulation(
               { ...hotel, remaining: 2 },
               flight,
               { discount: 0, horizonDays: 5 },
               DEFAULT_ENGINE_CONFIG
          );

          expect(result.packagesSold).toBe(2);
          expect(result.trace.map((d) => d.flightStockB)).toEqual([9, 8, 7, 6, 5, 5]);
          // 2 packages × 6400 + 3 flights × 4000 − 5 seats × 5000
          expect(result.profitB).toBe(-200);
          expect(result.profitA).toBe(1000);
          expect(result.gain).toBe(-1200);
     });

     it('should write everything off when departure is today', () => {
          const result = runSalesSimulation(
               hotel,
               flight,
               { discount: 1000, horizonDays: 0 },
               DEFAULT_ENGINE_CONFIG
          );

          expect(result.trace).toHaveLength(1);
          expect(result.profitA).toBe(-120000);
          expect(result.profitB).toBe(-120000);
          expect(result.gain).toBe(0);
     });

     describe('cannibalizationCost', () => {
          it('should apply the base rate without a velocity signal', () => {
               expect(cannibalizationCost(flight, DEFAULT_ENGINE_CONFIG)).toBeCloseTo(600, 6);
          });

          it('should scale with over-pacing', () => {
               const overPacing = { ...flight, velocity: { kind: 'RATIO' as const, ratio: 2 } };
               expect(cannibalizationCost(overPacing, DEFAULT_ENGINE_CONFIG)).toBe(4000);
          });

          it('should be zero for an under-pacing flight', () => {
               const underPacing = { ...flight, velocity: { kind: 'RATIO' as const, ratio: 0.8 } };
               expect(cannibalizationCost(underPacing, DEFAULT_ENGINE_CONFIG)).toBe(0);
          });
     });

     it('should boost the package pace with the discount', () => {
          expect(
               packagePace(
                    { ...hotel, dailyPace: 0.5 },
                    { ...flight, dailyPace: 2 },
                    5000,
                    DEFAULT_ENGINE_CONFIG
               )
          ).toBe(4.5);
     });

     describe('simulateBundle', () => {
          it('should reject units of the wrong kind', () => {
               const ctx = createTestContext();

               expect(() =>
                    simulateBundle(createTestFlight(), createTestFlight(), 1000, 10, 'base', ctx)
               ).toThrow(UnitKindMismatchError);
               expect(() =>
                    simulateBundle(createTestHotel(), createTestHotel(), 1000, 10, 'base', ctx)
               ).toThrow('Inventory unit 1 is a HOTEL, expected a FLIGHT');
          });

          it('should simulate real units from their prices and forecasts', () => {
               const ctx = createTestContext();
               const result = simulateBundle(createTestHotel(), createTestFlight(), 7400, 30, 'base', ctx);

               expect(result.hotelUnitId).toBe(1);
               expect(result.flightUnitId).toBe(101);
               expect(result.trace).toHaveLength(31);
               expect(result.packagesSold).toBe(40);
               expect(result.gain).toBe(184000);
               expect(simulateBundle(createTestHotel(), createTestFlight(), 7400, 30, 'base', ctx)).toEqual(
                    result
               );
          });
     });
});
