import {
     BundleRecommendation,
     DemandScenario,
     ForecastResult,
     InventoryUnit,
     SimulationLeg,
     SimulationResult,
     StandaloneRecommendation,
     StrategyRecommendation,
     StrategyReport,
     UnitRef,
} from '../types/revenue.types';
import { isoDate, leadDaysUntil } from '../utils/dates';
import { DomainError, InvalidUnitError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { formatYen, roundToCurrency } from '../utils/numbers';
import { partitionByKind, strategyScore, urgencyScore } from './bundle-scoring';
import { EngineContext } from './context';
import { forecastUnit } from './forecast';
import { runSalesSimulation, simulationLeg, standaloneProfit } from './simulator';

const log = createChildLogger({ module: 'bundle-optimizer' });

interface UnitProfile {
     unit: InventoryUnit;
     leg: SimulationLeg;
     forecast: ForecastResult;
     leadDays: number | null;
     departure: string | null;
     horizonDays: number;
}

interface Candidate {
     hotel: UnitProfile;
     flight: UnitProfile;
     simulation: SimulationResult;
}

function validateUnit(unit: InventoryUnit): void {
     if (!Number.isFinite(unit.basePrice) || unit.basePrice <= 0) {
          throw new InvalidUnitError(unit.id, 'base price must be positive');
     }
     if (
          unit.totalCapacity < 0 ||
          unit.remainingCapacity < 0 ||
          unit.remainingCapacity > unit.totalCapacity
     ) {
          throw new InvalidUnitError(unit.id, 'remaining capacity outside [0, total capacity]');
     }
     if (unit.departureDate && Number.isNaN(unit.departureDate.getTime())) {
          throw new InvalidUnitError(unit.id, 'departure date is not a valid date');
     }
}

function buildProfile(unit: InventoryUnit, scenario: DemandScenario, ctx: EngineContext): UnitProfile {
     validateUnit(unit);

     const leg = simulationLeg(unit, scenario, ctx);
     const forecast = forecastUnit(unit, ctx, leg.price)[scenario];
     if (!Number.isFinite(leg.price) || !Number.isFinite(forecast.dailyPace)) {
          throw new InvalidUnitError(unit.id, 'price or forecast pace is not a finite number');
     }

     const leadDays = leadDaysUntil(unit.departureDate, ctx.referenceTime);
     return {
          unit,
          leg,
          forecast,
          leadDays,
          departure: unit.departureDate ? isoDate(unit.departureDate) : null,
          horizonDays: Math.max(leadDays ?? 0, 0),
     };
}

function excludedRecommendation(unit: InventoryUnit, err: DomainError): StandaloneRecommendation {
     const departure = unit.departureDate;
     return {
          strategy: 'STANDALONE',
          unit: refOf(unit),
          departureDate: departure && !Number.isNaN(departure.getTime()) ? isoDate(departure) : null,
          currentPrice: null,
          justification: `Excluded from bundling. ${err.message}.`,
     };
}

function refOf(unit: InventoryUnit): UnitRef {
     return { id: unit.id, kind: unit.kind, name: unit.name };
}

function groupByDeparture(profiles: UnitProfile[]): Map<string, UnitProfile[]> {
     const groups = new Map<string, UnitProfile[]>();
     for (const profile of profiles) {
          if (profile.departure === null) continue;
          const group = groups.get(profile.departure);
          if (group) {
               group.push(profile);
          } else {
               groups.set(profile.departure, [profile]);
          }
     }
     return groups;
}

/**
 * Best-gain flight for each hotel on the same departure date. Ties go to the
 * lower flight id.
 */
function bestCandidates(profiles: UnitProfile[], ctx: EngineContext): Candidate[] {
     const byId = new Map(profiles.map((p) => [p.unit.id, p]));
     const candidates: Candidate[] = [];

     for (const group of groupByDeparture(profiles).values()) {
          const { hotels, flights } = partitionByKind(group.map((p) => p.unit));

          for (const hotelUnit of hotels) {
               const hotel = byId.get(hotelUnit.id);
               if (!hotel) continue;

               let best: Candidate | undefined;
               for (const flightUnit of flights) {
                    const flight = byId.get(flightUnit.id);
                    if (!flight) continue;

                    const discount = roundToCurrency(
                         ctx.config.bundleDiscountRate * (hotel.leg.price + flight.leg.price)
                    );
                    const simulation = runSalesSimulation(
                         hotel.leg,
                         flight.leg,
                         { discount, horizonDays: hotel.horizonDays },
                         ctx.config
                    );
                    if (!best || simulation.gain > best.simulation.gain) {
                         best = { hotel, flight, simulation };
                    }
               }
               if (best) candidates.push(best);
          }
     }

     return candidates.sort(
          (a, b) => b.simulation.gain - a.simulation.gain || a.hotel.unit.id - b.hotel.unit.id
     );
}

function bundleRecommendation(candidate: Candidate, ctx: EngineContext): BundleRecommendation {
     const { hotel, flight, simulation } = candidate;
     const urgency = urgencyScore(
          hotel.unit.remainingCapacity,
          hotel.unit.totalCapacity,
          hotel.leadDays,
          ctx.config.urgencyHorizonDays
     );

     return {
          strategy: 'BUNDLE',
          hotel: refOf(hotel.unit),
          flight: refOf(flight.unit),
          departureDate: hotel.departure ?? '',
          bundlePrice: hotel.leg.price + flight.leg.price - simulation.discount,
          discount: -simulation.discount,
          estimatedGain: simulation.gain,
          strategyScore: strategyScore(urgency, flight.unit.remainingCapacity, flight.unit.totalCapacity),
          urgencyScore: urgency,
          maxSets: Math.min(hotel.unit.remainingCapacity, flight.unit.remainingCapacity),
          justification:
               `Selling ${hotel.unit.name} with ${flight.unit.name} moves ${simulation.packagesSold} packages ` +
               `before departure and gains ${formatYen(simulation.gain)} over selling them separately.`,
     };
}

function standaloneRecommendation(
     profile: UnitProfile,
     scenario: DemandScenario,
     reason: string
): StandaloneRecommendation {
     const { unit, forecast } = profile;
     const pace =
          profile.leadDays === null
               ? 'No departure date set'
               : `${forecast.dailyPace.toFixed(2)} units/day in the ${scenario} scenario sells ` +
                 `${Math.round(forecast.predictedSold)} of ${unit.remainingCapacity} before departure`;

     return {
          strategy: 'STANDALONE',
          unit: refOf(unit),
          departureDate: profile.departure,
          currentPrice: profile.leg.price,
          justification: `${pace}. ${reason}.`,
     };
}

/**
 * Greedy hotel × flight bundle assignment for one demand scenario.
 *
 * Hotels claim their best-gain same-date flight in descending gain order. A
 * hotel whose best flight is already claimed stays standalone; its second
 * choice is not considered.
 */
export function recommendStrategy(
     units: readonly InventoryUnit[],
     scenario: DemandScenario,
     ctx: EngineContext
): StrategyReport {
     const profiles: UnitProfile[] = [];
     const excluded: StandaloneRecommendation[] = [];
     for (const unit of [...units].sort((a, b) => a.id - b.id)) {
          try {
               profiles.push(buildProfile(unit, scenario, ctx));
          } catch (err) {
               if (!(err instanceof DomainError)) throw err;
               log.warn({ err, unitId: unit.id }, 'Unit excluded from bundling');
               excluded.push(excludedRecommendation(unit, err));
          }
     }

     const totalStandaloneProfit = profiles
          .filter((p) => p.departure !== null)
          .reduce((sum, p) => sum + standaloneProfit(p.leg, p.horizonDays), 0);

     const candidates = bestCandidates(profiles, ctx);
     if (candidates.length === 0) {
          log.debug({ scenario, units: profiles.length }, 'No same-date bundle candidates');
          return {
               scenario,
               recommendations: excluded,
               totalStandaloneProfit,
               totalOptimizedProfit: totalStandaloneProfit,
               uplift: 0,
          };
     }

     const bundles: BundleRecommendation[] = [];
     const reasons = new Map<number, string>();
     const claimed = new Set<number>();
     let uplift = 0;

     for (const candidate of candidates) {
          const { hotel, flight, simulation } = candidate;
          const threshold = ctx.config.bundleGainThreshold;

          if (claimed.has(flight.unit.id)) {
               reasons.set(hotel.unit.id, `Best partner ${flight.unit.name} is already bundled`);
          } else if (simulation.gain <= threshold) {
               reasons.set(
                    hotel.unit.id,
                    `Bundling with ${flight.unit.name} gains ${formatYen(simulation.gain)}, ` +
                         `not above the ¥${threshold.toLocaleString('en-US')} threshold`
               );
          } else {
               claimed.add(flight.unit.id);
               claimed.add(hotel.unit.id);
               bundles.push(bundleRecommendation(candidate, ctx));
               uplift += simulation.gain;
          }
     }

     const standalone = profiles
          .filter((p) => !claimed.has(p.unit.id))
          .map((p) =>
               standaloneRecommendation(
                    p,
                    scenario,
                    reasons.get(p.unit.id) ??
                         (p.departure === null ? 'Not eligible for bundling' : 'No bundle partner selected')
               )
          );

     const recommendations: StrategyRecommendation[] = [...bundles, ...standalone, ...excluded];

     log.debug(
          { scenario, bundles: bundles.length, standalone: standalone.length, uplift },
          'Bundle assignment complete'
     );

     return {
          scenario,
          recommendations,
          totalStandaloneProfit,
          totalOptimizedProfit: totalStandaloneProfit + uplift,
          uplift,
     };
}
