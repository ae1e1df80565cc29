// Type definitions for the revenue-management domain

export type UnitKind = 'HOTEL' | 'FLIGHT';

export interface InventoryUnit {
     id: number;
     kind: UnitKind;
     name: string;
     totalCapacity: number;
     remainingCapacity: number;
     basePrice: number;
     /** Price-elasticity coefficient; negative for normal demand. */
     elasticity: number;
     departureDate?: Date;
     procurementDate?: Date;
     /** Per-unit cost. Falls back to `basePrice × defaultCostRatio`. */
     unitCost?: number;
}

export interface BookingEvent {
     id?: number;
     unitId: number;
     partnerUnitId?: number;
     bookedAt: Date;
     quantity: number;
     soldPrice: number;
     basePriceAtSale: number;
     isBundle: boolean;
     discountAmount: number;
}

export interface PriceSnapshot {
     unitId: number;
     recordedAt: Date;
     remainingCapacity: number;
     finalPrice: number;
     leadDays: number | null;
     strategy: PricingStrategy;
     isBrakeActive: boolean;
}

// Velocity signal

export type VelocitySignal =
     | { kind: 'RATIO'; ratio: number }
     | { kind: 'NO_SIGNAL'; reason: string };

// Pricing

export type PricingStrategy = 'RULE_BASED' | 'DEMAND_ELASTICITY';

export type PriceFactor =
     | 'SCARCITY'
     | 'LEAD_TIME'
     | 'VELOCITY_BRAKE'
     | 'DEMAND_ELASTICITY'
     | 'INVENTORY_DECAY';

export interface PriceAdjustment {
     factor: PriceFactor;
     label: string;
     amount: number;
     applicable: boolean;
     reason: string;
}

export type WaterfallMeasure = 'absolute' | 'relative' | 'total';

export interface WaterfallStep {
     label: string;
     value: number;
     measure: WaterfallMeasure;
}

export interface PricingResult {
     unitId: number;
     name: string;
     strategy: PricingStrategy;
     basePrice: number;
     adjustments: PriceAdjustment[];
     theoreticalPrice: number;
     finalPrice: number;
     inventoryRatio: number;
     leadDays: number | null;
     velocity: VelocitySignal;
     isBrakeActive: boolean;
     decayFactor: number | null;
     justification: string;
     waterfall: WaterfallStep[];
}

// Forecast

export type DemandScenario = 'pessimistic' | 'base' | 'optimistic';

export const DEMAND_SCENARIOS: readonly DemandScenario[] = ['pessimistic', 'base', 'optimistic'];

export interface ForecastResult {
     scenario: DemandScenario;
     dailyPace: number;
     predictedSold: number;
     predictedUnsold: number;
     expectedNetProfit: number;
}

export type ScenarioForecast = Record<DemandScenario, ForecastResult>;

// Simulation

export interface SimulationLeg {
     unitId: number;
     remaining: number;
     price: number;
     cost: number;
     dailyPace: number;
     velocity: VelocitySignal;
}

export interface SimulationDay {
     dayIndex: number;
     profitA: number;
     profitB: number;
     hotelStockA: number;
     flightStockA: number;
     hotelStockB: number;
     flightStockB: number;
     hotelSoldA: number;
     flightSoldA: number;
     packagesSold: number;
     decayFactor: number;
     residualAssetValueB: number;
}

export interface SimulationResult {
     hotelUnitId: number;
     flightUnitId: number;
     discount: number;
     horizonDays: number;
     profitA: number;
     profitB: number;
     gain: number;
     packagesSold: number;
     standaloneProfitHotel: number;
     standaloneProfitFlight: number;
     trace: SimulationDay[];
}

// Bundling

export interface PackageOffer {
     rank: number;
     hotelUnitId: number;
     hotelName: string;
     flightUnitId: number;
     flightName: string;
     hotelPrice: number;
     flightPrice: number;
     bundleDiscount: number;
     packagePrice: number;
     urgencyScore: number;
     strategyScore: number;
     justification: string;
}

export interface UnitRef {
     id: number;
     kind: UnitKind;
     name: string;
}

export interface BundleRecommendation {
     strategy: 'BUNDLE';
     hotel: UnitRef;
     flight: UnitRef;
     departureDate: string;
     bundlePrice: number;
     discount: number;
     estimatedGain: number;
     strategyScore: number;
     urgencyScore: number;
     maxSets: number;
     justification: string;
}

export interface StandaloneRecommendation {
     strategy: 'STANDALONE';
     unit: UnitRef;
     departureDate: string | null;
     // null when the unit could not be priced
     currentPrice: number | null;
     justification: string;
}

export type StrategyRecommendation = BundleRecommendation | StandaloneRecommendation;

export interface StrategyReport {
     scenario: DemandScenario;
     recommendations: StrategyRecommendation[];
     totalStandaloneProfit: number;
     totalOptimizedProfit: number;
     uplift: number;
}

// Sales metrics

export interface DailyRevenue {
     day: string;
     dynamicRevenue: number;
     fixedRevenue: number;
}

export interface RevenueLift {
     totalDynamic: number;
     totalFixed: number;
     lift: number;
     liftPct: number;
     totalUnits: number;
     daily: DailyRevenue[];
}

export interface RescueRate {
     overallRescueRate: number;
     rescuedUnits: number;
     hotelRescueRate: number;
     totalUnits: number;
}
