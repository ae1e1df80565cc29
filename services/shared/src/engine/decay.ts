import { clamp01 } from '../utils/numbers';

export interface DecayCurve {
     steepness: number;
     midpoint: number;
}

function logistic(x: number, { steepness, midpoint }: DecayCurve): number {
     return 1 / (1 + Math.exp(-steepness * (x - midpoint)));
}

/**
 * Residual value multiplier of unsold inventory: holds near 1 for most of the
 * selling horizon, then collapses towards 0 over the last `midpoint` share of it.
 *
 * The logistic is rescaled so that x = 1 maps to 1 and x = 0 maps to 0.
 */
export function inventoryDecayFactor(
     leadDays: number,
     horizonDays: number,
     curve: DecayCurve
): number {
     if (leadDays <= 0) return 0;
     if (horizonDays <= 0) return 1;

     const x = Math.min(leadDays / horizonDays, 1);
     const high = logistic(1, curve);
     const low = logistic(0, curve);
     if (high === low) return 1;

     return clamp01((logistic(x, curve) - low) / (high - low));
}
