export const CURRENCY_UNIT = 100;

export function roundTo(value: number, decimals: number): number {
     const factor = 10 ** decimals;
     return Math.round(value * factor) / factor;
}

/** Nearest multiple of the currency unit. */
export function roundToCurrency(value: number): number {
     return Math.round(value / CURRENCY_UNIT) * CURRENCY_UNIT;
}

export function floorToCurrency(value: number): number {
     // Tolerates binary noise such as 55000 * 0.3 = 16499.999...
     return Math.floor(value / CURRENCY_UNIT + 1e-9) * CURRENCY_UNIT;
}

export function clamp(value: number, min: number, max: number): number {
     return Math.min(Math.max(value, min), max);
}

export function clamp01(value: number): number {
     return clamp(value, 0, 1);
}

export function formatYen(amount: number): string {
     const sign = amount < 0 ? '-' : '+';
     return `${sign}¥${Math.abs(amount).toLocaleString('en-US')}`;
}

export function percent(ratio: number): number {
     return Math.floor(ratio * 100 + 1e-9);
}
