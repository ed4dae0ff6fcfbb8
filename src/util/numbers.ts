export const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

export const toTwoDecimals = (value: number): number =>
  Math.round(value * 100) / 100;

export const clampScore = (value: number): number =>
  clamp(Number.isFinite(value) ? value : 0, 0, 100);
