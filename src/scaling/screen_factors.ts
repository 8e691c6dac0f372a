import { createLogger } from '../logger.js';

const logger = createLogger('ScreenFactors');

/** Reserved key holding the factor shared by every screen. */
export const ALL_SCREENS = 'ALL';

export type ScreenFactors = Record<string, number>;

/** Parses `name=factor` pairs separated by `;`. Malformed pairs are skipped. */
export function parseScreenFactors(str: string): ScreenFactors {
  const result: ScreenFactors = {};
  for (const pair of str.split(';')) {
    const idx = pair.indexOf('=');
    if (idx === -1) continue;

    const name = pair.slice(0, idx);
    const raw = pair.slice(idx + 1);
    const value = Number.parseFloat(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
      logger.warn(`Ignoring invalid factor for ${name}: ${raw}`);
      continue;
    }
    result[name] = value;
  }
  return result;
}

export function joinScreenScaleFactors(factors: ScreenFactors): string {
  return Object.entries(factors)
    .map(([name, value]) => `${name}=${value.toFixed(2)}`)
    .join(';');
}

export function getSingleScaleFactor(factors: ScreenFactors): number {
  const values = Object.values(factors);
  if (values.length === 0) return 1;
  if (values.length === 1) return values[0];
  return factors[ALL_SCREENS] ?? 1;
}

export function singleToMap(value: number): ScreenFactors {
  return { [ALL_SCREENS]: value };
}

/**
 * Integer scale for toolkit windows. Anything from 1.7 up rounds to 2;
 * never below 1.
 */
export function computeWindowScale(scale: number): number {
  const windowScale = Math.trunc(Math.trunc((scale + 0.3) * 10) / 10);
  return windowScale < 1 ? 1 : windowScale;
}

export function computeCursorSize(scale: number, baseCursorSize: number): number {
  return Math.trunc(baseCursorSize * scale);
}
