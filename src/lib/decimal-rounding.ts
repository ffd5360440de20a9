/**
 * Exact decimal arithmetic for band boundaries.
 *
 * A number is read as the digits of its shortest decimal representation
 * (1.005 stays 1.005, not 1.00499999…) and held as a scaled BigInt, so
 * products, sums and percentages are exact before they are rounded. Half-way
 * values round up (away from zero).
 */

/** `units / 10^scale` */
interface ScaledDecimal {
  units: bigint;
  scale: number;
}

const NUMBER_TEXT = /^(-?)(\d+)(?:\.(\d+))?(?:e([+-]\d+))?$/;

function toScaledDecimal(value: number): ScaledDecimal {
  const match = NUMBER_TEXT.exec(String(value));
  if (!match) throw new Error(`Not a finite number: ${value}`);
  const [, sign, whole, fraction = "", exponent = "0"] = match;
  let units = BigInt(`${whole}${fraction}`);
  let scale = fraction.length - Number(exponent);
  if (scale < 0) {
    units *= 10n ** BigInt(-scale);
    scale = 0;
  }
  return { units: sign === "-" ? -units : units, scale };
}

function quantizeHalfUp({ units, scale }: ScaledDecimal, places: number): number {
  const negative = units < 0n;
  let magnitude = negative ? -units : units;
  let exponent = scale;
  if (scale > places) {
    const divisor = 10n ** BigInt(scale - places);
    const remainder = magnitude % divisor;
    magnitude /= divisor;
    if (remainder * 2n >= divisor) magnitude += 1n;
    exponent = places;
  }
  // never emit -0
  if (magnitude === 0n) return 0;
  const rounded = Number(`${magnitude}e-${exponent}`);
  return negative ? -rounded : rounded;
}

function alignScales(a: ScaledDecimal, b: ScaledDecimal): [bigint, bigint, number] {
  const scale = Math.max(a.scale, b.scale);
  return [a.units * 10n ** BigInt(scale - a.scale), b.units * 10n ** BigInt(scale - b.scale), scale];
}

export function roundHalfUp(value: number, places: number): number {
  if (!Number.isFinite(value)) return value;
  return quantizeHalfUp(toScaledDecimal(value), places);
}

/** `a × b`, rounded half-up. */
export function multiplyHalfUp(a: number, b: number, places: number): number {
  const x = toScaledDecimal(a);
  const y = toScaledDecimal(b);
  return quantizeHalfUp({ units: x.units * y.units, scale: x.scale + y.scale }, places);
}

/** `percent`% of `value`, rounded half-up. */
export function percentHalfUp(value: number, percent: number, places: number): number {
  const x = toScaledDecimal(value);
  const p = toScaledDecimal(percent);
  return quantizeHalfUp({ units: x.units * p.units, scale: x.scale + p.scale + 2 }, places);
}

/** `a + b`, rounded half-up. */
export function addHalfUp(a: number, b: number, places: number): number {
  const [x, y, scale] = alignScales(toScaledDecimal(a), toScaledDecimal(b));
  return quantizeHalfUp({ units: x + y, scale }, places);
}

/** `a - b`, rounded half-up. */
export function subtractHalfUp(a: number, b: number, places: number): number {
  const [x, y, scale] = alignScales(toScaledDecimal(a), toScaledDecimal(b));
  return quantizeHalfUp({ units: x - y, scale }, places);
}

export function clampToZero(value: number): number {
  return value < 0 ? 0 : value;
}

/** Fixed-point text, e.g. for range summaries. */
export function formatFixed(value: number, places: number): string {
  return roundHalfUp(value, places).toFixed(places);
}
