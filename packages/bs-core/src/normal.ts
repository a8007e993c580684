// Standard normal CDF/PDF to double precision, no reliance on Math.erf

const SQRT_2PI = Math.sqrt(2 * Math.PI);

// Beyond this the tail is below the smallest double.
const TAIL_CUTOFF = 37;
// Switch from the rational form to the continued fraction (10 / sqrt(2)).
const RATIONAL_LIMIT = 7.07106781186547;

const NUM = [
  3.52624965998911e-2, 0.700383064443688, 6.37396220353165, 33.912866078383,
  112.079291497871, 221.213596169931, 220.206867912376,
];
const DEN = [
  8.83883476483184e-2, 1.75566716318264, 16.064177579207, 86.7807322029461,
  296.564248779674, 637.333633378831, 793.826512519948, 440.413735824752,
];

function horner(coeffs: readonly number[], x: number): number {
  let acc = 0;
  for (const c of coeffs) acc = acc * x + c;
  return acc;
}

/** Lower tail Φ(-|x|), Hart (1968) double-precision algorithm 5666. */
function lowerTail(ax: number): number {
  if (ax > TAIL_CUTOFF) return 0;
  const e = Math.exp(-0.5 * ax * ax);
  if (ax < RATIONAL_LIMIT) {
    return (e * horner(NUM, ax)) / horner(DEN, ax);
  }
  let cf = ax + 0.65;
  cf = ax + 4 / cf;
  cf = ax + 3 / cf;
  cf = ax + 2 / cf;
  cf = ax + 1 / cf;
  return e / cf / SQRT_2PI;
}

/** Standard normal cumulative distribution Φ(x). Absolute error < 1e-14. */
export function normCdf(x: number): number {
  if (Number.isNaN(x)) return NaN;
  const tail = lowerTail(Math.abs(x));
  return x > 0 ? 1 - tail : tail;
}

/** Standard normal density φ(x). */
export function normPdf(x: number): number {
  return Math.exp(-0.5 * x * x) / SQRT_2PI;
}
