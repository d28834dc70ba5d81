const f64 = new DataView(new ArrayBuffer(8));

/**
 * Converts a number to IEEE 754 half-precision bits, rounding the float64
 * value to nearest-even in a single step.
 * Values beyond the half range become ±Infinity; NaN stays NaN.
 */
export function toHalfBits(value: number): number {
  f64.setFloat64(0, value, false);
  const hi = f64.getUint32(0, false);
  const lo = f64.getUint32(4, false);

  const sign = (hi >>> 16) & 0x8000;
  const exponent = (hi >>> 20) & 0x7ff;
  const mantissa = hi & 0xfffff;

  if (exponent === 0x7ff) {
    return sign | 0x7c00 | (mantissa !== 0 || lo !== 0 ? 0x200 : 0);
  }

  const e = exponent - 1023 + 15;
  if (e >= 0x1f) return sign | 0x7c00;

  // Only the top 20 mantissa bits decide the result; `lo` breaks ties
  let half: number;
  let rest: number;
  let halfway: number;

  if (e <= 0) {
    // Subnormal half (or underflow to signed zero)
    if (e < -10) return sign;
    const significand = mantissa | 0x100000;
    const shift = 11 - e;
    half = significand >>> shift;
    rest = significand & ((1 << shift) - 1);
    halfway = 1 << (shift - 1);
  } else {
    half = (e << 10) | (mantissa >>> 10);
    rest = mantissa & 0x3ff;
    halfway = 0x200;
  }

  // A carry out of the mantissa correctly bumps the exponent
  if (rest > halfway || (rest === halfway && (lo !== 0 || (half & 1) === 1))) half++;
  return sign | half;
}

/**
 * Converts IEEE 754 half-precision bits back to a number.
 */
export function fromHalfBits(bits: number): number {
  const sign = (bits & 0x8000) !== 0 ? -1 : 1;
  const exponent = (bits >>> 10) & 0x1f;
  const mantissa = bits & 0x3ff;

  if (exponent === 0) return sign * mantissa * 2 ** -24;
  if (exponent === 0x1f) return mantissa !== 0 ? NaN : sign * Infinity;
  return sign * (1 + mantissa / 1024) * 2 ** (exponent - 15);
}

/** Rounds a number to the nearest value representable in half precision */
export function roundToHalf(value: number): number {
  return fromHalfBits(toHalfBits(value));
}
