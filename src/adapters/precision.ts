/**
 * Tick-size rounding for prices and amounts.
 */

/** Decimal places needed to print `step` exactly (0.001 → 3, 1e-8 → 8, 5 → 0) */
export const decimalsOf = (step: number): number => {
  const [mantissa = "", exponent = "0"] = step.toExponential().split("e");
  const fraction = mantissa.split(".")[1] ?? "";
  return Math.max(0, fraction.length - Number.parseInt(exponent, 10));
};

/**
 * Rounds `value` to the nearest multiple of `step`.
 * Returns the value unchanged when no step is known.
 *
 * @example
 * ```typescript
 * roundToStep(60123.456, 0.1); // 60123.5
 * roundToStep(0.123456, 0.001); // 0.123
 * ```
 */
export const roundToStep = (value: number, step: number | null): number => {
  if (step === null || !Number.isFinite(step) || step <= 0) {
    return value;
  }
  return Number((Math.round(value / step) * step).toFixed(decimalsOf(step)));
};
