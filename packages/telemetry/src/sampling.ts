/**
 * Sampling decision for one call. Rates at or above 1 always sample and
 * rates at or below 0 never do, without consulting `random`.
 */
export function shouldSample(rate: number, random: () => number = Math.random): boolean {
  if (rate >= 1) return true;
  if (rate <= 0) return false;
  return random() <= rate;
}
