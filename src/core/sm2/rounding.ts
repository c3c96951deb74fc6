/**
 * Rounds to `decimals` places, breaking exact ties towards the even
 * neighbour: 240.5 rounds to 240 and 241.5 to 242.
 *
 * Only values that sit exactly halfway in binary are ties. 0.12345 is stored
 * slightly above its midpoint, so it rounds to 0.1235.
 */
export function roundHalfEven(value: number, decimals = 0): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  // Exactly halfway at `decimals` places iff value * 2^(decimals + 1) is odd.
  const halves = value * 2 ** (decimals + 1);
  if (Number.isInteger(halves) && Math.abs(halves % 2) === 1) {
    const lower = (halves * 5 ** decimals - 1) / 2;
    const even = lower % 2 === 0 ? lower : lower + 1;
    return even / 10 ** decimals;
  }

  return Number(value.toFixed(decimals));
}
