/**
 * Format a number with a fixed count of decimals, rounding exact ties to the
 * even digit. `Number.prototype.toFixed` rounds ties away from zero.
 *
 * A double sits exactly halfway between two `digits`-decimal values only when
 * it is an odd multiple of 2^-(digits + 1); both scalings below are exact.
 */
export const formatFixed = (value: number, digits: number): string => {
  const isTie =
    Number.isInteger(value * 2 ** (digits + 1)) && !Number.isInteger(value * 2 ** digits)
  if (!isTie) {
    return value.toFixed(digits)
  }
  const scale = 10 ** digits
  const below = Math.floor(Math.abs(value) * scale)
  const rounded = below % 2 === 0 ? below : below + 1
  return `${value < 0 ? '-' : ''}${(rounded / scale).toFixed(digits)}`
}
