/**
 * Round to the two decimal places money columns are stored with
 */
export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Percentages are reported with two decimal places
 */
export function roundPercentage(value: number): number {
  return Math.round(value * 100) / 100;
}
