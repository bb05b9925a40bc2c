/**
 * Converts a decimal amount to whole cents
 * @param amount - Amount in currency units, e.g. 12.34
 */
export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/**
 * Adds amounts in cents so repeated additions do not drift
 */
export function addMoney(...amounts: number[]): number {
  return fromCents(amounts.reduce((total, amount) => total + toCents(amount), 0));
}

export function subtractMoney(amount: number, subtrahend: number): number {
  return fromCents(toCents(amount) - toCents(subtrahend));
}
