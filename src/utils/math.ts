/** Rounds to two decimals, the precision the ledger stores. */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
