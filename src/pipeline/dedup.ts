/**
 * Identity of a ledger row. One row per date + game + pick type, ever.
 */
export function ledgerKey(p: { date: string; gameId: string; pickType: string }): string {
  return `${p.date}|${p.gameId.toUpperCase().trim()}|${p.pickType}`;
}
