import { timestampMs } from '../models/index.js';
import type { LedgerEntry, LedgerSummary } from '../models/index.js';

/**
 * Cash effect of one entry on the portfolio. Outflows carry their fees on
 * top; inflows arrive net of fees. Transfers and adjustments are taken as
 * recorded.
 */
export const ledgerEntryNetAmount = (entry: LedgerEntry): number => {
  switch (entry.type) {
    case 'buy':
    case 'withdrawal':
    case 'fee':
      return -(entry.totalAmount + entry.fees);
    case 'sell':
    case 'deposit':
    case 'dividend':
    case 'interest':
      return entry.totalAmount - entry.fees;
    case 'transfer':
    case 'adjustment':
      return entry.totalAmount;
  }
};

const sumOf = (entries: readonly LedgerEntry[], type: LedgerEntry['type']): number =>
  entries.filter((entry) => entry.type === type).reduce((sum, entry) => sum + entry.totalAmount, 0);

export const summarizeLedger = (entries: readonly LedgerEntry[]): LedgerSummary => ({
  totalTransactions: entries.length,
  totalBuys: entries.filter((entry) => entry.type === 'buy').length,
  totalSells: entries.filter((entry) => entry.type === 'sell').length,
  totalDeposits: sumOf(entries, 'deposit'),
  totalWithdrawals: sumOf(entries, 'withdrawal'),
  totalDividends: sumOf(entries, 'dividend'),
  totalFees: sumOf(entries, 'fee'),
  netCashFlow: entries.reduce((sum, entry) => sum + ledgerEntryNetAmount(entry), 0),
});

/**
 * Entries dated within `[from, to]`, both ends included. Bounds are ISO
 * timestamps; an entry whose date does not parse is left out.
 */
export const ledgerEntriesInRange = (
  entries: readonly LedgerEntry[],
  from: string,
  to: string
): LedgerEntry[] => {
  const start = Date.parse(from);
  const end = Date.parse(to);
  return entries.filter((entry) => {
    const at = timestampMs(entry.transactionDate);
    return at !== 0 && at >= start && at <= end;
  });
};
