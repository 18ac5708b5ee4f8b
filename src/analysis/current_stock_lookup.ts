import { CurrentStockEntry, CurrentStockLookup, CurrentStockTieBreak, ItemNumber, RawUsageRow } from '../domain/types';

function replaces(candidate: CurrentStockEntry, current: CurrentStockEntry, tieBreak: CurrentStockTieBreak): boolean {
  switch (tieBreak) {
    case 'first-seen':
      return false;
    case 'last-seen':
      return true;
    case 'latest-date':
      // undated rows never beat dated ones; equal dates go to the later row
      if (candidate.date === null) return current.date === null;
      if (current.date === null) return true;
      return candidate.date.getTime() >= current.date.getTime();
  }
}

/**
 * Picks one current-stock reading per part from the raw rows, before any
 * remark filtering. Rows are visited in input order.
 */
export function buildCurrentStockLookup(rows: readonly RawUsageRow[], tieBreak: CurrentStockTieBreak): CurrentStockLookup {
  const lookup = new Map<ItemNumber, CurrentStockEntry>();
  for (const row of rows) {
    if (row.itemNumber === '' || row.currentStock === null) continue;
    const candidate: CurrentStockEntry = {
      value: row.currentStock,
      date: row.date,
      source: row.source,
      rowNumber: row.rowNumber,
    };
    const current = lookup.get(row.itemNumber);
    if (!current || replaces(candidate, current, tieBreak)) {
      lookup.set(row.itemNumber, candidate);
    }
  }
  return lookup;
}
