import { DiscardReason, RawUsageRow, RowValidationIssue, UsageEvent } from '../domain/types';
import { toDayKey } from '../utils/dates';
import { parseNumeric } from '../utils/numbers';
import { logger } from '../utils/logger';

export interface CleanerOptions {
  keepRemarkCode: string;
}

export interface CleanedUsage {
  events: UsageEvent[];
  rowsRead: number;
  discardCounts: Partial<Record<DiscardReason, number>>;
  issues: RowValidationIssue[];
}

type Verdict = { keep: true; date: Date; quantity: number } | { keep: false; reason: DiscardReason; message: string };

function judge(row: RawUsageRow, keepCode: string): Verdict {
  if (row.blank) {
    return { keep: false, reason: 'BLANK_ROW', message: 'Row is empty' };
  }
  if (row.itemNumber === '') {
    return { keep: false, reason: 'MISSING_ITEM_NUMBER', message: 'Item number is missing' };
  }
  if (row.dateUnparseable) {
    return { keep: false, reason: 'UNPARSEABLE_DATE', message: `Unrecognized date "${row.dateText}"` };
  }
  if (row.date === null) {
    return { keep: false, reason: 'MISSING_DATE', message: 'Date is missing' };
  }

  const quantity = parseNumeric(row.quantity);
  if (quantity === null) {
    return { keep: false, reason: 'INVALID_QUANTITY', message: `Quantity "${row.quantity ?? ''}" is not a number` };
  }
  if (quantity < 0) {
    return { keep: false, reason: 'NEGATIVE_QUANTITY', message: `Quantity ${quantity} is negative` };
  }

  if (row.hasRemarksColumn && row.remarks.toLowerCase() !== keepCode) {
    return { keep: false, reason: 'EXCLUDED_REMARK', message: `Remark "${row.remarks}" is not "${keepCode}"` };
  }

  return { keep: true, date: row.date, quantity };
}

/**
 * Turns raw rows into usage events. Rules run in order: blank rows,
 * missing item/date, quantity, remark code, exact duplicates. Every
 * discarded row is counted by reason and kept as an issue.
 */
export function cleanUsageRows(rows: readonly RawUsageRow[], options: CleanerOptions): CleanedUsage {
  const keepCode = options.keepRemarkCode.trim().toLowerCase();
  const events: UsageEvent[] = [];
  const discardCounts: Partial<Record<DiscardReason, number>> = {};
  const issues: RowValidationIssue[] = [];
  const seen = new Set<string>();
  const unfilteredSources = new Set<string>();

  const discard = (row: RawUsageRow, reason: DiscardReason, message: string) => {
    discardCounts[reason] = (discardCounts[reason] ?? 0) + 1;
    issues.push({
      source: row.source,
      rowNumber: row.rowNumber,
      reason,
      message,
      ...(row.itemNumber ? { itemNumber: row.itemNumber } : {}),
    });
  };

  for (const row of rows) {
    if (!row.hasRemarksColumn && !unfilteredSources.has(row.source)) {
      unfilteredSources.add(row.source);
      logger.warn('Source has no remarks column; remark filter not applied', { source: row.source });
    }

    const verdict = judge(row, keepCode);
    if (!verdict.keep) {
      discard(row, verdict.reason, verdict.message);
      continue;
    }
    const day = toDayKey(verdict.date);
    const key = `${row.itemNumber}\u0000${day}\u0000${verdict.quantity}`;
    if (seen.has(key)) {
      discard(row, 'DUPLICATE', `Duplicate of an earlier ${row.itemNumber} row on ${day}`);
      continue;
    }
    seen.add(key);

    events.push({
      itemNumber: row.itemNumber,
      date: verdict.date,
      quantity: verdict.quantity,
      partName: row.partName,
      description2: row.description2,
      remark: row.remarks,
      source: row.source,
      rowNumber: row.rowNumber,
    });
  }

  logger.debug('Usage rows cleaned', { read: rows.length, retained: events.length, discardCounts });

  return { events, rowsRead: rows.length, discardCounts, issues };
}
