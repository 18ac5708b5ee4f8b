import { CurrentStockLookup, ItemNumber, PartStatistics, PartUsageSeries, UsageEvent } from '../domain/types';
import { ComputationError } from '../utils/errors';
import { daysBetween, toDayKey } from '../utils/dates';
import { sampleStandardDeviation, sum } from '../utils/numbers';
import { compareCodeUnits } from '../utils/compare';

/**
 * Groups events by part. Series come back keyed in item-number order, each
 * sorted by date; same-day events keep their input order.
 */
export function groupUsageSeries(events: readonly UsageEvent[]): PartUsageSeries {
  const groups = new Map<ItemNumber, UsageEvent[]>();
  for (const event of events) {
    const group = groups.get(event.itemNumber);
    if (group) {
      group.push(event);
    } else {
      groups.set(event.itemNumber, [event]);
    }
  }

  const series = new Map<ItemNumber, readonly UsageEvent[]>();
  for (const itemNumber of [...groups.keys()].sort(compareCodeUnits)) {
    const group = groups.get(itemNumber) ?? [];
    series.set(itemNumber, [...group].sort((a, b) => a.date.getTime() - b.date.getTime()));
  }
  return series;
}

/**
 * Sums quantities per calendar day, in date order.
 */
export function binByDay(events: readonly UsageEvent[]): Map<string, number> {
  const bins = new Map<string, number>();
  for (const event of events) {
    const day = toDayKey(event.date);
    bins.set(day, (bins.get(day) ?? 0) + event.quantity);
  }
  return bins;
}

function assertValidEvent(itemNumber: ItemNumber, event: UsageEvent): void {
  if (event.itemNumber !== itemNumber) {
    throw new ComputationError(`Series for ${itemNumber} contains an event for ${event.itemNumber}`, itemNumber, {
      source: event.source,
      rowNumber: event.rowNumber,
    });
  }
  if (!Number.isFinite(event.quantity) || event.quantity < 0) {
    throw new ComputationError(`Invalid quantity ${event.quantity} reached statistics for ${itemNumber}`, itemNumber, {
      source: event.source,
      rowNumber: event.rowNumber,
    });
  }
  if (Number.isNaN(event.date.getTime())) {
    throw new ComputationError(`Invalid date reached statistics for ${itemNumber}`, itemNumber, {
      source: event.source,
      rowNumber: event.rowNumber,
    });
  }
}

function assertFinite(itemNumber: ItemNumber, figures: Record<string, number>): void {
  for (const [name, value] of Object.entries(figures)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new ComputationError(`Statistic ${name} for ${itemNumber} is ${value}`, itemNumber, { [name]: value });
    }
  }
}

function latestText(events: readonly UsageEvent[], pick: (event: UsageEvent) => string): string {
  for (let i = events.length - 1; i >= 0; i--) {
    const value = pick(events[i]);
    if (value !== '') return value;
  }
  return '';
}

export function computePartStatistics(
  itemNumber: ItemNumber,
  events: readonly UsageEvent[],
  stockLookup: CurrentStockLookup
): PartStatistics {
  if (events.length === 0) {
    throw new ComputationError(`No usage events for ${itemNumber}`, itemNumber);
  }
  events.forEach((event) => assertValidEvent(itemNumber, event));

  const times = events.map((event) => event.date.getTime());
  const first = new Date(times.reduce((min, time) => Math.min(min, time)));
  const last = new Date(times.reduce((max, time) => Math.max(max, time)));
  const totalQuantity = sum(events.map((event) => event.quantity));
  const observationSpanDays = Math.max(1, daysBetween(first, last));
  const dailyTotals = [...binByDay(events).values()];
  const dMeanPerDay = totalQuantity / observationSpanDays;
  const dStdPerDay = sampleStandardDeviation(dailyTotals);
  const averageQuantityPerRequest = totalQuantity / events.length;

  assertFinite(itemNumber, { totalQuantity, dMeanPerDay, dStdPerDay, averageQuantityPerRequest });

  const stock = stockLookup.get(itemNumber);

  return {
    itemNumber,
    partName: latestText(events, (event) => event.partName),
    description2: latestText(events, (event) => event.description2),
    currentStock: stock?.value ?? 0,
    currentStockMissing: stock === undefined,
    dMeanPerDay,
    dStdPerDay,
    observationSpanDays,
    observationDays: dailyTotals.length,
    totalQuantity,
    usageCount: events.length,
    averageQuantityPerRequest,
    firstDate: toDayKey(first),
    lastDate: toDayKey(last),
  };
}

export function computeStatistics(series: PartUsageSeries, stockLookup: CurrentStockLookup): PartStatistics[] {
  const statistics: PartStatistics[] = [];
  for (const [itemNumber, events] of series) {
    // parts without events have nothing to analyze
    if (events.length === 0) continue;
    statistics.push(computePartStatistics(itemNumber, events, stockLookup));
  }
  return statistics;
}
