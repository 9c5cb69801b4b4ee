import type { TimedItem } from "./types/vault.ts";
import type { StaleItemFinding, Thresholds } from "./types/report.ts";

const DAY_MS = 24 * 60 * 60 * 1000;

function utcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/** Whole UTC calendar days from `timestamp` to `now`; future timestamps count as 0. */
export function ageInDays(timestamp: Date, now: Date): number {
  return Math.max(0, Math.round((utcDay(now) - utcDay(timestamp)) / DAY_MS));
}

export interface StaleItem {
  item: TimedItem;
  ageDays: number;
}

/** Items strictly older than `thresholdDays`; an age equal to the threshold passes. */
export function detectStale(items: TimedItem[], thresholdDays: number, now: Date): StaleItem[] {
  return items
    .map((item) => ({ item, ageDays: ageInDays(item.timestamp, now) }))
    .filter(({ ageDays }) => ageDays > thresholdDays);
}

export function findStaleItems(
  pillar: string,
  items: { capture: TimedItem[]; active: TimedItem[] },
  thresholds: Thresholds,
  now: Date,
): StaleItemFinding[] {
  const toFinding =
    (kind: StaleItemFinding["kind"]) =>
    ({ item, ageDays }: StaleItem): StaleItemFinding => ({ kind, pillar, path: item.path, ageDays });

  return [
    ...detectStale(items.active, thresholds.activeDays, now).map(toFinding("stale_project")),
    ...detectStale(items.capture, thresholds.captureDays, now).map(toFinding("stale_capture")),
  ];
}
