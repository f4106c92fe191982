import type { Item } from "../inventory/Item";

export const MIN_QUALITY = 0;
export const MAX_QUALITY = 50;

/**
 * Per-category rules for one simulated day.
 *
 * The updater always calls `updateQuality` before `updateDaysToSell`, so quality
 * deltas see the day count from the start of the tick while past-due
 * adjustments see the decremented one.
 */
export interface CategoryStrategy {
  readonly category: string;
  updateQuality(item: Item): void;
  updateDaysToSell(item: Item): void;
}

export function clampQuality(quality: number): number {
  return Math.max(MIN_QUALITY, Math.min(quality, MAX_QUALITY));
}

export function isPastDue(item: Item): boolean {
  return item.daysToSell < 0;
}

export function decreaseDaysToSell(item: Item): void {
  item.daysToSell -= 1;
}
