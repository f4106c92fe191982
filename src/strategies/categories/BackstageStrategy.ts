import type { Item } from "../../inventory/Item";
import { type CategoryStrategy, MIN_QUALITY, clampQuality, decreaseDaysToSell, isPastDue } from "../CategoryStrategy";

const CRITICAL_DAYS = 6;
const URGENT_DAYS = 11;

export function urgencyBonus(daysToSell: number): number {
  if (daysToSell < CRITICAL_DAYS) return 3;
  if (daysToSell < URGENT_DAYS) return 2;
  return 1;
}

/**
 * Event tickets: worth more the closer the event gets, worthless once it has
 * happened. The reset runs after the day's bonus, so a ticket that expires
 * this tick still ends at 0.
 */
export class BackstageStrategy implements CategoryStrategy {
  readonly category = "backstage";

  updateQuality(item: Item): void {
    item.quality = clampQuality(item.quality + urgencyBonus(item.daysToSell));
  }

  updateDaysToSell(item: Item): void {
    decreaseDaysToSell(item);
    if (isPastDue(item)) {
      item.quality = MIN_QUALITY;
    }
  }
}
