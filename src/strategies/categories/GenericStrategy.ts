import type { Item } from "../../inventory/Item";
import { type CategoryStrategy, clampQuality, decreaseDaysToSell, isPastDue } from "../CategoryStrategy";

export class GenericStrategy implements CategoryStrategy {
  readonly category = "generic";

  updateQuality(item: Item): void {
    item.quality = clampQuality(item.quality - 1);
  }

  updateDaysToSell(item: Item): void {
    decreaseDaysToSell(item);
    if (isPastDue(item)) {
      item.quality = clampQuality(item.quality - 1);
    }
  }
}
