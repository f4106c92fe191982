export class Item {
  constructor(public name: string, public daysToSell: number, public quality: number) {}

  toString(): string {
    return `${this.name}, ${this.daysToSell}, ${this.quality}`;
  }
}
