/** Append-only price window capped at `capacity` most recent values. */
export class PriceHistory {
  private readonly values: number[] = [];

  constructor(private readonly capacity: number) {}

  push(price: number): void {
    this.values.push(price);
    if (this.values.length > this.capacity) this.values.shift();
  }

  get length(): number {
    return this.values.length;
  }

  /** Most recent `count` prices, oldest first. */
  tail(count: number): number[] {
    return this.values.slice(-count);
  }
}
