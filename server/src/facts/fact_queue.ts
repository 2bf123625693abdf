import type { Fact } from './facts.js';

export class FactQueue {
  private readonly items: Fact[] = [];
  private readonly capacity: number;
  private droppedCount = 0;

  constructor(capacity = 16) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  push(fact: Fact): void {
    this.items.push(fact);
    while (this.items.length > this.capacity) {
      this.items.shift();
      this.droppedCount += 1;
    }
  }

  drain(): Fact[] {
    return this.items.splice(0, this.items.length);
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }
}
