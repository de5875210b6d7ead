/**
 * Per-run bookkeeping for collectors: which page a side is on and how many
 * items each collector returned. One context per side per run.
 */

import type { Side } from './types.js';

export class CollectionContext {
  readonly side: Side;
  readonly url: string;
  private counts = new Map<string, number>();

  constructor(side: Side, url: string) {
    this.side = side;
    this.url = url;
  }

  record(kind: string, count: number): void {
    this.counts.set(kind, (this.counts.get(kind) ?? 0) + count);
  }

  count(kind: string): number {
    return this.counts.get(kind) ?? 0;
  }

  summary(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}
