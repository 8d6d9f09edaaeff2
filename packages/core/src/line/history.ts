/**
 * History: submitted lines, deduplicated by content.
 *
 * Entries are keyed by a monotonically increasing order number. Pushing text
 * that already exists moves the existing entry to the newest slot instead of
 * storing it twice. A browse position walks the order space for Up/Down.
 */

import { Logger } from "@replkit/kernel";

const log = Logger.for("History");

// ── Types ───────────────────────────────────────────────────────────────────

export interface HistoryEntry {
  value: string;
  tag?: number;
}

export interface HistoryExportOptions {
  /** Only the newest `max` entries (after tag filtering). */
  max?: number;
  /** Only entries pushed with this tag. */
  tag?: number;
}

// ── History ─────────────────────────────────────────────────────────────────

export class History {
  private readonly byOrder = new Map<number, HistoryEntry>();
  private readonly orderByValue = new Map<string, number>();
  /** Next order number; also the browse position meaning "not browsing". */
  private top = 0;
  private tempTop = "";
  private position = 0;

  constructor(seed: Iterable<string | HistoryEntry> = []) {
    for (const entry of seed) {
      if (typeof entry === "string") this.push(entry);
      else this.push(entry.value, entry.tag);
    }
  }

  get size(): number {
    return this.byOrder.size;
  }

  /** True when the browse position is past the newest entry. */
  get atTop(): boolean {
    return this.position === this.top;
  }

  push(text: string, tag?: number): void {
    const value = text.trim();

    if (this.last() === value) {
      this.resetPosition();
      return;
    }

    const order = this.top++;
    const previous = this.orderByValue.get(value);

    if (previous !== undefined) {
      const existing = this.byOrder.get(previous);
      this.byOrder.delete(previous);
      this.byOrder.set(order, { value, tag: tag ?? existing?.tag });
    } else {
      this.byOrder.set(order, tag === undefined ? { value } : { value, tag });
    }
    this.orderByValue.set(value, order);

    log.trace({ order, relocated: previous !== undefined }, "push");
    this.resetPosition();
  }

  /**
   * Move to the next-older entry and return its text. `current` is the
   * unsubmitted buffer, stashed when browsing starts. Returns `undefined` when
   * there is nothing older.
   */
  back(current: string): string | undefined {
    const first = this.firstOrder();
    if (first === undefined || this.position === first) return undefined;

    const older = this.orderBefore(this.position);
    if (older === undefined) return undefined;

    if (this.position === this.top) this.tempTop = current;
    this.position = older;
    return this.valueAt(older);
  }

  /**
   * Move to the next-newer entry. Leaving the newest entry restores the
   * stashed buffer. Returns `undefined` when not browsing.
   */
  forward(): string | undefined {
    if (this.position === this.top) return undefined;

    if (this.position === this.lastOrder()) {
      const restored = this.tempTop;
      this.tempTop = "";
      this.position = this.top;
      return restored;
    }

    const newer = this.orderAfter(this.position);
    if (newer === undefined) return undefined;
    this.position = newer;
    return this.valueAt(newer);
  }

  resetPosition(): void {
    this.position = this.top;
  }

  last(): string | undefined {
    const order = this.lastOrder();
    return order === undefined ? undefined : this.valueAt(order);
  }

  get(order: number): string | undefined {
    return this.byOrder.get(order)?.value;
  }

  /** `[order, entry]` pairs, newest first. */
  *entries(): IterableIterator<[number, HistoryEntry]> {
    const orders = this.sortedOrders();
    for (let i = orders.length - 1; i >= 0; i--) {
      const order = orders[i];
      const entry = order === undefined ? undefined : this.byOrder.get(order);
      if (order !== undefined && entry) yield [order, entry];
    }
  }

  /** Copies of the stored text, oldest to newest. */
  export(options: HistoryExportOptions = {}): string[] {
    const values: string[] = [];
    for (const order of this.sortedOrders()) {
      const entry = this.byOrder.get(order);
      if (!entry) continue;
      if (options.tag !== undefined && entry.tag !== options.tag) continue;
      values.push(entry.value);
    }
    if (options.max === undefined || options.max >= values.length) return values;
    return options.max <= 0 ? [] : values.slice(values.length - options.max);
  }

  // ── Order-space helpers ─────────────────────────────────────────────────

  private sortedOrders(): number[] {
    return [...this.byOrder.keys()].sort((a, b) => a - b);
  }

  private valueAt(order: number): string {
    return this.byOrder.get(order)?.value ?? "";
  }

  private firstOrder(): number | undefined {
    let first: number | undefined;
    for (const order of this.byOrder.keys()) {
      if (first === undefined || order < first) first = order;
    }
    return first;
  }

  private lastOrder(): number | undefined {
    let last: number | undefined;
    for (const order of this.byOrder.keys()) {
      if (last === undefined || order > last) last = order;
    }
    return last;
  }

  private orderBefore(position: number): number | undefined {
    let best: number | undefined;
    for (const order of this.byOrder.keys()) {
      if (order < position && (best === undefined || order > best)) best = order;
    }
    return best;
  }

  private orderAfter(position: number): number | undefined {
    let best: number | undefined;
    for (const order of this.byOrder.keys()) {
      if (order > position && (best === undefined || order < best)) best = order;
    }
    return best;
  }
}
