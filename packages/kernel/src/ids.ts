/**
 * Hook ids.
 *
 * Every input hook gets a process-unique numeric id from a monotonic
 * counter. Related hooks may share a tag so they can be removed together.
 */

import type { HookIdentity } from "@replkit/shared";

/**
 * Source of monotonically increasing ids. Swap in a fresh allocator in tests
 * to get deterministic ids.
 */
export class IdAllocator {
  private next: number;

  constructor(start = 0) {
    this.next = start;
  }

  allocate(): number {
    return this.next++;
  }

  peek(): number {
    return this.next;
  }
}

let defaultAllocator = new IdAllocator();

export function setDefaultIdAllocator(allocator: IdAllocator): IdAllocator {
  const previous = defaultAllocator;
  defaultAllocator = allocator;
  return previous;
}

export class HookId implements HookIdentity {
  private constructor(
    readonly id: number,
    readonly tag?: string,
  ) {}

  static next(tag?: string, allocator: IdAllocator = defaultAllocator): HookId {
    return new HookId(allocator.allocate(), tag);
  }

  /** Ids compare by their numeric value only. */
  equals(other: HookIdentity): boolean {
    return this.id === other.id;
  }

  hasTag(tag: string): boolean {
    return this.tag === tag;
  }

  toString(): string {
    return this.tag ? `${this.id}:${this.tag}` : String(this.id);
  }
}
