// src/core/generic/registry.ts
// Insertion-ordered method table for one generic function, plus the event ledger

import { getActiveConfig } from "../config/config";
import {
  type DispatchKey,
  type GenericEvent,
  type Implementation,
  type KeywordSpecs,
  type MethodEntry,
  type SpecToken,
  dispatchKey,
} from "./types";

export type RegisterResult<R> = {
  entry: MethodEntry<R>;
  /** True if an existing method with the same key was replaced in place */
  replaced: boolean;
};

// ─────────────────────────────────────────────────────────────────
// Method Registry
// ─────────────────────────────────────────────────────────────────

/**
 * MethodRegistry: dispatch key -> method, iterated in first-insertion order.
 *
 * Writes publish a fresh entry array (copy-on-write), so a snapshot taken at
 * the start of a call is not affected by registrations made during it.
 * Entries are frozen; replacing an implementation goes through `register`.
 */
export class MethodRegistry<R> {
  private entries: ReadonlyArray<MethodEntry<R>> = [];
  private readonly positions = new Map<DispatchKey, number>();

  /**
   * Register a method. Re-registering an identical spec tuple replaces the
   * implementation without moving it.
   */
  register(
    specs: readonly SpecToken[],
    kwspecs: KeywordSpecs,
    method: Implementation<R>
  ): RegisterResult<R> {
    const key = dispatchKey(specs, kwspecs);
    const existing = this.positions.get(key);
    const now = Date.now();

    if (existing !== undefined) {
      const prev = this.entries[existing];
      const entry: MethodEntry<R> = Object.freeze({ ...prev, method, replacedAt: now });
      const next = [...this.entries];
      next[existing] = entry;
      this.entries = Object.freeze(next);
      return { entry, replaced: true };
    }

    const entry: MethodEntry<R> = Object.freeze({
      key,
      specs: Object.freeze([...specs]),
      kwspecs: Object.freeze({ ...kwspecs }),
      method,
      index: this.entries.length,
      registeredAt: now,
    });
    this.positions.set(key, entry.index);
    this.entries = Object.freeze([...this.entries, entry]);
    return { entry, replaced: false };
  }

  /**
   * Exact-key lookup, for introspection. Not used when dispatching.
   */
  lookup(specs: readonly SpecToken[], kwspecs: KeywordSpecs = {}): Implementation<R> | undefined {
    return this.getEntry(specs, kwspecs)?.method;
  }

  getEntry(specs: readonly SpecToken[], kwspecs: KeywordSpecs = {}): MethodEntry<R> | undefined {
    const position = this.positions.get(dispatchKey(specs, kwspecs));
    return position === undefined ? undefined : this.entries[position];
  }

  has(specs: readonly SpecToken[], kwspecs: KeywordSpecs = {}): boolean {
    return this.positions.has(dispatchKey(specs, kwspecs));
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Current entries in dispatch order. The array is never mutated.
   */
  snapshot(): ReadonlyArray<MethodEntry<R>> {
    return this.entries;
  }

  keys(): DispatchKey[] {
    return this.entries.map(e => e.key);
  }
}

// ─────────────────────────────────────────────────────────────────
// Event Logging
// ─────────────────────────────────────────────────────────────────

const eventLog: GenericEvent[] = [];

/**
 * Log a generic event. The ledger keeps at most `limit` events.
 */
export function logGenericEvent(event: GenericEvent, limit: number = getActiveConfig().maxEvents): void {
  eventLog.push(event);
  if (eventLog.length > limit) {
    eventLog.splice(0, eventLog.length - limit);
  }
}

/**
 * Get recent events.
 */
export function getRecentEvents(limit: number = 100): GenericEvent[] {
  return eventLog.slice(-limit);
}

/**
 * Clear event log (for testing).
 */
export function clearEventLog(): void {
  eventLog.length = 0;
}

/**
 * Count events by type.
 */
export function countEvents(tag: GenericEvent["tag"]): number {
  return eventLog.filter(e => e.tag === tag).length;
}
