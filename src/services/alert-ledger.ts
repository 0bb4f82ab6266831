/**
 * Alert Ledger
 *
 * Ordered in-memory collection of a trader's alerts. At most one Open alert
 * may exist per (type, level) pair: a candidate matching an Open entry is
 * discarded at insertion. Resolving an alert is terminal and does not stop
 * an identical alert from being raised again later.
 */

import { NotFoundError } from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AlertType = "risk" | "performance" | "system" | "trade";

export type AlertLevel = "info" | "warning" | "critical";

export interface Alert {
  id: string;
  traderId: string;
  type: AlertType;
  level: AlertLevel;
  title: string;
  message: string;
  /** ISO timestamp */
  raisedAt: string;
  /** ISO timestamp; null while the alert is Open */
  resolvedAt: string | null;
}

export function isOpen(alert: Alert): boolean {
  return alert.resolvedAt === null;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Entries kept before the oldest Resolved alerts are evicted */
export const MAX_ALERT_LEDGER = 500;

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export class AlertLedger {
  private readonly entries: Alert[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries = MAX_ALERT_LEDGER) {
    this.maxEntries = maxEntries;
  }

  get size(): number {
    return this.entries.length;
  }

  get openCount(): number {
    return this.entries.filter(isOpen).length;
  }

  /**
   * Append the candidate unless an Open alert with the same (type, level)
   * already exists. Returns whether it was appended.
   */
  admit(candidate: Alert): boolean {
    const duplicate = this.entries.some(
      (a) =>
        isOpen(a) && a.type === candidate.type && a.level === candidate.level,
    );
    if (duplicate) return false;

    this.entries.push({ ...candidate });
    this.evictResolved();
    return true;
  }

  /**
   * Mark an alert Resolved. Resolving an already-Resolved alert keeps its
   * original `resolvedAt`.
   *
   * @throws NotFoundError when no entry has this id
   */
  resolve(id: string, resolvedAt: string = new Date().toISOString()): Alert {
    const alert = this.entries.find((a) => a.id === id);
    if (!alert) {
      throw new NotFoundError(`alert ${id} not found`);
    }
    if (alert.resolvedAt === null) {
      alert.resolvedAt = resolvedAt;
    }
    return { ...alert };
  }

  /**
   * Copies of the entries, newest first by `raisedAt`. Ties keep reverse
   * insertion order. `limit <= 0` returns everything.
   */
  list(limit = 0): Alert[] {
    const sorted = this.entries
      .map((a) => ({ ...a }))
      .reverse()
      .sort((a, b) => Date.parse(b.raisedAt) - Date.parse(a.raisedAt));
    return limit > 0 ? sorted.slice(0, limit) : sorted;
  }

  /**
   * Id for a new alert, suffixed when the base id is already taken (an alert
   * resolved and re-raised within the same second).
   */
  uniqueId(base: string): string {
    if (!this.entries.some((a) => a.id === base)) return base;
    let n = 2;
    while (this.entries.some((a) => a.id === `${base}_${n}`)) n++;
    return `${base}_${n}`;
  }

  private evictResolved(): void {
    let excess = this.entries.length - this.maxEntries;
    for (let i = 0; i < this.entries.length && excess > 0; ) {
      if (isOpen(this.entries[i])) {
        i++;
      } else {
        this.entries.splice(i, 1);
        excess--;
      }
    }
  }
}
