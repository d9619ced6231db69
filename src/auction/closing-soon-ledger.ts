/**
 * Per-instance record of closing-soon notices already sent, keyed by event
 * and end time. A new end time (anti-snipe extension) re-arms the notice.
 */
export class ClosingSoonLedger {
  private readonly endAtByEvent = new Map<number, number>();

  get size(): number {
    return this.endAtByEvent.size;
  }

  /** Records the notice and returns true when it has not been sent yet. */
  claim(eventId: number, endAt: Date): boolean {
    const end = endAt.getTime();
    if (this.endAtByEvent.get(eventId) === end) return false;
    this.endAtByEvent.set(eventId, end);
    return true;
  }

  forget(eventId: number): void {
    this.endAtByEvent.delete(eventId);
  }

  /** Drops events whose announced end has passed, wherever they were closed. */
  prune(now: Date): void {
    const t = now.getTime();
    for (const [eventId, end] of this.endAtByEvent) {
      if (end < t) this.endAtByEvent.delete(eventId);
    }
  }
}
