import type {
  AuctionBidRecord,
  AuctionEventState,
  AuctionItemState,
} from '../engine';
import { LockUnavailableError } from '../auction.errors';
import {
  AuctionPersistenceService,
  type EventLockOptions,
  type EventPatch,
  type ItemPatch,
  type LockedEventScope,
  type LockedItemScope,
  type NewAuctionEventInput,
  type NewAuctionItemInput,
  type NewBidInput,
} from '../auction-persistence.service';

type Undo = () => void;

const DAY_MS = 24 * 60 * 60_000;

/**
 * Process-local stand-in for the PostgreSQL store. Event rows are locked by
 * chaining promises per event id; writes made inside a unit of work are
 * undone when the work throws.
 */
export class InMemoryAuctionPersistence extends AuctionPersistenceService {
  private readonly events = new Map<number, AuctionEventState>();
  private readonly items = new Map<number, AuctionItemState>();
  private readonly bids = new Map<number, AuctionBidRecord>();
  private readonly lockTails = new Map<number, Promise<void>>();
  private nextEventId = 1;
  private nextItemId = 1;
  private nextBidId = 1;
  private pendingLockFailures = 0;

  /** Units of work that ran to completion. */
  commits = 0;

  /* ------------------------------------------------------------------ */
  /*  SEEDING                                                            */
  /* ------------------------------------------------------------------ */

  seedEvent(overrides: Partial<AuctionEventState> = {}): AuctionEventState {
    const id = overrides.id ?? this.nextEventId;
    this.nextEventId = Math.max(this.nextEventId, id + 1);
    const now = Date.now();
    const event: AuctionEventState = {
      id,
      slug: `event-${id}`,
      title: `Event ${id}`,
      galleryId: null,
      galleryOwnerId: null,
      organizer: 'Test Organizer',
      startAt: new Date(now - DAY_MS),
      endAt: new Date(now + DAY_MS),
      isLive: false,
      isOnline: true,
      status: 'active',
      isFeatured: false,
      commissionRate: 10,
      extensionCount: 0,
      closedAt: null,
      ...overrides,
    };
    this.events.set(id, event);
    return { ...event };
  }

  seedItem(
    eventId: number,
    overrides: Partial<AuctionItemState> = {},
  ): AuctionItemState {
    const id = overrides.id ?? this.nextItemId;
    this.nextItemId = Math.max(this.nextItemId, id + 1);
    const item: AuctionItemState = {
      id,
      eventId,
      productId: `product-${id}`,
      title: `Lot ${id}`,
      lotNumber: id,
      startPrice: 1_000_000,
      reservePrice: null,
      currentBid: null,
      winningBid: null,
      totalBids: 0,
      status: 'active',
      hammerTime: null,
      ...overrides,
    };
    this.items.set(id, item);
    return { ...item };
  }

  /** Adds a bid row as-is; aggregates on the item are left to the caller. */
  seedBid(
    itemId: number,
    userId: string,
    amount: number,
    overrides: Partial<AuctionBidRecord> = {},
  ): AuctionBidRecord {
    const bid: AuctionBidRecord = {
      id: this.nextBidId++,
      itemId,
      userId,
      amount,
      placedAt: new Date(),
      isWinner: false,
      isAuto: false,
      ...overrides,
    };
    this.bids.set(bid.id, bid);
    return { ...bid };
  }

  getEvent(id: number): AuctionEventState | undefined {
    const event = this.events.get(id);
    return event && { ...event };
  }

  getItem(id: number): AuctionItemState | undefined {
    const item = this.items.get(id);
    return item && { ...item };
  }

  bidsFor(itemId: number): AuctionBidRecord[] {
    return [...this.bids.values()]
      .filter((b) => b.itemId === itemId)
      .sort((a, b) => a.id - b.id)
      .map((b) => ({ ...b }));
  }

  /** The next `count` lock attempts fail as if lock_timeout expired. */
  failNextLocks(count: number): void {
    this.pendingLockFailures = count;
  }

  /** Holds an event lock until the returned release is called. */
  async holdLock(eventId: number): Promise<() => void> {
    return this.acquire(eventId, false);
  }

  /* ------------------------------------------------------------------ */
  /*  UNITS OF WORK                                                      */
  /* ------------------------------------------------------------------ */

  async withLockedItem<T>(
    itemId: number,
    work: (scope: LockedItemScope) => Promise<T>,
  ): Promise<T | null> {
    const ref = this.items.get(itemId);
    if (!ref) return null;

    const release = await this.acquire(ref.eventId, false);
    const undo: Undo[] = [];
    try {
      const event = this.events.get(ref.eventId);
      const item = this.items.get(itemId);
      if (!event || !item) return null;

      const scope: LockedItemScope = {
        event: { ...event },
        item: { ...item },
        topBid: this.topBidOf(itemId),
        insertBid: async (input) => this.insertBid(input, undo),
        updateItemAggregate: async (id, currentBid, totalBids) => {
          this.patchItem(id, { currentBid, totalBids }, undo);
        },
        updateItem: async (id, patch) => this.patchItem(id, patch, undo),
        updateEvent: async (id, patch) => this.patchEvent(id, patch, undo),
      };
      const result = await work(scope);
      this.commits += 1;
      return result;
    } catch (err) {
      rollback(undo);
      throw err;
    } finally {
      release();
    }
  }

  async withLockedEvent<T>(
    eventId: number,
    work: (scope: LockedEventScope) => Promise<T>,
    options: EventLockOptions = {},
  ): Promise<T | null> {
    if (!this.events.has(eventId)) return null;

    const release = await this.acquire(eventId, options.noWait ?? false);
    const undo: Undo[] = [];
    try {
      const event = this.events.get(eventId);
      if (!event) return null;
      const items = [...this.items.values()]
        .filter((i) => i.eventId === eventId)
        .sort((a, b) => a.lotNumber - b.lotNumber)
        .map((i) => ({ ...i }));

      const scope: LockedEventScope = {
        event: { ...event },
        items,
        topBid: async (itemId) => this.topBidOf(itemId),
        countWinners: async (itemId) =>
          [...this.bids.values()].filter((b) => b.itemId === itemId && b.isWinner)
            .length,
        markWinner: async (bidId) => {
          const bid = this.bids.get(bidId);
          if (!bid) return;
          const before = { ...bid };
          this.bids.set(bidId, { ...bid, isWinner: true });
          undo.push(() => this.bids.set(bidId, before));
        },
        updateItem: async (id, patch) => this.patchItem(id, patch, undo),
        updateEvent: async (id, patch) => this.patchEvent(id, patch, undo),
        insertItem: async (input) => this.insertItem(eventId, input, undo),
      };
      const result = await work(scope);
      this.commits += 1;
      return result;
    } catch (err) {
      rollback(undo);
      throw err;
    } finally {
      release();
    }
  }

  /* ------------------------------------------------------------------ */
  /*  WRITES / READS                                                     */
  /* ------------------------------------------------------------------ */

  async createEvent(input: NewAuctionEventInput): Promise<AuctionEventState> {
    return this.seedEvent({
      slug: input.slug,
      title: input.title,
      galleryId: input.galleryId,
      organizer: input.organizer,
      startAt: input.startAt,
      endAt: input.endAt,
      isLive: input.isLive,
      isOnline: input.isOnline,
      isFeatured: input.isFeatured,
      commissionRate: input.commissionRate,
      status: 'planned',
    });
  }

  async findDueEventIds(now: Date): Promise<number[]> {
    const t = now.getTime();
    return [...this.events.values()]
      .filter(
        (e) =>
          (e.status === 'planned' && e.startAt.getTime() <= t) ||
          (e.status === 'active' && e.endAt.getTime() <= t),
      )
      .sort((a, b) => a.endAt.getTime() - b.endAt.getTime())
      .map((e) => e.id);
  }

  async findEventsEndingBetween(
    now: Date,
    until: Date,
  ): Promise<AuctionEventState[]> {
    return [...this.events.values()]
      .filter(
        (e) =>
          e.status === 'active' &&
          e.endAt.getTime() > now.getTime() &&
          e.endAt.getTime() <= until.getTime(),
      )
      .map((e) => ({ ...e }));
  }

  async findBids(itemId: number): Promise<AuctionBidRecord[]> {
    return this.bidsFor(itemId).sort(
      (a, b) => b.amount - a.amount || b.id - a.id,
    );
  }

  /* ------------------------------------------------------------------ */
  /*  HELPERS                                                            */
  /* ------------------------------------------------------------------ */

  private async acquire(eventId: number, noWait: boolean): Promise<() => void> {
    if (this.pendingLockFailures > 0) {
      this.pendingLockFailures -= 1;
      throw new LockUnavailableError(undefined, '55P03');
    }
    const previous = this.lockTails.get(eventId);
    if (noWait && previous) {
      throw new LockUnavailableError(undefined, '55P03');
    }

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = (previous ?? Promise.resolve()).then(() => held);
    this.lockTails.set(eventId, tail);
    await previous;

    return () => {
      if (this.lockTails.get(eventId) === tail) this.lockTails.delete(eventId);
      release();
    };
  }

  private topBidOf(itemId: number): AuctionBidRecord | null {
    let top: AuctionBidRecord | null = null;
    for (const bid of this.bids.values()) {
      if (bid.itemId !== itemId) continue;
      if (
        !top ||
        bid.amount > top.amount ||
        (bid.amount === top.amount && bid.id > top.id)
      ) {
        top = bid;
      }
    }
    return top && { ...top };
  }

  private insertBid(input: NewBidInput, undo: Undo[]): AuctionBidRecord {
    const bid: AuctionBidRecord = {
      id: this.nextBidId++,
      ...input,
      isWinner: false,
    };
    this.bids.set(bid.id, bid);
    undo.push(() => this.bids.delete(bid.id));
    return { ...bid };
  }

  private insertItem(
    eventId: number,
    input: NewAuctionItemInput,
    undo: Undo[],
  ): AuctionItemState {
    const item = this.seedItem(eventId, {
      productId: input.productId,
      title: input.title,
      lotNumber: input.lotNumber,
      startPrice: input.startPrice,
      reservePrice: input.reservePrice,
      status: input.status,
    });
    undo.push(() => this.items.delete(item.id));
    return item;
  }

  private patchItem(
    itemId: number,
    patch: ItemPatch & Partial<Pick<AuctionItemState, 'currentBid' | 'totalBids'>>,
    undo: Undo[],
  ): void {
    const item = this.items.get(itemId);
    if (!item) return;
    this.items.set(itemId, { ...item, ...patch });
    undo.push(() => this.items.set(itemId, item));
  }

  private patchEvent(eventId: number, patch: EventPatch, undo: Undo[]): void {
    const event = this.events.get(eventId);
    if (!event) return;
    this.events.set(eventId, { ...event, ...patch });
    undo.push(() => this.events.set(eventId, event));
  }
}

function rollback(undo: Undo[]): void {
  for (let i = undo.length - 1; i >= 0; i -= 1) {
    undo[i]?.();
  }
}
