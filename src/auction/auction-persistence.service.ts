import type {
  AuctionBidRecord,
  AuctionEventState,
  AuctionEventStatus,
  AuctionItemState,
  AuctionItemStatus,
} from './engine';

export interface NewBidInput {
  itemId: number;
  userId: string;
  amount: number;
  placedAt: Date;
  isAuto: boolean;
}

export interface NewAuctionEventInput {
  title: string;
  slug: string;
  description: string;
  shortDescription: string;
  galleryId: number | null;
  organizer: string;
  startAt: Date;
  endAt: Date;
  isLive: boolean;
  isOnline: boolean;
  liveUrl: string | null;
  isFeatured: boolean;
  commissionRate: number;
  registrationRequired: boolean;
  registrationFee: number;
}

export interface NewAuctionItemInput {
  productId: string;
  title: string;
  lotNumber: number;
  startPrice: number;
  reservePrice: number | null;
  estimatedPriceMin: number | null;
  estimatedPriceMax: number | null;
  status: Extract<AuctionItemStatus, 'pending' | 'active'>;
}

export type ItemPatch = Partial<
  Pick<AuctionItemState, 'status' | 'winningBid' | 'hammerTime'>
>;

export type EventPatch = {
  status?: AuctionEventStatus;
  endAt?: Date;
  extensionCount?: number;
  closedAt?: Date | null;
};

/**
 * Work done while the parent event row and the item row are locked. Every
 * write lands in the same transaction and commits only if `work` resolves.
 */
export interface LockedItemScope {
  readonly event: AuctionEventState;
  readonly item: AuctionItemState;
  readonly topBid: AuctionBidRecord | null;
  insertBid(input: NewBidInput): Promise<AuctionBidRecord>;
  updateItemAggregate(
    itemId: number,
    currentBid: number,
    totalBids: number,
  ): Promise<void>;
  updateItem(itemId: number, patch: ItemPatch): Promise<void>;
  updateEvent(eventId: number, patch: EventPatch): Promise<void>;
}

/**
 * Work done while an event row and all of its item rows are locked.
 */
export interface LockedEventScope {
  readonly event: AuctionEventState;
  readonly items: readonly AuctionItemState[];
  topBid(itemId: number): Promise<AuctionBidRecord | null>;
  countWinners(itemId: number): Promise<number>;
  markWinner(bidId: number): Promise<void>;
  updateItem(itemId: number, patch: ItemPatch): Promise<void>;
  updateEvent(eventId: number, patch: EventPatch): Promise<void>;
  insertItem(input: NewAuctionItemInput): Promise<AuctionItemState>;
}

export interface EventLockOptions {
  /** Fail with LockUnavailableError instead of waiting for the lock. */
  noWait?: boolean;
}

/**
 * Transactional store for the bidding core. Lock order is always event row,
 * then item rows; every mutation of bid aggregates or statuses goes through
 * one of the `withLocked*` units of work.
 */
export abstract class AuctionPersistenceService {
  /** Resolves null when the item does not exist. */
  abstract withLockedItem<T>(
    itemId: number,
    work: (scope: LockedItemScope) => Promise<T>,
  ): Promise<T | null>;

  /** Resolves null when the event does not exist. */
  abstract withLockedEvent<T>(
    eventId: number,
    work: (scope: LockedEventScope) => Promise<T>,
    options?: EventLockOptions,
  ): Promise<T | null>;

  abstract createEvent(input: NewAuctionEventInput): Promise<AuctionEventState>;

  /** Planned events past their start and active events past their end. Unlocked read. */
  abstract findDueEventIds(now: Date): Promise<number[]>;

  /** Active events whose end falls in (now, until]. Unlocked read. */
  abstract findEventsEndingBetween(
    now: Date,
    until: Date,
  ): Promise<AuctionEventState[]>;

  abstract findBids(itemId: number): Promise<AuctionBidRecord[]>;
}
