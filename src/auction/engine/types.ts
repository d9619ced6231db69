/**
 * Event-level state: planned → active → ended, canceled from planned | active.
 */
export type AuctionEventStatus = 'planned' | 'active' | 'ended' | 'canceled';

/**
 * Lot-level state: pending → active → sold | unsold, withdrawn from pending | active.
 */
export type AuctionItemStatus =
  | 'pending'
  | 'active'
  | 'sold'
  | 'unsold'
  | 'withdrawn';

export const AUCTION_EVENT_STATUSES: readonly AuctionEventStatus[] = [
  'planned',
  'active',
  'ended',
  'canceled',
];

export const AUCTION_ITEM_STATUSES: readonly AuctionItemStatus[] = [
  'pending',
  'active',
  'sold',
  'unsold',
  'withdrawn',
];

/**
 * One scheduled sale session. Amounts are whole Toman.
 */
export interface AuctionEventState {
  id: number;
  slug: string;
  title: string;
  galleryId: number | null;
  galleryOwnerId: string | null;
  organizer: string;
  startAt: Date;
  endAt: Date;
  isLive: boolean;
  isOnline: boolean;
  status: AuctionEventStatus;
  isFeatured: boolean;
  commissionRate: number;
  extensionCount: number;
  closedAt: Date | null;
}

/**
 * One lot within an event. `currentBid` null means no accepted bid yet.
 */
export interface AuctionItemState {
  id: number;
  eventId: number;
  productId: string;
  title: string;
  lotNumber: number;
  startPrice: number;
  reservePrice: number | null;
  currentBid: number | null;
  winningBid: number | null;
  totalBids: number;
  status: AuctionItemStatus;
  hammerTime: Date | null;
}

/**
 * An accepted bid. Immutable apart from `isWinner`.
 */
export interface AuctionBidRecord {
  id: number;
  itemId: number;
  userId: string;
  amount: number;
  placedAt: Date;
  isWinner: boolean;
  isAuto: boolean;
}

/**
 * Tunables for bid acceptance and late-bid extension.
 */
export interface BidPolicy {
  /** Fraction over the current bid the next bid must reach, e.g. 0.05. */
  incrementPercentage: number;
  allowSelfOutbid: boolean;
  antiSnipeWindowMs: number;
  antiSnipeExtensionMs: number;
}

export type BidRejectCode =
  | 'AUCTION_NOT_ACTIVE'
  | 'ITEM_NOT_ACTIVE'
  | 'INVALID_AMOUNT'
  | 'BID_TOO_LOW'
  | 'ALREADY_HIGHEST_BIDDER';

/** Request field a rejection is reported against. */
export type BidField = 'auction_item_id' | 'amount';

export interface BidValidationInput {
  event: AuctionEventState;
  item: AuctionItemState;
  amount: number;
  bidderId: string;
  topBidderId: string | null;
  now: Date;
}

/**
 * Result of BidValidator.validate() – explicit accept or the first rule that failed.
 */
export type BidValidationResult =
  | { ok: true; minimum: number }
  | {
      ok: false;
      code: BidRejectCode;
      field: BidField;
      reason: string;
      minimum?: number;
    };

/**
 * What the periodic sweep should do to an event right now.
 */
export type EventTransition = 'activate' | 'close' | null;

/**
 * Outcome of settling one lot at closure.
 */
export type ItemSettlement =
  | {
      status: 'sold';
      itemId: number;
      winningBid: number;
      winnerBidId: number;
      winnerId: string;
    }
  | {
      status: 'unsold';
      itemId: number;
      reason: 'no_bids' | 'below_reserve' | 'not_opened';
    };
