import type {
  AuctionBidRecord,
  AuctionEventState,
  AuctionEventStatus,
  AuctionItemState,
  AuctionItemStatus,
  EventTransition,
  ItemSettlement,
} from './types';

const EVENT_TRANSITIONS: Record<AuctionEventStatus, AuctionEventStatus[]> = {
  planned: ['active', 'canceled'],
  active: ['ended', 'canceled'],
  ended: [],
  canceled: [],
};

const ITEM_TRANSITIONS: Record<AuctionItemStatus, AuctionItemStatus[]> = {
  pending: ['active', 'unsold', 'withdrawn'],
  active: ['sold', 'unsold', 'withdrawn'],
  sold: [],
  unsold: [],
  withdrawn: [],
};

/**
 * Thrown when persisted state contradicts an invariant the bidding core relies
 * on (two winners, a top bid that disagrees with current_bid). Never retried.
 */
export class AuctionInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuctionInvariantError';
  }
}

export function canTransitionEvent(
  from: AuctionEventStatus,
  to: AuctionEventStatus,
): boolean {
  return EVENT_TRANSITIONS[from].includes(to);
}

export function canTransitionItem(
  from: AuctionItemStatus,
  to: AuctionItemStatus,
): boolean {
  return ITEM_TRANSITIONS[from].includes(to);
}

/**
 * Time-driven transition due for an event at `now`, if any.
 */
export function planEventTransition(
  event: Pick<AuctionEventState, 'status' | 'startAt' | 'endAt'>,
  now: Date,
): EventTransition {
  const t = now.getTime();
  if (event.status === 'planned' && t >= event.startAt.getTime()) {
    return 'activate';
  }
  if (event.status === 'active' && t >= event.endAt.getTime()) {
    return 'close';
  }
  return null;
}

/**
 * True once the event is inside the closing-soon window but not yet due.
 */
export function isClosingSoon(
  event: Pick<AuctionEventState, 'status' | 'endAt'>,
  now: Date,
  windowMs: number,
): boolean {
  if (event.status !== 'active') return false;
  const remaining = event.endAt.getTime() - now.getTime();
  return remaining > 0 && remaining <= windowMs;
}

/**
 * Decide the terminal status of one lot at event closure.
 *
 * `topBid` must be the highest accepted bid for the item; a mismatch with
 * `item.currentBid` or an existing winner flag is an invariant breach.
 */
export function settleItem(
  item: AuctionItemState,
  topBid: AuctionBidRecord | null,
  existingWinners: number,
): ItemSettlement {
  if (existingWinners > 0) {
    throw new AuctionInvariantError(
      `Item ${item.id} already has ${existingWinners} winning bid(s) before closure`,
    );
  }

  if (item.status === 'pending') {
    return { status: 'unsold', itemId: item.id, reason: 'not_opened' };
  }
  if (item.status !== 'active') {
    throw new AuctionInvariantError(
      `Item ${item.id} cannot be settled from status ${item.status}`,
    );
  }

  if (item.currentBid === null) {
    if (topBid) {
      throw new AuctionInvariantError(
        `Item ${item.id} has bids but no current bid`,
      );
    }
    return { status: 'unsold', itemId: item.id, reason: 'no_bids' };
  }

  if (!topBid || topBid.amount !== item.currentBid) {
    throw new AuctionInvariantError(
      `Item ${item.id} current bid ${item.currentBid} does not match top bid ${topBid?.amount ?? 'none'}`,
    );
  }

  if (item.reservePrice !== null && item.currentBid < item.reservePrice) {
    return { status: 'unsold', itemId: item.id, reason: 'below_reserve' };
  }

  return {
    status: 'sold',
    itemId: item.id,
    winningBid: item.currentBid,
    winnerBidId: topBid.id,
    winnerId: topBid.userId,
  };
}
