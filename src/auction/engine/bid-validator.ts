import type {
  AuctionEventState,
  AuctionItemState,
  BidPolicy,
  BidValidationInput,
  BidValidationResult,
} from './types';

/** numeric(12,0) upper bound for any stored amount. */
export const MAX_BID_AMOUNT = 999_999_999_999;

const BASIS_POINTS = 10_000n;

export const DEFAULT_BID_POLICY: BidPolicy = {
  incrementPercentage: 0.05,
  allowSelfOutbid: false,
  antiSnipeWindowMs: 15 * 60_000,
  antiSnipeExtensionMs: 15 * 60_000,
};

/**
 * Smallest acceptable next bid: the start price for the first bid, otherwise
 * the current bid raised by the increment and rounded up to a whole Toman.
 * Never less than one Toman over the current bid.
 */
export function minimumNextBid(
  item: Pick<AuctionItemState, 'currentBid' | 'startPrice'>,
  incrementPercentage: number,
): number {
  if (item.currentBid === null) return item.startPrice;
  const bps = BigInt(Math.round(incrementPercentage * 10_000));
  const scaled = BigInt(item.currentBid) * (BASIS_POINTS + bps);
  const rounded = Number((scaled + BASIS_POINTS - 1n) / BASIS_POINTS);
  return Math.max(rounded, item.currentBid + 1);
}

/**
 * Pure bid acceptance rules. Inspects state, never mutates it; the placement
 * service runs it under the item lock.
 */
export class BidValidator {
  constructor(private readonly policy: BidPolicy = DEFAULT_BID_POLICY) {
    const { incrementPercentage } = policy;
    if (!Number.isFinite(incrementPercentage) || incrementPercentage <= 0) {
      throw new RangeError(
        `Bid increment must be a positive fraction, got ${incrementPercentage}`,
      );
    }
  }

  getPolicy(): Readonly<BidPolicy> {
    return this.policy;
  }

  minimumFor(item: Pick<AuctionItemState, 'currentBid' | 'startPrice'>): number {
    return minimumNextBid(item, this.policy.incrementPercentage);
  }

  validate(input: BidValidationInput): BidValidationResult {
    const { event, item, amount, now } = input;

    if (!isAcceptingBids(event, now)) {
      return {
        ok: false,
        code: 'AUCTION_NOT_ACTIVE',
        field: 'auction_item_id',
        reason: `Auction is not active (status: ${event.status})`,
      };
    }

    if (item.status !== 'active') {
      return {
        ok: false,
        code: 'ITEM_NOT_ACTIVE',
        field: 'auction_item_id',
        reason: `Auction item is not active (status: ${item.status})`,
      };
    }

    if (!Number.isInteger(amount) || amount <= 0 || amount > MAX_BID_AMOUNT) {
      return {
        ok: false,
        code: 'INVALID_AMOUNT',
        field: 'amount',
        reason: 'Bid amount must be a positive whole number',
      };
    }

    const minimum = this.minimumFor(item);
    if (amount < minimum) {
      return {
        ok: false,
        code: 'BID_TOO_LOW',
        field: 'amount',
        reason:
          item.currentBid === null
            ? `Bid must be at least the start price (${minimum})`
            : `Bid must be at least ${minimum} (${formatPercent(this.policy.incrementPercentage)} above the current bid)`,
        minimum,
      };
    }

    if (
      !this.policy.allowSelfOutbid &&
      input.topBidderId !== null &&
      input.topBidderId === input.bidderId
    ) {
      return {
        ok: false,
        code: 'ALREADY_HIGHEST_BIDDER',
        field: 'auction_item_id',
        reason: 'You already hold the highest bid on this item',
        minimum,
      };
    }

    return { ok: true, minimum };
  }

  /**
   * New end time when a bid accepted at `now` lands inside the trailing
   * window, otherwise null.
   */
  antiSnipeExtension(
    event: Pick<AuctionEventState, 'endAt'>,
    now: Date,
  ): Date | null {
    const { antiSnipeWindowMs, antiSnipeExtensionMs } = this.policy;
    if (antiSnipeWindowMs <= 0 || antiSnipeExtensionMs <= 0) return null;
    const remaining = event.endAt.getTime() - now.getTime();
    if (remaining < 0 || remaining > antiSnipeWindowMs) return null;
    return new Date(event.endAt.getTime() + antiSnipeExtensionMs);
  }
}

export function isAcceptingBids(
  event: Pick<AuctionEventState, 'status' | 'startAt' | 'endAt'>,
  now: Date,
): boolean {
  if (event.status !== 'active') return false;
  const t = now.getTime();
  return t >= event.startAt.getTime() && t <= event.endAt.getTime();
}

function formatPercent(fraction: number): string {
  return `${Math.round(fraction * 10_000) / 100}%`;
}
