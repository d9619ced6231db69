import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  BidValidator,
  type AuctionBidRecord,
  type AuctionEventState,
  type AuctionItemState,
  type BidField,
  type BidRejectCode,
} from './engine';
import { RedisService } from '../redis/redis.service';
import { LockUnavailableError } from './auction.errors';
import { AuctionNotifier } from './auction-notifier';
import {
  AuctionPersistenceService,
  type LockedItemScope,
} from './auction-persistence.service';
import { toBidResponse, type AuctionBidResponse } from './auction.serializer';

export type PlaceBidFailureCode = BidRejectCode | 'ITEM_NOT_FOUND' | 'TRY_AGAIN';

export type PlaceBidResult =
  | { accepted: true; bid: AuctionBidResponse; extendedUntil: string | null }
  | {
      accepted: false;
      code: PlaceBidFailureCode;
      field?: BidField;
      reason: string;
      minimum?: number;
    };

type BidCommit =
  | { accepted: false; result: PlaceBidResult }
  | {
      accepted: true;
      event: AuctionEventState;
      item: AuctionItemState;
      bid: AuctionBidRecord;
      previousTop: AuctionBidRecord | null;
      totalBids: number;
      extendedUntil: Date | null;
    };

const ITEM_NOT_FOUND: PlaceBidResult = {
  accepted: false,
  code: 'ITEM_NOT_FOUND',
  field: 'auction_item_id',
  reason: 'Auction item not found',
};

const TRY_AGAIN: PlaceBidResult = {
  accepted: false,
  code: 'TRY_AGAIN',
  reason: 'The item is busy, please try again',
};

const IDEMPOTENCY_POLL_ATTEMPTS = 40;
const IDEMPOTENCY_POLL_MS = 25;

function isPlaceBidResult(value: unknown): value is PlaceBidResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    'accepted' in value &&
    typeof value.accepted === 'boolean'
  );
}

@Injectable()
export class BidPlacementService {
  private readonly logger = new Logger(BidPlacementService.name);
  private readonly maxAttempts: number;

  constructor(
    private readonly persistence: AuctionPersistenceService,
    private readonly validator: BidValidator,
    private readonly notifier: AuctionNotifier,
    private readonly redis: RedisService,
    config: ConfigService,
  ) {
    this.maxAttempts = Math.max(
      1,
      config.get<number>('auction.maxBidAttempts') ?? 3,
    );
  }

  /**
   * Validate and record a bid under the event + item row locks.
   * Notifications go out only after the transaction committed.
   */
  async placeBid(
    itemId: number,
    userId: string,
    amount: number,
    idempotencyKey?: string,
  ): Promise<PlaceBidResult> {
    const key = idempotencyKey?.trim().slice(0, 128) || null;
    if (!key) return this.placeWithRetry(itemId, userId, amount);

    const existing = await this.readIdempotentResult(itemId, userId, key);
    if (existing) return existing;

    const claimed = await this.redis.claimBidIdempotency(itemId, userId, key);
    if (!claimed) {
      const settled = await this.waitForIdempotentResult(itemId, userId, key);
      return (
        settled ?? {
          accepted: false,
          code: 'TRY_AGAIN',
          reason: 'Duplicate bid in progress',
        }
      );
    }

    let result: PlaceBidResult;
    try {
      result = await this.placeWithRetry(itemId, userId, amount);
    } catch (err) {
      await this.redis.releaseBidIdempotency(itemId, userId, key);
      throw err;
    }

    if (!result.accepted && result.code === 'TRY_AGAIN') {
      await this.redis.releaseBidIdempotency(itemId, userId, key);
    } else {
      await this.redis.storeBidIdempotencyResult(
        itemId,
        userId,
        key,
        JSON.stringify(result),
      );
    }
    return result;
  }

  /* ------------------------------------------------------------------ */
  /*  TRANSACTION                                                        */
  /* ------------------------------------------------------------------ */

  private async placeWithRetry(
    itemId: number,
    userId: string,
    amount: number,
  ): Promise<PlaceBidResult> {
    for (let attempt = 1; ; attempt += 1) {
      let commit: BidCommit | null;
      try {
        commit = await this.persistence.withLockedItem(itemId, (scope) =>
          this.applyBid(scope, userId, amount),
        );
      } catch (err) {
        if (!(err instanceof LockUnavailableError)) throw err;
        this.logger.warn(
          `Lock conflict on item ${itemId} (attempt ${attempt}/${this.maxAttempts})`,
        );
        if (attempt >= this.maxAttempts) return TRY_AGAIN;
        continue;
      }

      if (commit === null) return ITEM_NOT_FOUND;
      if (!commit.accepted) return commit.result;

      this.notifyAccepted(commit);
      return {
        accepted: true,
        bid: toBidResponse(commit.bid),
        extendedUntil: commit.extendedUntil?.toISOString() ?? null,
      };
    }
  }

  private async applyBid(
    scope: LockedItemScope,
    userId: string,
    amount: number,
  ): Promise<BidCommit> {
    const { event, item, topBid } = scope;
    const now = new Date();

    const verdict = this.validator.validate({
      event,
      item,
      amount,
      bidderId: userId,
      topBidderId: topBid?.userId ?? null,
      now,
    });
    if (!verdict.ok) {
      const { code, field, reason, minimum } = verdict;
      return {
        accepted: false,
        result: {
          accepted: false,
          code,
          field,
          reason,
          ...(minimum !== undefined && { minimum }),
        },
      };
    }

    const bid = await scope.insertBid({
      itemId: item.id,
      userId,
      amount,
      placedAt: now,
      isAuto: false,
    });
    const totalBids = item.totalBids + 1;
    await scope.updateItemAggregate(item.id, amount, totalBids);

    const extendedUntil = this.validator.antiSnipeExtension(event, now);
    if (extendedUntil) {
      await scope.updateEvent(event.id, {
        endAt: extendedUntil,
        extensionCount: event.extensionCount + 1,
      });
    }

    return {
      accepted: true,
      event,
      item,
      bid,
      previousTop: topBid,
      totalBids,
      extendedUntil,
    };
  }

  /* ------------------------------------------------------------------ */
  /*  POST-COMMIT                                                        */
  /* ------------------------------------------------------------------ */

  private notifyAccepted(
    commit: Extract<BidCommit, { accepted: true }>,
  ): void {
    const { event, item, bid, previousTop, totalBids, extendedUntil } = commit;
    this.logger.log(
      `Bid ${bid.id} accepted on item ${item.id}: ${bid.amount} by ${bid.userId}`,
    );

    this.notifier.emit({
      event: 'bid_placed',
      auctionId: event.id,
      itemId: item.id,
      bid: {
        id: bid.id,
        itemId: bid.itemId,
        userId: bid.userId,
        amount: bid.amount,
        placedAt: bid.placedAt.toISOString(),
      },
      totalBids,
      minNextBid: this.validator.minimumFor({
        currentBid: bid.amount,
        startPrice: item.startPrice,
      }),
    });

    if (previousTop && previousTop.userId !== bid.userId) {
      this.notifier.emit({
        event: 'outbid',
        auctionId: event.id,
        itemId: item.id,
        userId: previousTop.userId,
        previousAmount: previousTop.amount,
        newAmount: bid.amount,
      });
    }

    if (extendedUntil) {
      this.logger.log(
        `Auction ${event.id} extended to ${extendedUntil.toISOString()} by a late bid`,
      );
      this.notifier.emit({
        event: 'auction_extended',
        auctionId: event.id,
        endAt: extendedUntil.toISOString(),
      });
    }
  }

  /* ------------------------------------------------------------------ */
  /*  IDEMPOTENCY                                                        */
  /* ------------------------------------------------------------------ */

  private async readIdempotentResult(
    itemId: number,
    userId: string,
    key: string,
  ): Promise<PlaceBidResult | null> {
    const raw = await this.redis.getBidIdempotencyResult(itemId, userId, key);
    if (!raw) return null;
    try {
      const parsed: unknown = JSON.parse(raw);
      return isPlaceBidResult(parsed) ? parsed : null;
    } catch {
      this.logger.warn(`Discarding unreadable idempotency result for item ${itemId}`);
      return null;
    }
  }

  private async waitForIdempotentResult(
    itemId: number,
    userId: string,
    key: string,
  ): Promise<PlaceBidResult | null> {
    for (let i = 0; i < IDEMPOTENCY_POLL_ATTEMPTS; i += 1) {
      const result = await this.readIdempotentResult(itemId, userId, key);
      if (result) return result;
      await new Promise((resolve) => setTimeout(resolve, IDEMPOTENCY_POLL_MS));
    }
    return null;
  }
}
