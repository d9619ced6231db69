import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter } from 'node:events';

export interface NotifiedBid {
  id: number;
  itemId: number;
  userId: string;
  amount: number;
  placedAt: string;
}

export type AuctionNotification =
  | {
      event: 'bid_placed';
      auctionId: number;
      itemId: number;
      bid: NotifiedBid;
      totalBids: number;
      minNextBid: number;
    }
  | {
      event: 'outbid';
      auctionId: number;
      itemId: number;
      userId: string;
      previousAmount: number;
      newAmount: number;
    }
  | { event: 'auction_extended'; auctionId: number; endAt: string }
  | { event: 'auction_started'; auctionId: number; itemIds: number[] }
  | { event: 'closing_soon'; auctionId: number; endAt: string }
  | {
      event: 'item_sold';
      auctionId: number;
      itemId: number;
      winnerId: string;
      winningBid: number;
    }
  | {
      event: 'item_unsold';
      auctionId: number;
      itemId: number;
      reason: 'no_bids' | 'below_reserve' | 'not_opened';
    }
  | { event: 'item_withdrawn'; auctionId: number; itemId: number }
  | {
      event: 'auction_ended';
      auctionId: number;
      results: Array<{
        itemId: number;
        winnerId: string | null;
        winningBid: number | null;
      }>;
    }
  | { event: 'auction_canceled'; auctionId: number; withdrawnItemIds: number[] };

export type AuctionNotificationListener = (n: AuctionNotification) => void;

const CHANNEL = 'notification';

/**
 * In-process fan-out for post-commit auction notifications. Callers emit only
 * after their transaction committed; a failing listener never reaches them.
 */
@Injectable()
export class AuctionNotifier {
  private readonly emitter = new EventEmitter();
  private readonly logger = new Logger(AuctionNotifier.name);

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  subscribe(listener: AuctionNotificationListener): () => void {
    const guarded = (n: AuctionNotification) => {
      try {
        listener(n);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        this.logger.error(
          `Listener failed for ${n.event} on auction ${n.auctionId}: ${msg}`,
          err instanceof Error ? err.stack : undefined,
        );
      }
    };
    this.emitter.on(CHANNEL, guarded);
    return () => {
      this.emitter.off(CHANNEL, guarded);
    };
  }

  emit(notification: AuctionNotification): void {
    this.emitter.emit(CHANNEL, notification);
  }
}
