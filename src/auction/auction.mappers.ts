import type {
  AuctionBidRecord,
  AuctionEventState,
  AuctionItemState,
} from './engine';
import type { AuctionBidEntity } from './entities/auction-bid.entity';
import type { AuctionEventEntity } from './entities/auction-event.entity';
import type { AuctionItemEntity } from './entities/auction-item.entity';

/** Convert an event row into engine state */
export function toEventState(
  event: AuctionEventEntity,
  galleryOwnerId: string | null,
): AuctionEventState {
  return {
    id: event.id,
    slug: event.slug,
    title: event.title,
    galleryId: event.galleryId,
    galleryOwnerId,
    organizer: event.organizer,
    startAt: event.startAt,
    endAt: event.endAt,
    isLive: event.isLive,
    isOnline: event.isOnline,
    status: event.status,
    isFeatured: event.isFeatured,
    commissionRate: event.commissionRate,
    extensionCount: event.extensionCount,
    closedAt: event.closedAt,
  };
}

export function toItemState(item: AuctionItemEntity): AuctionItemState {
  return {
    id: item.id,
    eventId: item.eventId,
    productId: item.productId,
    title: item.title,
    lotNumber: item.lotNumber,
    startPrice: item.startPrice,
    reservePrice: item.reservePrice,
    currentBid: item.currentBid,
    winningBid: item.winningBid,
    totalBids: item.totalBids,
    status: item.status,
    hammerTime: item.hammerTime,
  };
}

export function toBidRecord(bid: AuctionBidEntity): AuctionBidRecord {
  return {
    id: bid.id,
    itemId: bid.itemId,
    userId: bid.userId,
    amount: bid.amount,
    placedAt: bid.placedAt,
    isWinner: bid.isWinner,
    isAuto: bid.isAuto,
  };
}
