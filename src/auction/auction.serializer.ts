import { isAcceptingBids, type AuctionBidRecord } from './engine';
import type { AuctionEventEntity } from './entities/auction-event.entity';
import type { AuctionItemEntity } from './entities/auction-item.entity';
import type { GalleryEntity } from './entities/gallery.entity';

/**
 * Wire shapes. Field names follow the public API (snake_case).
 */
export interface AuctionBidResponse {
  id: number;
  auction_item: number;
  user: string;
  amount: number;
  placed_at: string;
  is_winner: boolean;
  is_auto: boolean;
}

export interface GallerySummaryResponse {
  id: number;
  slug: string;
  name: string;
}

export interface AuctionEventSummaryResponse {
  id: number;
  title: string;
  slug: string;
  short_description: string;
  gallery: GallerySummaryResponse | null;
  organizer: string;
  start_datetime: string;
  end_datetime: string;
  is_live: boolean;
  is_online: boolean;
  status: AuctionEventEntity['status'];
  is_featured: boolean;
  is_active: boolean;
  items_count: number;
}

export interface AuctionItemSummaryResponse {
  id: number;
  auction: number;
  product: string;
  title: string;
  lot_number: number;
  start_price: number;
  current_bid: number | null;
  total_bids: number;
  status: AuctionItemEntity['status'];
  min_next_bid: number | null;
}

export interface AuctionEventDetailResponse extends AuctionEventSummaryResponse {
  description: string;
  live_url: string | null;
  commission_rate: number;
  registration_required: boolean;
  registration_fee: number;
  extension_count: number;
  closed_at: string | null;
  created_at: string;
  updated_at: string;
  items: AuctionItemSummaryResponse[];
}

export interface AuctionItemDetailResponse extends AuctionItemSummaryResponse {
  reserve_price: number | null;
  estimated_price_min: number | null;
  estimated_price_max: number | null;
  winning_bid: number | null;
  hammer_time: string | null;
  bids: AuctionBidResponse[];
}

export interface Page<T> {
  count: number;
  page: number;
  page_size: number;
  consistency: 'snapshot';
  results: T[];
}

export function toBidResponse(bid: AuctionBidRecord): AuctionBidResponse {
  return {
    id: bid.id,
    auction_item: bid.itemId,
    user: bid.userId,
    amount: bid.amount,
    placed_at: bid.placedAt.toISOString(),
    is_winner: bid.isWinner,
    is_auto: bid.isAuto,
  };
}

function toGalleryResponse(
  gallery: GalleryEntity | null,
): GallerySummaryResponse | null {
  return gallery && { id: gallery.id, slug: gallery.slug, name: gallery.name };
}

export function toEventSummary(
  event: AuctionEventEntity,
  itemsCount: number,
  now: Date,
): AuctionEventSummaryResponse {
  return {
    id: event.id,
    title: event.title,
    slug: event.slug,
    short_description: event.shortDescription,
    gallery: toGalleryResponse(event.gallery),
    organizer: event.organizer,
    start_datetime: event.startAt.toISOString(),
    end_datetime: event.endAt.toISOString(),
    is_live: event.isLive,
    is_online: event.isOnline,
    status: event.status,
    is_featured: event.isFeatured,
    is_active: isAcceptingBids(event, now),
    items_count: itemsCount,
  };
}

/** `minNextBid` is null once the lot no longer takes bids. */
export function toItemSummary(
  item: AuctionItemEntity,
  minNextBid: number | null,
): AuctionItemSummaryResponse {
  return {
    id: item.id,
    auction: item.eventId,
    product: item.productId,
    title: item.title,
    lot_number: item.lotNumber,
    start_price: item.startPrice,
    current_bid: item.currentBid,
    total_bids: item.totalBids,
    status: item.status,
    min_next_bid: minNextBid,
  };
}

export function toEventDetail(
  event: AuctionEventEntity,
  items: AuctionItemSummaryResponse[],
  now: Date,
): AuctionEventDetailResponse {
  return {
    ...toEventSummary(event, items.length, now),
    description: event.description,
    live_url: event.liveUrl,
    commission_rate: event.commissionRate,
    registration_required: event.registrationRequired,
    registration_fee: event.registrationFee,
    extension_count: event.extensionCount,
    closed_at: event.closedAt?.toISOString() ?? null,
    created_at: event.createdAt.toISOString(),
    updated_at: event.updatedAt.toISOString(),
    items,
  };
}

export function toItemDetail(
  item: AuctionItemEntity,
  minNextBid: number | null,
  bids: AuctionBidRecord[],
): AuctionItemDetailResponse {
  return {
    ...toItemSummary(item, minNextBid),
    reserve_price: item.reservePrice,
    estimated_price_min: item.estimatedPriceMin,
    estimated_price_max: item.estimatedPriceMax,
    winning_bid: item.winningBid,
    hammer_time: item.hammerTime?.toISOString() ?? null,
    bids: bids.map(toBidResponse),
  };
}
