import { Injectable, NotFoundException } from '@nestjs/common';
import { DataSource, In, type SelectQueryBuilder } from 'typeorm';
import {
  BidValidator,
  isAcceptingBids,
  visibleBids,
  type BidViewer,
} from './engine';
import {
  and,
  byEventStatus,
  byFlag,
  byGallery,
  byItemStatus,
  byPeriod,
  byPriceRange,
  bySearch,
  excludeCanceled,
} from './auction-filters';
import { AuctionPersistenceService } from './auction-persistence.service';
import {
  toEventDetail,
  toEventSummary,
  toItemDetail,
  toItemSummary,
  type AuctionBidResponse,
  type AuctionEventDetailResponse,
  type AuctionEventSummaryResponse,
  type AuctionItemDetailResponse,
  type AuctionItemSummaryResponse,
  type Page,
  toBidResponse,
} from './auction.serializer';
import {
  DEFAULT_PAGE_SIZE,
  type AuctionOrdering,
  type ListAuctionsQueryDto,
} from './dto/list-auctions-query.dto';
import type { ListItemsQueryDto } from './dto/list-items-query.dto';
import { AuctionEventEntity } from './entities/auction-event.entity';
import { AuctionItemEntity } from './entities/auction-item.entity';

const ORDER_COLUMNS: Record<string, string> = {
  start_datetime: 'event.startAt',
  end_datetime: 'event.endAt',
  created_at: 'event.createdAt',
};

function orderingOf(ordering: AuctionOrdering = '-start_datetime'): {
  column: string;
  direction: 'ASC' | 'DESC';
} {
  const descending = ordering.startsWith('-');
  const key = descending ? ordering.slice(1) : ordering;
  return {
    column: ORDER_COLUMNS[key] ?? 'event.startAt',
    direction: descending ? 'DESC' : 'ASC',
  };
}

/**
 * Read side. Every response is a snapshot taken outside the bidding
 * transactions and may trail a bid that commits concurrently.
 */
@Injectable()
export class AuctionQueryService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly persistence: AuctionPersistenceService,
    private readonly validator: BidValidator,
  ) {}

  async listEvents(
    query: ListAuctionsQueryDto,
    viewer: BidViewer,
    now = new Date(),
  ): Promise<Page<AuctionEventSummaryResponse>> {
    const page = query.page ?? 1;
    const pageSize = query.page_size ?? DEFAULT_PAGE_SIZE;
    const where = and(
      viewer.isStaff ? null : excludeCanceled(),
      query.status ? byEventStatus(query.status) : null,
      query.is_live !== undefined ? byFlag('isLive', query.is_live) : null,
      query.is_online !== undefined ? byFlag('isOnline', query.is_online) : null,
      query.is_featured !== undefined
        ? byFlag('isFeatured', query.is_featured)
        : null,
      query.gallery ? byGallery(query.gallery) : null,
      query.period ? byPeriod(query.period, now) : null,
      query.search ? bySearch(query.search) : null,
    );
    const { column, direction } = orderingOf(query.ordering);

    const [events, count] = await this.eventQuery()
      .where(where.sql, where.params)
      .orderBy(column, direction)
      .addOrderBy('event.id', direction)
      .skip((page - 1) * pageSize)
      .take(pageSize)
      .getManyAndCount();

    const counts = await this.itemCounts(events.map((e) => e.id));
    return {
      count,
      page,
      page_size: pageSize,
      consistency: 'snapshot',
      results: events.map((e) => toEventSummary(e, counts.get(e.id) ?? 0, now)),
    };
  }

  async getEvent(
    slug: string,
    viewer: BidViewer,
    now = new Date(),
  ): Promise<AuctionEventDetailResponse> {
    return this.eventDetail(await this.findVisibleEvent({ slug }, viewer), now);
  }

  async getEventById(
    eventId: number,
    viewer: BidViewer,
    now = new Date(),
  ): Promise<AuctionEventDetailResponse> {
    return this.eventDetail(
      await this.findVisibleEvent({ id: eventId }, viewer),
      now,
    );
  }

  private async eventDetail(
    event: AuctionEventEntity,
    now: Date,
  ): Promise<AuctionEventDetailResponse> {
    const items = await this.dataSource.getRepository(AuctionItemEntity).find({
      where: { eventId: event.id },
      order: { lotNumber: 'ASC' },
    });
    return toEventDetail(
      event,
      items.map((item) => toItemSummary(item, this.minNextBid(event, item, now))),
      now,
    );
  }

  async listItems(
    slug: string,
    query: ListItemsQueryDto,
    viewer: BidViewer,
    now = new Date(),
  ): Promise<AuctionItemSummaryResponse[]> {
    const event = await this.findVisibleEvent({ slug }, viewer);
    const where = and(
      { sql: 'item.eventId = :eventId', params: { eventId: event.id } },
      query.status ? byItemStatus(query.status) : null,
      byPriceRange(query.min_price, query.max_price),
    );
    const items = await this.dataSource
      .getRepository(AuctionItemEntity)
      .createQueryBuilder('item')
      .where(where.sql, where.params)
      .orderBy('item.lotNumber', 'ASC')
      .getMany();
    return items.map((item) => toItemSummary(item, this.minNextBid(event, item, now)));
  }

  async getItem(
    itemId: number,
    viewer: BidViewer,
    now = new Date(),
  ): Promise<AuctionItemDetailResponse> {
    const item = await this.findVisibleItem(itemId, viewer);
    const bids = await this.persistence.findBids(item.id);
    return toItemDetail(
      item,
      this.minNextBid(item.event, item, now),
      visibleBids(bids, viewer, item.event.gallery?.ownerId ?? null),
    );
  }

  async listItemBids(
    itemId: number,
    viewer: BidViewer,
  ): Promise<AuctionBidResponse[]> {
    const item = await this.findVisibleItem(itemId, viewer);
    const bids = await this.persistence.findBids(item.id);
    return visibleBids(bids, viewer, item.event.gallery?.ownerId ?? null).map(
      toBidResponse,
    );
  }

  async resolveEventId(slug: string): Promise<number> {
    const event = await this.dataSource.getRepository(AuctionEventEntity).findOne({
      where: { slug },
      select: { id: true },
    });
    if (!event) throw new NotFoundException('Auction not found');
    return event.id;
  }

  /* ------------------------------------------------------------------ */

  private eventQuery(): SelectQueryBuilder<AuctionEventEntity> {
    return this.dataSource
      .getRepository(AuctionEventEntity)
      .createQueryBuilder('event')
      .leftJoinAndSelect('event.gallery', 'gallery');
  }

  private async findVisibleEvent(
    by: { slug: string } | { id: number },
    viewer: BidViewer,
  ): Promise<AuctionEventEntity> {
    const query = this.eventQuery();
    if ('slug' in by) query.where('event.slug = :slug', { slug: by.slug });
    else query.where('event.id = :id', { id: by.id });
    const event = await query.getOne();
    if (!event || (event.status === 'canceled' && !viewer.isStaff)) {
      throw new NotFoundException('Auction not found');
    }
    return event;
  }

  private async findVisibleItem(
    itemId: number,
    viewer: BidViewer,
  ): Promise<AuctionItemEntity> {
    const item = await this.dataSource
      .getRepository(AuctionItemEntity)
      .createQueryBuilder('item')
      .innerJoinAndSelect('item.event', 'event')
      .leftJoinAndSelect('event.gallery', 'gallery')
      .where('item.id = :itemId', { itemId })
      .getOne();
    if (!item || (item.event.status === 'canceled' && !viewer.isStaff)) {
      throw new NotFoundException('Auction item not found');
    }
    return item;
  }

  private async itemCounts(eventIds: number[]): Promise<Map<number, number>> {
    if (eventIds.length === 0) return new Map();
    const rows = await this.dataSource
      .getRepository(AuctionItemEntity)
      .createQueryBuilder('item')
      .select('item.eventId', 'eventId')
      .addSelect('COUNT(*)', 'count')
      .where({ eventId: In(eventIds) })
      .groupBy('item.eventId')
      .getRawMany<{ eventId: number; count: string }>();
    return new Map(rows.map((r) => [Number(r.eventId), Number(r.count)]));
  }

  private minNextBid(
    event: AuctionEventEntity,
    item: AuctionItemEntity,
    now: Date,
  ): number | null {
    if (item.status !== 'active' || !isAcceptingBids(event, now)) return null;
    return this.validator.minimumFor(item);
  }
}
