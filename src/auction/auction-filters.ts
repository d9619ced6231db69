import type { AuctionEventStatus, AuctionItemStatus } from './engine';

/**
 * A WHERE fragment over the `event` / `item` / `gallery` query aliases with
 * its named parameters. Each builder owns distinct parameter names, so any
 * combination can be joined with `and`.
 */
export interface Predicate {
  sql: string;
  params: Record<string, unknown>;
}

export type AuctionPeriod = 'active' | 'upcoming' | 'past';

export const AUCTION_PERIODS: readonly AuctionPeriod[] = [
  'active',
  'upcoming',
  'past',
];

type EventFlag = 'isLive' | 'isOnline' | 'isFeatured';

export const MATCH_ALL: Predicate = { sql: '1 = 1', params: {} };

export function and(...predicates: Array<Predicate | null>): Predicate {
  const parts = predicates.filter((p): p is Predicate => p !== null);
  if (parts.length === 0) return MATCH_ALL;
  return {
    sql: parts.map((p) => `(${p.sql})`).join(' AND '),
    params: parts.reduce<Record<string, unknown>>(
      (acc, p) => ({ ...acc, ...p.params }),
      {},
    ),
  };
}

export function byEventStatus(status: AuctionEventStatus): Predicate {
  return { sql: 'event.status = :eventStatus', params: { eventStatus: status } };
}

export function excludeCanceled(): Predicate {
  return {
    sql: 'event.status <> :canceledStatus',
    params: { canceledStatus: 'canceled' },
  };
}

export function byFlag(flag: EventFlag, value: boolean): Predicate {
  return { sql: `event.${flag} = :${flag}`, params: { [flag]: value } };
}

export function byGallery(slug: string): Predicate {
  return { sql: 'gallery.slug = :gallerySlug', params: { gallerySlug: slug } };
}

export function byPeriod(period: AuctionPeriod, now: Date): Predicate {
  switch (period) {
    case 'active':
      return {
        sql: 'event.startAt <= :periodNow AND event.endAt >= :periodNow',
        params: { periodNow: now },
      };
    case 'upcoming':
      return { sql: 'event.startAt > :periodNow', params: { periodNow: now } };
    case 'past':
      return { sql: 'event.endAt < :periodNow', params: { periodNow: now } };
  }
}

/** Case-insensitive substring match; LIKE wildcards in `term` are literal. */
export function bySearch(term: string): Predicate | null {
  const trimmed = term.trim();
  if (!trimmed) return null;
  const escaped = trimmed.replace(/[\\%_]/g, (c) => `\\${c}`);
  return {
    sql: [
      'event.title ILIKE :search',
      'event.description ILIKE :search',
      'event.shortDescription ILIKE :search',
      'event.organizer ILIKE :search',
    ].join(' OR '),
    params: { search: `%${escaped}%` },
  };
}

export function byItemStatus(status: AuctionItemStatus): Predicate {
  return { sql: 'item.status = :itemStatus', params: { itemStatus: status } };
}

/** Range over the current bid, or the start price before the first bid. */
export function byPriceRange(
  min: number | undefined,
  max: number | undefined,
): Predicate | null {
  const price = 'COALESCE(item.currentBid, item.startPrice)';
  if (min !== undefined && max !== undefined) {
    return {
      sql: `${price} >= :minPrice AND ${price} <= :maxPrice`,
      params: { minPrice: min, maxPrice: max },
    };
  }
  if (min !== undefined) {
    return { sql: `${price} >= :minPrice`, params: { minPrice: min } };
  }
  if (max !== undefined) {
    return { sql: `${price} <= :maxPrice`, params: { maxPrice: max } };
  }
  return null;
}
