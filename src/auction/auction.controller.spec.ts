import {
  BadRequestException,
  HttpException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { toPlacedBidResponse, viewerOf } from './auction.controller';
import type { PlaceBidResult } from './bid-placement.service';

function thrown(result: PlaceBidResult): HttpException {
  try {
    toPlacedBidResponse(result);
  } catch (e) {
    if (e instanceof HttpException) return e;
    throw e;
  }
  throw new Error('expected a rejection');
}

describe('toPlacedBidResponse', () => {
  it('returns the bid with the extended end time', () => {
    const res = toPlacedBidResponse({
      accepted: true,
      bid: {
        id: 1,
        auction_item: 2,
        user: 'u1',
        amount: 1_000_000,
        placed_at: '2026-05-10T18:00:00.000Z',
        is_winner: false,
        is_auto: false,
      },
      extendedUntil: '2026-05-10T18:15:00.000Z',
    });
    expect(res.amount).toBe(1_000_000);
    expect(res.extended_until).toBe('2026-05-10T18:15:00.000Z');
  });

  it('maps a low bid to 400 keyed by field with the minimum', () => {
    const err = thrown({
      accepted: false,
      code: 'BID_TOO_LOW',
      field: 'amount',
      reason: 'Bid must be at least 1050000 (5% above the current bid)',
      minimum: 1_050_000,
    });
    expect(err).toBeInstanceOf(BadRequestException);
    expect(err.getResponse()).toEqual({
      amount: ['Bid must be at least 1050000 (5% above the current bid)'],
      code: 'BID_TOO_LOW',
      minimum: 1_050_000,
    });
  });

  it('falls back to non_field_errors without a field', () => {
    const err = thrown({
      accepted: false,
      code: 'AUCTION_NOT_ACTIVE',
      reason: 'Auction is not active (status: planned)',
    });
    expect(err.getResponse()).toEqual({
      non_field_errors: ['Auction is not active (status: planned)'],
      code: 'AUCTION_NOT_ACTIVE',
    });
  });

  it('maps a missing item to 404', () => {
    const err = thrown({
      accepted: false,
      code: 'ITEM_NOT_FOUND',
      field: 'auction_item_id',
      reason: 'Auction item not found',
    });
    expect(err).toBeInstanceOf(NotFoundException);
    expect(err.getResponse()).toEqual({
      auction_item_id: ['Auction item not found'],
      code: 'ITEM_NOT_FOUND',
    });
  });

  it('maps lock exhaustion to 503', () => {
    const err = thrown({
      accepted: false,
      code: 'TRY_AGAIN',
      reason: 'The item is busy, please try again',
    });
    expect(err).toBeInstanceOf(ServiceUnavailableException);
    expect(err.getStatus()).toBe(503);
  });
});

describe('viewerOf', () => {
  it('treats a missing user as an anonymous viewer', () => {
    expect(viewerOf(null)).toEqual({ userId: null, isStaff: false });
  });

  it('carries the staff flag', () => {
    expect(
      viewerOf({ id: 'u9', clerkId: 'clerk_9', displayName: 'Staff', isStaff: true }),
    ).toEqual({ userId: 'u9', isStaff: true });
  });
});
