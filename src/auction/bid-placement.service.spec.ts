import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { BidPlacementService } from './bid-placement.service';
import { AuctionNotifier, type AuctionNotification } from './auction-notifier';
import { AuctionPersistenceService } from './auction-persistence.service';
import { BidValidator, DEFAULT_BID_POLICY, type BidPolicy } from './engine';
import { RedisService } from '../redis/redis.service';
import { InMemoryAuctionPersistence } from './testing/in-memory-auction-persistence';
import { RedisTestDouble } from './testing/redis-test-double';

const MINUTE = 60_000;

describe('BidPlacementService', () => {
  let persistence: InMemoryAuctionPersistence;
  let redis: RedisTestDouble;
  let notifications: AuctionNotification[];

  async function build(policy: Partial<BidPolicy> = {}) {
    const module = await Test.createTestingModule({
      providers: [
        BidPlacementService,
        AuctionNotifier,
        { provide: AuctionPersistenceService, useValue: persistence },
        {
          provide: BidValidator,
          useValue: new BidValidator({ ...DEFAULT_BID_POLICY, ...policy }),
        },
        { provide: RedisService, useValue: redis },
        {
          provide: ConfigService,
          useValue: new ConfigService({ auction: { maxBidAttempts: 3 } }),
        },
      ],
    }).compile();

    module.get(AuctionNotifier).subscribe((n) => notifications.push(n));
    return module.get(BidPlacementService);
  }

  beforeEach(() => {
    persistence = new InMemoryAuctionPersistence();
    redis = new RedisTestDouble();
    notifications = [];
  });

  it('accepts a first bid at the start price', async () => {
    const event = persistence.seedEvent();
    const item = persistence.seedItem(event.id, { startPrice: 1_000_000 });
    const service = await build();

    const result = await service.placeBid(item.id, 'alice', 1_000_000);

    expect(result).toMatchObject({
      accepted: true,
      bid: { auction_item: item.id, user: 'alice', amount: 1_000_000, is_winner: false },
      extendedUntil: null,
    });
    expect(persistence.getItem(item.id)).toMatchObject({
      currentBid: 1_000_000,
      totalBids: 1,
    });
  });

  it('rejects a bid under the minimum increment without writing', async () => {
    const event = persistence.seedEvent();
    const item = persistence.seedItem(event.id, {
      currentBid: 1_000_000,
      totalBids: 1,
    });
    persistence.seedBid(item.id, 'bob', 1_000_000);
    const service = await build();

    const result = await service.placeBid(item.id, 'alice', 1_040_000);

    expect(result).toEqual({
      accepted: false,
      code: 'BID_TOO_LOW',
      field: 'amount',
      reason: 'Bid must be at least 1050000 (5% above the current bid)',
      minimum: 1_050_000,
    });
    expect(persistence.getItem(item.id)?.currentBid).toBe(1_000_000);
    expect(persistence.bidsFor(item.id)).toHaveLength(1);
  });

  it('reports an unknown item', async () => {
    const service = await build();

    await expect(service.placeBid(999, 'alice', 1_000_000)).resolves.toEqual({
      accepted: false,
      code: 'ITEM_NOT_FOUND',
      field: 'auction_item_id',
      reason: 'Auction item not found',
    });
  });

  it('rejects bids on an auction that has not started', async () => {
    const event = persistence.seedEvent({
      status: 'planned',
      startAt: new Date(Date.now() + 60 * MINUTE),
    });
    const item = persistence.seedItem(event.id, { status: 'pending' });
    const service = await build();

    const result = await service.placeBid(item.id, 'alice', 1_000_000);

    expect(result).toMatchObject({
      accepted: false,
      code: 'AUCTION_NOT_ACTIVE',
      reason: 'Auction is not active (status: planned)',
    });
  });

  it('lets only one of two identical concurrent bids through', async () => {
    const event = persistence.seedEvent();
    const item = persistence.seedItem(event.id, {
      currentBid: 1_800_000,
      totalBids: 1,
    });
    persistence.seedBid(item.id, 'carol', 1_800_000);
    const service = await build();

    const [first, second] = await Promise.all([
      service.placeBid(item.id, 'alice', 2_000_000),
      service.placeBid(item.id, 'bob', 2_000_000),
    ]);

    expect(first.accepted).toBe(true);
    expect(second).toMatchObject({
      accepted: false,
      code: 'BID_TOO_LOW',
      minimum: 2_100_000,
    });
    expect(persistence.getItem(item.id)).toMatchObject({
      currentBid: 2_000_000,
      totalBids: 2,
    });

    const retry = await service.placeBid(item.id, 'bob', 2_100_000);
    expect(retry.accepted).toBe(true);
  });

  it('keeps accepted bids strictly increasing under a burst of bidders', async () => {
    const event = persistence.seedEvent();
    const item = persistence.seedItem(event.id, { startPrice: 1_000_000 });
    const service = await build();

    const amounts = Array.from({ length: 25 }, (_, i) => 1_000_000 + i * 60_000);
    const results = await Promise.all(
      amounts.map((amount, i) => service.placeBid(item.id, `user-${i}`, amount)),
    );

    const accepted = persistence.bidsFor(item.id);
    expect(accepted.length).toBe(results.filter((r) => r.accepted).length);
    for (let i = 1; i < accepted.length; i += 1) {
      const prev = accepted[i - 1]?.amount ?? 0;
      expect(accepted[i]?.amount ?? 0).toBeGreaterThanOrEqual(prev * 1.05);
    }
    const stored = persistence.getItem(item.id);
    expect(stored?.currentBid).toBe(Math.max(...accepted.map((b) => b.amount)));
    expect(stored?.totalBids).toBe(accepted.length);
  });

  it('rejects raising your own winning bid unless allowed', async () => {
    const event = persistence.seedEvent();
    const item = persistence.seedItem(event.id, {
      currentBid: 1_000_000,
      totalBids: 1,
    });
    persistence.seedBid(item.id, 'alice', 1_000_000);

    const strict = await build();
    await expect(strict.placeBid(item.id, 'alice', 1_100_000)).resolves.toMatchObject({
      accepted: false,
      code: 'ALREADY_HIGHEST_BIDDER',
    });

    const lenient = await build({ allowSelfOutbid: true });
    const result = await lenient.placeBid(item.id, 'alice', 1_100_000);
    expect(result.accepted).toBe(true);
    expect(notifications.map((n) => n.event)).toEqual(['bid_placed']);
  });

  it('retries lock conflicts and gives up after the last attempt', async () => {
    const event = persistence.seedEvent();
    const item = persistence.seedItem(event.id);
    const service = await build();

    persistence.failNextLocks(2);
    await expect(service.placeBid(item.id, 'alice', 1_000_000)).resolves.toMatchObject({
      accepted: true,
    });

    persistence.failNextLocks(3);
    await expect(service.placeBid(item.id, 'bob', 1_050_000)).resolves.toEqual({
      accepted: false,
      code: 'TRY_AGAIN',
      reason: 'The item is busy, please try again',
    });
    expect(persistence.bidsFor(item.id)).toHaveLength(1);
  });

  it('extends the auction when a bid lands inside the closing window', async () => {
    const endAt = new Date(Date.now() + 5 * MINUTE);
    const event = persistence.seedEvent({ endAt });
    const item = persistence.seedItem(event.id);
    const service = await build();

    const result = await service.placeBid(item.id, 'alice', 1_000_000);

    const extended = new Date(endAt.getTime() + 15 * MINUTE);
    expect(result).toMatchObject({
      accepted: true,
      extendedUntil: extended.toISOString(),
    });
    expect(persistence.getEvent(event.id)).toMatchObject({
      endAt: extended,
      extensionCount: 1,
    });
    expect(notifications).toContainEqual({
      event: 'auction_extended',
      auctionId: event.id,
      endAt: extended.toISOString(),
    });
  });

  it('leaves the end time alone outside the closing window', async () => {
    const endAt = new Date(Date.now() + 60 * MINUTE);
    const event = persistence.seedEvent({ endAt });
    const item = persistence.seedItem(event.id);
    const service = await build();

    await service.placeBid(item.id, 'alice', 1_000_000);

    expect(persistence.getEvent(event.id)).toMatchObject({
      endAt,
      extensionCount: 0,
    });
  });

  it('notifies the room and the outbid bidder after commit', async () => {
    const event = persistence.seedEvent();
    const item = persistence.seedItem(event.id, {
      currentBid: 1_000_000,
      totalBids: 1,
    });
    persistence.seedBid(item.id, 'bob', 1_000_000);
    const service = await build();

    await service.placeBid(item.id, 'alice', 1_050_000);
    const rejected = await service.placeBid(item.id, 'carol', 1_050_001);

    expect(rejected.accepted).toBe(false);
    expect(notifications).toHaveLength(2);
    expect(notifications[0]).toMatchObject({
      event: 'bid_placed',
      auctionId: event.id,
      itemId: item.id,
      bid: { userId: 'alice', amount: 1_050_000 },
      totalBids: 2,
      minNextBid: 1_102_500,
    });
    expect(notifications[1]).toEqual({
      event: 'outbid',
      auctionId: event.id,
      itemId: item.id,
      userId: 'bob',
      previousAmount: 1_000_000,
      newAmount: 1_050_000,
    });
  });

  it('does not let a failing listener undo an accepted bid', async () => {
    const event = persistence.seedEvent();
    const item = persistence.seedItem(event.id);
    const module = await Test.createTestingModule({
      providers: [
        BidPlacementService,
        AuctionNotifier,
        { provide: AuctionPersistenceService, useValue: persistence },
        { provide: BidValidator, useValue: new BidValidator() },
        { provide: RedisService, useValue: redis },
        { provide: ConfigService, useValue: new ConfigService({}) },
      ],
    }).compile();
    module.get(AuctionNotifier).subscribe(() => {
      throw new Error('socket down');
    });

    const result = await module
      .get(BidPlacementService)
      .placeBid(item.id, 'alice', 1_000_000);

    expect(result.accepted).toBe(true);
    expect(persistence.getItem(item.id)?.currentBid).toBe(1_000_000);
  });

  it('replays the stored outcome for a repeated idempotency key', async () => {
    const event = persistence.seedEvent();
    const item = persistence.seedItem(event.id);
    const service = await build();

    const first = await service.placeBid(item.id, 'alice', 1_000_000, 'key-1');
    const replay = await service.placeBid(item.id, 'alice', 1_000_000, 'key-1');

    expect(replay).toEqual(first);
    expect(persistence.bidsFor(item.id)).toHaveLength(1);
    expect(notifications).toHaveLength(1);
  });
});
