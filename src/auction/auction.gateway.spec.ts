import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { AuctionGateway, type AuctionSocket } from './auction.gateway';
import { AuctionNotifier } from './auction-notifier';
import { AuctionQueryService } from './auction-query.service';
import { BidPlacementService, type PlaceBidResult } from './bid-placement.service';
import { ClerkTokenVerifier } from '../auth/clerk-token.verifier';
import { UserService } from '../user/user.service';

function socket(id: string, token?: string) {
  return {
    id,
    handshake: {
      auth: token ? { token } : {},
      headers: {},
    },
    emit: jest.fn(),
    join: jest.fn(),
    leave: jest.fn(),
    disconnect: jest.fn(),
  } satisfies AuctionSocket;
}

const accepted: PlaceBidResult = {
  accepted: true,
  bid: {
    id: 7,
    auction_item: 3,
    user: 'u1',
    amount: 150,
    placed_at: '2026-05-10T18:00:00.000Z',
    is_winner: false,
    is_auto: false,
  },
  extendedUntil: null,
};

describe('AuctionGateway', () => {
  let gateway: AuctionGateway;
  let notifier: AuctionNotifier;
  let roomEmit: jest.Mock;
  let to: jest.Mock;
  const placeBid = jest.fn(async (): Promise<PlaceBidResult> => accepted);
  const getEventById = jest.fn(async (id: number) => ({ id, title: 'Spring' }));
  const verify = jest.fn(async (token: string) =>
    token === 'test-token' ? 'clerk_1' : null,
  );

  beforeEach(async () => {
    jest.clearAllMocks();
    roomEmit = jest.fn();
    to = jest.fn(() => ({ emit: roomEmit }));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuctionGateway,
        AuctionNotifier,
        { provide: BidPlacementService, useValue: { placeBid } },
        { provide: AuctionQueryService, useValue: { getEventById } },
        { provide: ClerkTokenVerifier, useValue: { verify } },
        {
          provide: UserService,
          useValue: {
            syncFromClerk: jest.fn(async () => ({ id: 'u1', isStaff: false })),
          },
        },
      ],
    }).compile();

    gateway = module.get(AuctionGateway);
    notifier = module.get(AuctionNotifier);
    gateway.server = { to };
    gateway.onModuleInit();
  });

  afterEach(() => gateway.onModuleDestroy());

  async function connected(id: string) {
    const client = socket(id, 'test-token');
    await gateway.handleConnection(client);
    return client;
  }

  describe('handleConnection', () => {
    it('joins the personal room once the token verifies', async () => {
      const client = await connected('c1');
      expect(client.join).toHaveBeenCalledWith('user:u1');
      expect(client.disconnect).not.toHaveBeenCalled();
    });

    it('disconnects a socket without a token', async () => {
      const client = socket('c2');
      await gateway.handleConnection(client);
      expect(client.emit).toHaveBeenCalledWith('auth_error', {
        message: 'Authentication required',
      });
      expect(client.disconnect).toHaveBeenCalledWith(true);
    });

    it('disconnects a socket whose token fails verification', async () => {
      const client = socket('c3', 'bad-token');
      await gateway.handleConnection(client);
      expect(client.emit).toHaveBeenCalledWith('auth_error', {
        message: 'Token verification failed',
      });
    });
  });

  describe('handleJoinAuction', () => {
    it('joins the auction room and sends the current state', async () => {
      const client = await connected('c4');
      await gateway.handleJoinAuction(client, { auctionId: 12 });
      expect(getEventById).toHaveBeenCalledWith(12, {
        userId: 'u1',
        isStaff: false,
      });
      expect(client.join).toHaveBeenCalledWith('auction:12');
      expect(client.emit).toHaveBeenCalledWith('auction_state', {
        id: 12,
        title: 'Spring',
      });
    });

    it('emits error when auctionId missing', async () => {
      const client = await connected('c5');
      await gateway.handleJoinAuction(client, {});
      expect(client.emit).toHaveBeenCalledWith('error', {
        message: 'auctionId required',
      });
    });

    it('does not join an auction the viewer cannot see', async () => {
      getEventById.mockRejectedValueOnce(new NotFoundException('Auction not found'));
      const client = await connected('c6');
      await gateway.handleJoinAuction(client, { auctionId: 99 });
      expect(client.join).not.toHaveBeenCalledWith('auction:99');
      expect(client.emit).toHaveBeenCalledWith('error', {
        message: 'Auction not found',
      });
    });

    it('rejects an unauthenticated socket', async () => {
      const client = socket('c7');
      await gateway.handleJoinAuction(client, { auctionId: 12 });
      expect(client.disconnect).toHaveBeenCalledWith(true);
      expect(getEventById).not.toHaveBeenCalled();
    });
  });

  describe('handleLeaveAuction', () => {
    it('leaves room when auctionId provided', async () => {
      const client = await connected('c8');
      gateway.handleLeaveAuction(client, { auctionId: 12 });
      expect(client.leave).toHaveBeenCalledWith('auction:12');
    });
  });

  describe('handlePlaceBid', () => {
    it('places the bid as the socket user and emits bid_result', async () => {
      const client = await connected('c9');
      await gateway.handlePlaceBid(client, {
        itemId: 3,
        amount: 150,
        idempotencyKey: 'k-1',
      });
      expect(placeBid).toHaveBeenCalledWith(3, 'u1', 150, 'k-1');
      expect(client.emit).toHaveBeenCalledWith('bid_result', accepted);
    });

    it('emits a validation result when payload incomplete', async () => {
      const client = await connected('c10');
      await gateway.handlePlaceBid(client, { itemId: 3, amount: '150' });
      expect(placeBid).not.toHaveBeenCalled();
      expect(client.emit).toHaveBeenCalledWith('bid_result', {
        accepted: false,
        code: 'VALIDATION_ERROR',
        reason: 'itemId, amount required',
      });
    });
  });

  describe('handlePlaceBid amounts', () => {
    it.each([0, -5, 10.5])(
      'leaves amount %p to the validator like the HTTP endpoint',
      async (amount) => {
        const client = await connected('c11');
        await gateway.handlePlaceBid(client, { itemId: 3, amount });
        expect(placeBid).toHaveBeenCalledWith(3, 'u1', amount, undefined);
      },
    );
  });

  describe('notifications', () => {
    it('broadcasts bid_placed to the auction room', () => {
      const n = {
        event: 'bid_placed' as const,
        auctionId: 12,
        itemId: 3,
        bid: { id: 7, itemId: 3, userId: 'u1', amount: 150, placedAt: 'x' },
        totalBids: 1,
        minNextBid: 158,
      };
      notifier.emit(n);
      expect(to).toHaveBeenCalledWith('auction:12');
      expect(roomEmit).toHaveBeenCalledWith('bid_placed', n);
    });

    it('sends outbid only to the displaced bidder', () => {
      notifier.emit({
        event: 'outbid',
        auctionId: 12,
        itemId: 3,
        userId: 'u2',
        previousAmount: 100,
        newAmount: 150,
      });
      expect(to.mock.calls).toEqual([['user:u2']]);
    });

    it('tells the winner about a sold item', () => {
      notifier.emit({
        event: 'item_sold',
        auctionId: 12,
        itemId: 3,
        winnerId: 'u1',
        winningBid: 150,
      });
      expect(to.mock.calls).toEqual([['auction:12'], ['user:u1']]);
      expect(roomEmit.mock.calls.map(([event]) => event)).toEqual([
        'item_sold',
        'item_won',
      ]);
    });

    it('stops forwarding after module destroy', () => {
      gateway.onModuleDestroy();
      notifier.emit({ event: 'closing_soon', auctionId: 12, endAt: 'x' });
      expect(to).not.toHaveBeenCalled();
    });
  });
});
