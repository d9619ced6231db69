import {
  WebSocketGateway,
  WebSocketServer,
  SubscribeMessage,
} from '@nestjs/websockets';
import {
  Logger,
  NotFoundException,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import type { IncomingHttpHeaders } from 'node:http';
import { AuctionNotifier, type AuctionNotification } from './auction-notifier';
import { AuctionQueryService } from './auction-query.service';
import { BidPlacementService } from './bid-placement.service';
import { ClerkTokenVerifier, bearerToken } from '../auth/clerk-token.verifier';
import { UserService } from '../user/user.service';

/** The parts of a socket.io socket the gateway talks to. */
export interface AuctionSocket {
  id: string;
  handshake: {
    auth: Record<string, unknown>;
    headers: IncomingHttpHeaders;
  };
  emit(event: string, payload: unknown): unknown;
  join(room: string): unknown;
  leave(room: string): unknown;
  disconnect(close?: boolean): unknown;
}

export interface RoomBroadcaster {
  to(room: string): { emit(event: string, payload: unknown): unknown };
}

interface SocketSession {
  clerkId: string;
  userId: string;
  isStaff: boolean;
}

export const auctionRoom = (auctionId: number) => `auction:${auctionId}`;
export const userRoom = (userId: string) => `user:${userId}`;

function positiveInt(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) && value > 0
    ? value
    : null;
}

/** Range and whole-number checks are left to BidValidator. */
function finiteNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function field(payload: unknown, key: string): unknown {
  return typeof payload === 'object' && payload !== null
    ? Object.entries(payload).find(([k]) => k === key)?.[1]
    : undefined;
}

@WebSocketGateway({ cors: { origin: '*' } })
export class AuctionGateway implements OnModuleInit, OnModuleDestroy {
  @WebSocketServer()
  server!: RoomBroadcaster;

  private readonly logger = new Logger(AuctionGateway.name);
  private readonly sessionBySocketId = new Map<string, SocketSession>();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly bids: BidPlacementService,
    private readonly queries: AuctionQueryService,
    private readonly notifier: AuctionNotifier,
    private readonly verifier: ClerkTokenVerifier,
    private readonly userService: UserService,
  ) {}

  async handleConnection(client: AuctionSocket): Promise<void> {
    const token = this.extractToken(client);
    if (!token) {
      this.reject(client, 'Authentication required');
      return;
    }

    try {
      const clerkId = await this.verifier.verify(token);
      if (!clerkId) {
        this.reject(client, 'Token verification failed');
        return;
      }
      const user = await this.userService.syncFromClerk(clerkId);
      this.sessionBySocketId.set(client.id, {
        clerkId,
        userId: user.id,
        isStaff: user.isStaff,
      });
      client.join(userRoom(user.id));
      this.logger.debug(`Socket authenticated id=${client.id} clerk=${clerkId}`);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      this.logger.warn(`Socket auth failed: ${msg}`);
      this.reject(client, 'Authentication failed');
    }
  }

  handleDisconnect(client: AuctionSocket): void {
    this.sessionBySocketId.delete(client.id);
  }

  onModuleInit(): void {
    this.unsubscribe = this.notifier.subscribe((n) => this.broadcast(n));
  }

  onModuleDestroy(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  @SubscribeMessage('join_auction')
  async handleJoinAuction(client: AuctionSocket, payload: unknown): Promise<void> {
    const session = this.requireSession(client);
    if (!session) return;

    const auctionId = positiveInt(field(payload, 'auctionId'));
    if (!auctionId) {
      client.emit('error', { message: 'auctionId required' });
      return;
    }
    try {
      const state = await this.queries.getEventById(auctionId, {
        userId: session.userId,
        isStaff: session.isStaff,
      });
      client.join(auctionRoom(auctionId));
      client.emit('auction_state', state);
    } catch (e) {
      if (!(e instanceof NotFoundException)) throw e;
      client.emit('error', { message: 'Auction not found' });
    }
  }

  @SubscribeMessage('leave_auction')
  handleLeaveAuction(client: AuctionSocket, payload: unknown): void {
    if (!this.requireSession(client)) return;

    const auctionId = positiveInt(field(payload, 'auctionId'));
    if (auctionId) client.leave(auctionRoom(auctionId));
  }

  @SubscribeMessage('place_bid')
  async handlePlaceBid(client: AuctionSocket, payload: unknown): Promise<void> {
    const session = this.requireSession(client);
    if (!session) return;

    const itemId = positiveInt(field(payload, 'itemId'));
    const amount = finiteNumber(field(payload, 'amount'));
    const idempotencyKey = field(payload, 'idempotencyKey');
    if (!itemId || amount === null) {
      client.emit('bid_result', {
        accepted: false,
        code: 'VALIDATION_ERROR',
        reason: 'itemId, amount required',
      });
      return;
    }
    const result = await this.bids.placeBid(
      itemId,
      session.userId,
      amount,
      typeof idempotencyKey === 'string' ? idempotencyKey : undefined,
    );
    client.emit('bid_result', result);
  }

  private broadcast(n: AuctionNotification): void {
    switch (n.event) {
      case 'outbid':
        this.server.to(userRoom(n.userId)).emit('outbid', n);
        return;
      case 'item_sold':
        this.server.to(auctionRoom(n.auctionId)).emit('item_sold', n);
        this.server.to(userRoom(n.winnerId)).emit('item_won', n);
        return;
      default:
        this.server.to(auctionRoom(n.auctionId)).emit(n.event, n);
    }
  }

  private extractToken(client: AuctionSocket): string | null {
    const authToken = client.handshake.auth['token'];
    if (typeof authToken === 'string' && authToken.trim()) {
      return authToken.trim();
    }
    return bearerToken(client.handshake.headers.authorization);
  }

  private reject(client: AuctionSocket, message: string): void {
    client.emit('auth_error', { message });
    client.disconnect(true);
  }

  private requireSession(client: AuctionSocket): SocketSession | null {
    const session = this.sessionBySocketId.get(client.id) ?? null;
    if (!session) this.reject(client, 'Authentication required');
    return session;
  }
}
