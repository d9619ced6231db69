import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { randomUUID } from 'node:crypto';
import {
  AuctionInvariantError,
  canTransitionEvent,
  canTransitionItem,
  isClosingSoon,
  planEventTransition,
  settleItem,
  type AuctionEventState,
  type AuctionItemState,
  type ItemSettlement,
} from './engine';
import { LockUnavailableError } from './auction.errors';
import { AuctionNotifier } from './auction-notifier';
import { ClosingSoonLedger } from './closing-soon-ledger';
import {
  AuctionPersistenceService,
  type LockedEventScope,
} from './auction-persistence.service';
import { OrdersService } from '../orders/orders.service';
import { RedisService } from '../redis/redis.service';

const SWEEP_JOB = 'auction-sweep';
const SWEEP_LEASE = 'auction-sweep';

export interface SweepReport {
  activated: number[];
  closed: number[];
  /** Locked by another transaction; retried next cycle. */
  skipped: number[];
  failed: number[];
  closingSoon: number[];
  /** Sold items whose missing purchase order was opened this pass. */
  ordersRecovered: number[];
}

export interface EventClosure {
  event: AuctionEventState;
  settlements: ItemSettlement[];
}

interface EventAdvance {
  activatedItemIds: number[] | null;
  closure: EventClosure | null;
}

@Injectable()
export class AuctionLifecycleService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(AuctionLifecycleService.name);
  private readonly sweepIntervalMs: number;
  private readonly closingSoonMs: number;
  readonly closingSoonLedger = new ClosingSoonLedger();

  constructor(
    private readonly persistence: AuctionPersistenceService,
    private readonly notifier: AuctionNotifier,
    private readonly orders: OrdersService,
    private readonly redis: RedisService,
    private readonly scheduler: SchedulerRegistry,
    config: ConfigService,
  ) {
    this.sweepIntervalMs =
      config.get<number>('auction.sweepIntervalMs') ?? 600_000;
    this.closingSoonMs =
      config.get<number>('auction.closingSoonMs') ?? 60 * 60_000;
  }

  onModuleInit(): void {
    const interval = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        const msg = err instanceof Error ? err.message : String(err);
        this.logger.error(`Auction sweep failed: ${msg}`);
      });
    }, this.sweepIntervalMs);
    this.scheduler.addInterval(SWEEP_JOB, interval);
    this.logger.log(`Auction sweep every ${this.sweepIntervalMs / 1000}s`);
  }

  onModuleDestroy(): void {
    if (this.scheduler.doesExist('interval', SWEEP_JOB)) {
      this.scheduler.deleteInterval(SWEEP_JOB);
    }
  }

  /* ------------------------------------------------------------------ */
  /*  SWEEP                                                              */
  /* ------------------------------------------------------------------ */

  /**
   * Activate and close every due event. Returns null when another instance
   * holds the sweep lease.
   */
  async sweep(now = new Date()): Promise<SweepReport | null> {
    const owner = randomUUID();
    const leased = await this.redis.acquireLease(
      SWEEP_LEASE,
      owner,
      this.sweepIntervalMs,
    );
    if (!leased) {
      this.logger.debug('Sweep lease held elsewhere, skipping cycle');
      return null;
    }

    try {
      return await this.runSweep(now);
    } finally {
      await this.redis.releaseLease(SWEEP_LEASE, owner);
    }
  }

  private async runSweep(now: Date): Promise<SweepReport> {
    const report: SweepReport = {
      activated: [],
      closed: [],
      skipped: [],
      failed: [],
      closingSoon: [],
      ordersRecovered: [],
    };

    const dueIds = await this.persistence.findDueEventIds(now);
    for (const eventId of dueIds) {
      try {
        const advance = await this.persistence.withLockedEvent(
          eventId,
          (scope) => this.advance(scope, now),
          { noWait: true },
        );
        if (!advance) continue;
        if (advance.activatedItemIds) report.activated.push(eventId);
        if (advance.closure) report.closed.push(eventId);
        await this.afterAdvance(eventId, advance);
      } catch (err) {
        if (err instanceof LockUnavailableError) {
          this.logger.debug(`Auction ${eventId} is locked, retrying next cycle`);
          report.skipped.push(eventId);
          continue;
        }
        report.failed.push(eventId);
        this.logSweepFailure(eventId, err);
      }
    }

    report.closingSoon = await this.announceClosingSoon(now);
    report.ordersRecovered = await this.recoverMissingOrders();

    if (report.activated.length || report.closed.length || report.failed.length) {
      this.logger.log(
        `Sweep: ${report.activated.length} activated, ${report.closed.length} closed, ` +
          `${report.skipped.length} skipped, ${report.failed.length} failed`,
      );
    }
    return report;
  }

  private async advance(
    scope: LockedEventScope,
    now: Date,
  ): Promise<EventAdvance> {
    let items = scope.items;
    let activatedItemIds: number[] | null = null;
    let transition = planEventTransition(scope.event, now);

    if (transition === 'activate') {
      ({ items, activatedItemIds } = await this.activate(scope, now));
      // An event first seen after its end opens and closes in one pass.
      transition = planEventTransition({ ...scope.event, status: 'active' }, now);
    }

    const closure =
      transition === 'close' ? await this.close(scope, items, now) : null;
    return { activatedItemIds, closure };
  }

  private async activate(
    scope: LockedEventScope,
    now: Date,
  ): Promise<{ items: AuctionItemState[]; activatedItemIds: number[] }> {
    const activatedItemIds: number[] = [];
    const items: AuctionItemState[] = [];
    for (const item of scope.items) {
      if (item.status === 'pending') {
        await scope.updateItem(item.id, { status: 'active' });
        activatedItemIds.push(item.id);
        items.push({ ...item, status: 'active' });
      } else {
        items.push(item);
      }
    }
    await scope.updateEvent(scope.event.id, { status: 'active' });
    this.logger.log(
      `Auction ${scope.event.id} activated at ${now.toISOString()} with ${activatedItemIds.length} lot(s)`,
    );
    return { items, activatedItemIds };
  }

  /**
   * Settle every open lot and end the event. Only reachable from `active`,
   * so a second pass over an ended event never settles twice.
   */
  private async close(
    scope: LockedEventScope,
    items: readonly AuctionItemState[],
    now: Date,
  ): Promise<EventClosure> {
    const settlements: ItemSettlement[] = [];

    for (const item of items) {
      if (item.status !== 'active' && item.status !== 'pending') continue;

      const topBid = await scope.topBid(item.id);
      const winners = await scope.countWinners(item.id);
      const settlement = settleItem(item, topBid, winners);

      if (settlement.status === 'sold') {
        await scope.markWinner(settlement.winnerBidId);
        await scope.updateItem(item.id, {
          status: 'sold',
          winningBid: settlement.winningBid,
          hammerTime: now,
        });
      } else {
        await scope.updateItem(item.id, { status: 'unsold', hammerTime: now });
      }
      settlements.push(settlement);
    }

    await scope.updateEvent(scope.event.id, { status: 'ended', closedAt: now });
    return { event: scope.event, settlements };
  }

  private async afterAdvance(eventId: number, advance: EventAdvance) {
    if (advance.activatedItemIds) {
      this.notifier.emit({
        event: 'auction_started',
        auctionId: eventId,
        itemIds: advance.activatedItemIds,
      });
    }
    if (advance.closure) await this.afterClosure(advance.closure);
  }

  private async afterClosure({ event, settlements }: EventClosure) {
    this.closingSoonLedger.forget(event.id);

    for (const s of settlements) {
      if (s.status === 'sold') {
        this.notifier.emit({
          event: 'item_sold',
          auctionId: event.id,
          itemId: s.itemId,
          winnerId: s.winnerId,
          winningBid: s.winningBid,
        });
      } else {
        this.notifier.emit({
          event: 'item_unsold',
          auctionId: event.id,
          itemId: s.itemId,
          reason: s.reason,
        });
      }
    }

    this.notifier.emit({
      event: 'auction_ended',
      auctionId: event.id,
      results: settlements.map((s) =>
        s.status === 'sold'
          ? { itemId: s.itemId, winnerId: s.winnerId, winningBid: s.winningBid }
          : { itemId: s.itemId, winnerId: null, winningBid: null },
      ),
    });

    const sold = settlements.filter(
      (s): s is Extract<ItemSettlement, { status: 'sold' }> => s.status === 'sold',
    );
    this.logger.log(
      `Auction ${event.id} ended: ${sold.length}/${settlements.length} lot(s) sold`,
    );

    for (const s of sold) {
      const created = await this.orders.createForWinningBid({
        itemId: s.itemId,
        bidId: s.winnerBidId,
        userId: s.winnerId,
        amount: s.winningBid,
        commissionRate: event.commissionRate,
      });
      if (!created) {
        this.logger.warn(`No purchase order opened for item ${s.itemId}`);
      }
    }
  }

  private async announceClosingSoon(now: Date): Promise<number[]> {
    const until = new Date(now.getTime() + this.closingSoonMs);
    const events = await this.persistence.findEventsEndingBetween(now, until);
    const announced: number[] = [];
    this.closingSoonLedger.prune(now);

    for (const event of events) {
      if (!isClosingSoon(event, now, this.closingSoonMs)) continue;
      if (!this.closingSoonLedger.claim(event.id, event.endAt)) continue;
      announced.push(event.id);
      this.notifier.emit({
        event: 'closing_soon',
        auctionId: event.id,
        endAt: event.endAt.toISOString(),
      });
    }
    return announced;
  }

  /**
   * Sold lots left without an order, by a failed insert or a crash after the
   * closure committed.
   */
  private async recoverMissingOrders(): Promise<number[]> {
    const sales = await this.orders.findUnorderedSales();
    const recovered: number[] = [];
    for (const sale of sales) {
      if (await this.orders.createForWinningBid(sale)) recovered.push(sale.itemId);
    }
    if (sales.length) {
      this.logger.warn(
        `Recovered ${recovered.length}/${sales.length} missing purchase order(s)`,
      );
    }
    return recovered;
  }

  private logSweepFailure(eventId: number, err: unknown): void {
    if (err instanceof AuctionInvariantError) {
      this.logger.error(
        `Invariant breach on auction ${eventId}, closure rolled back: ${err.message}`,
        err.stack,
      );
      return;
    }
    const msg = err instanceof Error ? err.message : String(err);
    this.logger.error(
      `Sweep failed for auction ${eventId}: ${msg}`,
      err instanceof Error ? err.stack : undefined,
    );
  }

  /* ------------------------------------------------------------------ */
  /*  STAFF ACTIONS                                                      */
  /* ------------------------------------------------------------------ */

  /**
   * Close an active event now, whatever its end time. An event that has
   * already ended resolves with `closed: false`.
   */
  async closeEvent(
    eventId: number,
    now = new Date(),
  ): Promise<{ closed: boolean; settlements: ItemSettlement[] }> {
    const locked = await this.persistence.withLockedEvent(eventId, async (scope) => {
      const { status } = scope.event;
      if (status === 'ended') return { closure: null };
      if (!canTransitionEvent(status, 'ended')) {
        throw new ConflictException(`Auction cannot be closed from status ${status}`);
      }
      return { closure: await this.close(scope, scope.items, now) };
    });
    if (locked === null) throw new NotFoundException('Auction not found');
    const { closure } = locked;
    if (closure === null) return { closed: false, settlements: [] };

    await this.afterClosure(closure);
    return { closed: true, settlements: closure.settlements };
  }

  /** Cancel a planned or active event; its open lots are withdrawn. */
  async cancelEvent(
    eventId: number,
    now = new Date(),
  ): Promise<{ withdrawnItemIds: number[] }> {
    const withdrawn = await this.persistence.withLockedEvent(eventId, async (scope) => {
      const { status } = scope.event;
      if (!canTransitionEvent(status, 'canceled')) {
        throw new ConflictException(`Auction cannot be canceled from status ${status}`);
      }
      const ids: number[] = [];
      for (const item of scope.items) {
        if (!canTransitionItem(item.status, 'withdrawn')) continue;
        await scope.updateItem(item.id, { status: 'withdrawn' });
        ids.push(item.id);
      }
      await scope.updateEvent(eventId, { status: 'canceled', closedAt: now });
      return ids;
    });
    if (withdrawn === null) throw new NotFoundException('Auction not found');

    this.closingSoonLedger.forget(eventId);
    this.logger.log(`Auction ${eventId} canceled, ${withdrawn.length} lot(s) withdrawn`);
    this.notifier.emit({
      event: 'auction_canceled',
      auctionId: eventId,
      withdrawnItemIds: withdrawn,
    });
    return { withdrawnItemIds: withdrawn };
  }

  async withdrawItem(itemId: number): Promise<AuctionItemState> {
    const result = await this.persistence.withLockedItem(itemId, async (scope) => {
      const { item } = scope;
      if (!canTransitionItem(item.status, 'withdrawn')) {
        throw new ConflictException(
          `Auction item cannot be withdrawn from status ${item.status}`,
        );
      }
      await scope.updateItem(item.id, { status: 'withdrawn' });
      return { eventId: scope.event.id, item: { ...item, status: 'withdrawn' as const } };
    });
    if (result === null) throw new NotFoundException('Auction item not found');

    this.logger.log(`Auction item ${itemId} withdrawn`);
    this.notifier.emit({
      event: 'item_withdrawn',
      auctionId: result.eventId,
      itemId,
    });
    return result.item;
  }
}
