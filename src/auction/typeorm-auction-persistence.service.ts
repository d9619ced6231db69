import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager, LessThanOrEqual } from 'typeorm';
import { sqlStateOf } from '../database/sql-state';
import type {
  AuctionBidRecord,
  AuctionEventState,
  AuctionItemState,
} from './engine';
import { LockUnavailableError } from './auction.errors';
import { toBidRecord, toEventState, toItemState } from './auction.mappers';
import {
  AuctionPersistenceService,
  type EventLockOptions,
  type EventPatch,
  type ItemPatch,
  type LockedEventScope,
  type LockedItemScope,
  type NewAuctionEventInput,
  type NewAuctionItemInput,
  type NewBidInput,
} from './auction-persistence.service';
import { AuctionBidEntity } from './entities/auction-bid.entity';
import { AuctionEventEntity } from './entities/auction-event.entity';
import { AuctionItemEntity } from './entities/auction-item.entity';
import { GalleryEntity } from './entities/gallery.entity';

/** SQLSTATEs worth retrying: lock_not_available, serialization_failure, deadlock_detected. */
const TRANSIENT_SQLSTATES = new Set(['55P03', '40001', '40P01']);

/**
 * PostgreSQL-backed store. Row locks are explicit `SELECT ... FOR UPDATE`
 * inside a transaction with a bounded `lock_timeout`.
 */
@Injectable()
export class TypeOrmAuctionPersistenceService extends AuctionPersistenceService {
  private readonly logger = new Logger(TypeOrmAuctionPersistenceService.name);
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly dataSource: DataSource,
    config: ConfigService,
  ) {
    super();
    this.lockTimeoutMs = config.get<number>('auction.lockTimeoutMs') ?? 3000;
  }

  /* ------------------------------------------------------------------ */
  /*  UNITS OF WORK                                                      */
  /* ------------------------------------------------------------------ */

  async withLockedItem<T>(
    itemId: number,
    work: (scope: LockedItemScope) => Promise<T>,
  ): Promise<T | null> {
    return this.transaction(async (manager) => {
      const ref = await manager.findOne(AuctionItemEntity, {
        where: { id: itemId },
        select: { id: true, eventId: true },
      });
      if (!ref) return null;

      const event = await this.lockEvent(manager, ref.eventId, false);
      if (!event) return null;
      const item = await manager.findOne(AuctionItemEntity, {
        where: { id: itemId },
        lock: { mode: 'pessimistic_write' },
      });
      if (!item) return null;

      const top = await manager.findOne(AuctionBidEntity, {
        where: { itemId },
        order: { amount: 'DESC', id: 'DESC' },
      });

      const scope: LockedItemScope = {
        event,
        item: toItemState(item),
        topBid: top ? toBidRecord(top) : null,
        insertBid: (input) => this.insertBid(manager, input),
        updateItemAggregate: async (id, currentBid, totalBids) => {
          await manager.update(AuctionItemEntity, { id }, { currentBid, totalBids });
        },
        updateItem: (id, patch) => this.updateItem(manager, id, patch),
        updateEvent: (id, patch) => this.updateEvent(manager, id, patch),
      };
      return work(scope);
    });
  }

  async withLockedEvent<T>(
    eventId: number,
    work: (scope: LockedEventScope) => Promise<T>,
    options: EventLockOptions = {},
  ): Promise<T | null> {
    const noWait = options.noWait ?? false;
    return this.transaction(async (manager) => {
      const event = await this.lockEvent(manager, eventId, noWait);
      if (!event) return null;
      const items = await manager.find(AuctionItemEntity, {
        where: { eventId },
        order: { lotNumber: 'ASC' },
        lock: noWait
          ? { mode: 'pessimistic_write', onLocked: 'nowait' }
          : { mode: 'pessimistic_write' },
      });

      const scope: LockedEventScope = {
        event,
        items: items.map(toItemState),
        topBid: async (itemId) => {
          const top = await manager.findOne(AuctionBidEntity, {
            where: { itemId },
            order: { amount: 'DESC', id: 'DESC' },
          });
          return top ? toBidRecord(top) : null;
        },
        countWinners: (itemId) =>
          manager.count(AuctionBidEntity, { where: { itemId, isWinner: true } }),
        markWinner: async (bidId) => {
          await manager.update(AuctionBidEntity, { id: bidId }, { isWinner: true });
        },
        updateItem: (id, patch) => this.updateItem(manager, id, patch),
        updateEvent: (id, patch) => this.updateEvent(manager, id, patch),
        insertItem: (input) => this.insertItem(manager, eventId, input),
      };
      return work(scope);
    });
  }

  /* ------------------------------------------------------------------ */
  /*  WRITES                                                             */
  /* ------------------------------------------------------------------ */

  async createEvent(input: NewAuctionEventInput): Promise<AuctionEventState> {
    const repo = this.dataSource.getRepository(AuctionEventEntity);
    const saved = await repo.save(repo.create({ ...input, status: 'planned' }));
    const ownerId = await this.galleryOwnerId(
      this.dataSource.manager,
      saved.galleryId,
    );
    return toEventState(saved, ownerId);
  }

  /* ------------------------------------------------------------------ */
  /*  READS                                                              */
  /* ------------------------------------------------------------------ */

  async findDueEventIds(now: Date): Promise<number[]> {
    const rows = await this.dataSource.getRepository(AuctionEventEntity).find({
      select: { id: true },
      where: [
        { status: 'planned', startAt: LessThanOrEqual(now) },
        { status: 'active', endAt: LessThanOrEqual(now) },
      ],
      order: { endAt: 'ASC' },
    });
    return rows.map((r) => r.id);
  }

  async findEventsEndingBetween(
    now: Date,
    until: Date,
  ): Promise<AuctionEventState[]> {
    const rows = await this.dataSource
      .getRepository(AuctionEventEntity)
      .createQueryBuilder('event')
      .leftJoinAndSelect('event.gallery', 'gallery')
      .where('event.status = :status', { status: 'active' })
      .andWhere('event.endAt > :now', { now })
      .andWhere('event.endAt <= :until', { until })
      .getMany();
    return rows.map((row) => toEventState(row, row.gallery?.ownerId ?? null));
  }

  async findBids(itemId: number): Promise<AuctionBidRecord[]> {
    const rows = await this.dataSource.getRepository(AuctionBidEntity).find({
      where: { itemId },
      order: { amount: 'DESC', id: 'DESC' },
    });
    return rows.map(toBidRecord);
  }

  /* ------------------------------------------------------------------ */
  /*  HELPERS                                                            */
  /* ------------------------------------------------------------------ */

  private async transaction<T>(
    fn: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.dataSource.transaction(async (manager) => {
        // SET cannot take bind parameters; the value is an integer from config.
        await manager.query(
          `SET LOCAL lock_timeout = ${Math.max(0, Math.trunc(this.lockTimeoutMs))}`,
        );
        return fn(manager);
      });
    } catch (err) {
      const sqlState = sqlStateOf(err);
      if (sqlState && TRANSIENT_SQLSTATES.has(sqlState)) {
        this.logger.warn(`Transient lock failure (${sqlState})`);
        throw new LockUnavailableError(
          err instanceof Error ? err.message : undefined,
          sqlState,
        );
      }
      throw err;
    }
  }

  private async lockEvent(
    manager: EntityManager,
    eventId: number,
    noWait: boolean,
  ): Promise<AuctionEventState | null> {
    const event = await manager.findOne(AuctionEventEntity, {
      where: { id: eventId },
      lock: noWait
        ? { mode: 'pessimistic_write', onLocked: 'nowait' }
        : { mode: 'pessimistic_write' },
    });
    if (!event) return null;
    return toEventState(event, await this.galleryOwnerId(manager, event.galleryId));
  }

  private async galleryOwnerId(
    manager: EntityManager,
    galleryId: number | null,
  ): Promise<string | null> {
    if (galleryId === null) return null;
    const gallery = await manager.findOne(GalleryEntity, {
      where: { id: galleryId },
      select: { id: true, ownerId: true },
    });
    return gallery?.ownerId ?? null;
  }

  private async insertBid(
    manager: EntityManager,
    input: NewBidInput,
  ): Promise<AuctionBidRecord> {
    const repo = manager.getRepository(AuctionBidEntity);
    const saved = await repo.save(
      repo.create({
        itemId: input.itemId,
        userId: input.userId,
        amount: input.amount,
        placedAt: input.placedAt,
        isAuto: input.isAuto,
        isWinner: false,
      }),
    );
    return toBidRecord(saved);
  }

  private async insertItem(
    manager: EntityManager,
    eventId: number,
    input: NewAuctionItemInput,
  ): Promise<AuctionItemState> {
    const repo = manager.getRepository(AuctionItemEntity);
    const saved = await repo.save(
      repo.create({
        ...input,
        eventId,
        currentBid: null,
        winningBid: null,
        totalBids: 0,
        hammerTime: null,
      }),
    );
    return toItemState(saved);
  }

  private async updateItem(
    manager: EntityManager,
    itemId: number,
    patch: ItemPatch,
  ): Promise<void> {
    await manager.update(AuctionItemEntity, { id: itemId }, {
      ...(patch.status !== undefined && { status: patch.status }),
      ...(patch.winningBid !== undefined && { winningBid: patch.winningBid }),
      ...(patch.hammerTime !== undefined && { hammerTime: patch.hammerTime }),
    });
  }

  private async updateEvent(
    manager: EntityManager,
    eventId: number,
    patch: EventPatch,
  ): Promise<void> {
    await manager.update(AuctionEventEntity, { id: eventId }, {
      ...(patch.status !== undefined && { status: patch.status }),
      ...(patch.endAt !== undefined && { endAt: patch.endAt }),
      ...(patch.extensionCount !== undefined && {
        extensionCount: patch.extensionCount,
      }),
      ...(patch.closedAt !== undefined && { closedAt: patch.closedAt }),
    });
  }
}
