import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { sqlStateOf } from '../database/sql-state';
import { AuctionBidEntity } from '../auction/entities/auction-bid.entity';
import { AuctionItemEntity } from '../auction/entities/auction-item.entity';
import { PurchaseOrderEntity } from './purchase-order.entity';

export interface WinningBidOrderInput {
  itemId: number;
  bidId: number;
  userId: string;
  amount: number;
  /** Event commission in percent, e.g. 10 for 10%. */
  commissionRate: number;
}

interface UnorderedSaleRow {
  itemId: number | string;
  bidId: number | string;
  userId: string;
  amount: number | string;
  commissionRate: number | string;
}

const UNIQUE_VIOLATION = '23505';

export function commissionFor(amount: number, commissionRate: number): number {
  return Math.round((amount * commissionRate) / 100);
}

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);
  private readonly paymentWindowMs: number;

  constructor(
    @InjectRepository(PurchaseOrderEntity)
    private readonly orders: Repository<PurchaseOrderEntity>,
    config: ConfigService,
  ) {
    this.paymentWindowMs =
      config.get<number>('orders.paymentWindowMs') ?? 30 * 60_000;
  }

  /**
   * Open an awaiting-payment order for a sold lot. At most one order exists
   * per item; returns false when none was created.
   */
  async createForWinningBid(
    input: WinningBidOrderInput,
    now = new Date(),
  ): Promise<boolean> {
    try {
      const existing = await this.orders.findOne({
        where: { auctionItemId: input.itemId },
        select: { id: true },
      });
      if (existing) return false;

      await this.orders.save(
        this.orders.create({
          auctionItemId: input.itemId,
          auctionBidId: input.bidId,
          userId: input.userId,
          amount: input.amount,
          commission: commissionFor(input.amount, input.commissionRate),
          status: 'awaiting_payment',
          expiresAt: new Date(now.getTime() + this.paymentWindowMs),
        }),
      );
      this.logger.log(
        `Order opened for item ${input.itemId}: ${input.amount} by ${input.userId}`,
      );
      return true;
    } catch (err) {
      if (sqlStateOf(err) === UNIQUE_VIOLATION) return false;
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error(
        `Failed to open order for item ${input.itemId}: ${msg}`,
        err instanceof Error ? err.stack : undefined,
      );
      return false;
    }
  }

  /** Sold lots with a winning bid but no purchase order, oldest hammer first. */
  async findUnorderedSales(limit = 50): Promise<WinningBidOrderInput[]> {
    const rows = await this.orders.manager
      .createQueryBuilder(AuctionItemEntity, 'item')
      .innerJoin('item.event', 'event')
      .innerJoin(
        AuctionBidEntity,
        'bid',
        'bid.itemId = item.id AND bid.isWinner = :isWinner',
        { isWinner: true },
      )
      .leftJoin(PurchaseOrderEntity, 'po', 'po.auctionItemId = item.id')
      .select('item.id', 'itemId')
      .addSelect('bid.id', 'bidId')
      .addSelect('bid.userId', 'userId')
      .addSelect('bid.amount', 'amount')
      .addSelect('event.commissionRate', 'commissionRate')
      .where('item.status = :sold', { sold: 'sold' })
      .andWhere('po.id IS NULL')
      .orderBy('item.hammerTime', 'ASC')
      .limit(limit)
      .getRawMany<UnorderedSaleRow>();
    return rows.map((r) => ({
      itemId: Number(r.itemId),
      bidId: Number(r.bidId),
      userId: r.userId,
      amount: Number(r.amount),
      commissionRate: Number(r.commissionRate),
    }));
  }
}
