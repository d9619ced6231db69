import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { numericTransformer } from '../../database/numeric.transformer';
import { AUCTION_ITEM_STATUSES, type AuctionItemStatus } from '../engine/types';
import { AuctionEventEntity } from './auction-event.entity';
import type { AuctionBidEntity } from './auction-bid.entity';

const money = (name: string, nullable: boolean) => ({
  name,
  type: 'numeric' as const,
  precision: 12,
  scale: 0,
  nullable,
  transformer: numericTransformer,
});

@Entity({ name: 'auction_items' })
@Index(['eventId', 'lotNumber'], { unique: true })
export class AuctionItemEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'event_id', type: 'integer' })
  eventId!: number;

  @ManyToOne(() => AuctionEventEntity, (event) => event.items, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'event_id' })
  event!: AuctionEventEntity;

  @Column({ name: 'product_id', type: 'varchar', length: 64 })
  productId!: string;

  @Column({ type: 'varchar', length: 255 })
  title!: string;

  @Column({ name: 'lot_number', type: 'integer' })
  lotNumber!: number;

  @Column(money('start_price', false))
  startPrice!: number;

  @Column(money('reserve_price', true))
  reservePrice!: number | null;

  @Column(money('estimated_price_min', true))
  estimatedPriceMin!: number | null;

  @Column(money('estimated_price_max', true))
  estimatedPriceMax!: number | null;

  @Column(money('current_bid', true))
  currentBid!: number | null;

  @Column(money('winning_bid', true))
  winningBid!: number | null;

  @Column({ name: 'total_bids', type: 'integer', default: 0 })
  totalBids!: number;

  @Column({ type: 'enum', enum: [...AUCTION_ITEM_STATUSES], default: 'pending' })
  status!: AuctionItemStatus;

  @Column({ name: 'hammer_time', type: 'timestamptz', nullable: true })
  hammerTime!: Date | null;

  @OneToMany('AuctionBidEntity', 'item')
  bids!: AuctionBidEntity[];
}
