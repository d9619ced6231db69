import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { numericTransformer } from '../database/numeric.transformer';

export type PurchaseOrderStatus = 'awaiting_payment' | 'paid' | 'expired';

@Entity({ name: 'purchase_orders' })
export class PurchaseOrderEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // One order per sold lot.
  @Column({ name: 'auction_item_id', type: 'integer', unique: true })
  auctionItemId!: number;

  @Column({ name: 'auction_bid_id', type: 'integer' })
  auctionBidId!: number;

  @Column({ name: 'user_id', type: 'uuid' })
  userId!: string;

  @Column({
    type: 'numeric',
    precision: 12,
    scale: 0,
    transformer: numericTransformer,
  })
  amount!: number;

  @Column({
    type: 'numeric',
    precision: 12,
    scale: 0,
    transformer: numericTransformer,
  })
  commission!: number;

  @Column({
    type: 'enum',
    enum: ['awaiting_payment', 'paid', 'expired'],
    default: 'awaiting_payment',
  })
  status!: PurchaseOrderStatus;

  @Column({ name: 'expires_at', type: 'timestamptz' })
  expiresAt!: Date;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
