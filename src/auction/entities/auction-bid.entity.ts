import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { numericTransformer } from '../../database/numeric.transformer';
import { UserEntity } from '../../user/user.entity';
import { AuctionItemEntity } from './auction-item.entity';

// Append-only apart from is_winner, which closure flips once.
@Entity({ name: 'auction_bids' })
@Index(['itemId', 'amount'])
export class AuctionBidEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'item_id', type: 'integer' })
  itemId!: number;

  @ManyToOne(() => AuctionItemEntity, (item) => item.bids, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'item_id' })
  item!: AuctionItemEntity;

  @Column({ name: 'user_id', type: 'uuid' })
  userId!: string;

  @ManyToOne(() => UserEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'user_id' })
  user!: UserEntity;

  @Column({
    type: 'numeric',
    precision: 12,
    scale: 0,
    transformer: numericTransformer,
  })
  amount!: number;

  @Column({ name: 'placed_at', type: 'timestamptz' })
  placedAt!: Date;

  @Column({ name: 'is_winner', type: 'boolean', default: false })
  isWinner!: boolean;

  @Column({ name: 'is_auto', type: 'boolean', default: false })
  isAuto!: boolean;
}
