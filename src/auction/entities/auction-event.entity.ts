import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { numericTransformer } from '../../database/numeric.transformer';
import {
  AUCTION_EVENT_STATUSES,
  type AuctionEventStatus,
} from '../engine/types';
import { GalleryEntity } from './gallery.entity';
import type { AuctionItemEntity } from './auction-item.entity';

@Entity({ name: 'auction_events' })
@Check('"start_at" < "end_at"')
@Index(['status', 'startAt'])
@Index(['status', 'endAt'])
export class AuctionEventEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  title!: string;

  @Column({ type: 'varchar', length: 255, unique: true })
  slug!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({ name: 'short_description', type: 'varchar', length: 500, default: '' })
  shortDescription!: string;

  @Column({ name: 'gallery_id', type: 'integer', nullable: true })
  galleryId!: number | null;

  @ManyToOne(() => GalleryEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'gallery_id' })
  gallery!: GalleryEntity | null;

  @Column({ type: 'varchar', length: 255 })
  organizer!: string;

  @Column({ name: 'start_at', type: 'timestamptz' })
  startAt!: Date;

  @Column({ name: 'end_at', type: 'timestamptz' })
  endAt!: Date;

  @Column({ name: 'is_live', type: 'boolean', default: false })
  isLive!: boolean;

  @Column({ name: 'is_online', type: 'boolean', default: true })
  isOnline!: boolean;

  @Column({ name: 'live_url', type: 'varchar', length: 500, nullable: true })
  liveUrl!: string | null;

  @Column({
    type: 'enum',
    enum: [...AUCTION_EVENT_STATUSES],
    default: 'planned',
  })
  status!: AuctionEventStatus;

  @Column({ name: 'is_featured', type: 'boolean', default: false })
  isFeatured!: boolean;

  @Column({
    name: 'commission_rate',
    type: 'numeric',
    precision: 5,
    scale: 2,
    default: 10,
    transformer: numericTransformer,
  })
  commissionRate!: number;

  @Column({ name: 'registration_required', type: 'boolean', default: false })
  registrationRequired!: boolean;

  @Column({
    name: 'registration_fee',
    type: 'numeric',
    precision: 12,
    scale: 0,
    default: 0,
    transformer: numericTransformer,
  })
  registrationFee!: number;

  @Column({ name: 'extension_count', type: 'integer', default: 0 })
  extensionCount!: number;

  @Column({ name: 'closed_at', type: 'timestamptz', nullable: true })
  closedAt!: Date | null;

  @OneToMany('AuctionItemEntity', 'event')
  items!: AuctionItemEntity[];

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
