import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

// Galleries are managed elsewhere; only the columns bidding needs are mapped.
@Entity({ name: 'galleries' })
export class GalleryEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255, unique: true })
  slug!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ name: 'owner_id', type: 'uuid' })
  ownerId!: string;
}
