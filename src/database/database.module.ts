import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuctionBidEntity } from '../auction/entities/auction-bid.entity';
import { AuctionEventEntity } from '../auction/entities/auction-event.entity';
import { AuctionItemEntity } from '../auction/entities/auction-item.entity';
import { GalleryEntity } from '../auction/entities/gallery.entity';
import { PurchaseOrderEntity } from '../orders/purchase-order.entity';
import { UserEntity } from '../user/user.entity';

export const ENTITIES = [
  UserEntity,
  GalleryEntity,
  AuctionEventEntity,
  AuctionItemEntity,
  AuctionBidEntity,
  PurchaseOrderEntity,
];

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        type: 'postgres' as const,
        url:
          config.get<string>('database.url') ??
          'postgresql://localhost:5432/ma2ta_auctions',
        entities: ENTITIES,
        synchronize: config.get<boolean>('database.synchronize') ?? false,
      }),
    }),
  ],
})
export class DatabaseModule {}
