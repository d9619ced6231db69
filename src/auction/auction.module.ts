import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuctionAdminService } from './auction-admin.service';
import { AuctionItemController } from './auction-item.controller';
import { AuctionLifecycleService } from './auction-lifecycle.service';
import { AuctionNotifier } from './auction-notifier';
import { AuctionPersistenceService } from './auction-persistence.service';
import { AuctionQueryService } from './auction-query.service';
import { AuctionController } from './auction.controller';
import { AuctionGateway } from './auction.gateway';
import { BidPlacementService } from './bid-placement.service';
import { BidValidator, DEFAULT_BID_POLICY } from './engine';
import { AuctionBidEntity } from './entities/auction-bid.entity';
import { AuctionEventEntity } from './entities/auction-event.entity';
import { AuctionItemEntity } from './entities/auction-item.entity';
import { GalleryEntity } from './entities/gallery.entity';
import { TypeOrmAuctionPersistenceService } from './typeorm-auction-persistence.service';
import { OrdersModule } from '../orders/orders.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      GalleryEntity,
      AuctionEventEntity,
      AuctionItemEntity,
      AuctionBidEntity,
    ]),
    OrdersModule,
  ],
  controllers: [AuctionController, AuctionItemController],
  providers: [
    {
      provide: AuctionPersistenceService,
      useClass: TypeOrmAuctionPersistenceService,
    },
    {
      provide: BidValidator,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new BidValidator({
          incrementPercentage:
            config.get<number>('auction.incrementPercentage') ??
            DEFAULT_BID_POLICY.incrementPercentage,
          allowSelfOutbid:
            config.get<boolean>('auction.allowSelfOutbid') ??
            DEFAULT_BID_POLICY.allowSelfOutbid,
          antiSnipeWindowMs:
            config.get<number>('auction.antiSnipeWindowMs') ??
            DEFAULT_BID_POLICY.antiSnipeWindowMs,
          antiSnipeExtensionMs:
            config.get<number>('auction.antiSnipeExtensionMs') ??
            DEFAULT_BID_POLICY.antiSnipeExtensionMs,
        }),
    },
    AuctionNotifier,
    BidPlacementService,
    AuctionLifecycleService,
    AuctionAdminService,
    AuctionQueryService,
    AuctionGateway,
  ],
  exports: [BidPlacementService, AuctionNotifier],
})
export class AuctionModule {}
