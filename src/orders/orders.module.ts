import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PurchaseOrderEntity } from './purchase-order.entity';
import { OrdersService } from './orders.service';

@Module({
  imports: [TypeOrmModule.forFeature([PurchaseOrderEntity])],
  providers: [OrdersService],
  exports: [OrdersService],
})
export class OrdersModule {}
