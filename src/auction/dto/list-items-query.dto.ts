import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Min } from 'class-validator';
import { AUCTION_ITEM_STATUSES, type AuctionItemStatus } from '../engine';

export class ListItemsQueryDto {
  @IsOptional()
  @IsIn(AUCTION_ITEM_STATUSES)
  status?: AuctionItemStatus;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  min_price?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  max_price?: number;
}
