import {
  IsInt,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { MAX_BID_AMOUNT } from '../engine';

export class CreateAuctionItemDto {
  @IsString()
  @MaxLength(64)
  product_id!: string;

  @IsString()
  @MaxLength(255)
  title!: string;

  @IsInt()
  @Min(1)
  lot_number!: number;

  @IsInt()
  @Min(1)
  @Max(MAX_BID_AMOUNT)
  start_price!: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_BID_AMOUNT)
  reserve_price?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_BID_AMOUNT)
  estimated_price_min?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_BID_AMOUNT)
  estimated_price_max?: number;
}
