import { Type } from 'class-transformer';
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';

export class PlaceBidDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  auction_item_id!: number;

  // Range and increment rules live in BidValidator.
  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 0 })
  amount!: number;

  @IsOptional()
  @IsString()
  @MaxLength(128)
  idempotency_key?: string;
}
