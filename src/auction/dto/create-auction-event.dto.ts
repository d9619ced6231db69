import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsDate,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export class CreateAuctionEventDto {
  @IsString()
  @MaxLength(255)
  title!: string;

  @Matches(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, {
    message: 'slug may contain lowercase letters, digits and hyphens only',
  })
  @MaxLength(255)
  slug!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  short_description?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  gallery_id?: number;

  @IsString()
  @MaxLength(255)
  organizer!: string;

  @Type(() => Date)
  @IsDate()
  start_datetime!: Date;

  @Type(() => Date)
  @IsDate()
  end_datetime!: Date;

  @IsOptional()
  @IsBoolean()
  is_live?: boolean;

  @IsOptional()
  @IsBoolean()
  is_online?: boolean;

  @IsOptional()
  @IsUrl()
  @MaxLength(500)
  live_url?: string;

  @IsOptional()
  @IsBoolean()
  is_featured?: boolean;

  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Max(100)
  commission_rate?: number;

  @IsOptional()
  @IsBoolean()
  registration_required?: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  registration_fee?: number;
}
