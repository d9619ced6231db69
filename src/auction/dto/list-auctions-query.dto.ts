import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { AUCTION_EVENT_STATUSES, type AuctionEventStatus } from '../engine';
import { AUCTION_PERIODS, type AuctionPeriod } from '../auction-filters';
import { ToBoolean } from './query-transforms';

export const AUCTION_ORDERINGS = [
  'start_datetime',
  '-start_datetime',
  'end_datetime',
  '-end_datetime',
  'created_at',
  '-created_at',
] as const;

export type AuctionOrdering = (typeof AUCTION_ORDERINGS)[number];

export const DEFAULT_PAGE_SIZE = 24;
export const MAX_PAGE_SIZE = 100;

export class ListAuctionsQueryDto {
  @IsOptional()
  @IsIn(AUCTION_EVENT_STATUSES)
  status?: AuctionEventStatus;

  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  is_live?: boolean;

  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  is_online?: boolean;

  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  is_featured?: boolean;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  gallery?: string;

  @IsOptional()
  @IsIn(AUCTION_PERIODS)
  period?: AuctionPeriod;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  search?: string;

  @IsOptional()
  @IsIn(AUCTION_ORDERINGS)
  ordering?: AuctionOrdering;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number = 1;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_SIZE)
  page_size?: number = DEFAULT_PAGE_SIZE;
}
