import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AuctionEventState, AuctionItemState } from './engine';
import { AuctionPersistenceService } from './auction-persistence.service';
import { sqlStateOf } from '../database/sql-state';
import { fieldError } from '../common/validation';
import type { CreateAuctionEventDto } from './dto/create-auction-event.dto';
import type { CreateAuctionItemDto } from './dto/create-auction-item.dto';

const DAY_MS = 24 * 60 * 60_000;
const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

@Injectable()
export class AuctionAdminService {
  private readonly logger = new Logger(AuctionAdminService.name);
  private readonly minDurationDays: number;
  private readonly maxDurationDays: number;

  constructor(
    private readonly persistence: AuctionPersistenceService,
    config: ConfigService,
  ) {
    this.minDurationDays = config.get<number>('auction.minDurationDays') ?? 3;
    this.maxDurationDays = config.get<number>('auction.maxDurationDays') ?? 14;
  }

  async createEvent(dto: CreateAuctionEventDto): Promise<AuctionEventState> {
    const startAt = dto.start_datetime;
    const endAt = dto.end_datetime;
    if (endAt.getTime() <= startAt.getTime()) {
      throw fieldError({ end_datetime: ['End time must be after start time'] });
    }
    const days = (endAt.getTime() - startAt.getTime()) / DAY_MS;
    if (days < this.minDurationDays || days > this.maxDurationDays) {
      throw fieldError({
        end_datetime: [
          `Auction must run between ${this.minDurationDays} and ${this.maxDurationDays} days`,
        ],
      });
    }

    try {
      const event = await this.persistence.createEvent({
        title: dto.title,
        slug: dto.slug,
        description: dto.description ?? '',
        shortDescription: dto.short_description ?? '',
        galleryId: dto.gallery_id ?? null,
        organizer: dto.organizer,
        startAt,
        endAt,
        isLive: dto.is_live ?? false,
        isOnline: dto.is_online ?? true,
        liveUrl: dto.live_url ?? null,
        isFeatured: dto.is_featured ?? false,
        commissionRate: dto.commission_rate ?? 10,
        registrationRequired: dto.registration_required ?? false,
        registrationFee: dto.registration_fee ?? 0,
      });
      this.logger.log(`Auction ${event.id} (${event.slug}) created`);
      return event;
    } catch (err) {
      const state = sqlStateOf(err);
      if (state === UNIQUE_VIOLATION) {
        throw fieldError({ slug: ['An auction with this slug already exists'] });
      }
      if (state === FOREIGN_KEY_VIOLATION) {
        throw fieldError({ gallery_id: ['Gallery not found'] });
      }
      throw err;
    }
  }

  /**
   * Add a lot to a planned or active event. Lots added to an active event
   * take bids immediately.
   */
  async addItem(
    eventId: number,
    dto: CreateAuctionItemDto,
  ): Promise<AuctionItemState> {
    if (
      dto.estimated_price_min !== undefined &&
      dto.estimated_price_max !== undefined &&
      dto.estimated_price_min > dto.estimated_price_max
    ) {
      throw fieldError({
        estimated_price_max: ['Maximum estimate must not be below the minimum'],
      });
    }

    const item = await this.persistence.withLockedEvent(eventId, async (scope) => {
      const { status } = scope.event;
      if (status !== 'planned' && status !== 'active') {
        throw new ConflictException(`Lots cannot be added to a ${status} auction`);
      }
      if (scope.items.some((i) => i.lotNumber === dto.lot_number)) {
        throw fieldError({
          lot_number: [`Lot number ${dto.lot_number} is already used in this auction`],
        });
      }
      return scope.insertItem({
        productId: dto.product_id,
        title: dto.title,
        lotNumber: dto.lot_number,
        startPrice: dto.start_price,
        reservePrice: dto.reserve_price ?? null,
        estimatedPriceMin: dto.estimated_price_min ?? null,
        estimatedPriceMax: dto.estimated_price_max ?? null,
        status: status === 'active' ? 'active' : 'pending',
      });
    });
    if (item === null) throw new NotFoundException('Auction not found');

    this.logger.log(`Lot ${item.lotNumber} (item ${item.id}) added to auction ${eventId}`);
    return item;
  }
}
