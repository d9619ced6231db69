import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  NotFoundException,
  Param,
  Post,
  Query,
  ServiceUnavailableException,
  UseGuards,
} from '@nestjs/common';
import type { BidViewer, ItemSettlement } from './engine';
import { AuctionAdminService } from './auction-admin.service';
import { AuctionLifecycleService } from './auction-lifecycle.service';
import { AuctionQueryService } from './auction-query.service';
import {
  BidPlacementService,
  type PlaceBidResult,
} from './bid-placement.service';
import type {
  AuctionBidResponse,
  AuctionEventDetailResponse,
  AuctionEventSummaryResponse,
  AuctionItemDetailResponse,
  AuctionItemSummaryResponse,
  Page,
} from './auction.serializer';
import { CreateAuctionEventDto } from './dto/create-auction-event.dto';
import { CreateAuctionItemDto } from './dto/create-auction-item.dto';
import { ListAuctionsQueryDto } from './dto/list-auctions-query.dto';
import { ListItemsQueryDto } from './dto/list-items-query.dto';
import { PlaceBidDto } from './dto/place-bid.dto';
import {
  ClerkAuthGuard,
  OptionalClerkAuthGuard,
  StaffGuard,
  type AuthenticatedUser,
} from '../auth/guards/clerk-auth.guard';
import { CurrentUser } from '../auth/decorators/current-user.decorator';

export interface PlacedBidResponse extends AuctionBidResponse {
  extended_until: string | null;
}

export type SettlementResponse =
  | { item: number; status: 'sold'; winner: string; winning_bid: number }
  | { item: number; status: 'unsold'; reason: string };

export function viewerOf(user: AuthenticatedUser | null): BidViewer {
  return { userId: user?.id ?? null, isStaff: user?.isStaff ?? false };
}

/** Map a placement outcome onto the HTTP contract, throwing for rejections. */
export function toPlacedBidResponse(result: PlaceBidResult): PlacedBidResponse {
  if (result.accepted) {
    return { ...result.bid, extended_until: result.extendedUntil };
  }
  const { code, field, reason, minimum } = result;
  if (code === 'ITEM_NOT_FOUND') {
    throw new NotFoundException({ auction_item_id: [reason], code });
  }
  if (code === 'TRY_AGAIN') {
    throw new ServiceUnavailableException({ detail: reason, code });
  }
  throw new BadRequestException({
    [field ?? 'non_field_errors']: [reason],
    code,
    ...(minimum !== undefined && { minimum }),
  });
}

function toSettlementResponse(s: ItemSettlement): SettlementResponse {
  return s.status === 'sold'
    ? { item: s.itemId, status: 'sold', winner: s.winnerId, winning_bid: s.winningBid }
    : { item: s.itemId, status: 'unsold', reason: s.reason };
}

@Controller('auctions')
export class AuctionController {
  private readonly logger = new Logger(AuctionController.name);

  constructor(
    private readonly bids: BidPlacementService,
    private readonly queries: AuctionQueryService,
    private readonly admin: AuctionAdminService,
    private readonly lifecycle: AuctionLifecycleService,
  ) {}

  @Post('place-bid')
  @UseGuards(ClerkAuthGuard)
  async placeBid(
    @CurrentUser() user: AuthenticatedUser,
    @Body() dto: PlaceBidDto,
  ): Promise<PlacedBidResponse> {
    const result = await this.bids.placeBid(
      dto.auction_item_id,
      user.id,
      dto.amount,
      dto.idempotency_key,
    );
    if (!result.accepted) {
      this.logger.debug(
        `Bid rejected item=${dto.auction_item_id} user=${user.id} code=${result.code}`,
      );
    }
    return toPlacedBidResponse(result);
  }

  @Get()
  @UseGuards(OptionalClerkAuthGuard)
  list(
    @CurrentUser() user: AuthenticatedUser | null,
    @Query() query: ListAuctionsQueryDto,
  ): Promise<Page<AuctionEventSummaryResponse>> {
    return this.queries.listEvents(query, viewerOf(user));
  }

  @Get(':slug')
  @UseGuards(OptionalClerkAuthGuard)
  detail(
    @CurrentUser() user: AuthenticatedUser | null,
    @Param('slug') slug: string,
  ): Promise<AuctionEventDetailResponse> {
    return this.queries.getEvent(slug, viewerOf(user));
  }

  @Get(':slug/items')
  @UseGuards(OptionalClerkAuthGuard)
  items(
    @CurrentUser() user: AuthenticatedUser | null,
    @Param('slug') slug: string,
    @Query() query: ListItemsQueryDto,
  ): Promise<AuctionItemSummaryResponse[]> {
    return this.queries.listItems(slug, query, viewerOf(user));
  }

  /* ------------------------------------------------------------------ */
  /*  STAFF                                                              */
  /* ------------------------------------------------------------------ */

  @Post()
  @UseGuards(ClerkAuthGuard, StaffGuard)
  async create(
    @CurrentUser() user: AuthenticatedUser,
    @Body() dto: CreateAuctionEventDto,
  ): Promise<AuctionEventDetailResponse> {
    const event = await this.admin.createEvent(dto);
    return this.queries.getEvent(event.slug, viewerOf(user));
  }

  @Post(':slug/items')
  @UseGuards(ClerkAuthGuard, StaffGuard)
  async addItem(
    @CurrentUser() user: AuthenticatedUser,
    @Param('slug') slug: string,
    @Body() dto: CreateAuctionItemDto,
  ): Promise<AuctionItemDetailResponse> {
    const eventId = await this.queries.resolveEventId(slug);
    const item = await this.admin.addItem(eventId, dto);
    return this.queries.getItem(item.id, viewerOf(user));
  }

  @Post(':slug/close')
  @HttpCode(200)
  @UseGuards(ClerkAuthGuard, StaffGuard)
  async close(
    @Param('slug') slug: string,
  ): Promise<{ closed: boolean; results: SettlementResponse[] }> {
    const eventId = await this.queries.resolveEventId(slug);
    const { closed, settlements } = await this.lifecycle.closeEvent(eventId);
    return { closed, results: settlements.map(toSettlementResponse) };
  }

  @Post(':slug/cancel')
  @HttpCode(200)
  @UseGuards(ClerkAuthGuard, StaffGuard)
  async cancel(
    @Param('slug') slug: string,
  ): Promise<{ withdrawn_items: number[] }> {
    const eventId = await this.queries.resolveEventId(slug);
    const { withdrawnItemIds } = await this.lifecycle.cancelEvent(eventId);
    return { withdrawn_items: withdrawnItemIds };
  }
}
