import {
  Controller,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuctionLifecycleService } from './auction-lifecycle.service';
import { AuctionQueryService } from './auction-query.service';
import type {
  AuctionBidResponse,
  AuctionItemDetailResponse,
} from './auction.serializer';
import { viewerOf } from './auction.controller';
import {
  ClerkAuthGuard,
  OptionalClerkAuthGuard,
  StaffGuard,
  type AuthenticatedUser,
} from '../auth/guards/clerk-auth.guard';
import { CurrentUser } from '../auth/decorators/current-user.decorator';

@Controller('auction-items')
export class AuctionItemController {
  constructor(
    private readonly queries: AuctionQueryService,
    private readonly lifecycle: AuctionLifecycleService,
  ) {}

  @Get(':id')
  @UseGuards(OptionalClerkAuthGuard)
  detail(
    @CurrentUser() user: AuthenticatedUser | null,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<AuctionItemDetailResponse> {
    return this.queries.getItem(id, viewerOf(user));
  }

  @Get(':id/bids')
  @UseGuards(OptionalClerkAuthGuard)
  bids(
    @CurrentUser() user: AuthenticatedUser | null,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<AuctionBidResponse[]> {
    return this.queries.listItemBids(id, viewerOf(user));
  }

  @Post(':id/withdraw')
  @HttpCode(200)
  @UseGuards(ClerkAuthGuard, StaffGuard)
  async withdraw(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<AuctionItemDetailResponse> {
    await this.lifecycle.withdrawItem(id);
    return this.queries.getItem(id, viewerOf(user));
  }
}
