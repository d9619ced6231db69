import {
  Body,
  Controller,
  Get,
  Logger,
  Param,
  Patch,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { IsOptional, IsString, MaxLength } from 'class-validator';
import { UserService } from './user.service';
import type { UserEntity } from './user.entity';
import { ClerkAuthGuard, type AuthenticatedUser } from '../auth/guards/clerk-auth.guard';
import { CurrentUser } from '../auth/decorators/current-user.decorator';

export class DisplayNameDto {
  @IsOptional()
  @IsString()
  @MaxLength(64)
  display_name?: string;
}

export interface UserResponse {
  id: string;
  display_name: string;
  is_staff: boolean;
  created_at: string;
}

function toUserResponse(user: UserEntity): UserResponse {
  return {
    id: user.id,
    display_name: user.displayName,
    is_staff: user.isStaff,
    created_at: user.createdAt.toISOString(),
  };
}

@Controller('users')
export class UserController {
  private readonly logger = new Logger(UserController.name);

  constructor(private readonly userService: UserService) {}

  @Post('sync')
  @UseGuards(ClerkAuthGuard)
  async sync(
    @CurrentUser() current: AuthenticatedUser,
    @Body() body: DisplayNameDto,
  ): Promise<UserResponse> {
    this.logger.log(
      `POST /users/sync clerkId=${current.clerkId} displayName=${body.display_name ?? '(none)'}`,
    );
    const user = await this.userService.syncFromClerk(
      current.clerkId,
      body.display_name,
    );
    return toUserResponse(user);
  }

  @Patch('me')
  @UseGuards(ClerkAuthGuard)
  async updateMe(
    @CurrentUser() current: AuthenticatedUser,
    @Body() body: DisplayNameDto,
  ): Promise<UserResponse> {
    const user = await this.userService.updateDisplayNameFromClerk(
      current.clerkId,
      body.display_name ?? '',
    );
    this.logger.log(`Profile updated: id=${user.id} name=${user.displayName}`);
    return toUserResponse(user);
  }

  @Get(':id')
  async findById(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<UserResponse> {
    return toUserResponse(await this.userService.findById(id));
  }
}
