import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { UserEntity } from './user.entity';

@Injectable()
export class UserService {
  constructor(
    @InjectRepository(UserEntity)
    private readonly users: Repository<UserEntity>,
  ) {}

  private async getAvailableDisplayName(
    baseDisplayName: string,
    excludeUserId?: string,
  ): Promise<string> {
    const base = baseDisplayName.trim().slice(0, 56) || 'User';
    let candidate = base;
    let suffix = 0;
    for (;;) {
      const taken = await this.users.findOne({
        where: { displayName: candidate },
        select: { id: true },
      });
      if (!taken || taken.id === excludeUserId) return candidate;
      suffix += 1;
      candidate = `${base}_${suffix}`;
    }
  }

  async findById(id: string): Promise<UserEntity> {
    const user = await this.users.findOne({ where: { id } });
    if (!user) throw new NotFoundException('User not found');
    return user;
  }

  async updateDisplayNameFromClerk(
    clerkId: string,
    displayName: string,
  ): Promise<UserEntity> {
    const preferredDisplayName = displayName.trim();
    const existing = await this.users.findOne({ where: { clerkId } });
    if (!existing || !preferredDisplayName) {
      return this.syncFromClerk(clerkId, preferredDisplayName);
    }
    return this.rename(existing, preferredDisplayName);
  }

  /** Sync or create user from Clerk. Returns app user. */
  async syncFromClerk(
    clerkId: string,
    displayName?: string,
  ): Promise<UserEntity> {
    const preferredDisplayName = displayName?.trim();
    const existing = await this.users.findOne({ where: { clerkId } });
    if (existing) {
      if (!preferredDisplayName) return existing;
      return this.rename(existing, preferredDisplayName);
    }

    const candidate = await this.getAvailableDisplayName(
      preferredDisplayName || `User_${clerkId.slice(-8)}`,
    );
    return this.users.save(
      this.users.create({ clerkId, displayName: candidate, isStaff: false }),
    );
  }

  private async rename(
    user: UserEntity,
    preferredDisplayName: string,
  ): Promise<UserEntity> {
    if (preferredDisplayName === user.displayName) return user;
    const candidate = await this.getAvailableDisplayName(
      preferredDisplayName,
      user.id,
    );
    if (candidate === user.displayName) return user;
    user.displayName = candidate;
    return this.users.save(user);
  }
}
