import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { UserEntity } from './user.entity';
import { UserService } from './user.service';

class UserRepositoryDouble {
  readonly rows: UserEntity[] = [];

  async findOne(options: {
    where: Partial<Pick<UserEntity, 'id' | 'clerkId' | 'displayName'>>;
  }): Promise<UserEntity | null> {
    const { id, clerkId, displayName } = options.where;
    return (
      this.rows.find(
        (r) =>
          (id === undefined || r.id === id) &&
          (clerkId === undefined || r.clerkId === clerkId) &&
          (displayName === undefined || r.displayName === displayName),
      ) ?? null
    );
  }

  create(data: Partial<UserEntity>): UserEntity {
    return Object.assign(new UserEntity(), data);
  }

  async save(row: UserEntity): Promise<UserEntity> {
    if (!this.rows.includes(row)) {
      row.id = `user-${this.rows.length + 1}`;
      this.rows.push(row);
    }
    return row;
  }
}

describe('UserService', () => {
  let service: UserService;
  let repo: UserRepositoryDouble;

  beforeEach(async () => {
    repo = new UserRepositoryDouble();
    const module = await Test.createTestingModule({
      providers: [
        UserService,
        { provide: getRepositoryToken(UserEntity), useValue: repo },
      ],
    }).compile();
    service = module.get(UserService);
  });

  it('creates a user named after the tail of the Clerk id', async () => {
    const user = await service.syncFromClerk('user_2abcdefgh12345678');
    expect(user.displayName).toBe('User_12345678');
    expect(user.isStaff).toBe(false);
    expect(repo.rows).toHaveLength(1);
  });

  it('returns the existing user on repeat sync', async () => {
    const first = await service.syncFromClerk('clerk_a');
    const again = await service.syncFromClerk('clerk_a');
    expect(again).toBe(first);
    expect(repo.rows).toHaveLength(1);
  });

  it('suffixes a display name that is taken', async () => {
    await service.syncFromClerk('clerk_a', 'Shirin');
    const second = await service.syncFromClerk('clerk_b', 'Shirin');
    expect(second.displayName).toBe('Shirin_1');
  });

  it('keeps a user’s own name when renaming to it', async () => {
    const user = await service.syncFromClerk('clerk_a', 'Darius');
    const renamed = await service.updateDisplayNameFromClerk('clerk_a', ' Darius ');
    expect(renamed.displayName).toBe('Darius');
    expect(renamed).toBe(user);
  });

  it('renames to a free name', async () => {
    await service.syncFromClerk('clerk_a', 'Darius');
    const renamed = await service.updateDisplayNameFromClerk('clerk_a', 'Kaveh');
    expect(renamed.displayName).toBe('Kaveh');
  });

  it('throws when the user does not exist', async () => {
    await expect(service.findById('missing')).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });
});
