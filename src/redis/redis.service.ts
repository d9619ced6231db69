import { Injectable, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

/**
 * Lua script releasing a lease only if the caller still owns it.
 * KEYS[1] = lease key, ARGV[1] = owner token
 * Returns 1 if released, 0 otherwise.
 */
const RELEASE_LEASE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly client: Redis;
  private readonly logger = new Logger(RedisService.name);

  constructor(config: ConfigService) {
    const url = config.get<string>('redis.url') ?? 'redis://localhost:6379';
    this.client = new Redis(url, { lazyConnect: false, maxRetriesPerRequest: 3 });
    this.client.on('error', (err) =>
      this.logger.error('Redis connection error', err),
    );
    this.client.on('connect', () => this.logger.log('Connected to Redis'));
  }

  getClient(): Redis {
    return this.client;
  }

  private bidIdempotencyPendingKey(
    itemId: number,
    bidderId: string,
    idempotencyKey: string,
  ): string {
    return `auction-item:${itemId}:bidder:${bidderId}:idem:${idempotencyKey}:pending`;
  }

  private bidIdempotencyResultKey(
    itemId: number,
    bidderId: string,
    idempotencyKey: string,
  ): string {
    return `auction-item:${itemId}:bidder:${bidderId}:idem:${idempotencyKey}:result`;
  }

  private leaseKey(name: string): string {
    return `lease:${name}`;
  }

  async claimBidIdempotency(
    itemId: number,
    bidderId: string,
    idempotencyKey: string,
    ttlSec = 30,
  ): Promise<boolean> {
    const result = await this.client.set(
      this.bidIdempotencyPendingKey(itemId, bidderId, idempotencyKey),
      '1',
      'EX',
      ttlSec,
      'NX',
    );
    return result === 'OK';
  }

  /** Raw JSON of a settled outcome; the caller owns its shape. */
  async getBidIdempotencyResult(
    itemId: number,
    bidderId: string,
    idempotencyKey: string,
  ): Promise<string | null> {
    return this.client.get(
      this.bidIdempotencyResultKey(itemId, bidderId, idempotencyKey),
    );
  }

  async storeBidIdempotencyResult(
    itemId: number,
    bidderId: string,
    idempotencyKey: string,
    result: string,
    ttlSec = 600,
  ): Promise<void> {
    const pipeline = this.client.pipeline();
    pipeline.set(
      this.bidIdempotencyResultKey(itemId, bidderId, idempotencyKey),
      result,
      'EX',
      ttlSec,
    );
    pipeline.del(
      this.bidIdempotencyPendingKey(itemId, bidderId, idempotencyKey),
    );
    await pipeline.exec();
  }

  /** Drop a pending claim without a result so a retry can run. */
  async releaseBidIdempotency(
    itemId: number,
    bidderId: string,
    idempotencyKey: string,
  ): Promise<void> {
    await this.client.del(
      this.bidIdempotencyPendingKey(itemId, bidderId, idempotencyKey),
    );
  }

  /**
   * Take a named lease for `ttlMs` if nobody holds it.
   * Returns true when `owner` now holds the lease.
   */
  async acquireLease(name: string, owner: string, ttlMs: number): Promise<boolean> {
    const result = await this.client.set(
      this.leaseKey(name),
      owner,
      'PX',
      ttlMs,
      'NX',
    );
    return result === 'OK';
  }

  async releaseLease(name: string, owner: string): Promise<boolean> {
    const result = await this.client.eval(
      RELEASE_LEASE_SCRIPT,
      1,
      this.leaseKey(name),
      owner,
    );
    return result === 1;
  }

  async onModuleDestroy() {
    await this.client.quit();
  }
}
