import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';
import { ClerkTokenVerifier, bearerToken } from '../clerk-token.verifier';
import { UserService } from '../../user/user.service';

export interface AuthenticatedUser {
  id: string;
  clerkId: string;
  displayName: string;
  isStaff: boolean;
}

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
}

@Injectable()
abstract class ClerkGuardBase implements CanActivate {
  protected readonly logger = new Logger(this.constructor.name);

  protected abstract readonly required: boolean;

  constructor(
    private readonly verifier: ClerkTokenVerifier,
    private readonly userService: UserService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = bearerToken(request.headers.authorization);

    if (!token) {
      if (!this.required) return true;
      throw new UnauthorizedException('Missing or invalid authorization header');
    }

    let clerkId: string | null;
    try {
      clerkId = await this.verifier.verify(token);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error(`Unexpected token verification error: ${msg}`);
      throw new UnauthorizedException('Token verification failed');
    }
    if (!clerkId) throw new UnauthorizedException('Token verification failed');

    const user = await this.userService.syncFromClerk(clerkId);
    request.user = {
      id: user.id,
      clerkId,
      displayName: user.displayName,
      isStaff: user.isStaff,
    };
    this.logger.debug(`Authenticated user=${user.id} clerk=${clerkId}`);
    return true;
  }
}

/** Rejects requests without a valid Clerk session token. */
@Injectable()
export class ClerkAuthGuard extends ClerkGuardBase {
  protected readonly required = true;
}

/** Attaches the user when a token is sent; anonymous requests pass. */
@Injectable()
export class OptionalClerkAuthGuard extends ClerkGuardBase {
  protected readonly required = false;
}

/** Use after ClerkAuthGuard. */
@Injectable()
export class StaffGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.user?.isStaff) {
      throw new ForbiddenException('Staff access required');
    }
    return true;
  }
}
