import { Global, Module } from '@nestjs/common';
import { UserModule } from '../user/user.module';
import { ClerkTokenVerifier } from './clerk-token.verifier';
import {
  ClerkAuthGuard,
  OptionalClerkAuthGuard,
  StaffGuard,
} from './guards/clerk-auth.guard';

@Global()
@Module({
  imports: [UserModule],
  providers: [ClerkTokenVerifier, ClerkAuthGuard, OptionalClerkAuthGuard, StaffGuard],
  exports: [
    ClerkTokenVerifier,
    ClerkAuthGuard,
    OptionalClerkAuthGuard,
    StaffGuard,
    UserModule,
  ],
})
export class AuthModule {}
