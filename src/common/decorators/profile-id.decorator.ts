import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { PROFILE_HEADER } from '../guards/profile.guard';

/**
 * Extracts the profile id resolved by ProfileGuard.
 * Used in profile-aware controllers.
 */
export const ProfileId = createParamDecorator((data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<Request>();
  return String(request.header(PROFILE_HEADER) ?? '').trim();
});
