import { BadRequestException, CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Request } from 'express';

export const PROFILE_HEADER = 'x-profile-id';

const PROFILE_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * Resolves profile context for every request from the X-Profile-ID header.
 * Profiles are local to the device, there is no authentication.
 */
@Injectable()
export class ProfileGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const profileId = String(request.header(PROFILE_HEADER) ?? '').trim();
    if (!profileId) {
      throw new BadRequestException('X-Profile-ID header is required');
    }
    if (!PROFILE_ID_PATTERN.test(profileId)) {
      throw new BadRequestException('X-Profile-ID must be 1-64 letters, digits, "-" or "_"');
    }
    return true;
  }
}
