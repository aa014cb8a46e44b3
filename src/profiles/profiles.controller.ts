import { Body, Controller, Get, Patch, UseGuards } from '@nestjs/common';
import { ProfileId } from '../common/decorators/profile-id.decorator';
import { ProfileGuard } from '../common/guards/profile.guard';
import { ProfilesService } from './profiles.service';
import { UpdateProfileDto } from './dto/update-profile.dto';

@Controller('profiles')
@UseGuards(ProfileGuard)
export class ProfilesController {
  constructor(private readonly profilesService: ProfilesService) {}

  @Get('me')
  me(@ProfileId() profileId: string) {
    return this.profilesService.getOrCreate(profileId);
  }

  @Patch('me')
  update(@ProfileId() profileId: string, @Body() body: UpdateProfileDto) {
    return this.profilesService.update(profileId, body);
  }
}
