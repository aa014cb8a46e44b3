import { BadRequestException, Body, Controller, Get, Inject, Param, Post, Query, UseGuards } from '@nestjs/common';
import { ProfileId } from '../common/decorators/profile-id.decorator';
import { ProfileGuard } from '../common/guards/profile.guard';
import { isProgramDay } from '../common/utils/program-day';
import { ProfilesService } from '../profiles/profiles.service';
import { Clock, CLOCK } from '../progression/clock';
import { expectTransition } from '../progression/transition-errors';
import { PlanProgressService } from './plan-progress.service';
import { ActivatePlanDto, RecordCompletionDto } from './dto/plan-progress.dto';

@Controller('plan-progress')
@UseGuards(ProfileGuard)
export class PlanProgressController {
  constructor(
    private readonly planProgressService: PlanProgressService,
    private readonly profilesService: ProfilesService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Get(':planId')
  state(@ProfileId() profileId: string, @Param('planId') planId: string) {
    return this.planProgressService.getState(profileId, planId);
  }

  @Post(':planId/activate')
  async activate(@ProfileId() profileId: string, @Param('planId') planId: string, @Body() body: ActivatePlanDto) {
    return expectTransition(await this.planProgressService.activate(profileId, planId, body.startDayIndex ?? 1));
  }

  @Post(':planId/completions')
  async recordCompletion(
    @ProfileId() profileId: string,
    @Param('planId') planId: string,
    @Body() body: RecordCompletionDto,
  ) {
    if (!isProgramDay(body.date)) throw new BadRequestException('date must be a valid yyyy-MM-dd day');
    return expectTransition(await this.planProgressService.recordCompletion(profileId, planId, body.date));
  }

  @Get(':planId/preview')
  async preview(@ProfileId() profileId: string, @Param('planId') planId: string, @Query('date') date?: string) {
    const { today } = await this.profilesService.resolveToday(profileId, this.clock.now());
    const target = date ?? today;
    if (!isProgramDay(target)) throw new BadRequestException('date must be a valid yyyy-MM-dd day');
    const preview = await this.planProgressService.preview(profileId, planId, today, target);
    return preview ?? { date: target, dayIndex: null, totalDays: 0, dayName: null, day: null };
  }
}
