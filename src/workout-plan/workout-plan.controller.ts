import { Body, Controller, Delete, Get, Param, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { ProfileId } from '../common/decorators/profile-id.decorator';
import { ProfileGuard } from '../common/guards/profile.guard';
import { WorkoutPlanService } from './workout-plan.service';
import { CreateWorkoutPlanDto, MoveDayDto, PlanDayDto, UpdateWorkoutPlanDto } from './dto/workout-plan.dto';

@Controller('workout-plans')
@UseGuards(ProfileGuard)
export class WorkoutPlanController {
  constructor(private readonly workoutPlanService: WorkoutPlanService) {}

  @Get()
  list(@ProfileId() profileId: string, @Query('includeArchived') includeArchived?: string) {
    return this.workoutPlanService.listPlans(profileId, includeArchived === 'true');
  }

  @Post()
  create(@ProfileId() profileId: string, @Body() body: CreateWorkoutPlanDto) {
    return this.workoutPlanService.createPlan(profileId, body);
  }

  @Get(':planId')
  get(@ProfileId() profileId: string, @Param('planId') planId: string) {
    return this.workoutPlanService.getPlan(profileId, planId);
  }

  @Patch(':planId')
  update(@ProfileId() profileId: string, @Param('planId') planId: string, @Body() body: UpdateWorkoutPlanDto) {
    return this.workoutPlanService.updatePlan(profileId, planId, body);
  }

  @Delete(':planId')
  async remove(@ProfileId() profileId: string, @Param('planId') planId: string) {
    await this.workoutPlanService.deletePlan(profileId, planId);
    return { success: true };
  }

  @Post(':planId/days')
  addDay(@ProfileId() profileId: string, @Param('planId') planId: string, @Body() body: PlanDayDto) {
    return this.workoutPlanService.addDay(profileId, planId, body);
  }

  @Patch(':planId/days/:dayId')
  updateDay(
    @ProfileId() profileId: string,
    @Param('planId') planId: string,
    @Param('dayId') dayId: string,
    @Body() body: PlanDayDto,
  ) {
    return this.workoutPlanService.updateDay(profileId, planId, dayId, body);
  }

  @Delete(':planId/days/:dayId')
  removeDay(@ProfileId() profileId: string, @Param('planId') planId: string, @Param('dayId') dayId: string) {
    return this.workoutPlanService.removeDay(profileId, planId, dayId);
  }

  @Post(':planId/days/move')
  moveDay(@ProfileId() profileId: string, @Param('planId') planId: string, @Body() body: MoveDayDto) {
    return this.workoutPlanService.moveDay(profileId, planId, body.fromIndex, body.toIndex);
  }

  @Post(':planId/days/:dayId/duplicate')
  duplicateDay(@ProfileId() profileId: string, @Param('planId') planId: string, @Param('dayId') dayId: string) {
    return this.workoutPlanService.duplicateDay(profileId, planId, dayId);
  }

  @Post(':planId/days/reindex')
  reindexDays(@ProfileId() profileId: string, @Param('planId') planId: string) {
    return this.workoutPlanService.reindexDays(profileId, planId);
  }
}
