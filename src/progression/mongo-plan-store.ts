import { Injectable } from '@nestjs/common';
import { ProgramDay } from '../common/utils/program-day';
import { WorkoutDaysService } from '../workout-days/workout-days.service';
import { WorkoutPlanService } from '../workout-plan/workout-plan.service';
import { PlanStore } from './plan-store';
import { PlanDayRef, WorkoutRecordStatus } from './progression.types';

/** PlanStore backed by the workout plan and workout day collections. */
@Injectable()
export class MongoPlanStore implements PlanStore {
  constructor(
    private readonly workoutPlanService: WorkoutPlanService,
    private readonly workoutDaysService: WorkoutDaysService,
  ) {}

  daysOf(planId: string): Promise<PlanDayRef[] | null> {
    return this.workoutPlanService.daysOf(planId);
  }

  nameOf(planId: string): Promise<string | null> {
    return this.workoutPlanService.planName(planId);
  }

  workoutRecordStatus(profileId: string, planId: string, day: ProgramDay): Promise<WorkoutRecordStatus> {
    return this.workoutDaysService.statusFor(profileId, planId, day);
  }

  async deleteWorkoutRecord(profileId: string, planId: string, day: ProgramDay): Promise<void> {
    await this.workoutDaysService.deleteForPlan(profileId, planId, day);
  }
}
