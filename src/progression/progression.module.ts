import { Module } from '@nestjs/common';
import { WorkoutDaysModule } from '../workout-days/workout-days.module';
import { WorkoutPlanModule } from '../workout-plan/workout-plan.module';
import { CLOCK, systemClock } from './clock';
import { MongoPlanStore } from './mongo-plan-store';
import { PLAN_STORE } from './plan-store';
import { ProgressLockService } from './progress-lock.service';

@Module({
  imports: [WorkoutPlanModule, WorkoutDaysModule],
  providers: [
    ProgressLockService,
    { provide: PLAN_STORE, useClass: MongoPlanStore },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [ProgressLockService, PLAN_STORE, CLOCK],
})
export class ProgressionModule {}
