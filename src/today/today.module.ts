import { Module } from '@nestjs/common';
import { CyclesModule } from '../cycles/cycles.module';
import { PlanProgressModule } from '../plan-progress/plan-progress.module';
import { ProfilesModule } from '../profiles/profiles.module';
import { ProgressionModule } from '../progression/progression.module';
import { WorkoutDaysModule } from '../workout-days/workout-days.module';
import { WorkoutPlanModule } from '../workout-plan/workout-plan.module';
import { TodayController } from './today.controller';
import { TodayService } from './today.service';

@Module({
  imports: [ProfilesModule, PlanProgressModule, CyclesModule, WorkoutDaysModule, WorkoutPlanModule, ProgressionModule],
  controllers: [TodayController],
  providers: [TodayService],
})
export class TodayModule {}
