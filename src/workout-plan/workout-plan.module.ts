import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { WorkoutPlanController } from './workout-plan.controller';
import { WorkoutPlanService } from './workout-plan.service';
import { WorkoutPlan, WorkoutPlanSchema } from './schemas/workout-plan.schema';
import { PlanProgress, PlanProgressSchema } from '../plan-progress/schemas/plan-progress.schema';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: WorkoutPlan.name, schema: WorkoutPlanSchema },
      { name: PlanProgress.name, schema: PlanProgressSchema },
    ]),
  ],
  controllers: [WorkoutPlanController],
  providers: [WorkoutPlanService],
  exports: [WorkoutPlanService],
})
export class WorkoutPlanModule {}
