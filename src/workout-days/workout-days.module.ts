import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { WorkoutDaysService } from './workout-days.service';
import { WorkoutDay, WorkoutDaySchema } from './schemas/workout-day.schema';

@Module({
  imports: [MongooseModule.forFeature([{ name: WorkoutDay.name, schema: WorkoutDaySchema }])],
  providers: [WorkoutDaysService],
  exports: [WorkoutDaysService],
})
export class WorkoutDaysModule {}
