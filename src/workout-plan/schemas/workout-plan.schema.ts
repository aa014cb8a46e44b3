import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

@Schema({ _id: false })
export class PlannedExercise {
  @Prop({ required: true, trim: true })
  name!: string;

  @Prop({ default: 3, min: 0 })
  plannedSetCount!: number;
}

export const PlannedExerciseSchema = SchemaFactory.createForClass(PlannedExercise);

/** One day of a plan. `dayIndex` is 1-based and dense within the plan. */
@Schema()
export class PlanDay {
  _id!: Types.ObjectId;

  @Prop({ required: true, min: 1 })
  dayIndex!: number;

  @Prop({ default: '' })
  name!: string;

  @Prop({ default: '' })
  note!: string;

  @Prop({ default: false })
  isRestDay!: boolean;

  @Prop({ type: [PlannedExerciseSchema], default: [] })
  exercises!: PlannedExercise[];
}

export const PlanDaySchema = SchemaFactory.createForClass(PlanDay);

@Schema({ timestamps: true, collection: 'workout_plans' })
export class WorkoutPlan {
  @Prop({ required: true, index: true })
  profileId!: string;

  @Prop({ required: true, trim: true })
  name!: string;

  @Prop({ default: '' })
  note!: string;

  @Prop({ default: false })
  isArchived!: boolean;

  @Prop({ type: [PlanDaySchema], default: [] })
  days!: PlanDay[];
}

export type WorkoutPlanDocument = HydratedDocument<WorkoutPlan>;
export type LeanWorkoutPlan = WorkoutPlan & { _id: Types.ObjectId; createdAt?: Date; updatedAt?: Date };

export const WorkoutPlanSchema = SchemaFactory.createForClass(WorkoutPlan);
WorkoutPlanSchema.index({ profileId: 1, isArchived: 1, createdAt: -1 });
