import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export enum WorkoutMode {
  FREE = 'free',
  ROUTINE = 'routine',
}

@Schema({ _id: false })
export class WorkoutEntry {
  @Prop({ required: true })
  name!: string;

  @Prop({ default: 0, min: 0 })
  plannedSetCount!: number;

  @Prop({ default: 0, min: 0 })
  completedSetCount!: number;
}

export const WorkoutEntrySchema = SchemaFactory.createForClass(WorkoutEntry);

/** The workout logged on one program day. One document per (profileId, date). */
@Schema({ timestamps: true, collection: 'workout_days' })
export class WorkoutDay {
  @Prop({ required: true, index: true })
  profileId!: string;

  /** Program day, `yyyy-MM-dd`. */
  @Prop({ required: true })
  date!: string;

  @Prop({ type: String, enum: Object.values(WorkoutMode), default: WorkoutMode.FREE })
  mode!: WorkoutMode;

  @Prop({ type: String, default: null })
  planId!: string | null;

  @Prop({ type: String, default: null })
  cycleId!: string | null;

  @Prop({ type: String, default: null })
  planDayId!: string | null;

  @Prop({ type: [WorkoutEntrySchema], default: [] })
  entries!: WorkoutEntry[];
}

export type WorkoutDayDocument = HydratedDocument<WorkoutDay>;
export type LeanWorkoutDay = WorkoutDay & { _id: Types.ObjectId; createdAt?: Date; updatedAt?: Date };

export const WorkoutDaySchema = SchemaFactory.createForClass(WorkoutDay);
WorkoutDaySchema.index({ profileId: 1, date: 1 }, { unique: true });
