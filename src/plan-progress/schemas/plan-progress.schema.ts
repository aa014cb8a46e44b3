import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/** Where a profile stands in one plan. One document per (profileId, planId). */
@Schema({ timestamps: true, collection: 'plan_progress' })
export class PlanProgress {
  @Prop({ required: true, index: true })
  profileId!: string;

  @Prop({ required: true })
  planId!: string;

  /** 1-based. */
  @Prop({ default: 1, min: 1 })
  currentDayIndex!: number;

  @Prop({ type: String, default: null })
  currentDayId!: string | null;

  @Prop({ type: String, default: null })
  lastOpenedDate!: string | null;

  @Prop({ type: String, default: null })
  lastCompletedDate!: string | null;
}

export type PlanProgressDocument = HydratedDocument<PlanProgress>;
export const PlanProgressSchema = SchemaFactory.createForClass(PlanProgress);
PlanProgressSchema.index({ profileId: 1, planId: 1 }, { unique: true });
