import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

/** A plan's slot in the rotation. `order` is 0-based and dense. */
@Schema()
export class CycleItem {
  _id!: Types.ObjectId;

  @Prop({ required: true, min: 0 })
  order!: number;

  @Prop({ required: true })
  planId!: string;

  @Prop({ default: '' })
  note!: string;
}

export const CycleItemSchema = SchemaFactory.createForClass(CycleItem);

@Schema({ _id: false })
export class CycleProgress {
  @Prop({ default: 0, min: 0 })
  currentItemIndex!: number;

  @Prop({ default: 0, min: 0 })
  currentDayIndex!: number;

  @Prop({ type: String, default: null })
  currentItemId!: string | null;

  @Prop({ type: String, default: null })
  currentDayId!: string | null;

  @Prop({ type: Date, default: null })
  lastAdvancedAt!: Date | null;

  @Prop({ type: String, default: null })
  lastOpenedDate!: string | null;

  @Prop({ type: String, default: null })
  lastCompletedDate!: string | null;
}

export const CycleProgressSchema = SchemaFactory.createForClass(CycleProgress);

/** Ordered rotation of plans. At most one cycle per profile is active. */
@Schema({ timestamps: true, collection: 'plan_cycles' })
export class PlanCycle {
  @Prop({ required: true, index: true })
  profileId!: string;

  @Prop({ required: true, trim: true })
  name!: string;

  @Prop({ default: false })
  isActive!: boolean;

  @Prop({ type: [CycleItemSchema], default: [] })
  items!: CycleItem[];

  @Prop({ type: CycleProgressSchema, default: null })
  progress!: CycleProgress | null;
}

export type PlanCycleDocument = HydratedDocument<PlanCycle>;
export type LeanPlanCycle = PlanCycle & { _id: Types.ObjectId; createdAt?: Date; updatedAt?: Date };

export const PlanCycleSchema = SchemaFactory.createForClass(PlanCycle);
PlanCycleSchema.index({ profileId: 1, isActive: 1 });
// at most one active cycle per profile
PlanCycleSchema.index({ profileId: 1 }, { unique: true, partialFilterExpression: { isActive: true } });
