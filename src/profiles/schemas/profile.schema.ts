import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { ExecutionMode } from '../../common/constants/execution-mode';

@Schema({ timestamps: true, collection: 'profiles' })
export class Profile {
  @Prop({ required: true, unique: true })
  profileId!: string;

  /** Local hour (0-23) at which a new program day starts. */
  @Prop({ required: true, min: 0, max: 23 })
  dayTransitionHour!: number;

  @Prop({ type: String, enum: Object.values(ExecutionMode), default: ExecutionMode.SINGLE })
  executionMode!: ExecutionMode;

  @Prop({ type: String, default: null })
  activePlanId!: string | null;
}

export type ProfileDocument = HydratedDocument<Profile>;
export type LeanProfile = Profile & { _id: Types.ObjectId };

export const ProfileSchema = SchemaFactory.createForClass(Profile);
