import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { ExecutionMode } from '../common/constants/execution-mode';
import { isValidTransitionHour, programDay, ProgramDay } from '../common/utils/program-day';
import { LeanProfile, Profile } from './schemas/profile.schema';
import { UpdateProfileDto } from './dto/update-profile.dto';

export const FALLBACK_DAY_TRANSITION_HOUR = 3;

export interface ProfileView {
  profileId: string;
  dayTransitionHour: number;
  executionMode: ExecutionMode;
  activePlanId: string | null;
}

@Injectable()
export class ProfilesService {
  private readonly logger = new Logger(ProfilesService.name);

  constructor(
    @InjectModel(Profile.name) private profileModel: Model<Profile>,
    private readonly config: ConfigService,
  ) {}

  /** DEFAULT_DAY_TRANSITION_HOUR, or 3 when unset or out of range. */
  defaultTransitionHour(): number {
    const raw = this.config.get<string>('DEFAULT_DAY_TRANSITION_HOUR');
    if (raw == null || String(raw).trim() === '') return FALLBACK_DAY_TRANSITION_HOUR;
    const hour = Number(raw);
    if (!isValidTransitionHour(hour)) {
      this.logger.warn(`Ignoring DEFAULT_DAY_TRANSITION_HOUR=${raw}, expected an integer 0-23`);
      return FALLBACK_DAY_TRANSITION_HOUR;
    }
    return hour;
  }

  private toView(doc: LeanProfile): ProfileView {
    return {
      profileId: doc.profileId,
      dayTransitionHour: doc.dayTransitionHour,
      executionMode: doc.executionMode ?? ExecutionMode.SINGLE,
      activePlanId: doc.activePlanId ?? null,
    };
  }

  /** Profiles are created on first use. */
  async getOrCreate(profileId: string): Promise<ProfileView> {
    const doc: LeanProfile | null = await this.profileModel
      .findOneAndUpdate(
        { profileId },
        {
          $setOnInsert: {
            profileId,
            dayTransitionHour: this.defaultTransitionHour(),
            executionMode: ExecutionMode.SINGLE,
            activePlanId: null,
          },
        },
        { new: true, upsert: true },
      )
      .lean<LeanProfile>();
    if (!doc) throw new NotFoundException('Profile not found');
    return this.toView(doc);
  }

  async update(profileId: string, dto: UpdateProfileDto): Promise<ProfileView> {
    await this.getOrCreate(profileId);
    const $set: Record<string, unknown> = {};
    if (dto.dayTransitionHour !== undefined) $set.dayTransitionHour = dto.dayTransitionHour;
    if (dto.executionMode !== undefined) $set.executionMode = dto.executionMode;
    if (Object.keys($set).length > 0) {
      await this.profileModel.updateOne({ profileId }, { $set });
      this.logger.log(`Updated profile ${profileId}: ${Object.keys($set).join(', ')}`);
    }
    return this.getOrCreate(profileId);
  }

  async setActivePlan(profileId: string, planId: string): Promise<ProfileView> {
    await this.getOrCreate(profileId);
    await this.profileModel.updateOne(
      { profileId },
      { $set: { activePlanId: planId, executionMode: ExecutionMode.SINGLE } },
    );
    return this.getOrCreate(profileId);
  }

  async setExecutionMode(profileId: string, executionMode: ExecutionMode): Promise<ProfileView> {
    await this.getOrCreate(profileId);
    await this.profileModel.updateOne({ profileId }, { $set: { executionMode } });
    return this.getOrCreate(profileId);
  }

  /** The profile and the program day `at` falls on under its transition hour. */
  async resolveToday(profileId: string, at: Date): Promise<{ profile: ProfileView; today: ProgramDay }> {
    const profile = await this.getOrCreate(profileId);
    return { profile, today: programDay(at, profile.dayTransitionHour) };
  }
}
