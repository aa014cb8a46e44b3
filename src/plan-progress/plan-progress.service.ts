import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { compareProgramDays, daysBetween, ProgramDay } from '../common/utils/program-day';
import { ProfilesService } from '../profiles/profiles.service';
import {
  changeDay,
  createSinglePlanProgress,
  DayChangeRequest,
  DayChangeResult,
  DayPointerResult,
  openDay,
  reconcileDayPointer,
  recordCompletion,
  restartAt,
} from '../progression/day-advancement';
import { Clock, CLOCK } from '../progression/clock';
import { PLAN_STORE, PlanStore } from '../progression/plan-store';
import { previewDayIndex } from '../progression/preview';
import { ProgressLockService } from '../progression/progress-lock.service';
import {
  invalid,
  isInvalid,
  PlanDayRef,
  SinglePlanProgressState,
  TransitionOutcome,
  TransitionResult,
} from '../progression/progression.types';
import { PlanProgress } from './schemas/plan-progress.schema';

type LeanPlanProgress = PlanProgress & { _id: unknown };

export interface PlanPreview {
  date: ProgramDay;
  dayIndex: number;
  totalDays: number;
  dayName: string | null;
  day: PlanDayRef;
}

/** Open result with the day count the transition ran against. */
export type PlanOpenResult = TransitionResult<{
  dayIndex: number;
  day: PlanDayRef;
  discardRecordOn: ProgramDay | null;
  totalDays: number;
}>;

export interface PlanProgressView extends SinglePlanProgressState {
  planId: string;
  totalDays: number;
}

@Injectable()
export class PlanProgressService {
  private readonly logger = new Logger(PlanProgressService.name);

  constructor(
    @InjectModel(PlanProgress.name) private progressModel: Model<PlanProgress>,
    @Inject(PLAN_STORE) private readonly planStore: PlanStore,
    private readonly lock: ProgressLockService,
    private readonly profilesService: ProfilesService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  private async load(profileId: string, planId: string): Promise<SinglePlanProgressState> {
    const doc: LeanPlanProgress | null = await this.progressModel
      .findOne({ profileId, planId })
      .lean<LeanPlanProgress>();
    if (!doc) return createSinglePlanProgress();
    return {
      currentDayIndex: doc.currentDayIndex ?? 1,
      currentDayId: doc.currentDayId ?? null,
      lastOpenedDate: doc.lastOpenedDate ?? null,
      lastCompletedDate: doc.lastCompletedDate ?? null,
    };
  }

  private async save(profileId: string, planId: string, state: SinglePlanProgressState): Promise<void> {
    await this.progressModel.updateOne(
      { profileId, planId },
      {
        $set: {
          currentDayIndex: state.currentDayIndex,
          currentDayId: state.currentDayId,
          lastOpenedDate: state.lastOpenedDate,
          lastCompletedDate: state.lastCompletedDate,
        },
        $setOnInsert: { profileId, planId },
      },
      { upsert: true },
    );
  }

  private async daysOrWarn(planId: string): Promise<PlanDayRef[] | null> {
    const days = await this.planStore.daysOf(planId);
    if (!days) this.logger.warn(`Plan ${planId} not found`);
    else if (days.length === 0) this.logger.warn(`Plan ${planId} has no days`);
    return days;
  }

  /** Stored progress with its pointer reconciled against the current plan; nothing is written. */
  async getState(profileId: string, planId: string): Promise<PlanProgressView> {
    const state = await this.load(profileId, planId);
    const days = (await this.planStore.daysOf(planId)) ?? [];
    reconcileDayPointer(state, days);
    return { planId, totalDays: days.length, ...state };
  }

  /** App-open transition for `today`. */
  openDay(profileId: string, planId: string, today: ProgramDay): Promise<PlanOpenResult> {
    return this.lock.runExclusive(ProgressLockService.planKey(profileId, planId), async () => {
      const days = await this.daysOrWarn(planId);
      if (!days) return invalid('plan-not-found');

      const state = await this.load(profileId, planId);
      const previousRecord = state.lastOpenedDate
        ? await this.planStore.workoutRecordStatus(profileId, planId, state.lastOpenedDate)
        : 'absent';

      const result = openDay(state, days, today, previousRecord);
      if (isInvalid(result)) return result;

      if (result.discardRecordOn) {
        await this.planStore.deleteWorkoutRecord(profileId, planId, result.discardRecordOn);
        this.logger.log(`Discarded unfinished workout of ${result.discardRecordOn} for plan ${planId}`);
      }
      await this.save(profileId, planId, state);
      if (result.outcome === TransitionOutcome.Advanced) {
        this.logger.log(`Plan ${planId} advanced to day ${result.dayIndex}/${days.length} on open (${profileId})`);
      }
      return { ...result, totalDays: days.length };
    });
  }

  /** Retroactive completion of a program day no later than the profile's today. */
  recordCompletion(profileId: string, planId: string, date: ProgramDay): Promise<DayPointerResult> {
    return this.lock.runExclusive(ProgressLockService.planKey(profileId, planId), async () => {
      const { today } = await this.profilesService.resolveToday(profileId, this.clock.now());
      if (compareProgramDays(date, today) > 0) {
        this.logger.warn(`Completion of ${date} for plan ${planId} refused: today is ${today}`);
        return invalid('completion-in-future');
      }
      const days = await this.daysOrWarn(planId);
      if (!days) return invalid('plan-not-found');

      const state = await this.load(profileId, planId);
      const result = recordCompletion(state, days, date);
      if (isInvalid(result)) return result;

      await this.save(profileId, planId, state);
      if (result.outcome === TransitionOutcome.Advanced) {
        this.logger.log(`Plan ${planId} advanced to day ${result.dayIndex} by completion of ${date} (${profileId})`);
      } else {
        this.logger.debug(`Completion of ${date} already credited for plan ${planId}`);
      }
      return result;
    });
  }

  changeDay(profileId: string, planId: string, request: DayChangeRequest): Promise<DayChangeResult> {
    return this.lock.runExclusive(ProgressLockService.planKey(profileId, planId), async () => {
      const days = await this.daysOrWarn(planId);
      if (!days) return invalid('plan-not-found');

      const state = await this.load(profileId, planId);
      const result = changeDay(state, days, request);
      if (isInvalid(result)) {
        this.logger.warn(`Day change on plan ${planId} refused: ${result.reason}`);
        return result;
      }
      await this.save(profileId, planId, state);
      this.logger.log(
        `Plan ${planId} switched to day ${request.newDayIndex}` +
          (request.skipAndAdvance ? `, next day ${result.dayIndex}` : '') +
          ` (${profileId})`,
      );
      return result;
    });
  }

  /** Makes the plan the profile's active one and restarts it at `startDayIndex`. */
  activate(profileId: string, planId: string, startDayIndex = 1): Promise<DayPointerResult> {
    return this.lock.runExclusive(ProgressLockService.planKey(profileId, planId), async () => {
      const days = await this.daysOrWarn(planId);
      if (!days) return invalid('plan-not-found');

      const state = createSinglePlanProgress();
      const result = restartAt(state, days, startDayIndex);
      if (isInvalid(result)) return result;

      await this.save(profileId, planId, state);
      await this.profilesService.setActivePlan(profileId, planId);
      this.logger.log(`Activated plan ${planId} at day ${startDayIndex} for ${profileId}`);
      return result;
    });
  }

  /** Day shown on `target` if one day is completed per day from `today`. Reads only. */
  async preview(profileId: string, planId: string, today: ProgramDay, target: ProgramDay): Promise<PlanPreview | null> {
    const days = await this.planStore.daysOf(planId);
    if (!days || days.length === 0) return null;
    const state = await this.load(profileId, planId);
    reconcileDayPointer(state, days);
    const dayIndex = previewDayIndex(state.currentDayIndex, days.length, daysBetween(today, target));
    if (dayIndex == null) return null;
    const day = days[dayIndex - 1];
    return { date: target, dayIndex, totalDays: days.length, dayName: day.name ?? null, day };
  }
}
