import { Inject, Injectable, Logger } from '@nestjs/common';
import { ExecutionMode } from '../common/constants/execution-mode';
import { compareProgramDays, ProgramDay } from '../common/utils/program-day';
import { CyclesService } from '../cycles/cycles.service';
import { PlanProgressService } from '../plan-progress/plan-progress.service';
import { ProfilesService } from '../profiles/profiles.service';
import { Clock, CLOCK } from '../progression/clock';
import {
  invalid,
  isInvalid,
  PlanDayRef,
  TransitionFailure,
  TransitionOutcome,
  TransitionResult,
} from '../progression/progression.types';
import { WorkoutDaysService, WorkoutDayView, WorkoutLink } from '../workout-days/workout-days.service';
import { WorkoutMode } from '../workout-days/schemas/workout-day.schema';
import { PlanDayView, WorkoutPlanService } from '../workout-plan/workout-plan.service';

export interface TodayView {
  date: ProgramDay;
  mode: ExecutionMode;
  /** Null when neither a plan nor a cycle is active. */
  outcome: TransitionOutcome | null;
  reason: TransitionFailure | null;
  planId: string | null;
  cycleId: string | null;
  /** 1-based. */
  dayIndex: number | null;
  totalDays: number | null;
  day: PlanDayView | null;
  record: WorkoutDayView;
}

export interface TodayPreview {
  date: ProgramDay;
  planId: string | null;
  dayIndex: number | null;
  totalDays: number;
  dayName: string | null;
}

export interface TodayDayChange {
  date: ProgramDay;
  planId: string;
  cycleId: string | null;
  /** The day now shown today. */
  day: PlanDayView | null;
  /** 1-based pointer for the next open. */
  nextDayIndex: number;
  record: WorkoutDayView;
}

export interface LoggedSets {
  record: WorkoutDayView;
  /** Set when the log completed a past day and moved progress. */
  rescue: TransitionOutcome | null;
}

type ActiveProgram =
  | { kind: 'plan'; planId: string }
  | { kind: 'cycle'; cycleId: string }
  | { kind: 'none' };

type SuccessOutcome = TransitionOutcome.Advanced | TransitionOutcome.NoOp;

interface OpenedDay {
  planId: string;
  cycleId: string | null;
  dayIndex: number;
  totalDays: number;
  day: PlanDayRef;
}

@Injectable()
export class TodayService {
  private readonly logger = new Logger(TodayService.name);

  constructor(
    private readonly profilesService: ProfilesService,
    private readonly planProgressService: PlanProgressService,
    private readonly cyclesService: CyclesService,
    private readonly workoutDaysService: WorkoutDaysService,
    private readonly workoutPlanService: WorkoutPlanService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  private async activeProgram(
    profileId: string,
    mode: ExecutionMode,
    activePlanId: string | null,
  ): Promise<ActiveProgram> {
    if (mode === ExecutionMode.CYCLE) {
      const cycle = await this.cyclesService.findActive(profileId);
      return cycle ? { kind: 'cycle', cycleId: String(cycle._id) } : { kind: 'none' };
    }
    return activePlanId ? { kind: 'plan', planId: activePlanId } : { kind: 'none' };
  }

  /**
   * Today's record for the opened day. A record already linked to the plan or
   * holding manual entries is kept; an empty one is materialized.
   */
  private async ensureRecord(
    profileId: string,
    date: ProgramDay,
    link: WorkoutLink,
    day: PlanDayView | null,
  ): Promise<WorkoutDayView> {
    const existing = await this.workoutDaysService.findByDate(profileId, date);
    if (existing && existing.mode === WorkoutMode.ROUTINE && existing.planId === link.planId) return existing;
    if (existing && existing.entries.length > 0) return existing;
    if (!day) return this.workoutDaysService.getOrCreate(profileId, date);
    return this.workoutDaysService.materialize(profileId, date, link, day.exercises);
  }

  private async openActive(
    profileId: string,
    program: ActiveProgram,
    today: ProgramDay,
  ): Promise<TransitionResult<OpenedDay> | null> {
    if (program.kind === 'plan') {
      const result = await this.planProgressService.openDay(profileId, program.planId, today);
      if (isInvalid(result)) return result;
      return {
        outcome: result.outcome,
        planId: program.planId,
        cycleId: null,
        dayIndex: result.dayIndex,
        totalDays: result.totalDays,
        day: result.day,
      };
    }
    if (program.kind === 'cycle') {
      const result = await this.cyclesService.openDay(profileId, program.cycleId, today);
      if (isInvalid(result)) return result;
      return {
        outcome: result.outcome,
        planId: result.planId,
        cycleId: program.cycleId,
        dayIndex: result.dayIndex + 1,
        totalDays: result.totalDays,
        day: result.day,
      };
    }
    return null;
  }

  /** Runs the open-time transition and returns the day to show with its record. */
  async open(profileId: string): Promise<TodayView> {
    const { profile, today } = await this.profilesService.resolveToday(profileId, this.clock.now());
    const program = await this.activeProgram(profileId, profile.executionMode, profile.activePlanId);
    const opened = await this.openActive(profileId, program, today);

    const empty = {
      date: today,
      mode: profile.executionMode,
      planId: null,
      cycleId: program.kind === 'cycle' ? program.cycleId : null,
      dayIndex: null,
      totalDays: null,
      day: null,
    };
    if (!opened) {
      const record = await this.workoutDaysService.getOrCreate(profileId, today);
      return { ...empty, outcome: null, reason: null, record };
    }
    if (isInvalid(opened)) {
      this.logger.warn(`Nothing to open for ${profileId} on ${today}: ${opened.reason}`);
      const record = await this.workoutDaysService.getOrCreate(profileId, today);
      return { ...empty, outcome: opened.outcome, reason: opened.reason, record };
    }

    const day = await this.workoutPlanService.findDay(opened.planId, opened.day.id);
    const link = { planId: opened.planId, cycleId: opened.cycleId, planDayId: opened.day.id };
    const record = await this.ensureRecord(profileId, today, link, day);
    return {
      date: today,
      mode: profile.executionMode,
      outcome: opened.outcome,
      reason: null,
      planId: opened.planId,
      cycleId: opened.cycleId,
      dayIndex: opened.dayIndex,
      totalDays: opened.totalDays,
      day,
      record,
    };
  }

  /** Switches today's workout to another day of the current plan. */
  async changeDay(
    profileId: string,
    newDayIndex: number,
    skipAndAdvance: boolean,
  ): Promise<TransitionResult<TodayDayChange>> {
    const { profile, today } = await this.profilesService.resolveToday(profileId, this.clock.now());
    const program = await this.activeProgram(profileId, profile.executionMode, profile.activePlanId);
    const completedSets = await this.workoutDaysService.totalCompletedSets(profileId, today);
    const request = { newDayIndex, skipAndAdvance, completedSets, today };

    let changed: {
      outcome: SuccessOutcome;
      planId: string;
      cycleId: string | null;
      target: PlanDayRef;
      next: number;
    };
    if (program.kind === 'plan') {
      const result = await this.planProgressService.changeDay(profileId, program.planId, request);
      if (isInvalid(result)) return result;
      changed = {
        outcome: result.outcome,
        planId: program.planId,
        cycleId: null,
        target: result.targetDay,
        next: result.dayIndex,
      };
    } else if (program.kind === 'cycle') {
      const result = await this.cyclesService.changeDay(profileId, program.cycleId, request);
      if (isInvalid(result)) return result;
      changed = {
        outcome: result.outcome,
        planId: result.planId,
        cycleId: program.cycleId,
        target: result.targetDay,
        next: result.dayIndex + 1,
      };
    } else {
      return invalid('plan-not-found');
    }

    const day = await this.workoutPlanService.findDay(changed.planId, changed.target.id);
    const link = { planId: changed.planId, cycleId: changed.cycleId, planDayId: changed.target.id };
    const record = day
      ? await this.workoutDaysService.materialize(profileId, today, link, day.exercises)
      : await this.workoutDaysService.getOrCreate(profileId, today);
    return {
      outcome: changed.outcome,
      date: today,
      planId: changed.planId,
      cycleId: changed.cycleId,
      day,
      nextDayIndex: changed.next,
      record,
    };
  }

  /**
   * Records completed sets for one entry. Completing a past day credits it
   * to the plan or cycle the record belongs to.
   */
  async logSets(
    profileId: string,
    date: ProgramDay,
    entryIndex: number,
    completedSetCount: number,
  ): Promise<LoggedSets> {
    const { record, becameComplete } = await this.workoutDaysService.logSets(
      profileId,
      date,
      entryIndex,
      completedSetCount,
    );
    if (!becameComplete || record.mode !== WorkoutMode.ROUTINE) return { record, rescue: null };

    const { today } = await this.profilesService.resolveToday(profileId, this.clock.now());
    if (compareProgramDays(date, today) >= 0) return { record, rescue: null };

    let result: TransitionResult | null = null;
    if (record.cycleId) {
      result = await this.cyclesService.recordCompletion(profileId, record.cycleId, date);
    } else if (record.planId) {
      result = await this.planProgressService.recordCompletion(profileId, record.planId, date);
    }
    if (!result) return { record, rescue: null };
    if (isInvalid(result)) {
      this.logger.warn(`Late completion of ${date} not credited for ${profileId}: ${result.reason}`);
    } else {
      this.logger.log(`Late completion of ${date} for ${profileId}: ${result.outcome}`);
    }
    return { record, rescue: result.outcome };
  }

  async preview(profileId: string, date?: ProgramDay): Promise<TodayPreview> {
    const { profile, today } = await this.profilesService.resolveToday(profileId, this.clock.now());
    const target = date ?? today;
    const program = await this.activeProgram(profileId, profile.executionMode, profile.activePlanId);
    const none: TodayPreview = { date: target, planId: null, dayIndex: null, totalDays: 0, dayName: null };

    if (program.kind === 'cycle') {
      return (await this.cyclesService.preview(profileId, program.cycleId, today, target)) ?? none;
    }
    if (program.kind === 'plan') {
      const preview = await this.planProgressService.preview(profileId, program.planId, today, target);
      if (!preview) return { ...none, planId: program.planId };
      return {
        date: target,
        planId: program.planId,
        dayIndex: preview.dayIndex,
        totalDays: preview.totalDays,
        dayName: preview.dayName,
      };
    }
    return none;
  }
}
