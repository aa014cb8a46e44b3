import { compareProgramDays, laterProgramDay, ProgramDay } from '../common/utils/program-day';
import { anchorAt, resolvePointer } from './reindex';
import {
  invalid,
  PlanDayRef,
  SinglePlanProgressState,
  TransitionOutcome,
  TransitionResult,
  WorkoutRecordStatus,
} from './progression.types';

export type DayPointerResult = TransitionResult<{ dayIndex: number; day: PlanDayRef }>;

export type DayOpenResult = TransitionResult<{
  dayIndex: number;
  day: PlanDayRef;
  /** Day whose half-finished record should be deleted so the same plan day is offered again. */
  discardRecordOn: ProgramDay | null;
}>;

export type DayChangeResult = TransitionResult<{ dayIndex: number; targetDay: PlanDayRef }>;

export function createSinglePlanProgress(startDayIndex = 1): SinglePlanProgressState {
  return {
    currentDayIndex: startDayIndex,
    currentDayId: null,
    lastOpenedDate: null,
    lastCompletedDate: null,
  };
}

/** Moves the pointer back onto the anchored day (or a clamped one) after plan edits. */
export function reconcileDayPointer(state: SinglePlanProgressState, days: readonly PlanDayRef[]): boolean {
  const resolved = resolvePointer({ index: state.currentDayIndex, anchorId: state.currentDayId }, days, 1);
  const changed = resolved.index !== state.currentDayIndex || resolved.anchorId !== state.currentDayId;
  state.currentDayIndex = resolved.index;
  state.currentDayId = resolved.anchorId;
  return changed;
}

/** One step forward with 1-based wraparound. */
export function stepDayPointer(state: SinglePlanProgressState, days: readonly PlanDayRef[]): void {
  const total = days.length;
  state.currentDayIndex = ((((state.currentDayIndex % total) + total) % total) + 1);
  state.currentDayId = anchorAt(days, state.currentDayIndex, 1);
}

function current(state: SinglePlanProgressState, days: readonly PlanDayRef[]): { dayIndex: number; day: PlanDayRef } {
  return { dayIndex: state.currentDayIndex, day: days[state.currentDayIndex - 1] };
}

/**
 * App-open transition for a single plan. Advances at most once per program day:
 * when the day last opened was a rest day, or its workout was completed and not
 * already credited by a rescue.
 *
 * `previousRecord` is the status of the workout recorded on `state.lastOpenedDate`.
 */
export function openDay(
  state: SinglePlanProgressState,
  days: readonly PlanDayRef[],
  today: ProgramDay,
  previousRecord: WorkoutRecordStatus,
): DayOpenResult {
  if (days.length === 0) return invalid('empty-plan');
  reconcileDayPointer(state, days);

  const openedOn = state.lastOpenedDate;
  if (openedOn == null) {
    state.lastOpenedDate = today;
    return { outcome: TransitionOutcome.NoOp, ...current(state, days), discardRecordOn: null };
  }
  // same day, or the clock went backwards
  if (compareProgramDays(today, openedOn) <= 0) {
    return { outcome: TransitionOutcome.NoOp, ...current(state, days), discardRecordOn: null };
  }

  let outcome: TransitionOutcome.Advanced | TransitionOutcome.NoOp = TransitionOutcome.NoOp;
  let discardRecordOn: ProgramDay | null = null;
  const previousDay = days[state.currentDayIndex - 1];

  if (previousDay.isRestDay) {
    stepDayPointer(state, days);
    state.lastCompletedDate = laterProgramDay(state.lastCompletedDate, openedOn);
    outcome = TransitionOutcome.Advanced;
  } else if (previousRecord === 'complete') {
    const alreadyCredited =
      state.lastCompletedDate != null && compareProgramDays(openedOn, state.lastCompletedDate) <= 0;
    if (!alreadyCredited) {
      stepDayPointer(state, days);
      state.lastCompletedDate = openedOn;
      outcome = TransitionOutcome.Advanced;
    }
  } else if (previousRecord === 'incomplete') {
    discardRecordOn = openedOn;
  }

  state.lastOpenedDate = today;
  return { outcome, ...current(state, days), discardRecordOn };
}

/**
 * Retroactive completion. Advances once for a day newer than every completion
 * already credited; older or repeated days are no-ops.
 */
export function recordCompletion(
  state: SinglePlanProgressState,
  days: readonly PlanDayRef[],
  completionDate: ProgramDay,
): DayPointerResult {
  if (days.length === 0) return invalid('empty-plan');
  reconcileDayPointer(state, days);

  if (state.lastCompletedDate != null && compareProgramDays(completionDate, state.lastCompletedDate) <= 0) {
    return { outcome: TransitionOutcome.NoOp, ...current(state, days) };
  }
  stepDayPointer(state, days);
  state.lastCompletedDate = completionDate;
  return { outcome: TransitionOutcome.Advanced, ...current(state, days) };
}

export interface DayChangeRequest {
  /** 1-based. */
  newDayIndex: number;
  skipAndAdvance: boolean;
  /** Completed sets already logged in today's workout. */
  completedSets: number;
  today: ProgramDay;
}

/**
 * Manual switch of today's plan day. With `skipAndAdvance` the pointer moves past
 * the chosen day and today counts as credited, so the next open does not step again.
 */
export function changeDay(
  state: SinglePlanProgressState,
  days: readonly PlanDayRef[],
  request: DayChangeRequest,
): DayChangeResult {
  if (request.completedSets > 0) return invalid('workout-in-progress');
  if (days.length === 0) return invalid('empty-plan');
  const total = days.length;
  if (!Number.isInteger(request.newDayIndex) || request.newDayIndex < 1 || request.newDayIndex > total) {
    return invalid('day-not-found');
  }
  reconcileDayPointer(state, days);

  const targetDay = days[request.newDayIndex - 1];
  if (!request.skipAndAdvance) {
    return { outcome: TransitionOutcome.NoOp, dayIndex: state.currentDayIndex, targetDay };
  }
  state.currentDayIndex = (request.newDayIndex % total) + 1;
  state.currentDayId = anchorAt(days, state.currentDayIndex, 1);
  state.lastCompletedDate = laterProgramDay(state.lastCompletedDate, request.today);
  return { outcome: TransitionOutcome.Advanced, dayIndex: state.currentDayIndex, targetDay };
}

/** Restarts progress at a chosen day, e.g. when a plan is activated. */
export function restartAt(
  state: SinglePlanProgressState,
  days: readonly PlanDayRef[],
  startDayIndex: number,
): DayPointerResult {
  if (days.length === 0) return invalid('empty-plan');
  if (!Number.isInteger(startDayIndex) || startDayIndex < 1 || startDayIndex > days.length) {
    return invalid('day-not-found');
  }
  state.currentDayIndex = startDayIndex;
  state.currentDayId = anchorAt(days, startDayIndex, 1);
  state.lastOpenedDate = null;
  state.lastCompletedDate = null;
  return { outcome: TransitionOutcome.Advanced, ...current(state, days) };
}
