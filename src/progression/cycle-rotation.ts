import { compareProgramDays, laterProgramDay, ProgramDay } from '../common/utils/program-day';
import { anchorAt, resolvePointer } from './reindex';
import {
  CycleProgressState,
  CycleSlot,
  invalid,
  PlanDayRef,
  TransitionOutcome,
  TransitionResult,
  WorkoutRecordStatus,
} from './progression.types';

export interface CyclePosition {
  /** 0-based. */
  itemIndex: number;
  /** 0-based within the current plan. */
  dayIndex: number;
  itemId: string;
  planId: string;
  totalDays: number;
  day: PlanDayRef;
}

export type CycleTransitionResult = TransitionResult<CyclePosition>;

export type CycleOpenResult = TransitionResult<
  CyclePosition & { discardRecord: { planId: string; day: ProgramDay } | null }
>;

export type CycleDayChangeResult = TransitionResult<CyclePosition & { targetDay: PlanDayRef }>;

type UsableSlot = CycleSlot & { days: PlanDayRef[] };

export function createCycleProgress(): CycleProgressState {
  return {
    currentItemIndex: 0,
    currentDayIndex: 0,
    currentItemId: null,
    currentDayId: null,
    lastAdvancedAt: null,
    lastOpenedDate: null,
    lastCompletedDate: null,
  };
}

export function resetCycleProgress(state: CycleProgressState): void {
  Object.assign(state, createCycleProgress());
}

function isUsable(slot: CycleSlot | undefined): slot is UsableSlot {
  return slot != null && slot.days != null && slot.days.length > 0;
}

function snapshot(state: CycleProgressState): CycleProgressState {
  return {
    currentItemIndex: state.currentItemIndex,
    currentDayIndex: state.currentDayIndex,
    currentItemId: state.currentItemId,
    currentDayId: state.currentDayId,
    lastAdvancedAt: state.lastAdvancedAt,
    lastOpenedDate: state.lastOpenedDate,
    lastCompletedDate: state.lastCompletedDate,
  };
}

/** Re-resolves item and day pointers by identity against the live lists. */
export function reconcileCyclePointer(state: CycleProgressState, slots: readonly CycleSlot[]): void {
  if (slots.length === 0) return;
  const items = slots.map((s) => s.item);
  const item = resolvePointer({ index: state.currentItemIndex, anchorId: state.currentItemId }, items, 0);
  // the anchored item is gone: start the item that took its place from its first day
  if (state.currentItemId != null && !item.matched) {
    state.currentDayIndex = 0;
    state.currentDayId = null;
  }
  state.currentItemIndex = item.index;
  state.currentItemId = item.anchorId;

  const slot = slots[item.index];
  if (!isUsable(slot)) return;
  const day = resolvePointer({ index: state.currentDayIndex, anchorId: state.currentDayId }, slot.days, 0);
  state.currentDayIndex = day.index;
  state.currentDayId = day.anchorId;
}

function moveToNextItem(state: CycleProgressState, totalItems: number): void {
  state.currentItemIndex = (state.currentItemIndex + 1) % totalItems;
  state.currentDayIndex = 0;
}

/**
 * Walks forward from the current item until one references a plan with days.
 * Visits each item at most once, so an all-empty cycle terminates with false.
 */
export function skipEmptyPlans(state: CycleProgressState, slots: readonly CycleSlot[]): boolean {
  const startIndex = state.currentItemIndex;
  let checked = 0;
  while (checked < slots.length) {
    if (isUsable(slots[state.currentItemIndex])) return true;
    moveToNextItem(state, slots.length);
    checked += 1;
    if (state.currentItemIndex === startIndex) break;
  }
  return false;
}

function syncAnchors(state: CycleProgressState, slots: readonly CycleSlot[]): void {
  const slot = slots[state.currentItemIndex];
  state.currentItemId = slot?.item.id ?? null;
  state.currentDayId = isUsable(slot) ? anchorAt(slot.days, state.currentDayIndex, 0) : null;
}

function positionOf(state: CycleProgressState, slots: readonly CycleSlot[]): CyclePosition | null {
  const slot = slots[state.currentItemIndex];
  if (!isUsable(slot)) return null;
  const day = slot.days[state.currentDayIndex];
  if (!day) return null;
  return {
    itemIndex: state.currentItemIndex,
    dayIndex: state.currentDayIndex,
    itemId: slot.item.id,
    planId: slot.item.planId,
    totalDays: slot.days.length,
    day,
  };
}

function stepCycle(state: CycleProgressState, slots: readonly CycleSlot[]): boolean {
  const slot = slots[state.currentItemIndex];
  if (isUsable(slot) && state.currentDayIndex + 1 < slot.days.length) {
    state.currentDayIndex += 1;
    return true;
  }
  moveToNextItem(state, slots.length);
  return skipEmptyPlans(state, slots);
}

function commit(
  state: CycleProgressState,
  work: CycleProgressState,
  slots: readonly CycleSlot[],
): CyclePosition | null {
  syncAnchors(work, slots);
  const position = positionOf(work, slots);
  if (position) Object.assign(state, work);
  return position;
}

/**
 * Brings the pointer onto a usable item without consuming a day: reconciles by
 * identity, then skips deleted or empty plans.
 */
export function settleCyclePointer(state: CycleProgressState, slots: readonly CycleSlot[]): CycleTransitionResult {
  if (slots.length === 0) return invalid('empty-cycle');
  const work = snapshot(state);
  reconcileCyclePointer(work, slots);
  if (!skipEmptyPlans(work, slots)) return invalid('no-valid-plan');
  const position = commit(state, work, slots);
  return position ? { outcome: TransitionOutcome.NoOp, ...position } : invalid('no-valid-plan');
}

/**
 * Advances one day within the current plan, rolling over to the next usable plan
 * at the end. The state is left untouched when no usable plan exists.
 */
export function advanceCycle(state: CycleProgressState, slots: readonly CycleSlot[], now: Date): CycleTransitionResult {
  if (slots.length === 0) return invalid('empty-cycle');
  const work = snapshot(state);
  reconcileCyclePointer(work, slots);
  if (!stepCycle(work, slots)) return invalid('no-valid-plan');
  work.lastAdvancedAt = now;
  const position = commit(state, work, slots);
  return position ? { outcome: TransitionOutcome.Advanced, ...position } : invalid('no-valid-plan');
}

/** App-open transition for a cycle; same rules as a single plan, with cycle advancement as the step. */
export function openCycleDay(
  state: CycleProgressState,
  slots: readonly CycleSlot[],
  today: ProgramDay,
  previousRecord: WorkoutRecordStatus,
  now: Date,
): CycleOpenResult {
  if (slots.length === 0) return invalid('empty-cycle');
  const work = snapshot(state);
  reconcileCyclePointer(work, slots);
  if (!skipEmptyPlans(work, slots)) return invalid('no-valid-plan');

  const openedOn = work.lastOpenedDate;
  let outcome: TransitionOutcome.Advanced | TransitionOutcome.NoOp = TransitionOutcome.NoOp;
  let discardRecord: { planId: string; day: ProgramDay } | null = null;

  if (openedOn == null) {
    work.lastOpenedDate = today;
  } else if (compareProgramDays(today, openedOn) > 0) {
    const slot = slots[work.currentItemIndex];
    const previousDay = isUsable(slot) ? slot.days[work.currentDayIndex] : undefined;
    const alreadyCredited =
      work.lastCompletedDate != null && compareProgramDays(openedOn, work.lastCompletedDate) <= 0;

    if (previousDay?.isRestDay || (previousRecord === 'complete' && !alreadyCredited)) {
      if (!stepCycle(work, slots)) return invalid('no-valid-plan');
      work.lastAdvancedAt = now;
      work.lastCompletedDate = laterProgramDay(work.lastCompletedDate, openedOn);
      outcome = TransitionOutcome.Advanced;
    } else if (previousRecord === 'incomplete' && slot) {
      discardRecord = { planId: slot.item.planId, day: openedOn };
    }
    work.lastOpenedDate = today;
  }

  const position = commit(state, work, slots);
  return position ? { outcome, ...position, discardRecord } : invalid('no-valid-plan');
}

/** Retroactive completion for a cycle: advances once for a day newer than the last credited one. */
export function recordCycleCompletion(
  state: CycleProgressState,
  slots: readonly CycleSlot[],
  completionDate: ProgramDay,
  now: Date,
): CycleTransitionResult {
  if (slots.length === 0) return invalid('empty-cycle');
  const work = snapshot(state);
  reconcileCyclePointer(work, slots);
  if (!skipEmptyPlans(work, slots)) return invalid('no-valid-plan');

  const isNewer =
    work.lastCompletedDate == null || compareProgramDays(completionDate, work.lastCompletedDate) > 0;
  if (isNewer) {
    if (!stepCycle(work, slots)) return invalid('no-valid-plan');
    work.lastAdvancedAt = now;
    work.lastCompletedDate = completionDate;
  }

  const position = commit(state, work, slots);
  if (!position) return invalid('no-valid-plan');
  return { outcome: isNewer ? TransitionOutcome.Advanced : TransitionOutcome.NoOp, ...position };
}

export interface CycleDayChangeRequest {
  /** 1-based within the current plan. */
  newDayIndex: number;
  skipAndAdvance: boolean;
  completedSets: number;
  today: ProgramDay;
}

/** Manual day switch inside the current plan of the cycle. */
export function changeCycleDay(
  state: CycleProgressState,
  slots: readonly CycleSlot[],
  request: CycleDayChangeRequest,
  now: Date,
): CycleDayChangeResult {
  if (request.completedSets > 0) return invalid('workout-in-progress');
  if (slots.length === 0) return invalid('empty-cycle');
  const work = snapshot(state);
  reconcileCyclePointer(work, slots);
  if (!skipEmptyPlans(work, slots)) return invalid('no-valid-plan');

  const slot = slots[work.currentItemIndex];
  if (!isUsable(slot)) return invalid('no-valid-plan');
  const total = slot.days.length;
  if (!Number.isInteger(request.newDayIndex) || request.newDayIndex < 1 || request.newDayIndex > total) {
    return invalid('day-not-found');
  }
  const targetDay = slot.days[request.newDayIndex - 1];

  if (request.skipAndAdvance) {
    // next day after the selected one, wrapping inside the same plan
    work.currentDayIndex = request.newDayIndex % total;
    work.lastAdvancedAt = now;
    work.lastCompletedDate = laterProgramDay(work.lastCompletedDate, request.today);
  }

  const position = commit(state, work, slots);
  if (!position) return invalid('no-valid-plan');
  const outcome = request.skipAndAdvance ? TransitionOutcome.Advanced : TransitionOutcome.NoOp;
  return { outcome, ...position, targetDay };
}

/** Restarts the rotation at a chosen 0-based item and day, clearing the open and completion dates. */
export function startCycleAt(
  state: CycleProgressState,
  slots: readonly CycleSlot[],
  itemIndex: number,
  dayIndex: number,
): CycleTransitionResult {
  if (slots.length === 0) return invalid('empty-cycle');
  const slot = slots[itemIndex];
  if (!Number.isInteger(itemIndex) || !slot) return invalid('day-not-found');
  if (!isUsable(slot)) return invalid('empty-plan');
  if (!Number.isInteger(dayIndex) || dayIndex < 0 || dayIndex >= slot.days.length) return invalid('day-not-found');

  const work = createCycleProgress();
  work.currentItemIndex = itemIndex;
  work.currentDayIndex = dayIndex;
  const position = commit(state, work, slots);
  return position ? { outcome: TransitionOutcome.Advanced, ...position } : invalid('no-valid-plan');
}
