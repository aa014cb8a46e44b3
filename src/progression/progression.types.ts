import { ProgramDay } from '../common/utils/program-day';

/** Ordered day of a plan as the progression core sees it. `position` is 1-based. */
export interface PlanDayRef {
  id: string;
  position: number;
  isRestDay: boolean;
  exerciseCount: number;
  name?: string | null;
}

/** Plan reference inside a cycle. `order` is 0-based. */
export interface CycleItemRef {
  id: string;
  order: number;
  planId: string;
}

export type WorkoutRecordStatus = 'absent' | 'incomplete' | 'complete';

export enum TransitionOutcome {
  Advanced = 'advanced',
  NoOp = 'noop',
  Invalid = 'invalid',
}

export type TransitionFailure =
  | 'plan-not-found'
  | 'empty-plan'
  | 'day-not-found'
  | 'workout-in-progress'
  | 'empty-cycle'
  | 'no-valid-plan'
  | 'cycle-not-found'
  | 'completion-in-future';

export type TransitionSuccess<T extends object = object> = {
  outcome: TransitionOutcome.Advanced | TransitionOutcome.NoOp;
} & T;

export interface TransitionInvalid {
  outcome: TransitionOutcome.Invalid;
  reason: TransitionFailure;
}

export type TransitionResult<T extends object = object> = TransitionSuccess<T> | TransitionInvalid;

export interface SinglePlanProgressState {
  /** 1-based position into the plan's days. */
  currentDayIndex: number;
  currentDayId: string | null;
  lastOpenedDate: ProgramDay | null;
  /** Most recent day whose completion has already moved the pointer. */
  lastCompletedDate: ProgramDay | null;
}

export interface CycleProgressState {
  /** 0-based position into the cycle's items. */
  currentItemIndex: number;
  /** 0-based position into the current plan's days. */
  currentDayIndex: number;
  currentItemId: string | null;
  currentDayId: string | null;
  lastAdvancedAt: Date | null;
  lastOpenedDate: ProgramDay | null;
  lastCompletedDate: ProgramDay | null;
}

/** A cycle item with its plan's days; `days` is null when the plan was deleted. */
export interface CycleSlot {
  item: CycleItemRef;
  days: PlanDayRef[] | null;
}

export function invalid(reason: TransitionFailure): TransitionInvalid {
  return { outcome: TransitionOutcome.Invalid, reason };
}

export function isInvalid<T extends object>(result: TransitionResult<T>): result is TransitionInvalid {
  return result.outcome === TransitionOutcome.Invalid;
}
