import { ProgramDay } from '../common/utils/program-day';
import { PlanDayRef, WorkoutRecordStatus } from './progression.types';

export const PLAN_STORE = Symbol('PLAN_STORE');

/**
 * Read access to plans and workout records for the progression services.
 * Implementations never throw for missing data: absent plans are `null`.
 */
export interface PlanStore {
  /** Days of a plan ordered by position, or null if the plan does not exist. */
  daysOf(planId: string): Promise<PlanDayRef[] | null>;

  nameOf(planId: string): Promise<string | null>;

  /** Records in free mode or linked to another plan count as absent. */
  workoutRecordStatus(profileId: string, planId: string, day: ProgramDay): Promise<WorkoutRecordStatus>;

  deleteWorkoutRecord(profileId: string, planId: string, day: ProgramDay): Promise<void>;
}
