import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { ProgramDay } from '../common/utils/program-day';
import { WorkoutRecordStatus } from '../progression/progression.types';
import { LeanWorkoutDay, WorkoutDay, WorkoutEntry, WorkoutMode } from './schemas/workout-day.schema';

export interface WorkoutDayView {
  id: string;
  date: ProgramDay;
  mode: WorkoutMode;
  planId: string | null;
  cycleId: string | null;
  planDayId: string | null;
  entries: WorkoutEntry[];
  totalCompletedSets: number;
  isComplete: boolean;
}

export interface WorkoutLink {
  planId: string;
  cycleId: string | null;
  planDayId: string;
}

/** Every entry with planned sets has them all done. A record without planned sets counts as done. */
export function isWorkoutComplete(entries: readonly WorkoutEntry[]): boolean {
  return entries
    .filter((e) => e.plannedSetCount > 0)
    .every((e) => e.completedSetCount >= e.plannedSetCount);
}

export function totalCompleted(entries: readonly WorkoutEntry[]): number {
  return entries.reduce((sum, e) => sum + (e.completedSetCount ?? 0), 0);
}

@Injectable()
export class WorkoutDaysService {
  private readonly logger = new Logger(WorkoutDaysService.name);

  constructor(@InjectModel(WorkoutDay.name) private dayModel: Model<WorkoutDay>) {}

  toView(doc: LeanWorkoutDay): WorkoutDayView {
    const entries = (doc.entries ?? []).map((e) => ({
      name: e.name,
      plannedSetCount: e.plannedSetCount ?? 0,
      completedSetCount: e.completedSetCount ?? 0,
    }));
    return {
      id: String(doc._id),
      date: doc.date,
      mode: doc.mode ?? WorkoutMode.FREE,
      planId: doc.planId ?? null,
      cycleId: doc.cycleId ?? null,
      planDayId: doc.planDayId ?? null,
      entries,
      totalCompletedSets: totalCompleted(entries),
      isComplete: isWorkoutComplete(entries),
    };
  }

  async findByDate(profileId: string, date: ProgramDay): Promise<WorkoutDayView | null> {
    const doc: LeanWorkoutDay | null = await this.dayModel.findOne({ profileId, date }).lean<LeanWorkoutDay>();
    return doc ? this.toView(doc) : null;
  }

  async getOrCreate(profileId: string, date: ProgramDay, mode: WorkoutMode = WorkoutMode.FREE): Promise<WorkoutDayView> {
    const doc: LeanWorkoutDay | null = await this.dayModel
      .findOneAndUpdate(
        { profileId, date },
        { $setOnInsert: { profileId, date, mode, planId: null, cycleId: null, planDayId: null, entries: [] } },
        { new: true, upsert: true },
      )
      .lean<LeanWorkoutDay>();
    if (!doc) throw new NotFoundException(`Workout for ${date} could not be created`);
    return this.toView(doc);
  }

  /**
   * Links the record to a plan day and replaces its entries with the day's
   * planned exercises, all at zero completed sets.
   */
  async materialize(
    profileId: string,
    date: ProgramDay,
    link: WorkoutLink,
    exercises: ReadonlyArray<{ name: string; plannedSetCount: number }>,
  ): Promise<WorkoutDayView> {
    const entries: WorkoutEntry[] = exercises.map((e) => ({
      name: e.name,
      plannedSetCount: e.plannedSetCount,
      completedSetCount: 0,
    }));
    await this.dayModel.updateOne(
      { profileId, date },
      {
        $set: { mode: WorkoutMode.ROUTINE, planId: link.planId, cycleId: link.cycleId, planDayId: link.planDayId, entries },
        $setOnInsert: { profileId, date },
      },
      { upsert: true },
    );
    this.logger.debug(`Materialized day ${link.planDayId} of plan ${link.planId} into ${date} for ${profileId}`);
    const view = await this.findByDate(profileId, date);
    if (!view) throw new NotFoundException(`Workout for ${date} not found`);
    return view;
  }

  /** Sets the completed set count of one entry. */
  async logSets(
    profileId: string,
    date: ProgramDay,
    entryIndex: number,
    completedSetCount: number,
  ): Promise<{ record: WorkoutDayView; becameComplete: boolean }> {
    const before = await this.findByDate(profileId, date);
    if (!before) throw new NotFoundException(`No workout recorded for ${date}`);
    if (entryIndex < 0 || entryIndex >= before.entries.length) {
      throw new BadRequestException(`Entry ${entryIndex} does not exist in the workout for ${date}`);
    }
    const entries = before.entries.map((e, i) => (i === entryIndex ? { ...e, completedSetCount } : e));
    await this.dayModel.updateOne({ profileId, date }, { $set: { entries } });

    const record = await this.findByDate(profileId, date);
    if (!record) throw new NotFoundException(`No workout recorded for ${date}`);
    return { record, becameComplete: !before.isComplete && record.isComplete };
  }

  async totalCompletedSets(profileId: string, date: ProgramDay): Promise<number> {
    const record = await this.findByDate(profileId, date);
    return record?.totalCompletedSets ?? 0;
  }

  /** Status of the routine record linked to `planId`; other records count as absent. */
  async statusFor(profileId: string, planId: string, date: ProgramDay): Promise<WorkoutRecordStatus> {
    const record = await this.findByDate(profileId, date);
    if (!record || record.mode !== WorkoutMode.ROUTINE || record.planId !== planId) return 'absent';
    return record.isComplete ? 'complete' : 'incomplete';
  }

  async deleteForPlan(profileId: string, planId: string, date: ProgramDay): Promise<boolean> {
    const result = await this.dayModel.deleteOne({ profileId, date, planId });
    if (result.deletedCount === 1) {
      this.logger.log(`Discarded unfinished workout of ${date} (plan ${planId}) for ${profileId}`);
    }
    return result.deletedCount === 1;
  }
}
