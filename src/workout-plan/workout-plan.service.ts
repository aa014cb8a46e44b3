import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model, Types } from 'mongoose';
import { PlanProgress } from '../plan-progress/schemas/plan-progress.schema';
import { densePositions } from '../progression/reindex';
import { PlanDayRef } from '../progression/progression.types';
import { LeanWorkoutPlan, PlanDay, WorkoutPlan } from './schemas/workout-plan.schema';
import { CreateWorkoutPlanDto, PlanDayDto, UpdateWorkoutPlanDto } from './dto/workout-plan.dto';

export interface PlanDayView {
  id: string;
  dayIndex: number;
  name: string;
  note: string;
  isRestDay: boolean;
  exercises: Array<{ name: string; plannedSetCount: number }>;
}

export interface WorkoutPlanView {
  id: string;
  name: string;
  note: string;
  isArchived: boolean;
  days: PlanDayView[];
  updatedAt?: string;
}

function toDayView(day: PlanDay): PlanDayView {
  return {
    id: String(day._id),
    dayIndex: day.dayIndex,
    name: day.name ?? '',
    note: day.note ?? '',
    isRestDay: Boolean(day.isRestDay),
    exercises: (day.exercises ?? []).map((e) => ({ name: e.name, plannedSetCount: e.plannedSetCount })),
  };
}

function sortedDays(plan: { days?: PlanDay[] }): PlanDay[] {
  return [...(plan.days ?? [])].sort((a, b) => a.dayIndex - b.dayIndex);
}

/** Rewrites dayIndex as 1..n in list order. */
function renumber(days: PlanDay[]): PlanDay[] {
  return days.map((day, i) => ({ ...day, dayIndex: i + 1 }));
}

function buildDay(dto: PlanDayDto, dayIndex: number): PlanDay {
  const isRestDay = dto.isRestDay ?? false;
  return {
    _id: new Types.ObjectId(),
    dayIndex,
    name: dto.name?.trim() ?? '',
    note: dto.note?.trim() ?? '',
    isRestDay,
    exercises: isRestDay
      ? []
      : (dto.exercises ?? []).map((e) => ({ name: e.name.trim(), plannedSetCount: e.plannedSetCount })),
  };
}

@Injectable()
export class WorkoutPlanService {
  private readonly logger = new Logger(WorkoutPlanService.name);

  constructor(
    @InjectModel(WorkoutPlan.name) private planModel: Model<WorkoutPlan>,
    @InjectModel(PlanProgress.name) private progressModel: Model<PlanProgress>,
  ) {}

  private toView(doc: LeanWorkoutPlan): WorkoutPlanView {
    return {
      id: String(doc._id),
      name: doc.name,
      note: doc.note ?? '',
      isArchived: Boolean(doc.isArchived),
      days: sortedDays(doc).map(toDayView),
      updatedAt: doc.updatedAt?.toISOString(),
    };
  }

  private async findOwned(profileId: string, planId: string): Promise<LeanWorkoutPlan> {
    if (!isValidObjectId(planId)) throw new NotFoundException('Plan not found');
    const doc: LeanWorkoutPlan | null = await this.planModel.findOne({ _id: planId, profileId }).lean<LeanWorkoutPlan>();
    if (!doc) throw new NotFoundException('Plan not found');
    return doc;
  }

  /** Applies `change` to the ordered days and stores them densely renumbered. */
  private async mutateDays(
    profileId: string,
    planId: string,
    change: (days: PlanDay[]) => PlanDay[],
  ): Promise<WorkoutPlanView> {
    const plan = await this.findOwned(profileId, planId);
    const days = renumber(change(sortedDays(plan)));
    await this.planModel.updateOne({ _id: plan._id, profileId }, { $set: { days } });
    return this.getPlan(profileId, planId);
  }

  async listPlans(profileId: string, includeArchived = false): Promise<WorkoutPlanView[]> {
    const query: Record<string, unknown> = { profileId };
    if (!includeArchived) query.isArchived = false;
    const docs: LeanWorkoutPlan[] = await this.planModel.find(query).sort({ createdAt: 1 }).lean<LeanWorkoutPlan[]>();
    return docs.map((d) => this.toView(d));
  }

  async getPlan(profileId: string, planId: string): Promise<WorkoutPlanView> {
    return this.toView(await this.findOwned(profileId, planId));
  }

  async createPlan(profileId: string, dto: CreateWorkoutPlanDto): Promise<WorkoutPlanView> {
    const name = dto.name.trim();
    if (!name) throw new BadRequestException('Plan name is required.');
    const days = (dto.days ?? []).map((d, i) => buildDay(d, i + 1));
    const created = await this.planModel.create({
      profileId,
      name,
      note: dto.note?.trim() ?? '',
      isArchived: false,
      days,
    });
    this.logger.log(`Created plan ${String(created._id)} with ${days.length} day(s) for ${profileId}`);
    return this.getPlan(profileId, String(created._id));
  }

  async updatePlan(profileId: string, planId: string, dto: UpdateWorkoutPlanDto): Promise<WorkoutPlanView> {
    const plan = await this.findOwned(profileId, planId);
    const $set: Record<string, unknown> = {};
    if (dto.name !== undefined) $set.name = dto.name.trim();
    if (dto.note !== undefined) $set.note = dto.note.trim();
    if (dto.isArchived !== undefined) $set.isArchived = dto.isArchived;
    if (Object.keys($set).length > 0) {
      await this.planModel.updateOne({ _id: plan._id, profileId }, { $set });
    }
    return this.getPlan(profileId, planId);
  }

  /** Deletes the plan and the profile's progress through it. */
  async deletePlan(profileId: string, planId: string): Promise<void> {
    if (!isValidObjectId(planId)) throw new NotFoundException('Plan not found');
    const result = await this.planModel.deleteOne({ _id: planId, profileId });
    if (result.deletedCount !== 1) throw new NotFoundException('Plan not found');
    const progress = await this.progressModel.deleteMany({ profileId, planId });
    this.logger.log(`Deleted plan ${planId} and ${progress.deletedCount} progress record(s)`);
  }

  async addDay(profileId: string, planId: string, dto: PlanDayDto): Promise<WorkoutPlanView> {
    return this.mutateDays(profileId, planId, (days) => [...days, buildDay(dto, days.length + 1)]);
  }

  async updateDay(profileId: string, planId: string, dayId: string, dto: PlanDayDto): Promise<WorkoutPlanView> {
    return this.mutateDays(profileId, planId, (days) => {
      const index = days.findIndex((d) => String(d._id) === dayId);
      if (index < 0) throw new NotFoundException('Day not found');
      const current = days[index];
      const isRestDay = dto.isRestDay ?? current.isRestDay;
      const exercises = dto.exercises
        ? dto.exercises.map((e) => ({ name: e.name.trim(), plannedSetCount: e.plannedSetCount }))
        : current.exercises;
      const updated: PlanDay = {
        ...current,
        name: dto.name !== undefined ? dto.name.trim() : current.name,
        note: dto.note !== undefined ? dto.note.trim() : current.note,
        isRestDay,
        exercises: isRestDay ? [] : exercises,
      };
      return days.map((d, i) => (i === index ? updated : d));
    });
  }

  async removeDay(profileId: string, planId: string, dayId: string): Promise<WorkoutPlanView> {
    return this.mutateDays(profileId, planId, (days) => {
      const remaining = days.filter((d) => String(d._id) !== dayId);
      if (remaining.length === days.length) throw new NotFoundException('Day not found');
      return remaining;
    });
  }

  /** Moves the day at 1-based `fromIndex` so it ends up at `toIndex`. */
  async moveDay(profileId: string, planId: string, fromIndex: number, toIndex: number): Promise<WorkoutPlanView> {
    return this.mutateDays(profileId, planId, (days) => {
      if (fromIndex < 1 || fromIndex > days.length || toIndex < 1 || toIndex > days.length) {
        throw new BadRequestException(`Day positions must be between 1 and ${days.length}`);
      }
      const reordered = [...days];
      const [moved] = reordered.splice(fromIndex - 1, 1);
      reordered.splice(toIndex - 1, 0, moved);
      return reordered;
    });
  }

  /** Appends a copy of the day, exercises included. */
  async duplicateDay(profileId: string, planId: string, dayId: string): Promise<WorkoutPlanView> {
    return this.mutateDays(profileId, planId, (days) => {
      const source = days.find((d) => String(d._id) === dayId);
      if (!source) throw new NotFoundException('Day not found');
      const copy: PlanDay = {
        ...source,
        _id: new Types.ObjectId(),
        exercises: source.exercises.map((e) => ({ ...e })),
      };
      return [...days, copy];
    });
  }

  /** Re-densifies day positions, e.g. after a client wrote gaps or duplicates. */
  async reindexDays(profileId: string, planId: string): Promise<WorkoutPlanView> {
    const plan = await this.findOwned(profileId, planId);
    const days = densePositions(
      (plan.days ?? []).map((d) => ({ ...d, id: String(d._id) })),
      (d) => d.dayIndex,
      1,
    ).map(({ entry, position }): PlanDay => ({
      _id: entry._id,
      dayIndex: position,
      name: entry.name,
      note: entry.note,
      isRestDay: entry.isRestDay,
      exercises: entry.exercises,
    }));
    await this.planModel.updateOne({ _id: plan._id, profileId }, { $set: { days } });
    return this.getPlan(profileId, planId);
  }

  /** Ordered day references for progression; null when the plan is gone. */
  async daysOf(planId: string): Promise<PlanDayRef[] | null> {
    if (!isValidObjectId(planId)) return null;
    const doc: LeanWorkoutPlan | null = await this.planModel.findOne({ _id: planId }).lean<LeanWorkoutPlan>();
    if (!doc) return null;
    return sortedDays(doc).map((d) => ({
      id: String(d._id),
      position: d.dayIndex,
      isRestDay: Boolean(d.isRestDay),
      exerciseCount: (d.exercises ?? []).length,
      name: d.name || null,
    }));
  }

  async findDay(planId: string, dayId: string): Promise<PlanDayView | null> {
    if (!isValidObjectId(planId)) return null;
    const doc: LeanWorkoutPlan | null = await this.planModel.findOne({ _id: planId }).lean<LeanWorkoutPlan>();
    const day = doc?.days?.find((d) => String(d._id) === dayId);
    return day ? toDayView(day) : null;
  }

  async planName(planId: string): Promise<string | null> {
    if (!isValidObjectId(planId)) return null;
    const doc: LeanWorkoutPlan | null = await this.planModel.findOne({ _id: planId }).lean<LeanWorkoutPlan>();
    return doc?.name ?? null;
  }
}
