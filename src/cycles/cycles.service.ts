import { BadRequestException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model, Types } from 'mongoose';
import { ExecutionMode } from '../common/constants/execution-mode';
import { compareProgramDays, daysBetween, ProgramDay } from '../common/utils/program-day';
import { ProfilesService } from '../profiles/profiles.service';
import { Clock, CLOCK } from '../progression/clock';
import {
  advanceCycle,
  changeCycleDay,
  createCycleProgress,
  CycleDayChangeRequest,
  CycleDayChangeResult,
  CycleOpenResult,
  CycleTransitionResult,
  openCycleDay,
  reconcileCyclePointer,
  recordCycleCompletion,
  resetCycleProgress,
  settleCyclePointer,
  startCycleAt,
} from '../progression/cycle-rotation';
import { PLAN_STORE, PlanStore } from '../progression/plan-store';
import { previewDayIndex } from '../progression/preview';
import { ProgressLockService } from '../progression/progress-lock.service';
import { CycleProgressState, CycleSlot, invalid, isInvalid, TransitionOutcome } from '../progression/progression.types';
import { densePositions } from '../progression/reindex';
import { CycleItem, LeanPlanCycle, PlanCycle } from './schemas/plan-cycle.schema';
import { CreateCycleDto } from './dto/cycle.dto';

export interface CycleItemView {
  id: string;
  order: number;
  planId: string;
  planName: string | null;
  note: string;
}

export interface CycleView {
  id: string;
  name: string;
  isActive: boolean;
  items: CycleItemView[];
  progress: CycleProgressState;
}

/** What today's screen shows for a cycle. Day numbers are 1-based. */
export interface CycleStateView {
  cycleName: string;
  planName: string | null;
  planId: string;
  itemIndex: number;
  dayIndex: number;
  totalDays: number;
  dayName: string | null;
}

export interface CyclePreview {
  date: ProgramDay;
  planId: string;
  dayIndex: number;
  totalDays: number;
  dayName: string | null;
}

function sortedItems(cycle: { items?: CycleItem[] }): CycleItem[] {
  return [...(cycle.items ?? [])].sort((a, b) => a.order - b.order);
}

/** Rewrites `order` as 0..n-1 in list order. */
function renumber(items: CycleItem[]): CycleItem[] {
  return items.map((item, i) => ({ ...item, order: i }));
}

function progressOf(cycle: LeanPlanCycle): CycleProgressState {
  const p = cycle.progress;
  if (!p) return createCycleProgress();
  return {
    currentItemIndex: p.currentItemIndex ?? 0,
    currentDayIndex: p.currentDayIndex ?? 0,
    currentItemId: p.currentItemId ?? null,
    currentDayId: p.currentDayId ?? null,
    lastAdvancedAt: p.lastAdvancedAt ?? null,
    lastOpenedDate: p.lastOpenedDate ?? null,
    lastCompletedDate: p.lastCompletedDate ?? null,
  };
}

@Injectable()
export class CyclesService {
  private readonly logger = new Logger(CyclesService.name);

  constructor(
    @InjectModel(PlanCycle.name) private cycleModel: Model<PlanCycle>,
    @Inject(PLAN_STORE) private readonly planStore: PlanStore,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly lock: ProgressLockService,
    private readonly profilesService: ProfilesService,
  ) {}

  private async findCycle(profileId: string, cycleId: string): Promise<LeanPlanCycle | null> {
    if (!isValidObjectId(cycleId)) return null;
    return this.cycleModel.findOne({ _id: cycleId, profileId }).lean<LeanPlanCycle>();
  }

  private async findOwned(profileId: string, cycleId: string): Promise<LeanPlanCycle> {
    const cycle = await this.findCycle(profileId, cycleId);
    if (!cycle) throw new NotFoundException('Cycle not found');
    return cycle;
  }

  private async slotsOf(items: CycleItem[]): Promise<CycleSlot[]> {
    return Promise.all(
      items.map(async (item) => ({
        item: { id: String(item._id), order: item.order, planId: item.planId },
        days: await this.planStore.daysOf(item.planId),
      })),
    );
  }

  private async saveProgress(cycle: LeanPlanCycle, state: CycleProgressState): Promise<void> {
    await this.cycleModel.updateOne({ _id: cycle._id, profileId: cycle.profileId }, { $set: { progress: { ...state } } });
  }

  private async toView(cycle: LeanPlanCycle): Promise<CycleView> {
    const items = await Promise.all(
      sortedItems(cycle).map(async (item) => ({
        id: String(item._id),
        order: item.order,
        planId: item.planId,
        planName: await this.planStore.nameOf(item.planId),
        note: item.note ?? '',
      })),
    );
    return {
      id: String(cycle._id),
      name: cycle.name,
      isActive: Boolean(cycle.isActive),
      items,
      progress: progressOf(cycle),
    };
  }

  private async assertPlanExists(planId: string): Promise<void> {
    if ((await this.planStore.daysOf(planId)) == null) {
      throw new NotFoundException(`Plan ${planId} not found`);
    }
  }

  /**
   * Runs an item list edit under the cycle lock and carries the progress
   * pointer over to the edited list by item identity.
   */
  private mutateItems(
    profileId: string,
    cycleId: string,
    change: (items: CycleItem[]) => CycleItem[],
  ): Promise<CycleView> {
    return this.lock.runExclusive(ProgressLockService.cycleKey(cycleId), async () => {
      const cycle = await this.findOwned(profileId, cycleId);
      const before = sortedItems(cycle);
      const state = progressOf(cycle);
      // pin the anchors to the current entries before positions shift
      reconcileCyclePointer(state, await this.slotsOf(before));

      const items = renumber(change(before));
      reconcileCyclePointer(state, await this.slotsOf(items));
      await this.cycleModel.updateOne(
        { _id: cycle._id, profileId },
        { $set: { items, progress: { ...state } } },
      );
      return this.get(profileId, cycleId);
    });
  }

  async list(profileId: string): Promise<CycleView[]> {
    const cycles: LeanPlanCycle[] = await this.cycleModel
      .find({ profileId })
      .sort({ createdAt: 1 })
      .lean<LeanPlanCycle[]>();
    return Promise.all(cycles.map((c) => this.toView(c)));
  }

  async get(profileId: string, cycleId: string): Promise<CycleView> {
    return this.toView(await this.findOwned(profileId, cycleId));
  }

  async findActive(profileId: string): Promise<LeanPlanCycle | null> {
    return this.cycleModel.findOne({ profileId, isActive: true }).lean<LeanPlanCycle>();
  }

  async create(profileId: string, dto: CreateCycleDto): Promise<CycleView> {
    const name = dto.name.trim();
    if (!name) throw new BadRequestException('Cycle name is required.');
    const planIds = dto.planIds ?? [];
    for (const planId of planIds) await this.assertPlanExists(planId);

    const items: CycleItem[] = planIds.map((planId, order) => ({
      _id: new Types.ObjectId(),
      order,
      planId,
      note: '',
    }));
    const created = await this.cycleModel.create({
      profileId,
      name,
      isActive: false,
      items,
      progress: createCycleProgress(),
    });
    this.logger.log(`Created cycle ${String(created._id)} with ${items.length} plan(s) for ${profileId}`);
    return this.get(profileId, String(created._id));
  }

  async rename(profileId: string, cycleId: string, name: string): Promise<CycleView> {
    const cycle = await this.findOwned(profileId, cycleId);
    await this.cycleModel.updateOne({ _id: cycle._id, profileId }, { $set: { name: name.trim() } });
    return this.get(profileId, cycleId);
  }

  delete(profileId: string, cycleId: string): Promise<void> {
    return this.lock.runExclusive(ProgressLockService.profileKey(profileId), async () => {
      const cycle = await this.findOwned(profileId, cycleId);
      await this.cycleModel.deleteOne({ _id: cycle._id, profileId });
      if (cycle.isActive) {
        await this.profilesService.setExecutionMode(profileId, ExecutionMode.SINGLE);
      }
      this.logger.log(`Deleted cycle ${cycleId} for ${profileId}`);
    });
  }

  /**
   * Makes this the profile's only active cycle and switches the profile to
   * cycle mode. A start position restarts the rotation there. Activations
   * for one profile run one at a time.
   */
  activate(
    profileId: string,
    cycleId: string,
    start?: { itemIndex: number; dayIndex: number },
  ): Promise<CycleView> {
    const profileKey = ProgressLockService.profileKey(profileId);
    const cycleKey = ProgressLockService.cycleKey(cycleId);
    return this.lock.runExclusive(profileKey, () => this.lock.runExclusive(cycleKey, async () => {
      const cycle = await this.findOwned(profileId, cycleId);
      const state = progressOf(cycle);
      if (start) {
        const result = startCycleAt(state, await this.slotsOf(sortedItems(cycle)), start.itemIndex, start.dayIndex);
        if (isInvalid(result)) {
          throw new BadRequestException(`Cannot start cycle at plan ${start.itemIndex + 1}, day ${start.dayIndex + 1}`);
        }
      }
      await this.cycleModel.updateMany(
        { profileId, _id: { $ne: cycle._id }, isActive: true },
        { $set: { isActive: false } },
      );
      await this.cycleModel.updateOne({ _id: cycle._id, profileId }, { $set: { isActive: true, progress: { ...state } } });
      await this.profilesService.setExecutionMode(profileId, ExecutionMode.CYCLE);
      this.logger.log(`Activated cycle ${cycleId} for ${profileId}`);
      return this.get(profileId, cycleId);
    }));
  }

  deactivate(profileId: string, cycleId: string): Promise<CycleView> {
    return this.lock.runExclusive(ProgressLockService.profileKey(profileId), async () => {
      const cycle = await this.findOwned(profileId, cycleId);
      await this.cycleModel.updateOne({ _id: cycle._id, profileId }, { $set: { isActive: false } });
      if (cycle.isActive) {
        await this.profilesService.setExecutionMode(profileId, ExecutionMode.SINGLE);
      }
      return this.get(profileId, cycleId);
    });
  }

  async addPlan(profileId: string, cycleId: string, planId: string, note = ''): Promise<CycleView> {
    await this.assertPlanExists(planId);
    return this.mutateItems(profileId, cycleId, (items) => {
      const nextOrder = items.reduce((max, i) => Math.max(max, i.order), -1) + 1;
      return [...items, { _id: new Types.ObjectId(), order: nextOrder, planId, note: note.trim() }];
    });
  }

  async removeItem(profileId: string, cycleId: string, itemId: string): Promise<CycleView> {
    return this.mutateItems(profileId, cycleId, (items) => {
      const remaining = items.filter((i) => String(i._id) !== itemId);
      if (remaining.length === items.length) throw new NotFoundException('Cycle item not found');
      return remaining;
    });
  }

  /** Moves the item at 0-based `from` to `to`. */
  async moveItem(profileId: string, cycleId: string, from: number, to: number): Promise<CycleView> {
    return this.mutateItems(profileId, cycleId, (items) => {
      if (from >= items.length || to >= items.length) {
        throw new BadRequestException(`Item positions must be between 0 and ${items.length - 1}`);
      }
      const reordered = [...items];
      const [moved] = reordered.splice(from, 1);
      reordered.splice(to, 0, moved);
      return reordered;
    });
  }

  /** Re-densifies item orders, keeping their relative order. */
  async reindexItems(profileId: string, cycleId: string): Promise<CycleView> {
    return this.mutateItems(profileId, cycleId, (items) =>
      densePositions(
        items.map((item) => ({ id: String(item._id), item })),
        (e) => e.item.order,
        0,
      ).map(({ entry, position }) => ({ ...entry.item, order: position })),
    );
  }

  resetProgress(profileId: string, cycleId: string): Promise<CycleView> {
    return this.lock.runExclusive(ProgressLockService.cycleKey(cycleId), async () => {
      const cycle = await this.findOwned(profileId, cycleId);
      const state = progressOf(cycle);
      resetCycleProgress(state);
      await this.saveProgress(cycle, state);
      this.logger.log(`Reset progress of cycle ${cycleId}`);
      return this.get(profileId, cycleId);
    });
  }

  /** Raw advancement by one day, as after a completed workout. */
  advance(profileId: string, cycleId: string): Promise<CycleTransitionResult> {
    return this.lock.runExclusive(ProgressLockService.cycleKey(cycleId), async () => {
      const cycle = await this.findCycle(profileId, cycleId);
      if (!cycle) return invalid('cycle-not-found');
      const state = progressOf(cycle);
      const result = advanceCycle(state, await this.slotsOf(sortedItems(cycle)), this.clock.now());
      if (isInvalid(result)) {
        this.logger.warn(`Cycle ${cycleId} cannot advance: ${result.reason}`);
        return result;
      }
      await this.saveProgress(cycle, state);
      this.logger.log(`Cycle ${cycleId} advanced to plan ${result.itemIndex + 1}, day ${result.dayIndex + 1}`);
      return result;
    });
  }

  /** App-open transition for `today`. */
  openDay(profileId: string, cycleId: string, today: ProgramDay): Promise<CycleOpenResult> {
    return this.lock.runExclusive(ProgressLockService.cycleKey(cycleId), async () => {
      const cycle = await this.findCycle(profileId, cycleId);
      if (!cycle) return invalid('cycle-not-found');
      const slots = await this.slotsOf(sortedItems(cycle));
      const state = progressOf(cycle);

      // the record to judge belongs to the plan the pointer settles on
      const settled = settleCyclePointer({ ...state }, slots);
      if (isInvalid(settled)) {
        this.logger.warn(`Cycle ${cycleId} has no usable plan: ${settled.reason}`);
        return settled;
      }
      const previousRecord = state.lastOpenedDate
        ? await this.planStore.workoutRecordStatus(profileId, settled.planId, state.lastOpenedDate)
        : 'absent';

      const result = openCycleDay(state, slots, today, previousRecord, this.clock.now());
      if (isInvalid(result)) return result;

      if (result.discardRecord) {
        await this.planStore.deleteWorkoutRecord(profileId, result.discardRecord.planId, result.discardRecord.day);
        this.logger.log(`Discarded unfinished workout of ${result.discardRecord.day} in cycle ${cycleId}`);
      }
      await this.saveProgress(cycle, state);
      if (result.outcome === TransitionOutcome.Advanced) {
        this.logger.log(`Cycle ${cycleId} advanced to plan ${result.itemIndex + 1}, day ${result.dayIndex + 1} on open`);
      }
      return result;
    });
  }

  /** Retroactive completion of a program day no later than the profile's today. */
  recordCompletion(profileId: string, cycleId: string, date: ProgramDay): Promise<CycleTransitionResult> {
    return this.lock.runExclusive(ProgressLockService.cycleKey(cycleId), async () => {
      const { today } = await this.profilesService.resolveToday(profileId, this.clock.now());
      if (compareProgramDays(date, today) > 0) {
        this.logger.warn(`Completion of ${date} for cycle ${cycleId} refused: today is ${today}`);
        return invalid('completion-in-future');
      }
      const cycle = await this.findCycle(profileId, cycleId);
      if (!cycle) return invalid('cycle-not-found');
      const state = progressOf(cycle);
      const result = recordCycleCompletion(state, await this.slotsOf(sortedItems(cycle)), date, this.clock.now());
      if (isInvalid(result)) {
        this.logger.warn(`Completion of ${date} not applied to cycle ${cycleId}: ${result.reason}`);
        return result;
      }
      await this.saveProgress(cycle, state);
      if (result.outcome === TransitionOutcome.Advanced) {
        this.logger.log(`Cycle ${cycleId} advanced by completion of ${date}`);
      }
      return result;
    });
  }

  changeDay(profileId: string, cycleId: string, request: CycleDayChangeRequest): Promise<CycleDayChangeResult> {
    return this.lock.runExclusive(ProgressLockService.cycleKey(cycleId), async () => {
      const cycle = await this.findCycle(profileId, cycleId);
      if (!cycle) return invalid('cycle-not-found');
      const state = progressOf(cycle);
      const result = changeCycleDay(state, await this.slotsOf(sortedItems(cycle)), request, this.clock.now());
      if (isInvalid(result)) {
        this.logger.warn(`Day change on cycle ${cycleId} refused: ${result.reason}`);
        return result;
      }
      await this.saveProgress(cycle, state);
      this.logger.log(`Cycle ${cycleId} switched to day ${request.newDayIndex} of plan ${result.planId}`);
      return result;
    });
  }

  /** Current plan and day, without persisting the settled pointer. */
  async currentState(profileId: string, cycleId: string): Promise<CycleStateView | null> {
    const cycle = await this.findOwned(profileId, cycleId);
    const state = progressOf(cycle);
    const settled = settleCyclePointer(state, await this.slotsOf(sortedItems(cycle)));
    if (isInvalid(settled)) return null;
    return {
      cycleName: cycle.name,
      planName: await this.planStore.nameOf(settled.planId),
      planId: settled.planId,
      itemIndex: settled.itemIndex,
      dayIndex: settled.dayIndex + 1,
      totalDays: settled.totalDays,
      dayName: settled.day.name ?? null,
    };
  }

  /** Projected day on `target`, staying within the current plan. Reads only. */
  async preview(profileId: string, cycleId: string, today: ProgramDay, target: ProgramDay): Promise<CyclePreview | null> {
    const cycle = await this.findOwned(profileId, cycleId);
    const slots = await this.slotsOf(sortedItems(cycle));
    const state = progressOf(cycle);
    const settled = settleCyclePointer(state, slots);
    if (isInvalid(settled)) return null;
    const days = slots[settled.itemIndex].days ?? [];
    const dayIndex = previewDayIndex(settled.dayIndex, days.length, daysBetween(today, target), 0);
    if (dayIndex == null) return null;
    return {
      date: target,
      planId: settled.planId,
      dayIndex: dayIndex + 1,
      totalDays: days.length,
      dayName: days[dayIndex]?.name ?? null,
    };
  }
}
