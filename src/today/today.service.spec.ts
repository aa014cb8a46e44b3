import { ConfigService } from '@nestjs/config';
import { getModelToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { CyclesService } from '../cycles/cycles.service';
import { PlanCycle } from '../cycles/schemas/plan-cycle.schema';
import { PlanProgressService } from '../plan-progress/plan-progress.service';
import { PlanProgress } from '../plan-progress/schemas/plan-progress.schema';
import { ProfilesService } from '../profiles/profiles.service';
import { Profile } from '../profiles/schemas/profile.schema';
import { CLOCK } from '../progression/clock';
import { MongoPlanStore } from '../progression/mongo-plan-store';
import { PLAN_STORE } from '../progression/plan-store';
import { ProgressLockService } from '../progression/progress-lock.service';
import { TransitionOutcome } from '../progression/progression.types';
import { FakeModel } from '../testing/fake-model';
import { WorkoutDaysService } from '../workout-days/workout-days.service';
import { WorkoutDay } from '../workout-days/schemas/workout-day.schema';
import { WorkoutPlanService } from '../workout-plan/workout-plan.service';
import { WorkoutPlan } from '../workout-plan/schemas/workout-plan.schema';
import { TodayService } from './today.service';

describe('TodayService', () => {
  let service: TodayService;
  let plans: WorkoutPlanService;
  let planProgress: PlanProgressService;
  let cycles: CyclesService;
  let dayModel: FakeModel;
  let progressModel: FakeModel;
  let now: Date;

  beforeEach(async () => {
    now = new Date(2024, 2, 11, 9, 0, 0);
    dayModel = new FakeModel();
    progressModel = new FakeModel();

    const moduleRef = await Test.createTestingModule({
      providers: [
        TodayService,
        ProfilesService,
        PlanProgressService,
        CyclesService,
        WorkoutDaysService,
        WorkoutPlanService,
        ProgressLockService,
        { provide: PLAN_STORE, useClass: MongoPlanStore },
        { provide: CLOCK, useValue: { now: () => now } },
        { provide: getModelToken(Profile.name), useValue: new FakeModel() },
        { provide: getModelToken(PlanProgress.name), useValue: progressModel },
        { provide: getModelToken(PlanCycle.name), useValue: new FakeModel() },
        { provide: getModelToken(WorkoutPlan.name), useValue: new FakeModel() },
        { provide: getModelToken(WorkoutDay.name), useValue: dayModel },
        { provide: ConfigService, useValue: new ConfigService({ DEFAULT_DAY_TRANSITION_HOUR: '3' }) },
      ],
    }).compile();

    service = moduleRef.get(TodayService);
    plans = moduleRef.get(WorkoutPlanService);
    planProgress = moduleRef.get(PlanProgressService);
    cycles = moduleRef.get(CyclesService);
  });

  async function upperLower(): Promise<string> {
    const plan = await plans.createPlan('p1', {
      name: 'Upper Lower',
      days: [
        { name: 'Upper', exercises: [{ name: 'Bench', plannedSetCount: 2 }] },
        { name: 'Lower', exercises: [{ name: 'Squat', plannedSetCount: 1 }] },
      ],
    });
    return plan.id;
  }

  async function activePlan(): Promise<string> {
    const planId = await upperLower();
    await planProgress.activate('p1', planId, 1);
    return planId;
  }

  it('ensures a free workout when nothing is active', async () => {
    const view = await service.open('p1');
    expect(view).toMatchObject({
      date: '2024-03-11',
      mode: 'single',
      outcome: null,
      reason: null,
      planId: null,
      day: null,
    });
    expect(view.record).toMatchObject({ date: '2024-03-11', mode: 'free', entries: [] });
  });

  it('materializes the current plan day into a new record', async () => {
    const planId = await activePlan();
    const view = await service.open('p1');
    expect(view).toMatchObject({
      outcome: TransitionOutcome.NoOp,
      planId,
      cycleId: null,
      dayIndex: 1,
      totalDays: 2,
      day: { name: 'Upper' },
    });
    expect(view.record).toMatchObject({
      mode: 'routine',
      planId,
      planDayId: view.day?.id,
      entries: [{ name: 'Bench', plannedSetCount: 2, completedSetCount: 0 }],
      isComplete: false,
    });
  });

  it('leaves a record with manual entries untouched', async () => {
    await activePlan();
    await dayModel.create({
      profileId: 'p1',
      date: '2024-03-11',
      mode: 'free',
      planId: null,
      cycleId: null,
      planDayId: null,
      entries: [{ name: 'Run', plannedSetCount: 1, completedSetCount: 0 }],
    });

    const view = await service.open('p1');
    expect(view.day).toMatchObject({ name: 'Upper' });
    expect(view.record).toMatchObject({ mode: 'free', entries: [{ name: 'Run' }] });
  });

  it('advances the next day after the workout was finished', async () => {
    await activePlan();
    await service.open('p1');
    await expect(service.logSets('p1', '2024-03-11', 0, 2)).resolves.toMatchObject({
      record: { isComplete: true },
      rescue: null,
    });

    now = new Date(2024, 2, 12, 10, 0, 0);
    const view = await service.open('p1');
    expect(view).toMatchObject({ date: '2024-03-12', outcome: TransitionOutcome.Advanced, dayIndex: 2 });
    expect(view.record.entries).toEqual([{ name: 'Squat', plannedSetCount: 1, completedSetCount: 0 }]);
  });

  it('credits a late completion once', async () => {
    const planId = await activePlan();
    await service.open('p1');

    now = new Date(2024, 2, 12, 10, 0, 0);
    await expect(service.logSets('p1', '2024-03-11', 0, 2)).resolves.toMatchObject({
      rescue: TransitionOutcome.Advanced,
    });
    expect(progressModel.docs[0]).toMatchObject({ planId, currentDayIndex: 2, lastCompletedDate: '2024-03-11' });

    const view = await service.open('p1');
    expect(view).toMatchObject({ outcome: TransitionOutcome.NoOp, dayIndex: 2, day: { name: 'Lower' } });
  });

  it('refuses to change the day once sets are logged', async () => {
    await activePlan();
    await service.open('p1');
    await service.logSets('p1', '2024-03-11', 0, 1);

    await expect(service.changeDay('p1', 2, false)).resolves.toEqual({
      outcome: TransitionOutcome.Invalid,
      reason: 'workout-in-progress',
    });
  });

  it('materializes the chosen day and points past it', async () => {
    await activePlan();
    await service.open('p1');

    const result = await service.changeDay('p1', 2, true);
    expect(result).toMatchObject({
      outcome: TransitionOutcome.Advanced,
      date: '2024-03-11',
      nextDayIndex: 1,
      day: { name: 'Lower' },
      record: { entries: [{ name: 'Squat', plannedSetCount: 1, completedSetCount: 0 }] },
    });
  });

  it('has no day to change without an active plan', async () => {
    await expect(service.changeDay('p1', 1, false)).resolves.toEqual({
      outcome: TransitionOutcome.Invalid,
      reason: 'plan-not-found',
    });
  });

  it('opens the current plan of the active cycle', async () => {
    const planA = await upperLower();
    const planB = (
      await plans.createPlan('p1', {
        name: 'Full Body',
        days: [{ name: 'Full', exercises: [{ name: 'Deadlift', plannedSetCount: 3 }] }],
      })
    ).id;
    const cycle = await cycles.create('p1', { name: 'Rotation', planIds: [planA, planB] });
    await cycles.activate('p1', cycle.id);

    const view = await service.open('p1');
    expect(view).toMatchObject({
      mode: 'cycle',
      outcome: TransitionOutcome.NoOp,
      planId: planA,
      cycleId: cycle.id,
      dayIndex: 1,
      totalDays: 2,
      day: { name: 'Upper' },
    });
    expect(view.record).toMatchObject({ cycleId: cycle.id, planId: planA });

    await expect(service.preview('p1', '2024-03-13')).resolves.toEqual({
      date: '2024-03-13',
      planId: planA,
      dayIndex: 1,
      totalDays: 2,
      dayName: 'Upper',
    });
  });

  it('previews the active plan for a later date', async () => {
    const planId = await activePlan();
    await expect(service.preview('p1', '2024-03-12')).resolves.toEqual({
      date: '2024-03-12',
      planId,
      dayIndex: 2,
      totalDays: 2,
      dayName: 'Lower',
    });
  });
});
