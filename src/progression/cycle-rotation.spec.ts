import {
  advanceCycle,
  changeCycleDay,
  createCycleProgress,
  openCycleDay,
  reconcileCyclePointer,
  recordCycleCompletion,
  resetCycleProgress,
  settleCyclePointer,
  skipEmptyPlans,
  startCycleAt,
} from './cycle-rotation';
import { CycleProgressState, CycleSlot, PlanDayRef, TransitionOutcome } from './progression.types';

function slot(itemId: string, planId: string, dayCount: number | null, restDays: number[] = []): CycleSlot {
  const days: PlanDayRef[] | null =
    dayCount == null
      ? null
      : Array.from({ length: dayCount }, (_, i) => ({
          id: `${planId}-d${i + 1}`,
          position: i + 1,
          isRestDay: restDays.includes(i + 1),
          exerciseCount: 2,
        }));
  return { item: { id: itemId, order: 0, planId }, days };
}

function cycleState(overrides: Partial<CycleProgressState> = {}): CycleProgressState {
  return { ...createCycleProgress(), ...overrides };
}

const NOW = new Date(2024, 2, 11, 9, 30);

describe('advanceCycle', () => {
  const slots = [slot('i1', 'A', 3), slot('i2', 'B', 2)];

  it('steps within the current plan', () => {
    const state = cycleState();
    expect(advanceCycle(state, slots, NOW)).toMatchObject({
      outcome: TransitionOutcome.Advanced,
      itemIndex: 0,
      dayIndex: 1,
      planId: 'A',
      day: { id: 'A-d2' },
    });
    expect(state).toMatchObject({ currentItemId: 'i1', currentDayId: 'A-d2', lastAdvancedAt: NOW });
  });

  it('moves to the next plan after the last day', () => {
    const state = cycleState({ currentItemIndex: 0, currentDayIndex: 2 });
    expect(advanceCycle(state, slots, NOW)).toMatchObject({ itemIndex: 1, dayIndex: 0, planId: 'B' });
  });

  it('wraps from the last plan back to the first', () => {
    const state = cycleState({ currentItemIndex: 1, currentDayIndex: 1 });
    expect(advanceCycle(state, slots, NOW)).toMatchObject({ itemIndex: 0, dayIndex: 0, planId: 'A' });
  });

  it('skips plans that are empty or deleted', () => {
    const mixed = [slot('i1', 'A', 2), slot('i2', 'B', 0), slot('i3', 'C', null), slot('i4', 'D', 1)];
    const state = cycleState({ currentItemIndex: 0, currentDayIndex: 1 });
    expect(advanceCycle(state, mixed, NOW)).toMatchObject({ itemIndex: 3, dayIndex: 0, planId: 'D' });
  });

  it('leaves an empty current plan without consuming a day', () => {
    const state = cycleState();
    expect(advanceCycle(state, [slot('i1', 'A', 0), slot('i2', 'B', 2)], NOW)).toMatchObject({
      itemIndex: 1,
      dayIndex: 0,
    });
  });

  it('comes back to the only usable plan', () => {
    const state = cycleState({ currentItemIndex: 0, currentDayIndex: 1 });
    expect(advanceCycle(state, [slot('i1', 'A', 2), slot('i2', 'B', 0)], NOW)).toMatchObject({
      itemIndex: 0,
      dayIndex: 0,
    });
  });

  it('stops scanning a cycle with no usable plan and keeps the state', () => {
    const state = cycleState({ currentItemIndex: 1, currentDayIndex: 0, lastCompletedDate: '2024-03-01' });
    const before = { ...state };
    expect(advanceCycle(state, [slot('i1', 'A', 0), slot('i2', 'B', null)], NOW)).toEqual({
      outcome: TransitionOutcome.Invalid,
      reason: 'no-valid-plan',
    });
    expect(state).toEqual(before);
  });

  it('rejects a cycle without items', () => {
    expect(advanceCycle(cycleState(), [], NOW)).toEqual({
      outcome: TransitionOutcome.Invalid,
      reason: 'empty-cycle',
    });
  });

  it('follows the anchored item and day after an earlier item was removed', () => {
    const state = cycleState({
      currentItemIndex: 1,
      currentDayIndex: 1,
      currentItemId: 'i2',
      currentDayId: 'B-d2',
    });
    const remaining = [slot('i2', 'B', 3), slot('i3', 'C', 1)];
    expect(advanceCycle(state, remaining, NOW)).toMatchObject({
      itemIndex: 0,
      dayIndex: 2,
      planId: 'B',
      day: { id: 'B-d3' },
    });
  });
});

describe('reconcileCyclePointer', () => {
  it('starts the next item from its first day when the current item was removed', () => {
    const state = cycleState({ currentItemIndex: 1, currentDayIndex: 2, currentItemId: 'i2', currentDayId: 'B-d3' });
    reconcileCyclePointer(state, [slot('i1', 'A', 3), slot('i3', 'C', 3)]);
    expect(state).toMatchObject({
      currentItemIndex: 1,
      currentItemId: 'i3',
      currentDayIndex: 0,
      currentDayId: 'C-d1',
    });
  });
});

describe('skipEmptyPlans', () => {
  it('visits each item at most once', () => {
    const state = cycleState({ currentItemIndex: 2 });
    const empties = [slot('i1', 'A', 0), slot('i2', 'B', 0), slot('i3', 'C', 0)];
    expect(skipEmptyPlans(state, empties)).toBe(false);
    expect(state.currentItemIndex).toBe(2);
  });
});

describe('settleCyclePointer', () => {
  it('moves off a deleted plan onto the next usable one', () => {
    const state = cycleState({ currentItemIndex: 0, currentItemId: 'i1' });
    expect(settleCyclePointer(state, [slot('i1', 'A', null), slot('i2', 'B', 2)])).toMatchObject({
      outcome: TransitionOutcome.NoOp,
      itemIndex: 1,
      dayIndex: 0,
      planId: 'B',
    });
    expect(state.currentItemId).toBe('i2');
  });
});

describe('openCycleDay', () => {
  const slots = [slot('i1', 'A', 2, [2]), slot('i2', 'B', 2)];

  it('only records the open date on the first run', () => {
    const state = cycleState();
    expect(openCycleDay(state, slots, '2024-03-10', 'absent', NOW)).toMatchObject({
      outcome: TransitionOutcome.NoOp,
      itemIndex: 0,
      dayIndex: 0,
      discardRecord: null,
    });
    expect(state.lastOpenedDate).toBe('2024-03-10');
    expect(state.lastAdvancedAt).toBeNull();
  });

  it('advances after a completed workout', () => {
    const state = cycleState({ lastOpenedDate: '2024-03-10' });
    expect(openCycleDay(state, slots, '2024-03-11', 'complete', NOW)).toMatchObject({
      outcome: TransitionOutcome.Advanced,
      itemIndex: 0,
      dayIndex: 1,
    });
    expect(state).toMatchObject({ lastOpenedDate: '2024-03-11', lastCompletedDate: '2024-03-10', lastAdvancedAt: NOW });
  });

  it('rolls past a rest day into the next plan', () => {
    const state = cycleState({ currentDayIndex: 1, lastOpenedDate: '2024-03-10' });
    expect(openCycleDay(state, slots, '2024-03-11', 'absent', NOW)).toMatchObject({
      outcome: TransitionOutcome.Advanced,
      itemIndex: 1,
      dayIndex: 0,
      planId: 'B',
    });
  });

  it('holds and asks to discard an unfinished workout of the current plan', () => {
    const state = cycleState({ currentItemIndex: 1, lastOpenedDate: '2024-03-10' });
    expect(openCycleDay(state, slots, '2024-03-11', 'incomplete', NOW)).toMatchObject({
      outcome: TransitionOutcome.NoOp,
      itemIndex: 1,
      dayIndex: 0,
      discardRecord: { planId: 'B', day: '2024-03-10' },
    });
  });

  it('is a no-op for a repeated open on the same day', () => {
    const state = cycleState({ currentItemIndex: 1, lastOpenedDate: '2024-03-11' });
    expect(openCycleDay(state, slots, '2024-03-11', 'complete', NOW)).toMatchObject({
      outcome: TransitionOutcome.NoOp,
      itemIndex: 1,
      dayIndex: 0,
    });
  });
});

describe('recordCycleCompletion', () => {
  const slots = [slot('i1', 'A', 2), slot('i2', 'B', 2)];

  it('advances once per newer completion date', () => {
    const state = cycleState();
    expect(recordCycleCompletion(state, slots, '2024-03-09', NOW).outcome).toBe(TransitionOutcome.Advanced);
    expect(recordCycleCompletion(state, slots, '2024-03-08', NOW).outcome).toBe(TransitionOutcome.NoOp);
    expect(recordCycleCompletion(state, slots, '2024-03-10', NOW)).toMatchObject({
      outcome: TransitionOutcome.Advanced,
      itemIndex: 1,
      dayIndex: 0,
    });
    expect(state.lastCompletedDate).toBe('2024-03-10');
  });

  it('keeps the credited date when no plan can be reached', () => {
    const state = cycleState({ lastCompletedDate: '2024-03-01' });
    expect(recordCycleCompletion(state, [slot('i1', 'A', 0)], '2024-03-09', NOW)).toEqual({
      outcome: TransitionOutcome.Invalid,
      reason: 'no-valid-plan',
    });
    expect(state.lastCompletedDate).toBe('2024-03-01');
  });
});

describe('changeCycleDay', () => {
  const slots = [slot('i1', 'A', 3), slot('i2', 'B', 2)];

  it('refuses while today already has completed sets', () => {
    expect(
      changeCycleDay(cycleState(), slots, { newDayIndex: 2, skipAndAdvance: true, completedSets: 4, today: '2024-03-11' }, NOW),
    ).toEqual({ outcome: TransitionOutcome.Invalid, reason: 'workout-in-progress' });
  });

  it('rejects a day outside the current plan', () => {
    expect(
      changeCycleDay(cycleState(), slots, { newDayIndex: 4, skipAndAdvance: false, completedSets: 0, today: '2024-03-11' }, NOW),
    ).toEqual({ outcome: TransitionOutcome.Invalid, reason: 'day-not-found' });
  });

  it('points at the day after the chosen one, wrapping within the plan', () => {
    const state = cycleState();
    expect(
      changeCycleDay(state, slots, { newDayIndex: 3, skipAndAdvance: true, completedSets: 0, today: '2024-03-11' }, NOW),
    ).toMatchObject({ outcome: TransitionOutcome.Advanced, itemIndex: 0, dayIndex: 0, targetDay: { id: 'A-d3' } });
    expect(state).toMatchObject({ lastCompletedDate: '2024-03-11', currentDayId: 'A-d1' });

    changeCycleDay(state, slots, { newDayIndex: 1, skipAndAdvance: true, completedSets: 0, today: '2024-03-11' }, NOW);
    expect(state.currentDayIndex).toBe(1);
  });

  it('leaves the pointer alone without skip', () => {
    const state = cycleState({ currentDayIndex: 1 });
    expect(
      changeCycleDay(state, slots, { newDayIndex: 3, skipAndAdvance: false, completedSets: 0, today: '2024-03-11' }, NOW),
    ).toMatchObject({ outcome: TransitionOutcome.NoOp, dayIndex: 1, targetDay: { id: 'A-d3' } });
    expect(state.lastCompletedDate).toBeNull();
  });
});

describe('resetCycleProgress', () => {
  it('returns to the first day of the first plan', () => {
    const state = cycleState({ currentItemIndex: 1, currentDayIndex: 1, currentItemId: 'i2', lastOpenedDate: '2024-03-11' });
    resetCycleProgress(state);
    expect(state).toEqual(createCycleProgress());
  });
});

describe('startCycleAt', () => {
  const slots = [slot('i1', 'A', 2), slot('i2', 'B', 0), slot('i3', 'C', 3)];

  it('starts at the chosen plan and day with fresh dates', () => {
    const state = cycleState({ lastOpenedDate: '2024-03-11', lastCompletedDate: '2024-03-10' });
    expect(startCycleAt(state, slots, 2, 1)).toMatchObject({ outcome: TransitionOutcome.Advanced, planId: 'C' });
    expect(state).toEqual({
      currentItemIndex: 2,
      currentDayIndex: 1,
      currentItemId: 'i3',
      currentDayId: 'C-d2',
      lastAdvancedAt: null,
      lastOpenedDate: null,
      lastCompletedDate: null,
    });
  });

  it('rejects positions that do not exist', () => {
    expect(startCycleAt(cycleState(), slots, 1, 0)).toEqual({ outcome: TransitionOutcome.Invalid, reason: 'empty-plan' });
    expect(startCycleAt(cycleState(), slots, 0, 2)).toEqual({ outcome: TransitionOutcome.Invalid, reason: 'day-not-found' });
    expect(startCycleAt(cycleState(), slots, 5, 0)).toEqual({ outcome: TransitionOutcome.Invalid, reason: 'day-not-found' });
  });
});
