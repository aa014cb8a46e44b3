import { BadRequestException, ConflictException, HttpException, NotFoundException } from '@nestjs/common';
import { isInvalid, TransitionFailure, TransitionResult, TransitionSuccess } from './progression.types';

const MESSAGES: Record<TransitionFailure, string> = {
  'plan-not-found': 'Plan not found',
  'empty-plan': 'Plan has no days',
  'day-not-found': 'Day not found in plan',
  'workout-in-progress': 'Cannot change a day that already has completed sets',
  'empty-cycle': 'Cycle has no plans',
  'no-valid-plan': 'No plan in the cycle has any days',
  'cycle-not-found': 'Cycle not found',
  'completion-in-future': 'Completion date is later than today',
};

/** Missing or empty things are 404; refusing to discard logged sets is 409. */
export function transitionException(reason: TransitionFailure): HttpException {
  if (reason === 'workout-in-progress') return new ConflictException(MESSAGES[reason]);
  if (reason === 'completion-in-future') return new BadRequestException(MESSAGES[reason]);
  return new NotFoundException(MESSAGES[reason]);
}

export function expectTransition<T extends object>(result: TransitionResult<T>): TransitionSuccess<T> {
  if (isInvalid(result)) throw transitionException(result.reason);
  return result;
}
