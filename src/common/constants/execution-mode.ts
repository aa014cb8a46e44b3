/**
 * How a profile's daily workout is chosen.
 * SINGLE follows one plan; CYCLE rotates through the plans of the active cycle.
 */
export enum ExecutionMode {
  SINGLE = 'single',
  CYCLE = 'cycle',
}

export const EXECUTION_MODES: ExecutionMode[] = [ExecutionMode.SINGLE, ExecutionMode.CYCLE];
