/**
 * Job State Machine
 *
 * Strict state machine for export job lifecycle management.
 *
 * State Flow:
 * pending → validating → building → executing → finalizing → completed
 *                    ↘ failed | cancelled (from any non-terminal state)
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Terminal states never transition again
 */

import { StateTransitionError } from './errors/index.js';

export const JOB_STATES = [
  'pending',
  'validating',
  'building',
  'executing',
  'finalizing',
  'completed',
  'failed',
  'cancelled',
] as const;

export type JobState = typeof JOB_STATES[number];

export type TerminalJobState = Extract<JobState, 'completed' | 'failed' | 'cancelled'>;

/**
 * Represents a state transition with metadata
 */
export interface JobStateTransition {
  from: JobState;
  to: JobState;
  timestamp: Date;
  reason?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<JobState, ReadonlySet<JobState>> = {
  pending: new Set<JobState>(['validating', 'cancelled', 'failed']),
  validating: new Set<JobState>(['building', 'cancelled', 'failed']),
  building: new Set<JobState>(['executing', 'cancelled', 'failed']),
  executing: new Set<JobState>(['finalizing', 'cancelled', 'failed']),
  finalizing: new Set<JobState>(['completed', 'cancelled', 'failed']),
  completed: new Set<JobState>(),
  failed: new Set<JobState>(),
  cancelled: new Set<JobState>(),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: JobState, to: JobState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: JobState): JobState[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalState(state: JobState): state is TerminalJobState {
  return validTransitions[state].size === 0;
}

/**
 * Job State Machine class
 * Manages state transitions with validation
 */
export class JobStateMachine {
  private currentState: JobState;
  private history: JobStateTransition[];
  private readonly jobId: string;

  constructor(jobId: string, initialState: JobState = 'pending') {
    this.jobId = jobId;
    this.currentState = initialState;
    this.history = [];
  }

  /**
   * Get the current state
   */
  getState(): JobState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<JobStateTransition> {
    return [...this.history];
  }

  /**
   * Check if a transition to the target state is valid
   */
  canTransitionTo(targetState: JobState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetState: JobState,
    reason?: string,
    metadata?: Record<string, unknown>
  ): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.jobId, this.currentState, targetState);
    }

    const transition: JobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
      metadata,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  /**
   * Check if the job is in a terminal state
   */
  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  /**
   * Fail the job with a reason
   */
  fail(reason: string, metadata?: Record<string, unknown>): JobStateTransition {
    return this.transitionTo('failed', reason, metadata);
  }

  /**
   * Cancel the job
   */
  cancel(reason: string = 'cancellation requested'): JobStateTransition {
    return this.transitionTo('cancelled', reason);
  }
}
