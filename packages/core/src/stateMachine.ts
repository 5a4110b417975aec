/**
 * Job State Machine
 *
 * Lifecycle of a single compression job inside the runner.
 *
 * State Flow:
 * IDLE → PROBING → RUNNING → FINALIZING → COMPLETED
 *            ↘ COMPLETED (probe or bitrate failure)
 *                       ↘ COMPLETED (encoder could not be spawned)
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - COMPLETED is terminal and records the outcome
 */

import { StateTransitionError } from './errors/index.js';

export const JOB_STATES = ['IDLE', 'PROBING', 'RUNNING', 'FINALIZING', 'COMPLETED'] as const;

export type JobState = (typeof JOB_STATES)[number];

export type JobResultKind = 'success' | 'failure';

/**
 * Represents a state transition with metadata
 */
export interface JobStateTransition {
  from: JobState;
  to: JobState;
  timestamp: Date;
  reason?: string;
}

/**
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<JobState, ReadonlySet<JobState>> = {
  IDLE: new Set<JobState>(['PROBING']),
  PROBING: new Set<JobState>(['RUNNING', 'COMPLETED']),
  RUNNING: new Set<JobState>(['FINALIZING', 'COMPLETED']),
  FINALIZING: new Set<JobState>(['COMPLETED']),
  COMPLETED: new Set<JobState>([]), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: JobState, to: JobState): boolean {
  return validTransitions[from].has(to);
}

export class JobStateMachine {
  private currentState: JobState = 'IDLE';
  private outcome: JobResultKind | null = null;
  private readonly history: JobStateTransition[] = [];
  private readonly jobId: string;

  constructor(jobId: string) {
    this.jobId = jobId;
  }

  getState(): JobState {
    return this.currentState;
  }

  /**
   * Outcome once COMPLETED, null before
   */
  getOutcome(): JobResultKind | null {
    return this.outcome;
  }

  getHistory(): ReadonlyArray<JobStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: JobState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a non-terminal state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: Exclude<JobState, 'COMPLETED'>, reason?: string): JobStateTransition {
    return this.apply(targetState, reason);
  }

  /**
   * Enter COMPLETED with the given outcome
   */
  complete(outcome: JobResultKind, reason?: string): JobStateTransition {
    const transition = this.apply('COMPLETED', reason);
    this.outcome = outcome;
    return transition;
  }

  isTerminal(): boolean {
    return this.currentState === 'COMPLETED';
  }

  private apply(targetState: JobState, reason?: string): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.jobId, this.currentState, targetState);
    }

    const transition: JobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }
}
