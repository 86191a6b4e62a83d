/**
 * Pipeline State Machine
 *
 * Tracks one invocation through FETCHING → PROMPTING → QUERYING →
 * ENRICHING → DONE. States may be skipped but never revisited.
 *
 * @module pipeline/state-machine
 */

import { PIPELINE_STATES, type PipelineState } from './types.js';

/**
 * Raised on a backward or repeated transition.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: PipelineState,
    public readonly to: PipelineState
  ) {
    super(`Invalid pipeline transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Forward-only state tracker.
 *
 * @example
 * ```typescript
 * const machine = new PipelineStateMachine();
 * machine.transition('PROMPTING');
 * machine.transition('DONE');
 * machine.transition('QUERYING'); // throws InvalidTransitionError
 * ```
 */
export class PipelineStateMachine {
  private current: PipelineState = 'FETCHING';
  private readonly visited: PipelineState[] = ['FETCHING'];

  get state(): PipelineState {
    return this.current;
  }

  get isDone(): boolean {
    return this.current === 'DONE';
  }

  /**
   * Move to a later state.
   *
   * @throws InvalidTransitionError when `next` is not after the current state
   */
  transition(next: PipelineState): void {
    if (PIPELINE_STATES.indexOf(next) <= PIPELINE_STATES.indexOf(this.current)) {
      throw new InvalidTransitionError(this.current, next);
    }
    this.current = next;
    this.visited.push(next);
  }

  /**
   * States entered so far, in order. Returns a copy.
   */
  history(): PipelineState[] {
    return [...this.visited];
  }
}
