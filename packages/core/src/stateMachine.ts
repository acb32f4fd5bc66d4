/**
 * Track State Machine
 *
 * Lifecycle of a single track materialization.
 *
 * State Flow:
 * queued → fetching → writing → tagging → done
 *    ↘ skipped        ↘ failed (from any non-terminal state)
 *
 * Invalid transitions throw StateTransitionError.
 */

import { StateTransitionError } from './errors/index.js';

export type TrackState =
  | 'queued'
  | 'fetching'
  | 'writing'
  | 'tagging'
  | 'done'
  | 'skipped'
  | 'failed';

export interface TrackStateTransition {
  from: TrackState;
  to: TrackState;
  timestamp: Date;
  reason?: string;
}

const validTransitions: Record<TrackState, ReadonlySet<TrackState>> = {
  queued: new Set<TrackState>(['fetching', 'skipped', 'failed']),
  fetching: new Set<TrackState>(['writing', 'failed']),
  writing: new Set<TrackState>(['tagging', 'failed']),
  tagging: new Set<TrackState>(['done', 'failed']),
  done: new Set<TrackState>(),
  skipped: new Set<TrackState>(),
  failed: new Set<TrackState>(),
};

export class TrackStateMachine {
  private currentState: TrackState = 'queued';
  private readonly history: TrackStateTransition[] = [];

  constructor(private readonly trackId: string) {}

  getState(): TrackState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<TrackStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: TrackState): boolean {
    return validTransitions[this.currentState].has(targetState);
  }

  /**
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: TrackState, reason?: string): TrackStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.trackId, this.currentState, targetState);
    }

    const transition: TrackStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return validTransitions[this.currentState].size === 0;
  }

  fail(reason: string): TrackStateTransition {
    return this.transitionTo('failed', reason);
  }
}
