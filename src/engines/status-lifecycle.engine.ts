import StateMachine from 'javascript-state-machine';
import type { NodeStatus } from '../interfaces/telemetry-event.interface';
import type { RunStatus } from '../interfaces/run.interface';

export interface LifecycleTransition<TName extends string, TState extends string> {
  name: TName;
  from: TState | TState[];
  to: TState;
}

export interface LifecycleDefinition<TName extends string, TState extends string> {
  id: string;
  initial: TState;
  states: readonly TState[];
  final: readonly TState[];
  transitions: LifecycleTransition<TName, TState>[];
}

export type NodeLifecycleTransition = 'start' | 'succeed' | 'fail';

export type RunLifecycleTransition =
  | 'start'
  | 'pause'
  | 'resume'
  | 'complete'
  | 'fail'
  | 'expire'
  | 'cancel';

export const NODE_LIFECYCLE: LifecycleDefinition<
  NodeLifecycleTransition,
  NodeStatus
> = {
  id: 'node',
  initial: 'pending',
  states: ['pending', 'running', 'success', 'failed'],
  final: ['success', 'failed'],
  transitions: [
    { name: 'start', from: 'pending', to: 'running' },
    { name: 'succeed', from: ['pending', 'running'], to: 'success' },
    { name: 'fail', from: ['pending', 'running'], to: 'failed' },
  ],
};

export const RUN_LIFECYCLE: LifecycleDefinition<
  RunLifecycleTransition,
  RunStatus
> = {
  id: 'run',
  initial: 'pending',
  states: [
    'pending',
    'running',
    'paused',
    'completed',
    'failed',
    'timeout',
    'cancelled',
  ],
  final: ['completed', 'failed', 'timeout', 'cancelled'],
  transitions: [
    { name: 'start', from: 'pending', to: 'running' },
    { name: 'pause', from: 'running', to: 'paused' },
    { name: 'resume', from: 'paused', to: 'running' },
    { name: 'complete', from: ['running', 'paused'], to: 'completed' },
    { name: 'fail', from: ['pending', 'running', 'paused'], to: 'failed' },
    { name: 'expire', from: ['pending', 'running', 'paused'], to: 'timeout' },
    { name: 'cancel', from: ['pending', 'running', 'paused'], to: 'cancelled' },
  ],
};

export interface LifecycleStep<TState extends string> {
  from: TState;
  to: TState;
}

/**
 * Status holder whose moves are restricted to a lifecycle definition.
 * Terminal states have no outgoing transitions, so they can never be left.
 */
export class StatusLifecycle<TName extends string, TState extends string> {
  private readonly fsm: StateMachine;
  private readonly history: TState[];

  constructor(
    private readonly definition: LifecycleDefinition<TName, TState>,
    initial?: TState,
  ) {
    const seed = initial ?? definition.initial;
    this.history = [seed];
    this.fsm = new StateMachine({
      init: seed,
      transitions: definition.transitions,
    });

    this.fsm.observe('onAfterTransition', (lifecycle) => {
      const next = this.toState(lifecycle.to);
      if (next && lifecycle.from !== lifecycle.to) {
        this.history.push(next);
      }
    });
  }

  get status(): TState {
    const current = this.toState(this.fsm.state);
    if (!current) {
      throw new Error(
        `Lifecycle ${this.definition.id} reached undeclared state "${this.fsm.state}"`,
      );
    }
    return current;
  }

  /** Every status held so far, oldest first. */
  get statusHistory(): TState[] {
    return [...this.history];
  }

  isFinal(): boolean {
    return this.definition.final.includes(this.status);
  }

  can(transition: TName): boolean {
    return this.fsm.can(transition);
  }

  /**
   * Apply a transition. Returns null, leaving the status untouched, when the
   * transition is not allowed from the current status.
   */
  fire(transition: TName): LifecycleStep<TState> | null {
    if (!this.fsm.can(transition)) {
      return null;
    }

    const from = this.status;
    const transitionFn = this.fsm[transition];
    if (typeof transitionFn !== 'function') {
      throw new Error(
        `Lifecycle ${this.definition.id} has no transition ${transition} on its runtime machine`,
      );
    }
    transitionFn.call(this.fsm);

    return { from, to: this.status };
  }

  private toState(value: string): TState | undefined {
    return this.definition.states.find((state) => state === value);
  }
}

export function createNodeLifecycle(
  initial?: NodeStatus,
): StatusLifecycle<NodeLifecycleTransition, NodeStatus> {
  return new StatusLifecycle(NODE_LIFECYCLE, initial);
}

export function createRunLifecycle(
  initial?: RunStatus,
): StatusLifecycle<RunLifecycleTransition, RunStatus> {
  return new StatusLifecycle(RUN_LIFECYCLE, initial);
}
