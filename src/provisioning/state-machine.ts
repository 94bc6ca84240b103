/**
 * State machine for a single provisioning call.
 * Tracks progress through the provisioning steps and rejects out-of-order moves.
 */

import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';

/**
 * Provisioning states.
 */
export const ProvisionState = {
  START: 'START',
  EPHEMERAL_CLEANED_UP: 'EPHEMERAL_CLEANED_UP',
  SHARED_CONFIG_READY: 'SHARED_CONFIG_READY',
  PER_SERVER_CONFIG_READY: 'PER_SERVER_CONFIG_READY',
  STORAGE_READY: 'STORAGE_READY',
  EPHEMERAL_SET_CREATED: 'EPHEMERAL_SET_CREATED',
  DONE: 'DONE',
  /** Stale cleanup failed; nothing was created, nothing to undo */
  FAILED: 'FAILED',
  ROLLED_BACK: 'ROLLED_BACK',
} as const;

export type ProvisionState = (typeof ProvisionState)[keyof typeof ProvisionState];

/**
 * Events that drive provisioning transitions.
 */
export const ProvisionEvent = {
  EPHEMERAL_CLEANED: 'EPHEMERAL_CLEANED',
  SHARED_CONFIG_ENSURED: 'SHARED_CONFIG_ENSURED',
  SERVER_CONFIG_CREATED: 'SERVER_CONFIG_CREATED',
  STORAGE_ENSURED: 'STORAGE_ENSURED',
  WORKLOAD_CREATED: 'WORKLOAD_CREATED',
  COMPLETED: 'COMPLETED',
  STEP_FAILED: 'STEP_FAILED',
} as const;

export type ProvisionEvent = (typeof ProvisionEvent)[keyof typeof ProvisionEvent];

/**
 * State transition table.
 * Maps (current state, event) -> next state
 */
const transitions: Record<ProvisionState, Partial<Record<ProvisionEvent, ProvisionState>>> = {
  [ProvisionState.START]: {
    [ProvisionEvent.EPHEMERAL_CLEANED]: ProvisionState.EPHEMERAL_CLEANED_UP,
    [ProvisionEvent.STEP_FAILED]: ProvisionState.FAILED,
  },
  [ProvisionState.EPHEMERAL_CLEANED_UP]: {
    [ProvisionEvent.SHARED_CONFIG_ENSURED]: ProvisionState.SHARED_CONFIG_READY,
    [ProvisionEvent.STEP_FAILED]: ProvisionState.ROLLED_BACK,
  },
  [ProvisionState.SHARED_CONFIG_READY]: {
    [ProvisionEvent.SERVER_CONFIG_CREATED]: ProvisionState.PER_SERVER_CONFIG_READY,
    [ProvisionEvent.STEP_FAILED]: ProvisionState.ROLLED_BACK,
  },
  [ProvisionState.PER_SERVER_CONFIG_READY]: {
    [ProvisionEvent.STORAGE_ENSURED]: ProvisionState.STORAGE_READY,
    [ProvisionEvent.STEP_FAILED]: ProvisionState.ROLLED_BACK,
  },
  [ProvisionState.STORAGE_READY]: {
    [ProvisionEvent.WORKLOAD_CREATED]: ProvisionState.EPHEMERAL_SET_CREATED,
    [ProvisionEvent.STEP_FAILED]: ProvisionState.ROLLED_BACK,
  },
  [ProvisionState.EPHEMERAL_SET_CREATED]: {
    [ProvisionEvent.COMPLETED]: ProvisionState.DONE,
    [ProvisionEvent.STEP_FAILED]: ProvisionState.ROLLED_BACK,
  },
  // Terminal states - no transitions out
  [ProvisionState.DONE]: {},
  [ProvisionState.FAILED]: {},
  [ProvisionState.ROLLED_BACK]: {},
};

/**
 * Error thrown when an invalid state transition is attempted.
 */
export class InvalidTransitionError extends Error {
  override readonly name = 'InvalidTransitionError';

  constructor(
    public readonly fromState: ProvisionState,
    public readonly event: ProvisionEvent
  ) {
    super(`Invalid transition: cannot apply '${event}' in state '${fromState}'`);
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

/**
 * Check if a state is terminal (no more transitions possible).
 */
export function isTerminalState(state: ProvisionState): boolean {
  return (
    state === ProvisionState.DONE ||
    state === ProvisionState.FAILED ||
    state === ProvisionState.ROLLED_BACK
  );
}

/**
 * Get the next state for a given transition.
 * Returns null if the transition is invalid.
 */
export function getNextState(
  currentState: ProvisionState,
  event: ProvisionEvent
): ProvisionState | null {
  return transitions[currentState][event] ?? null;
}

/**
 * Recorded transition.
 */
export interface ProvisionTransition {
  from: ProvisionState;
  event: ProvisionEvent;
  to: ProvisionState;
  at: string;
}

/**
 * Tracks the state of one provision call.
 */
export class ProvisioningStateMachine {
  private readonly logger: Logger;
  private _state: ProvisionState = ProvisionState.START;
  private readonly _history: ProvisionTransition[] = [];

  constructor(private readonly serverName: string) {
    this.logger = createLogger(`provision:${serverName}`);
  }

  get state(): ProvisionState {
    return this._state;
  }

  get history(): readonly ProvisionTransition[] {
    return this._history;
  }

  /**
   * Whether a failure in the current state calls for compensation.
   */
  get requiresCompensation(): boolean {
    return getNextState(this._state, ProvisionEvent.STEP_FAILED) === ProvisionState.ROLLED_BACK;
  }

  /**
   * Apply an event, throwing InvalidTransitionError if it is not allowed.
   */
  apply(event: ProvisionEvent): ProvisionState {
    const next = getNextState(this._state, event);

    if (next === null) {
      this.logger.error({ server: this.serverName, state: this._state, event }, 'Invalid transition');
      throw new InvalidTransitionError(this._state, event);
    }

    this._history.push({
      from: this._state,
      event,
      to: next,
      at: new Date().toISOString(),
    });

    this.logger.debug({ from: this._state, event, to: next }, 'State transition');
    this._state = next;
    return next;
  }
}
