import { logger } from '../observability/logger';

/** Lifecycle of a single chat() turn */
export type TurnState = 'AWAITING_USER_INPUT' | 'MODEL_CALL' | 'TOOL_DISPATCH' | 'RESPONSE_READY';

/**
 * Allowed transitions. A turn aborted by an infrastructural failure returns
 * to AWAITING_USER_INPUT from wherever it was.
 */
export const TURN_TRANSITIONS: Readonly<Record<TurnState, readonly TurnState[]>> = {
  AWAITING_USER_INPUT: ['MODEL_CALL'],
  MODEL_CALL: ['TOOL_DISPATCH', 'RESPONSE_READY', 'AWAITING_USER_INPUT'],
  TOOL_DISPATCH: ['MODEL_CALL', 'RESPONSE_READY', 'AWAITING_USER_INPUT'],
  RESPONSE_READY: ['AWAITING_USER_INPUT'],
};

export interface TurnTransitionEvent {
  requestId: string;
  from: TurnState;
  to: TurnState;
  reason: string;
  timestamp: number;
}

export class TurnStateMachine {
  private current: TurnState = 'AWAITING_USER_INPUT';

  get state(): TurnState {
    return this.current;
  }

  get isIdle(): boolean {
    return this.current === 'AWAITING_USER_INPUT';
  }

  /**
   * Move to `target`. The agent loop never requests an illegal transition,
   * so one is treated as a bug and thrown.
   */
  transition(target: TurnState, reason: string, requestId: string): TurnTransitionEvent {
    const allowed = TURN_TRANSITIONS[this.current];
    if (!allowed.includes(target)) {
      throw new Error(`Invalid turn state transition ${this.current} -> ${target} (${reason})`);
    }

    const event: TurnTransitionEvent = {
      requestId,
      from: this.current,
      to: target,
      reason,
      timestamp: Date.now(),
    };

    this.current = target;
    logger.debug(event, 'Turn state transition');
    return event;
  }
}
