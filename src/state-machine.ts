import { Logger } from './logger.js';

export enum SessionState {
  IDLE = 'IDLE',
  CONNECTING = 'CONNECTING',
  DISCOVERING = 'DISCOVERING',
  MONITORING = 'MONITORING',
  DISCONNECTED = 'DISCONNECTED',
  FAILED = 'FAILED'
}

interface StateTransition {
  from: SessionState;
  to: SessionState;
}

const VALID_TRANSITIONS: readonly StateTransition[] = [
  { from: SessionState.IDLE, to: SessionState.CONNECTING },
  { from: SessionState.DISCONNECTED, to: SessionState.CONNECTING },
  { from: SessionState.FAILED, to: SessionState.CONNECTING },
  { from: SessionState.CONNECTING, to: SessionState.DISCOVERING },
  { from: SessionState.CONNECTING, to: SessionState.FAILED },
  { from: SessionState.CONNECTING, to: SessionState.DISCONNECTED },
  { from: SessionState.DISCOVERING, to: SessionState.MONITORING },
  { from: SessionState.DISCOVERING, to: SessionState.FAILED },
  { from: SessionState.DISCOVERING, to: SessionState.DISCONNECTED },
  { from: SessionState.MONITORING, to: SessionState.DISCONNECTED }
];

export type StateListener = (from: SessionState, to: SessionState, context?: string) => void;

export class StateMachine {
  private currentState: SessionState = SessionState.IDLE;
  private logger: Logger;

  constructor(name = 'StateMachine', private readonly onTransition?: StateListener) {
    this.logger = new Logger(name);
  }

  getState(): SessionState {
    return this.currentState;
  }

  is(...states: SessionState[]): boolean {
    return states.includes(this.currentState);
  }

  canTransition(to: SessionState): boolean {
    return VALID_TRANSITIONS.some(t => t.from === this.currentState && t.to === to);
  }

  transition(to: SessionState, context?: string): void {
    const from = this.currentState;

    if (!this.canTransition(to)) {
      const error = `Invalid state transition: ${from} -> ${to}`;
      this.logger.error(error);
      throw new Error(error);
    }

    this.currentState = to;
    this.logger.info(`State transition: ${from} -> ${to}${context ? ` (${context})` : ''}`);
    this.onTransition?.(from, to, context);
  }
}
