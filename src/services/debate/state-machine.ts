/**
 * Debate State Machine
 *
 * Tracks the stage of one debate run and enforces the transition rules:
 * INITIALIZING -> ROUND_1_OPENING -> ROUND_2_COUNTER -> ROUND_3_REBUTTAL
 * -> JUDGING -> COMPLETE, with FAILED reachable from every non-terminal
 * stage. Emits events so callers can observe progress.
 */

import { EventEmitter } from 'events';
import pino from 'pino';
import { DebateStage, type StageTransitionEvent } from '../../types/debate.js';
import { isTerminalStage } from '../../config/debate-protocol.js';

/**
 * Logger instance for state machine operations
 */
const logger = pino({
  name: 'debate-state-machine',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Transition map defining valid state transitions
 * Key: from stage, Value: allowed destination stages
 */
const TRANSITIONS: Map<DebateStage, DebateStage[]> = new Map([
  [DebateStage.INITIALIZING, [DebateStage.ROUND_1_OPENING, DebateStage.FAILED]],
  [DebateStage.ROUND_1_OPENING, [DebateStage.ROUND_2_COUNTER, DebateStage.FAILED]],
  [DebateStage.ROUND_2_COUNTER, [DebateStage.ROUND_3_REBUTTAL, DebateStage.FAILED]],
  [DebateStage.ROUND_3_REBUTTAL, [DebateStage.JUDGING, DebateStage.FAILED]],
  [DebateStage.JUDGING, [DebateStage.COMPLETE, DebateStage.FAILED]],

  // Terminal states
  [DebateStage.COMPLETE, []],
  [DebateStage.FAILED, []],
]);

/**
 * Thrown when a caller asks for a transition the map does not allow
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly fromStage: DebateStage,
    public readonly toStage: DebateStage
  ) {
    super(`Invalid transition from ${fromStage} to ${toStage}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Emits 'stage_transition' (StageTransitionEvent), 'completed'
 * (debateId, totalElapsedMs) and 'failed' (debateId, reason)
 */
export class DebateStateMachine extends EventEmitter {
  private readonly debateId: string;
  private stage: DebateStage = DebateStage.INITIALIZING;
  private stageStartTime: Date = new Date();
  private totalElapsedMs = 0;
  private failureReason: string | null = null;

  constructor(debateId: string) {
    super();
    this.debateId = debateId;
    logger.debug({ debateId }, 'State machine created');
  }

  getStage(): DebateStage {
    return this.stage;
  }

  getFailureReason(): string | null {
    return this.failureReason;
  }

  isTerminal(): boolean {
    return isTerminalStage(this.stage);
  }

  /**
   * Move to `toStage`. Throws InvalidTransitionError when not allowed.
   */
  transition(toStage: DebateStage): StageTransitionEvent {
    const fromStage = this.stage;

    if (!this.isValidTransition(fromStage, toStage)) {
      logger.error({ debateId: this.debateId, fromStage, toStage }, 'Rejected stage transition');
      throw new InvalidTransitionError(fromStage, toStage);
    }

    const now = new Date();
    const stageElapsedMs = now.getTime() - this.stageStartTime.getTime();

    this.stage = toStage;
    this.stageStartTime = now;
    this.totalElapsedMs += stageElapsedMs;

    const event: StageTransitionEvent = {
      debateId: this.debateId,
      fromStage,
      toStage,
      timestamp: now,
      stageElapsedMs,
      totalElapsedMs: this.totalElapsedMs,
    };

    this.emit('stage_transition', event);

    if (toStage === DebateStage.COMPLETE) {
      this.emit('completed', this.debateId, this.totalElapsedMs);
    }

    return event;
  }

  /**
   * Move to FAILED from any non-terminal stage
   */
  fail(reason: string): StageTransitionEvent {
    const event = this.transition(DebateStage.FAILED);
    this.failureReason = reason;
    this.emit('failed', this.debateId, reason);
    return event;
  }

  /**
   * Check if a transition is valid
   */
  isValidTransition(fromStage: DebateStage, toStage: DebateStage): boolean {
    const allowedTransitions = TRANSITIONS.get(fromStage);
    if (!allowedTransitions) {
      return false;
    }
    return allowedTransitions.includes(toStage);
  }
}
