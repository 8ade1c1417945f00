/**
 * Debate Orchestrator
 *
 * Drives one debate through its three rounds and the judging step.
 *
 * Responsibilities:
 * - Run both lawyers per round (concurrently by default) with a hard barrier
 *   between rounds
 * - Feed each round the right context: opponent's opening in round 2,
 *   opponent's counter plus own counter in round 3
 * - Retry every agent and judge call with linear backoff
 * - Escalate a heuristically extracted verdict to a one-shot repair
 * - Contain failures: the returned transcript is marked failed with partial
 *   rounds preserved; run() never rejects
 */

import pino from 'pino';
import {
  DebateStage,
  type AgentKind,
  type DebateTranscript,
  type RoundNumber,
  type StageTransitionEvent,
  type Verdict,
} from '../../types/debate.js';
import type { DebateAgents, JudgeEvaluation } from '../agents/types.js';
import { DebateStateMachine } from './state-machine.js';
import {
  cloneTranscript,
  createArgument,
  flattenArguments,
  getArgument,
  markTranscriptFailed,
  setArgument,
} from './transcript.js';
import { ARGUMENT_WORD_LIMITS, debateRunConfig } from '../../config/debate-protocol.js';
import { withRetry } from '../../utils/retry.js';
import { loggers } from '../logging/log-helpers.js';
import type { VerdictExtraction } from './verdict-extractor.js';

/**
 * Logger instance
 */
const logger = pino({
  name: 'debate-orchestrator',
  level: process.env.LOG_LEVEL || 'info',
});

export interface OrchestratorConfig {
  /** Attempts per agent or judge call */
  maxRetries: number;
  /** Linear backoff base in milliseconds */
  retryDelayMs: number;
  /** Run both lawyers of a round concurrently */
  parallelAgents: boolean;
  wordLimits: { min: number; max: number };
}

/**
 * Callbacks for observing a run. Errors thrown here are logged and ignored.
 */
export interface OrchestratorHooks {
  /** Receives a copy of the transcript after every round and at the end */
  onProgress?: (transcript: DebateTranscript) => Promise<void> | void;
  onStageChange?: (event: StageTransitionEvent) => void;
}

/**
 * Default orchestrator configuration
 */
const DEFAULT_CONFIG: OrchestratorConfig = {
  maxRetries: debateRunConfig.maxRetries,
  retryDelayMs: debateRunConfig.retryDelayMs,
  parallelAgents: debateRunConfig.parallelAgents,
  wordLimits: { ...ARGUMENT_WORD_LIMITS },
};

type RoundCalls = Record<AgentKind, () => Promise<string>>;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Debate Orchestrator Class
 */
export class DebateOrchestrator {
  private readonly agents: DebateAgents;
  private readonly config: OrchestratorConfig;
  private readonly hooks: OrchestratorHooks;

  constructor(agents: DebateAgents, config?: Partial<OrchestratorConfig>, hooks: OrchestratorHooks = {}) {
    this.agents = agents;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.hooks = hooks;
  }

  /**
   * Execute the debate described by `initial`. Resolves with the final
   * transcript, status complete or failed.
   */
  async run(initial: DebateTranscript): Promise<DebateTranscript> {
    const transcript = cloneTranscript(initial);
    const debateCase = transcript.case;
    const stateMachine = new DebateStateMachine(transcript.id);

    stateMachine.on('stage_transition', (event: StageTransitionEvent) => {
      loggers.stateTransition(event.debateId, event.fromStage, event.toStage, event.stageElapsedMs);
      this.reportStageChange(event);
    });

    loggers.debateLifecycle(transcript.id, 'started', { title: debateCase.title, roles: transcript.roles });

    try {
      stateMachine.transition(DebateStage.ROUND_1_OPENING);
      await this.runRound(transcript, 1, {
        emotional: () => this.agents.emotional.generateOpening(debateCase),
        logical: () => this.agents.logical.generateOpening(debateCase),
      });
      await this.reportProgress(transcript);

      stateMachine.transition(DebateStage.ROUND_2_COUNTER);
      const emotionalOpening = this.requireContent(transcript, 1, 'emotional');
      const logicalOpening = this.requireContent(transcript, 1, 'logical');
      await this.runRound(transcript, 2, {
        emotional: () => this.agents.emotional.generateCounter(debateCase, logicalOpening),
        logical: () => this.agents.logical.generateCounter(debateCase, emotionalOpening),
      });
      await this.reportProgress(transcript);

      stateMachine.transition(DebateStage.ROUND_3_REBUTTAL);
      const emotionalCounter = this.requireContent(transcript, 2, 'emotional');
      const logicalCounter = this.requireContent(transcript, 2, 'logical');
      await this.runRound(transcript, 3, {
        emotional: () => this.agents.emotional.generateRebuttal(debateCase, logicalCounter, emotionalCounter),
        logical: () => this.agents.logical.generateRebuttal(debateCase, emotionalCounter, logicalCounter),
      });
      await this.reportProgress(transcript);

      stateMachine.transition(DebateStage.JUDGING);
      transcript.verdict = await this.judge(transcript);

      stateMachine.transition(DebateStage.COMPLETE);
      transcript.status = 'complete';
      transcript.completedAt = new Date().toISOString();

      loggers.debateLifecycle(transcript.id, 'completed', {
        winner: transcript.verdict.winner,
        emotionalScore: transcript.verdict.emotionalScore,
        logicalScore: transcript.verdict.logicalScore,
      });
    } catch (error) {
      const message = errorMessage(error);
      if (!stateMachine.isTerminal()) {
        stateMachine.fail(message);
      }
      markTranscriptFailed(transcript, message);
      loggers.debateLifecycle(transcript.id, 'failed', { error: message });
    }

    await this.reportProgress(transcript);
    return transcript;
  }

  /**
   * Run both lawyers for one round. Successful arguments are recorded even
   * when the other call fails; the first failure is then rethrown.
   */
  private async runRound(transcript: DebateTranscript, round: RoundNumber, calls: RoundCalls): Promise<void> {
    if (this.config.parallelAgents) {
      const results = await Promise.allSettled([
        this.callLawyer(transcript, round, 'emotional', calls.emotional),
        this.callLawyer(transcript, round, 'logical', calls.logical),
      ]);

      const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
      if (failure) {
        throw failure.reason;
      }
      return;
    }

    await this.callLawyer(transcript, round, 'emotional', calls.emotional);
    await this.callLawyer(transcript, round, 'logical', calls.logical);
  }

  /**
   * One lawyer call with retry; records the argument on success
   */
  private async callLawyer(
    transcript: DebateTranscript,
    round: RoundNumber,
    kind: AgentKind,
    call: () => Promise<string>
  ): Promise<void> {
    const startTime = Date.now();

    try {
      const argument = await withRetry(
        async () => createArgument(kind, round, await call(), this.config.wordLimits),
        this.config.maxRetries,
        `${kind} lawyer round ${round}`,
        {
          baseDelayMs: this.config.retryDelayMs,
          logger: logger.child({ debateId: transcript.id }),
        }
      );

      setArgument(transcript, argument);
      loggers.agentCall({
        debateId: transcript.id,
        agent: kind,
        round,
        latency_ms: Date.now() - startTime,
        wordCount: argument.wordCount,
        success: true,
      });
    } catch (error) {
      loggers.agentCall({
        debateId: transcript.id,
        agent: kind,
        round,
        latency_ms: Date.now() - startTime,
        success: false,
        error: errorMessage(error),
      });
      throw new Error(`${kind} lawyer failed in round ${round}: ${errorMessage(error)}`);
    }
  }

  /**
   * Judge the six arguments; repair once if only a heuristic read was possible
   */
  private async judge(transcript: DebateTranscript): Promise<Verdict> {
    const startTime = Date.now();
    const args = flattenArguments(transcript);
    const childLogger = logger.child({ debateId: transcript.id });

    let evaluation: JudgeEvaluation;
    try {
      evaluation = await withRetry(
        () => this.agents.judge.evaluate(transcript.case, args),
        this.config.maxRetries,
        'judge evaluation',
        { baseDelayMs: this.config.retryDelayMs, logger: childLogger }
      );
    } catch (error) {
      loggers.agentCall({
        debateId: transcript.id,
        agent: 'judge',
        round: 'verdict',
        latency_ms: Date.now() - startTime,
        success: false,
        error: errorMessage(error),
      });
      throw new Error(`Judge failed: ${errorMessage(error)}`);
    }

    let extraction: VerdictExtraction = evaluation.extraction;
    let source: 'parsed' | 'heuristic' | 'repaired' = extraction.kind;

    if (extraction.kind === 'heuristic') {
      const repaired = await this.repairVerdict(evaluation.raw, transcript.id);
      if (repaired) {
        extraction = repaired;
        source = 'repaired';
      }
    }

    loggers.agentCall({
      debateId: transcript.id,
      agent: 'judge',
      round: 'verdict',
      latency_ms: Date.now() - startTime,
      success: true,
    });
    loggers.verdictExtraction(transcript.id, source, extraction.issues);
    transcript.verdictDegraded = extraction.kind === 'heuristic';

    return extraction.verdict;
  }

  /**
   * One repair attempt. Returns the repaired extraction only when it parsed
   * cleanly with integer scores.
   */
  private async repairVerdict(raw: string, debateId: string): Promise<VerdictExtraction | null> {
    try {
      const repaired = await this.agents.judge.repair(raw);
      if (repaired.extraction.kind === 'parsed' && repaired.extraction.scoresWereIntegers) {
        return repaired.extraction;
      }
      logger.warn({ debateId, kind: repaired.extraction.kind }, 'Verdict repair did not produce a usable verdict');
    } catch (error) {
      logger.warn({ debateId, error: errorMessage(error) }, 'Verdict repair call failed; keeping heuristic verdict');
    }
    return null;
  }

  private requireContent(transcript: DebateTranscript, round: RoundNumber, kind: AgentKind): string {
    const argument = getArgument(transcript, round, kind);
    if (!argument) {
      throw new Error(`Missing ${kind} argument for round ${round}`);
    }
    return argument.content;
  }

  private reportStageChange(event: StageTransitionEvent): void {
    if (!this.hooks.onStageChange) {
      return;
    }
    try {
      this.hooks.onStageChange(event);
    } catch (error) {
      logger.error({ debateId: event.debateId, stage: event.toStage, error: errorMessage(error) }, 'Stage hook failed');
    }
  }

  private async reportProgress(transcript: DebateTranscript): Promise<void> {
    if (!this.hooks.onProgress) {
      return;
    }
    try {
      await this.hooks.onProgress(cloneTranscript(transcript));
    } catch (error) {
      logger.error({ debateId: transcript.id, error: errorMessage(error) }, 'Progress hook failed');
    }
  }
}
