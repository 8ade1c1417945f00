/**
 * Debate Protocol Configuration
 *
 * Defines the three-round courtroom format, the word bands every argument
 * must land in, per-persona sampling temperatures, and the retry budgets the
 * orchestrator works with. Drives the state machine and agent prompts.
 */

import { config } from 'dotenv';
import { DebateStage, type AgentKind, type RoleAssignment, type StageMetadata } from '../types/debate.js';
import { getEnvBool, getEnvInt } from './env.js';

config();

/**
 * Stage configuration map
 */
export const STAGE_CONFIG: Record<DebateStage, StageMetadata | null> = {
  [DebateStage.INITIALIZING]: null,
  [DebateStage.COMPLETE]: null,
  [DebateStage.FAILED]: null,

  [DebateStage.ROUND_1_OPENING]: {
    stage: DebateStage.ROUND_1_OPENING,
    name: 'Opening',
    roundNumber: 1,
    description: 'Each lawyer presents an independent opening argument on the case.',
  },

  [DebateStage.ROUND_2_COUNTER]: {
    stage: DebateStage.ROUND_2_COUNTER,
    name: 'Counter-Argument',
    roundNumber: 2,
    description: "Each lawyer responds directly to the opponent's opening.",
  },

  [DebateStage.ROUND_3_REBUTTAL]: {
    stage: DebateStage.ROUND_3_REBUTTAL,
    name: 'Rebuttal',
    roundNumber: 3,
    description:
      "Each lawyer rebuts the opponent's counter-argument, building on their own previous round.",
  },

  [DebateStage.JUDGING]: {
    stage: DebateStage.JUDGING,
    name: 'Judging',
    roundNumber: null,
    description: 'The judge scores both sides against the rubric and names a winner.',
  },
};

/** Number of argument rounds in every debate */
export const ROUND_COUNT = 3;

/**
 * Word band for lawyer arguments (inclusive)
 */
export const ARGUMENT_WORD_LIMITS = { min: 250, max: 350 } as const;

/**
 * Soft target for judge reasoning (inclusive). Outside it is logged, never rejected.
 */
export const JUDGE_REASONING_WORD_TARGET = { min: 300, max: 400 } as const;

/** Shortest acceptable verdict reasoning, in characters */
export const MIN_REASONING_CHARS = 30;

/**
 * Sampling temperature per participant
 */
export const TEMPERATURES: Record<AgentKind | 'judge', number> = {
  emotional: 0.8,
  logical: 0.25,
  judge: 0,
};

/** Tokens budgeted per output word */
export const TOKENS_PER_WORD = 1.33;

/**
 * Token ceiling for a response of at most `words` words
 */
export function maxTokensFor(words: number): number {
  return Math.ceil(words * TOKENS_PER_WORD);
}

export const MAX_TOKENS_ARGUMENT = maxTokensFor(ARGUMENT_WORD_LIMITS.max);
export const MAX_TOKENS_VERDICT = maxTokensFor(JUDGE_REASONING_WORD_TARGET.max);

/** Attempts a lawyer makes to reach the minimum length before padding */
export const LENGTH_CORRECTION_ATTEMPTS = 2;

/**
 * Default side for each persona
 */
export const DEFAULT_ROLES: RoleAssignment = {
  emotional: 'prosecution',
  logical: 'defense',
};

/**
 * Reasoning placed on the verdict until the judge has ruled
 */
export const PENDING_REASONING =
  'Pending: the debate is still in progress. The verdict will be available once the judge has evaluated all three rounds.';

/**
 * Runtime settings for debate runs
 */
export interface DebateRunConfig {
  /** Attempts per agent or judge call */
  maxRetries: number;
  /** Linear backoff base; attempt n waits n * retryDelayMs */
  retryDelayMs: number;
  /** Run both lawyers of a round concurrently */
  parallelAgents: boolean;
  /** Debates executed at once by the service */
  maxConcurrentDebates: number;
  /** Use canned agents instead of the completion service */
  useMockAgents: boolean;
}

export const debateRunConfig: DebateRunConfig = {
  maxRetries: getEnvInt('DEBATE_MAX_RETRIES', 3),
  retryDelayMs: getEnvInt('DEBATE_RETRY_DELAY_MS', 1500),
  parallelAgents: getEnvBool('DEBATE_PARALLEL_AGENTS', true),
  maxConcurrentDebates: getEnvInt('DEBATE_MAX_CONCURRENT', 2),
  useMockAgents: getEnvBool('USE_MOCK_AGENTS', false),
};

/**
 * Whether a stage is terminal
 */
export function isTerminalStage(stage: DebateStage): boolean {
  return stage === DebateStage.COMPLETE || stage === DebateStage.FAILED;
}
