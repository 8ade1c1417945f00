/**
 * Debate Type Definitions
 *
 * Domain model for a courtroom debate: the case under dispute, the
 * arguments each lawyer produces per round, the judge's verdict, and the
 * transcript that ties them together.
 */

/**
 * Debate stage enum
 * Represents every state the orchestrator can be in, including the
 * terminal COMPLETE and FAILED states
 */
export enum DebateStage {
  /** Transcript created, no round started yet */
  INITIALIZING = 'INITIALIZING',

  /** Round 1: both lawyers open */
  ROUND_1_OPENING = 'ROUND_1_OPENING',

  /** Round 2: each lawyer counters the opponent's opening */
  ROUND_2_COUNTER = 'ROUND_2_COUNTER',

  /** Round 3: each lawyer rebuts the opponent's counter */
  ROUND_3_REBUTTAL = 'ROUND_3_REBUTTAL',

  /** Judge evaluates all six arguments */
  JUDGING = 'JUDGING',

  /** Terminal state: verdict rendered */
  COMPLETE = 'COMPLETE',

  /** Terminal state: a stage exhausted its retry budget */
  FAILED = 'FAILED',
}

/**
 * The two lawyer personas
 */
export const AGENT_KINDS = ['emotional', 'logical'] as const;

export type AgentKind = (typeof AGENT_KINDS)[number];

/**
 * Courtroom side a lawyer argues for
 */
export type Role = 'prosecution' | 'defense';

export const WINNERS = ['emotional', 'logical', 'tie'] as const;

export type Winner = (typeof WINNERS)[number];

export type DebateStatus = 'in_progress' | 'complete' | 'failed';

export type RoundNumber = 1 | 2 | 3;

/**
 * The dispute being argued. Immutable once created.
 */
export interface Case {
  title: string;
  description: string;
}

/**
 * A stored case with its identifier
 */
export interface CaseRecord extends Case {
  id: string;
  createdAt: string;
}

/**
 * One lawyer's contribution to one round
 */
export interface Argument {
  agentKind: AgentKind;
  roundNumber: RoundNumber;
  content: string;
  /** Whitespace-token count of content */
  wordCount: number;
}

/**
 * Rubric sub-scores, each in [0, 20]
 */
export interface CriteriaScores {
  relevance: number;
  coherence: number;
  evidence: number;
  persuasiveness: number;
  rebuttal: number;
}

export const CRITERIA_KEYS: readonly (keyof CriteriaScores)[] = [
  'relevance',
  'coherence',
  'evidence',
  'persuasiveness',
  'rebuttal',
];

/**
 * Judge's structured decision
 */
export interface Verdict {
  /** Integer in [0, 100] */
  emotionalScore: number;
  /** Integer in [0, 100] */
  logicalScore: number;
  winner: Winner;
  reasoning: string;
  criteriaScores: CriteriaScores;
}

/**
 * Which side each persona argues for in a given debate
 */
export type RoleAssignment = Record<AgentKind, Role>;

/**
 * A round holds at most one argument per agent kind.
 * Rounds are partially filled only while running or after a failure.
 */
export type Round = Argument[];

/**
 * Complete record of a debate run
 */
export interface DebateTranscript {
  id: string;
  caseId: string;
  case: Case;
  rounds: [Round, Round, Round];
  verdict: Verdict;
  status: DebateStatus;
  roles: RoleAssignment;
  /** ISO-8601 creation time */
  timestamp: string;
  /** ISO-8601 time the run reached a terminal status */
  completedAt?: string;
  /** Failure message when status is failed */
  error?: string;
  /** True when the verdict came from heuristic extraction */
  verdictDegraded?: boolean;
}

/**
 * Compact listing entry
 */
export interface DebateSummary {
  id: string;
  caseId: string;
  title: string;
  status: DebateStatus;
  winner: Winner | null;
  timestamp: string;
}

/**
 * Aggregate win counts across completed debates
 */
export interface DebateStatistics {
  emotionalWins: number;
  logicalWins: number;
  totalDebates: number;
}

/**
 * Stage transition event emitted by the state machine
 */
export interface StageTransitionEvent {
  debateId: string;
  fromStage: DebateStage;
  toStage: DebateStage;
  timestamp: Date;
  stageElapsedMs: number;
  totalElapsedMs: number;
}

/**
 * Stage metadata used by the protocol configuration
 */
export interface StageMetadata {
  stage: DebateStage;
  name: string;
  roundNumber: RoundNumber | null;
  description: string;
}
