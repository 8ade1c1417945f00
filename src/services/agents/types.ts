/**
 * Agent Interface Definitions
 *
 * Contracts the orchestrator relies on. Lawyers produce normalized argument
 * text for each round; the judge produces a tagged verdict extraction.
 */

import type { AgentKind, Argument, Case, Role } from '../../types/debate.js';
import type { VerdictExtraction } from '../debate/verdict-extractor.js';

/**
 * Agent metadata for logging and inspection
 */
export interface AgentMetadata {
  name: string;
  model: string;
  temperature: number;
  kind?: AgentKind;
  role?: Role;
}

/**
 * A lawyer persona arguing one side of the case
 */
export interface LawyerAgent {
  readonly kind: AgentKind;
  readonly role: Role;

  /**
   * Round 1: independent opening argument
   */
  generateOpening(debateCase: Case): Promise<string>;

  /**
   * Round 2: respond to the opponent's opening
   */
  generateCounter(debateCase: Case, opponentRound1: string): Promise<string>;

  /**
   * Round 3: rebut the opponent's counter while staying consistent with
   * this lawyer's own round-2 argument
   */
  generateRebuttal(debateCase: Case, opponentRound2: string, ownRound2: string): Promise<string>;

  getMetadata(): AgentMetadata;
}

/**
 * Raw judge output alongside its extraction
 */
export interface JudgeEvaluation {
  raw: string;
  extraction: VerdictExtraction;
}

/**
 * The impartial evaluator
 */
export interface JudgeAgent {
  /**
   * Score all six arguments, given in fixed order E1, L1, E2, L2, E3, L3
   */
  evaluate(debateCase: Case, args: Argument[]): Promise<JudgeEvaluation>;

  /**
   * Ask for `raw` to be restated as strict JSON
   */
  repair(raw: string): Promise<JudgeEvaluation>;

  getMetadata(): AgentMetadata;
}

/**
 * Everything one debate run needs
 */
export interface DebateAgents {
  emotional: LawyerAgent;
  logical: LawyerAgent;
  judge: JudgeAgent;
}
