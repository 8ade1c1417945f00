/**
 * Transcript helpers
 *
 * Construction of arguments, placeholder verdicts and fresh transcripts,
 * plus the read-side views (flattened argument order, listing summary).
 */

import type {
  AgentKind,
  Argument,
  Case,
  DebateSummary,
  DebateTranscript,
  RoleAssignment,
  RoundNumber,
  Verdict,
} from '../../types/debate.js';
import { AGENT_KINDS } from '../../types/debate.js';
import { ArgumentValidationError } from '../../types/errors.js';
import { ARGUMENT_WORD_LIMITS, PENDING_REASONING } from '../../config/debate-protocol.js';
import { countWords } from './response-normalizer.js';

/**
 * Prefix of the reasoning placed on the verdict of a failed run
 */
export const FAILURE_REASONING_PREFIX = 'Debate generation failed: ';

/**
 * Build an Argument, recomputing its word count.
 * Throws ArgumentValidationError outside the band.
 */
export function createArgument(
  agentKind: AgentKind,
  roundNumber: RoundNumber,
  content: string,
  limits: { min: number; max: number } = ARGUMENT_WORD_LIMITS
): Argument {
  const wordCount = countWords(content);
  if (wordCount < limits.min || wordCount > limits.max) {
    throw new ArgumentValidationError(
      `${agentKind} round ${roundNumber} argument has ${wordCount} words, expected ${limits.min}-${limits.max}`,
      wordCount,
      limits.min,
      limits.max
    );
  }
  return { agentKind, roundNumber, content, wordCount };
}

/**
 * Verdict shown while a debate is still running
 */
export function createPlaceholderVerdict(): Verdict {
  return {
    emotionalScore: 0,
    logicalScore: 0,
    winner: 'tie',
    reasoning: PENDING_REASONING,
    criteriaScores: {
      relevance: 0,
      coherence: 0,
      evidence: 0,
      persuasiveness: 0,
      rebuttal: 0,
    },
  };
}

/**
 * Fresh in-progress transcript with empty rounds
 */
export function createTranscript(params: {
  id: string;
  caseId: string;
  debateCase: Case;
  roles: RoleAssignment;
  timestamp?: string;
}): DebateTranscript {
  return {
    id: params.id,
    caseId: params.caseId,
    case: { title: params.debateCase.title, description: params.debateCase.description },
    rounds: [[], [], []],
    verdict: createPlaceholderVerdict(),
    status: 'in_progress',
    roles: { ...params.roles },
    timestamp: params.timestamp ?? new Date().toISOString(),
  };
}

/**
 * Put `argument` into its round, replacing any earlier one of the same kind,
 * keeping emotional before logical
 */
export function setArgument(transcript: DebateTranscript, argument: Argument): void {
  const index = argument.roundNumber - 1;
  const round = transcript.rounds[index].filter((a) => a.agentKind !== argument.agentKind);
  round.push(argument);
  round.sort((a, b) => AGENT_KINDS.indexOf(a.agentKind) - AGENT_KINDS.indexOf(b.agentKind));
  transcript.rounds[index] = round;
}

/**
 * Argument of `kind` in `round`, if present
 */
export function getArgument(
  transcript: DebateTranscript,
  round: RoundNumber,
  kind: AgentKind
): Argument | undefined {
  return transcript.rounds[round - 1].find((a) => a.agentKind === kind);
}

/**
 * All arguments in judging order: E1, L1, E2, L2, E3, L3
 */
export function flattenArguments(transcript: DebateTranscript): Argument[] {
  const ordered: Argument[] = [];
  for (const round of [1, 2, 3] as const) {
    for (const kind of AGENT_KINDS) {
      const argument = getArgument(transcript, round, kind);
      if (argument) {
        ordered.push(argument);
      }
    }
  }
  return ordered;
}

/**
 * Mark `transcript` failed in place. Rounds and verdict scores are kept; the
 * verdict reasoning carries the failure reason.
 */
export function markTranscriptFailed(transcript: DebateTranscript, reason: string): void {
  transcript.status = 'failed';
  transcript.error = reason;
  transcript.completedAt = new Date().toISOString();
  transcript.verdict = {
    ...transcript.verdict,
    reasoning: `${FAILURE_REASONING_PREFIX}${reason}`,
  };
}

/**
 * Compact listing view
 */
export function summarizeTranscript(transcript: DebateTranscript): DebateSummary {
  return {
    id: transcript.id,
    caseId: transcript.caseId,
    title: transcript.case.title,
    status: transcript.status,
    winner: transcript.status === 'complete' ? transcript.verdict.winner : null,
    timestamp: transcript.timestamp,
  };
}

/**
 * Deep copy so callers never share mutable state with a running debate
 */
export function cloneTranscript(transcript: DebateTranscript): DebateTranscript {
  return structuredClone(transcript);
}
