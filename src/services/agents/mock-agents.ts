/**
 * Mock Agent Implementations
 *
 * Canned agents for offline runs (USE_MOCK_AGENTS=true) and tests.
 * Output is deterministic and recognizable in logs; arguments are still
 * passed through the normalizer so they satisfy the word band.
 */

import type { AgentKind, Argument, Case, Role, RoleAssignment } from '../../types/debate.js';
import type { AgentMetadata, DebateAgents, JudgeAgent, JudgeEvaluation, LawyerAgent } from './types.js';
import { ARGUMENT_WORD_LIMITS, DEFAULT_ROLES } from '../../config/debate-protocol.js';
import { normalizeResponse } from '../debate/response-normalizer.js';
import { parseVerdict } from '../debate/verdict-extractor.js';

const EMOTIONAL_LINES = [
  'Imagine standing where my client stood, watching everything you trusted fall apart.',
  'How can anyone call this fair when a family is left with nothing but broken promises?',
  'We are not asking for sympathy, we are asking for justice!',
  'Every day of delay deepened the harm and the humiliation.',
];

const LOGICAL_LINES = [
  'First, the record establishes the relevant obligations and their scope.',
  'Second, if the standard requires proof of each element, then each element must be shown by evidence.',
  'Therefore, the burden remains with the party making the claim.',
  'Hence the documented facts, not characterizations, must decide the matter.',
];

function mockArgument(kind: AgentKind, role: Role, round: string, debateCase: Case, reference?: string): string {
  const lines = kind === 'emotional' ? EMOTIONAL_LINES : LOGICAL_LINES;
  const opener = `[Mock ${kind} lawyer, ${role}, ${round}] In the matter of ${debateCase.title}:`;
  const responding = reference ? ` Responding to the opponent, who argued "${reference.split(/\s+/).slice(0, 8).join(' ')}",` : '';
  const body: string[] = [];
  while (body.join(' ').split(/\s+/).length < ARGUMENT_WORD_LIMITS.min + 20) {
    body.push(...lines);
  }
  return normalizeResponse(`${opener}${responding} ${body.join(' ')}`, ARGUMENT_WORD_LIMITS.min, ARGUMENT_WORD_LIMITS.max);
}

/**
 * Mock lawyer producing canned arguments
 */
export class MockLawyerAgent implements LawyerAgent {
  constructor(
    readonly kind: AgentKind,
    readonly role: Role
  ) {}

  async generateOpening(debateCase: Case): Promise<string> {
    return mockArgument(this.kind, this.role, 'Opening', debateCase);
  }

  async generateCounter(debateCase: Case, opponentRound1: string): Promise<string> {
    return mockArgument(this.kind, this.role, 'Counter-Argument', debateCase, opponentRound1);
  }

  async generateRebuttal(debateCase: Case, opponentRound2: string, _ownRound2: string): Promise<string> {
    return mockArgument(this.kind, this.role, 'Rebuttal', debateCase, opponentRound2);
  }

  getMetadata(): AgentMetadata {
    return {
      name: `Mock${this.kind === 'emotional' ? 'Emotional' : 'Logical'}Lawyer`,
      model: 'mock-agent',
      temperature: 0,
      kind: this.kind,
      role: this.role,
    };
  }
}

/**
 * Mock judge that always favours the logical side by a small margin
 */
export class MockJudgeAgent implements JudgeAgent {
  async evaluate(debateCase: Case, args: Argument[]): Promise<JudgeEvaluation> {
    const raw = JSON.stringify({
      emotional_score: 68,
      logical_score: 74,
      winner: 'logical',
      reasoning:
        `Mock verdict for "${debateCase.title}" covering ${args.length} arguments. ` +
        'The logical side tied its claims to the record more consistently, while the emotional side offered a vivid account with less support.',
      criteria_scores: {
        relevance: 15,
        coherence: 14,
        evidence: 13,
        persuasiveness: 14,
        rebuttal: 13,
      },
    });
    return { raw, extraction: parseVerdict(raw) };
  }

  async repair(raw: string): Promise<JudgeEvaluation> {
    return { raw, extraction: parseVerdict(raw) };
  }

  getMetadata(): AgentMetadata {
    return { name: 'MockJudge', model: 'mock-agent', temperature: 0 };
  }
}

/**
 * Build a full set of mock agents
 */
export function createMockAgents(roles: RoleAssignment = DEFAULT_ROLES): DebateAgents {
  return {
    emotional: new MockLawyerAgent('emotional', roles.emotional),
    logical: new MockLawyerAgent('logical', roles.logical),
    judge: new MockJudgeAgent(),
  };
}
