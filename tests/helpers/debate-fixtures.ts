/**
 * Shared fakes for debate tests
 */

import { vi, type Mock } from 'vitest';
import type { AgentKind, Argument, Case, Role } from '../../src/types/debate.js';
import type { CompletionClient, GenerateRequest } from '../../src/types/llm.js';
import type { DebateAgents, JudgeAgent, JudgeEvaluation, LawyerAgent } from '../../src/services/agents/types.js';
import { parseVerdict } from '../../src/services/debate/verdict-extractor.js';
import { createTranscript } from '../../src/services/debate/transcript.js';

type OpeningFn = (debateCase: Case) => Promise<string>;
type CounterFn = (debateCase: Case, opponentRound1: string) => Promise<string>;
type RebuttalFn = (debateCase: Case, opponentRound2: string, ownRound2: string) => Promise<string>;
type EvaluateFn = (debateCase: Case, args: Argument[]) => Promise<JudgeEvaluation>;
type RepairFn = (raw: string) => Promise<JudgeEvaluation>;

export const TEST_CASE: Case = {
  title: 'Tenant v. Landlord',
  description: 'A tenant withheld rent after the landlord ignored repeated requests to repair the heating.',
};

/**
 * Argument text of `words` tokens whose first token is `label`
 */
export function argumentText(label: string, words = 300): string {
  return Array.from({ length: words }, (_, i) => (i === 0 ? label : 'point')).join(' ');
}

export const VERDICT_RAW = JSON.stringify({
  emotional_score: 62,
  logical_score: 71,
  winner: 'logical',
  reasoning: 'The logical lawyer anchored every claim in the lease terms and the repair log, which the emotional lawyer never answered.',
  criteria_scores: { relevance: 14, coherence: 15, evidence: 16, persuasiveness: 13, rebuttal: 12 },
});

export function evaluation(raw: string): JudgeEvaluation {
  return { raw, extraction: parseVerdict(raw) };
}

export interface FakeLawyer extends LawyerAgent {
  generateOpening: Mock<OpeningFn>;
  generateCounter: Mock<CounterFn>;
  generateRebuttal: Mock<RebuttalFn>;
}

/**
 * Lawyer whose arguments are labelled E1..E3 or L1..L3
 */
export function createFakeLawyer(kind: AgentKind, role: Role): FakeLawyer {
  const prefix = kind === 'emotional' ? 'E' : 'L';
  return {
    kind,
    role,
    generateOpening: vi.fn<OpeningFn>().mockResolvedValue(argumentText(`${prefix}1`)),
    generateCounter: vi.fn<CounterFn>().mockResolvedValue(argumentText(`${prefix}2`)),
    generateRebuttal: vi.fn<RebuttalFn>().mockResolvedValue(argumentText(`${prefix}3`)),
    getMetadata: () => ({ name: `fake-${kind}`, model: 'fake', temperature: 0, kind, role }),
  };
}

export interface FakeJudge extends JudgeAgent {
  evaluate: Mock<EvaluateFn>;
  repair: Mock<RepairFn>;
}

export function createFakeJudge(raw = VERDICT_RAW): FakeJudge {
  return {
    evaluate: vi.fn<EvaluateFn>().mockResolvedValue(evaluation(raw)),
    repair: vi.fn<RepairFn>().mockResolvedValue(evaluation(VERDICT_RAW)),
    getMetadata: () => ({ name: 'fake-judge', model: 'fake', temperature: 0 }),
  };
}

export interface FakeAgents extends DebateAgents {
  emotional: FakeLawyer;
  logical: FakeLawyer;
  judge: FakeJudge;
}

export function createFakeAgents(): FakeAgents {
  return {
    emotional: createFakeLawyer('emotional', 'prosecution'),
    logical: createFakeLawyer('logical', 'defense'),
    judge: createFakeJudge(),
  };
}

export function newTranscript(id = 'deb-test0001') {
  return createTranscript({
    id,
    caseId: 'case-test0001',
    debateCase: TEST_CASE,
    roles: { emotional: 'prosecution', logical: 'defense' },
    timestamp: '2024-05-01T10:00:00.000Z',
  });
}

type GenerateFn = (request: GenerateRequest) => Promise<string>;

export interface ScriptedClient extends CompletionClient {
  generate: Mock<GenerateFn>;
}

/**
 * Completion client that answers with `replies` in order, repeating the last
 */
export function createScriptedClient(...replies: string[]): ScriptedClient {
  let index = 0;
  return {
    generate: vi.fn<GenerateFn>(async () => {
      const reply = replies[Math.min(index, replies.length - 1)] ?? '';
      index++;
      return reply;
    }),
  };
}
