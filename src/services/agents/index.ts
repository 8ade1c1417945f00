/**
 * Agent Services Barrel Export
 *
 * Central export point for agent classes, personas and the factory the
 * debate service uses to assemble a run.
 */

import type { RoleAssignment } from '../../types/debate.js';
import type { CompletionClient } from '../../types/llm.js';
import type { DebateAgents } from './types.js';
import { LawyerAgent } from './lawyer-agent.js';
import { JudgeAgent } from './judge-agent.js';
import { EMOTIONAL_PERSONA, LOGICAL_PERSONA } from './personas.js';

export type {
  AgentMetadata,
  LawyerAgent as ILawyerAgent,
  JudgeAgent as IJudgeAgent,
  JudgeEvaluation,
  DebateAgents,
} from './types.js';

export { LawyerAgent } from './lawyer-agent.js';
export type { LawyerAgentOptions } from './lawyer-agent.js';
export { JudgeAgent } from './judge-agent.js';
export type { JudgeAgentOptions } from './judge-agent.js';
export { EMOTIONAL_PERSONA, LOGICAL_PERSONA, PERSONAS } from './personas.js';
export type { LawyerPersona } from './personas.js';
export { MockLawyerAgent, MockJudgeAgent, createMockAgents } from './mock-agents.js';
export { analyzeArgumentStyle, runStyleChecks } from './prompts/style-checks.js';

export interface AgentFactoryOptions {
  client: CompletionClient;
  model?: string;
  verdictMaxTokens?: number;
}

/**
 * Build both lawyers and the judge over one completion client
 */
export function createDebateAgents(roles: RoleAssignment, options: AgentFactoryOptions): DebateAgents {
  return {
    emotional: new LawyerAgent({
      persona: EMOTIONAL_PERSONA,
      role: roles.emotional,
      client: options.client,
      model: options.model,
    }),
    logical: new LawyerAgent({
      persona: LOGICAL_PERSONA,
      role: roles.logical,
      client: options.client,
      model: options.model,
    }),
    judge: new JudgeAgent({
      client: options.client,
      model: options.model,
      maxTokens: options.verdictMaxTokens,
    }),
  };
}
