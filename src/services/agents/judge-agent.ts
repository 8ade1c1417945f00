/**
 * Judge Agent
 *
 * Evaluates the six arguments at temperature 0 in JSON mode and hands the
 * raw reply to the verdict extractor. The repair call restates a reply that
 * could only be read heuristically.
 */

import type { Logger } from 'pino';
import type { Argument, Case } from '../../types/debate.js';
import type { CompletionClient } from '../../types/llm.js';
import type { AgentMetadata, JudgeAgent as IJudgeAgent, JudgeEvaluation } from './types.js';
import {
  JUDGE_REASONING_WORD_TARGET,
  MAX_TOKENS_VERDICT,
  ROUND_COUNT,
  TEMPERATURES,
} from '../../config/debate-protocol.js';
import {
  buildJudgeRepairPrompt,
  buildJudgeSystemPrompt,
  buildJudgeUserPrompt,
  JUDGE_REPAIR_SYSTEM_PROMPT,
} from './prompts/judge-prompts.js';
import { parseVerdict } from '../debate/verdict-extractor.js';
import { countWords } from '../debate/response-normalizer.js';
import { createAgentLogger } from '../logging/logger.js';

export interface JudgeAgentOptions {
  client: CompletionClient;
  model?: string;
  maxTokens?: number;
}

const EXPECTED_ARGUMENTS = ROUND_COUNT * 2;

export class JudgeAgent implements IJudgeAgent {
  private readonly client: CompletionClient;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly logger: Logger;

  constructor(options: JudgeAgentOptions) {
    this.client = options.client;
    this.model = options.model ?? 'configured-model';
    this.maxTokens = options.maxTokens && options.maxTokens > 0 ? options.maxTokens : MAX_TOKENS_VERDICT;
    this.logger = createAgentLogger('judge');
  }

  async evaluate(debateCase: Case, args: Argument[]): Promise<JudgeEvaluation> {
    if (args.length !== EXPECTED_ARGUMENTS) {
      this.logger.warn({ received: args.length, expected: EXPECTED_ARGUMENTS }, 'Judge received an unexpected number of arguments');
    }

    const raw = await this.client.generate({
      prompt: buildJudgeUserPrompt(args),
      systemPrompt: buildJudgeSystemPrompt(debateCase),
      temperature: TEMPERATURES.judge,
      maxTokens: this.maxTokens,
      options: { jsonMode: true },
    });

    const extraction = parseVerdict(raw);
    this.checkReasoningLength(extraction.verdict.reasoning, extraction.kind);
    return { raw, extraction };
  }

  async repair(raw: string): Promise<JudgeEvaluation> {
    const repaired = await this.client.generate({
      prompt: buildJudgeRepairPrompt(raw),
      systemPrompt: JUDGE_REPAIR_SYSTEM_PROMPT,
      temperature: TEMPERATURES.judge,
      maxTokens: this.maxTokens,
      options: { jsonMode: true },
    });

    return { raw: repaired, extraction: parseVerdict(repaired) };
  }

  getMetadata(): AgentMetadata {
    return {
      name: 'Judge',
      model: this.model,
      temperature: TEMPERATURES.judge,
    };
  }

  /**
   * Soft target only: log when the reasoning falls outside it
   */
  private checkReasoningLength(reasoning: string, kind: 'parsed' | 'heuristic'): void {
    if (kind === 'heuristic') {
      return;
    }
    const words = countWords(reasoning);
    if (words < JUDGE_REASONING_WORD_TARGET.min || words > JUDGE_REASONING_WORD_TARGET.max) {
      this.logger.warn(
        { words, target: JUDGE_REASONING_WORD_TARGET },
        'Verdict reasoning outside target length'
      );
    }
  }
}
