/**
 * Lawyer Agent
 *
 * One class serves both personas: the persona object supplies temperature,
 * character and style targets, the role decides the side. Every reply goes
 * through the response normalizer so the returned text always sits inside
 * the argument word band.
 */

import type { Logger } from 'pino';
import type { Case, Role, AgentKind } from '../../types/debate.js';
import type { CompletionClient } from '../../types/llm.js';
import type { AgentMetadata, LawyerAgent as ILawyerAgent } from './types.js';
import type { LawyerPersona } from './personas.js';
import {
  ARGUMENT_WORD_LIMITS,
  LENGTH_CORRECTION_ATTEMPTS,
  MAX_TOKENS_ARGUMENT,
  STAGE_CONFIG,
} from '../../config/debate-protocol.js';
import { DebateStage } from '../../types/debate.js';
import {
  buildLawyerSystemPrompt,
  buildLawyerUserPrompt,
  type RoundContext,
} from './prompts/lawyer-prompts.js';
import { runStyleChecks } from './prompts/style-checks.js';
import { cleanResponse, countWords, normalizeResponse } from '../debate/response-normalizer.js';
import { createAgentLogger } from '../logging/logger.js';
import { withRetry } from '../../utils/retry.js';

/**
 * Raised inside the length-correction loop; carries the short reply
 */
class ShortArgumentError extends Error {
  constructor(
    readonly text: string,
    readonly words: number
  ) {
    super(`Argument has ${words} words`);
    this.name = 'ShortArgumentError';
  }
}

export interface LawyerAgentOptions {
  persona: LawyerPersona;
  role: Role;
  client: CompletionClient;
  /** Reported in metadata only; the client decides the model */
  model?: string;
  /** Attempts to reach the minimum length before padding */
  lengthAttempts?: number;
  wordLimits?: { min: number; max: number };
  maxTokens?: number;
}

function roundLabel(stage: DebateStage): string {
  return STAGE_CONFIG[stage]?.name ?? stage;
}

export class LawyerAgent implements ILawyerAgent {
  readonly kind: AgentKind;
  readonly role: Role;
  private readonly persona: LawyerPersona;
  private readonly client: CompletionClient;
  private readonly model: string;
  private readonly lengthAttempts: number;
  private readonly wordLimits: { min: number; max: number };
  private readonly maxTokens: number;
  private readonly logger: Logger;

  constructor(options: LawyerAgentOptions) {
    this.persona = options.persona;
    this.kind = options.persona.kind;
    this.role = options.role;
    this.client = options.client;
    this.model = options.model ?? 'configured-model';
    this.lengthAttempts = Math.max(1, options.lengthAttempts ?? LENGTH_CORRECTION_ATTEMPTS);
    this.wordLimits = options.wordLimits ?? { ...ARGUMENT_WORD_LIMITS };
    this.maxTokens = options.maxTokens ?? MAX_TOKENS_ARGUMENT;
    this.logger = createAgentLogger(this.kind).child({ role: this.role });
  }

  async generateOpening(debateCase: Case): Promise<string> {
    return this.generateArgument(debateCase, {
      roundLabel: roundLabel(DebateStage.ROUND_1_OPENING),
    });
  }

  async generateCounter(debateCase: Case, opponentRound1: string): Promise<string> {
    return this.generateArgument(debateCase, {
      roundLabel: roundLabel(DebateStage.ROUND_2_COUNTER),
      opponentArgument: opponentRound1,
    });
  }

  async generateRebuttal(debateCase: Case, opponentRound2: string, ownRound2: string): Promise<string> {
    return this.generateArgument(debateCase, {
      roundLabel: roundLabel(DebateStage.ROUND_3_REBUTTAL),
      opponentArgument: opponentRound2,
      ownPreviousArgument: ownRound2,
    });
  }

  getMetadata(): AgentMetadata {
    return {
      name: this.persona.name,
      model: this.model,
      temperature: this.persona.temperature,
      kind: this.kind,
      role: this.role,
    };
  }

  /**
   * Generate, re-asking with a length hint while the reply is short,
   * then normalize the last reply into the word band
   */
  private async generateArgument(debateCase: Case, context: RoundContext): Promise<string> {
    const { min, max } = this.wordLimits;
    const systemPrompt = buildLawyerSystemPrompt(this.persona, this.role, debateCase, context);
    let userPrompt = buildLawyerUserPrompt(this.persona, this.role, context.roundLabel);

    const request = async (): Promise<string> => {
      const raw = await this.client.generate({
        prompt: userPrompt,
        systemPrompt,
        temperature: this.persona.temperature,
        maxTokens: this.maxTokens,
      });
      const text = cleanResponse(raw);
      const words = countWords(text);
      if (words < min) {
        throw new ShortArgumentError(text, words);
      }
      return text;
    };

    let lastText: string;
    try {
      lastText = await withRetry(request, this.lengthAttempts, `${this.kind} length correction`, {
        baseDelayMs: 0,
        shouldRetry: (error) => error instanceof ShortArgumentError,
        onRetry: (error, attempt) => {
          if (error instanceof ShortArgumentError) {
            this.logger.warn(
              { round: context.roundLabel, attempt, words: error.words, minWords: min },
              'Argument under minimum length'
            );
          }
          userPrompt = buildLawyerUserPrompt(this.persona, this.role, context.roundLabel, true);
        },
      });
    } catch (error) {
      if (!(error instanceof ShortArgumentError)) {
        throw error;
      }
      this.logger.warn(
        { round: context.roundLabel, words: error.words, minWords: min },
        'Argument still under minimum length, padding'
      );
      lastText = error.text;
    }

    const argument = normalizeResponse(lastText, min, max);

    const styleFailures = runStyleChecks(argument, this.kind);
    if (styleFailures.length > 0) {
      this.logger.debug(
        { round: context.roundLabel, failures: styleFailures.map((f) => f.message) },
        'Argument misses persona style targets'
      );
    }

    return argument;
  }
}
