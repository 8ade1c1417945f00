/**
 * Lawyer Prompt Templates
 *
 * System and per-round user prompts for both lawyer personas. The side a
 * lawyer argues for (prosecution or defense) is injected separately from
 * the persona so either persona can take either side.
 */

import type { Case, Role } from '../../../types/debate.js';
import { ARGUMENT_WORD_LIMITS } from '../../../config/debate-protocol.js';
import type { LawyerPersona } from '../personas.js';

/**
 * What each side is trying to achieve
 */
export const ROLE_BRIEFS: Record<Role, { party: string; objective: string; outcome: string }> = {
  prosecution: {
    party: 'the Complainant (prosecution)',
    objective: 'Prove the Respondent is liable and argue for a strong remedy.',
    outcome: 'the remedy you seek (payment, refund, stop order or sanction)',
  },
  defense: {
    party: 'the Respondent (defense)',
    objective: "Defend the Respondent, expose gaps in the complainant's case and argue for dismissal or mitigation.",
    outcome: 'the outcome you seek (dismissal, warning or reduced penalty)',
  },
};

/**
 * Context carried into a round beyond the case itself
 */
export interface RoundContext {
  roundLabel: string;
  opponentArgument?: string;
  ownPreviousArgument?: string;
}

const band = `${ARGUMENT_WORD_LIMITS.min}-${ARGUMENT_WORD_LIMITS.max}`;

/**
 * System prompt for a lawyer in a given round
 */
export function buildLawyerSystemPrompt(
  persona: LawyerPersona,
  role: Role,
  debateCase: Case,
  context: RoundContext
): string {
  const brief = ROLE_BRIEFS[role];

  return [
    `Role: You represent ${brief.party}.`,
    `Objective: ${brief.objective}`,
    persona.character,
    '',
    `Case: ${debateCase.title}`,
    debateCase.description,
    '',
    `Opponent's previous argument (if any): ${context.opponentArgument ?? ''}`,
    `Your previous argument (if any): ${context.ownPreviousArgument ?? ''}`,
    '',
    'Style requirements:',
    ...persona.styleRequirements.map((line) => `- ${line}`),
    '',
    'Round constraints:',
    `- Round 1 (Opening): ${band} words.`,
    `- Round 2 (Counter): ${band} words, must answer the opponent's opening.`,
    `- Round 3 (Rebuttal): ${band} words, must answer the opponent's counter and stay consistent with your previous argument.`,
    '',
    'Output rules:',
    `- Keep your ${role} stance throughout. Never switch sides.`,
    `- State ${brief.outcome}.`,
    '- Stay on topic, stay professional, no profanity.',
    '- No meta commentary about being an AI. No round headers or labels.',
    `- Target ${band} words.`,
  ].join('\n');
}

/**
 * Per-round instruction. `shortfall` escalates after a reply under the minimum.
 */
export function buildLawyerUserPrompt(
  persona: LawyerPersona,
  role: Role,
  roundLabel: string,
  shortfall: boolean = false
): string {
  const brief = ROLE_BRIEFS[role];

  if (shortfall) {
    return (
      `Round: ${roundLabel}. Your previous response was under ${ARGUMENT_WORD_LIMITS.min} words. ` +
      `You represent ${brief.party}. ${persona.expansionHint}, and clearly state ${brief.outcome}. ` +
      `Write ${band} words.`
    );
  }

  return (
    `Round: ${roundLabel}. You represent ${brief.party}. ` +
    `Argue using ${persona.advocacyStyle} and state ${brief.outcome}. ` +
    `Target ${band} words. Do not include round headers or labels in the output. Do not switch sides.`
  );
}
