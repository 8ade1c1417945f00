/**
 * Validation Helper Functions
 *
 * Converts untrusted stored documents into typed records and formats zod
 * issues for API responses.
 *
 * @see src/services/validation/store-schemas.ts for the schemas
 */

import type { ZodError } from 'zod';
import pino from 'pino';
import type { Argument, CaseRecord, DebateTranscript, Round, Verdict } from '../../types/debate.js';
import { AGENT_KINDS } from '../../types/debate.js';
import type { DebateStoreData, StatisticsData } from '../../types/store.js';
import { createPlaceholderVerdict } from '../debate/transcript.js';
import {
  argumentSchema,
  caseRecordSchema,
  statisticsSchema,
  storeDocumentSchema,
  transcriptEnvelopeSchema,
  verdictSchema,
} from './store-schemas.js';

const logger = pino({
  name: 'store-validation',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Detailed validation error
 */
export interface ValidationError {
  path: string;
  message: string;
  code?: string;
}

/**
 * Flatten zod issues into path/message pairs
 */
export function formatZodIssues(error: ZodError): ValidationError[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Keep the well-formed arguments of one stored round, at most one per kind
 */
function sanitizeRound(raw: unknown, roundNumber: number): Round {
  if (!Array.isArray(raw)) {
    return [];
  }

  const byKind = new Map<string, Argument>();
  for (const candidate of raw) {
    const parsed = argumentSchema.safeParse(candidate);
    if (!parsed.success || parsed.data.roundNumber !== roundNumber) {
      continue;
    }
    if (!byKind.has(parsed.data.agentKind)) {
      byKind.set(parsed.data.agentKind, parsed.data);
    }
  }

  const round: Round = [];
  for (const kind of AGENT_KINDS) {
    const argument = byKind.get(kind);
    if (argument) {
      round.push(argument);
    }
  }
  return round;
}

function sanitizeVerdict(raw: unknown): Verdict {
  const parsed = verdictSchema.safeParse(raw);
  return parsed.success ? parsed.data : createPlaceholderVerdict();
}

/**
 * Validate one stored transcript. Malformed arguments are dropped and a
 * malformed verdict becomes the placeholder; returns null when the envelope
 * itself is unusable.
 */
export function sanitizeTranscript(raw: unknown): DebateTranscript | null {
  const parsed = transcriptEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const { rounds, verdict, ...rest } = parsed.data;
  return {
    ...rest,
    rounds: [sanitizeRound(rounds[0], 1), sanitizeRound(rounds[1], 2), sanitizeRound(rounds[2], 3)],
    verdict: sanitizeVerdict(verdict),
  };
}

/**
 * Validate the debates document. Unknown shapes load as an empty store.
 */
export function sanitizeDebateStore(raw: unknown): DebateStoreData {
  const document = storeDocumentSchema.safeParse(raw ?? {});
  if (!document.success) {
    logger.warn({ errors: formatZodIssues(document.error) }, 'Stored debate document is malformed; starting empty');
    return { cases: {}, debates: {} };
  }

  const cases: Record<string, CaseRecord> = {};
  for (const [id, candidate] of Object.entries(document.data.cases)) {
    const parsed = caseRecordSchema.safeParse(candidate);
    if (parsed.success) {
      cases[id] = parsed.data;
    } else {
      logger.warn({ caseId: id }, 'Dropping malformed stored case');
    }
  }

  const debates: Record<string, DebateTranscript> = {};
  for (const [id, candidate] of Object.entries(document.data.debates)) {
    const transcript = sanitizeTranscript(candidate);
    if (transcript) {
      debates[id] = transcript;
    } else {
      logger.warn({ debateId: id }, 'Dropping malformed stored debate');
    }
  }

  return { cases, debates };
}

/**
 * Validate the statistics document; missing or bad counters read as 0
 */
export function sanitizeStatistics(raw: unknown): StatisticsData {
  const parsed = statisticsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return { emotionalWins: 0, logicalWins: 0, totalDebates: 0 };
  }
  return parsed.data;
}
