/**
 * Zod schemas for persisted records
 *
 * Stored documents may come from older runs or hand edits, so the schemas are
 * applied piecewise: a transcript survives a bad argument or a bad verdict,
 * and statistics survive a missing counter.
 */

import { z } from 'zod';
import { AGENT_KINDS, WINNERS } from '../../types/debate.js';
import { CRITERION_MAX, SCORE_MAX } from '../debate/verdict-extractor.js';

export const roleSchema = z.enum(['prosecution', 'defense']);

export const caseSchema = z.object({
  title: z.string(),
  description: z.string(),
});

export const caseRecordSchema = caseSchema.extend({
  id: z.string().min(1),
  createdAt: z.string(),
});

export const argumentSchema = z.object({
  agentKind: z.enum(AGENT_KINDS),
  roundNumber: z.union([z.literal(1), z.literal(2), z.literal(3)]),
  content: z.string(),
  wordCount: z.number().int().nonnegative(),
});

const criterionSchema = z.number().int().min(0).max(CRITERION_MAX);

export const verdictSchema = z.object({
  emotionalScore: z.number().int().min(0).max(SCORE_MAX),
  logicalScore: z.number().int().min(0).max(SCORE_MAX),
  winner: z.enum(WINNERS),
  reasoning: z.string(),
  criteriaScores: z.object({
    relevance: criterionSchema,
    coherence: criterionSchema,
    evidence: criterionSchema,
    persuasiveness: criterionSchema,
    rebuttal: criterionSchema,
  }),
});

/**
 * Envelope of a transcript. Rounds and verdict are checked separately.
 */
export const transcriptEnvelopeSchema = z.object({
  id: z.string().min(1),
  caseId: z.string(),
  case: caseSchema,
  rounds: z.array(z.unknown()).catch([]),
  verdict: z.unknown(),
  status: z.enum(['in_progress', 'complete', 'failed']),
  roles: z.object({
    emotional: roleSchema,
    logical: roleSchema,
  }),
  timestamp: z.string(),
  completedAt: z.string().optional(),
  error: z.string().optional(),
  verdictDegraded: z.boolean().optional(),
});

const counterSchema = z.number().int().nonnegative().catch(0);

export const statisticsSchema = z.object({
  emotionalWins: counterSchema,
  logicalWins: counterSchema,
  totalDebates: counterSchema,
});

export const storeDocumentSchema = z.object({
  cases: z.record(z.unknown()).catch({}),
  debates: z.record(z.unknown()).catch({}),
});
