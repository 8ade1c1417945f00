/**
 * Validation Service - Barrel Export
 */

export {
  argumentSchema,
  caseRecordSchema,
  caseSchema,
  roleSchema,
  statisticsSchema,
  transcriptEnvelopeSchema,
  verdictSchema,
} from './store-schemas.js';

export {
  formatZodIssues,
  sanitizeDebateStore,
  sanitizeStatistics,
  sanitizeTranscript,
  type ValidationError,
} from './validators.js';
