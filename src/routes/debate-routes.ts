/**
 * Debate Routes
 * Express routes for cases, debate runs and win statistics
 */

import express, { type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import type { RoleAssignment } from '../types/debate.js';
import { CaseNotFoundError, DebateNotFoundError } from '../types/errors.js';
import type { DebateService } from '../services/debate/debate-service.js';
import { DEFAULT_ROLES } from '../config/debate-protocol.js';
import { formatZodIssues, roleSchema } from '../services/validation/index.js';
import { createLogger } from '../services/logging/logger.js';

const logger = createLogger({ module: 'debate-routes' });

const createCaseSchema = z.object({
  title: z.string().trim().min(3, 'Title must be at least 3 characters'),
  description: z.string().trim().min(10, 'Description must be at least 10 characters'),
});

const startDebateSchema = z
  .object({
    emotionalRole: roleSchema.optional(),
  })
  .default({});

/**
 * Role assignment with the emotional lawyer on `emotionalRole` and the
 * logical lawyer on the opposite side
 */
function rolesFor(emotionalRole: RoleAssignment['emotional'] | undefined): RoleAssignment {
  if (!emotionalRole) {
    return DEFAULT_ROLES;
  }
  return {
    emotional: emotionalRole,
    logical: emotionalRole === 'prosecution' ? 'defense' : 'prosecution',
  };
}

function sendServerError(res: Response, message: string, error: unknown): void {
  res.status(500).json({
    error: message,
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Create the debate router over `service`
 */
export function createDebateRoutes(service: DebateService): Router {
  const router = express.Router();

  /**
   * POST /case/create
   * Register a case
   */
  router.post('/case/create', async (req: Request, res: Response) => {
    const parsed = createCaseSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid case',
        errors: formatZodIssues(parsed.error),
      });
      return;
    }

    try {
      const caseId = await service.createCase(parsed.data);
      res.status(201).json({ caseId });
    } catch (error) {
      logger.error({ error }, 'Error creating case');
      sendServerError(res, 'Failed to create case', error);
    }
  });

  /**
   * POST /debate/start/:caseId
   * Schedule a debate on a case; responds before the debate runs
   */
  router.post('/debate/start/:caseId', async (req: Request, res: Response) => {
    const { caseId } = req.params;
    const parsed = startDebateSchema.safeParse(req.body ?? {});
    if (!parsed.success || !caseId) {
      res.status(400).json({
        error: 'Invalid request',
        errors: parsed.success ? [] : formatZodIssues(parsed.error),
      });
      return;
    }

    try {
      const debateId = await service.startDebate(caseId, rolesFor(parsed.data.emotionalRole));
      res.status(202).json({ debateId, status: 'in_progress' });
    } catch (error) {
      if (error instanceof CaseNotFoundError) {
        res.status(404).json({ error: 'Case not found', caseId });
        return;
      }
      logger.error({ caseId, error }, 'Error starting debate');
      sendServerError(res, 'Failed to start debate', error);
    }
  });

  /**
   * GET /debate/:debateId
   * Full transcript, including partial rounds while running
   */
  router.get('/debate/:debateId', async (req: Request, res: Response) => {
    const { debateId } = req.params;

    try {
      const transcript = await service.getDebate(debateId ?? '');
      res.json(transcript);
    } catch (error) {
      if (error instanceof DebateNotFoundError) {
        res.status(404).json({ error: 'Debate not found', debateId });
        return;
      }
      logger.error({ debateId, error }, 'Error getting debate');
      sendServerError(res, 'Failed to get debate', error);
    }
  });

  /**
   * GET /debates
   * Debate summaries, newest first
   */
  router.get('/debates', async (_req: Request, res: Response) => {
    try {
      const debates = await service.listDebates();
      res.json({ debates, count: debates.length });
    } catch (error) {
      logger.error({ error }, 'Error listing debates');
      sendServerError(res, 'Failed to list debates', error);
    }
  });

  /**
   * GET /statistics
   * Win counts across completed debates
   */
  router.get('/statistics', async (_req: Request, res: Response) => {
    try {
      res.json(await service.getStatistics());
    } catch (error) {
      logger.error({ error }, 'Error getting statistics');
      sendServerError(res, 'Failed to get statistics', error);
    }
  });

  return router;
}
