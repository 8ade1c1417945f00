/**
 * Debate Service
 *
 * Application-level API over the store and the orchestrator: creates cases,
 * schedules debate runs in the background, and serves transcripts, listings
 * and win statistics. Each run persists its transcript after every round and
 * records the outcome in the statistics once it completes.
 */

import Bottleneck from 'bottleneck';
import pino from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type {
  Case,
  CaseRecord,
  DebateStatistics,
  DebateSummary,
  DebateTranscript,
  RoleAssignment,
} from '../../types/debate.js';
import type { DebateStoreData } from '../../types/store.js';
import { CaseNotFoundError, DebateNotFoundError } from '../../types/errors.js';
import type { DebateAgents } from '../agents/types.js';
import { createDebateAgents } from '../agents/index.js';
import { createMockAgents } from '../agents/mock-agents.js';
import { createCompletionClient, llmConfig, type CompletionClient } from '../llm/index.js';
import { DEFAULT_ROLES, debateRunConfig } from '../../config/debate-protocol.js';
import type { DebateStore } from '../storage/debate-store.js';
import { DebateOrchestrator, type OrchestratorConfig } from './debate-orchestrator.js';
import {
  cloneTranscript,
  createTranscript,
  markTranscriptFailed,
  summarizeTranscript,
} from './transcript.js';
import { loggers } from '../logging/log-helpers.js';

const logger = pino({
  name: 'debate-service',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Reason recorded on debates found in progress when the service starts
 */
export const INTERRUPTED_REASON = 'Interrupted before completion (server restarted)';

export type AgentFactory = (roles: RoleAssignment) => DebateAgents;

export interface DebateServiceOptions {
  store: DebateStore;
  /** Builds the agents for one run; defaults to mock or LLM-backed agents per config */
  agentFactory?: AgentFactory;
  orchestratorConfig?: Partial<OrchestratorConfig>;
  /** Debates allowed to run at the same time */
  maxConcurrentDebates?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Default factory: canned agents when USE_MOCK_AGENTS is set, otherwise one
 * shared completion client behind all three agents
 */
function createDefaultAgentFactory(): AgentFactory {
  if (debateRunConfig.useMockAgents) {
    return (roles) => createMockAgents(roles);
  }

  let client: CompletionClient | null = null;
  return (roles) => {
    client ??= createCompletionClient();
    return createDebateAgents(roles, {
      client,
      model: llmConfig.model,
      verdictMaxTokens: llmConfig.maxTokensVerdict,
    });
  };
}

export class DebateService {
  private readonly store: DebateStore;
  private readonly agentFactory: AgentFactory;
  private readonly orchestratorConfig: Partial<OrchestratorConfig>;
  private readonly limiter: Bottleneck;
  private readonly running = new Map<string, Promise<void>>();

  constructor(options: DebateServiceOptions) {
    this.store = options.store;
    this.agentFactory = options.agentFactory ?? createDefaultAgentFactory();
    this.orchestratorConfig = options.orchestratorConfig ?? {};
    this.limiter = new Bottleneck({
      maxConcurrent: options.maxConcurrentDebates ?? debateRunConfig.maxConcurrentDebates,
    });
  }

  /**
   * Register a case and return its id
   */
  async createCase(input: Case): Promise<string> {
    const caseId = `case-${uuidv4().slice(0, 8)}`;
    const record: CaseRecord = {
      id: caseId,
      title: input.title,
      description: input.description,
      createdAt: new Date().toISOString(),
    };

    await this.store.withLock(async () => {
      const data = await this.store.loadDebateStore();
      data.cases[caseId] = record;
      await this.store.saveDebateStore(data);
    });

    logger.info({ caseId, title: record.title }, 'Case created');
    return caseId;
  }

  /**
   * Persist an in-progress transcript for `caseId` and schedule its run.
   * Returns the debate id immediately.
   */
  async startDebate(caseId: string, roles: RoleAssignment = DEFAULT_ROLES): Promise<string> {
    const debateId = `deb-${uuidv4().slice(0, 8)}`;

    const transcript = await this.store.withLock(async () => {
      const data = await this.store.loadDebateStore();
      const caseRecord = data.cases[caseId];
      if (!caseRecord) {
        throw new CaseNotFoundError(caseId);
      }

      const created = createTranscript({ id: debateId, caseId, debateCase: caseRecord, roles });
      data.debates[debateId] = created;
      await this.store.saveDebateStore(data);
      return created;
    });

    loggers.debateLifecycle(debateId, 'scheduled', { caseId, roles });

    const job = this.limiter
      .schedule(() => this.runDebate(transcript))
      .catch((error: unknown) => {
        logger.error({ debateId, error: errorMessage(error) }, 'Debate run could not be persisted');
      })
      .finally(() => {
        this.running.delete(debateId);
      });
    this.running.set(debateId, job);

    return debateId;
  }

  async getDebate(debateId: string): Promise<DebateTranscript> {
    const data = await this.store.withLock(() => this.store.loadDebateStore());
    const transcript = data.debates[debateId];
    if (!transcript) {
      throw new DebateNotFoundError(debateId);
    }
    return transcript;
  }

  /**
   * Summaries of every debate, newest first
   */
  async listDebates(): Promise<DebateSummary[]> {
    const data = await this.store.withLock(() => this.store.loadDebateStore());
    return Object.values(data.debates)
      .map(summarizeTranscript)
      .sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  }

  async getStatistics(): Promise<DebateStatistics> {
    return this.store.withLock(() => this.store.loadStatistics());
  }

  /**
   * Mark debates left in progress by a previous process as failed.
   * Returns the ids that were updated.
   */
  async recoverInterrupted(): Promise<string[]> {
    const recovered = await this.store.withLock(async () => {
      const data = await this.store.loadDebateStore();
      const ids = Object.values(data.debates)
        .filter((t) => t.status === 'in_progress' && !this.running.has(t.id))
        .map((t) => t.id);

      for (const id of ids) {
        const transcript = data.debates[id];
        if (transcript) {
          data.debates[id] = failTranscript(transcript, INTERRUPTED_REASON);
        }
      }
      if (ids.length > 0) {
        await this.store.saveDebateStore(data);
      }
      return ids;
    });

    if (recovered.length > 0) {
      logger.warn({ debateIds: recovered }, 'Marked interrupted debates as failed');
    }
    return recovered;
  }

  /**
   * Resolves once the run for `debateId` has finished and been persisted
   */
  async whenSettled(debateId: string): Promise<void> {
    await this.running.get(debateId);
  }

  /**
   * Wait for every scheduled or running debate
   */
  async drain(): Promise<void> {
    await Promise.all([...this.running.values()]);
  }

  runningCount(): number {
    return this.running.size;
  }

  private async runDebate(initial: DebateTranscript): Promise<void> {
    let result: DebateTranscript;
    try {
      const agents = this.agentFactory(initial.roles);
      const orchestrator = new DebateOrchestrator(agents, this.orchestratorConfig, {
        onProgress: (snapshot) => this.persistProgress(snapshot),
      });
      result = await orchestrator.run(initial);
    } catch (error) {
      result = failTranscript(initial, errorMessage(error));
      loggers.debateLifecycle(initial.id, 'failed', { error: result.error });
    }

    await this.finishDebate(result);
  }

  private async persistProgress(snapshot: DebateTranscript): Promise<void> {
    if (snapshot.status !== 'in_progress') {
      return;
    }
    await this.store.withLock(async () => {
      const data = await this.store.loadDebateStore();
      if (!data.debates[snapshot.id]) {
        return;
      }
      data.debates[snapshot.id] = snapshot;
      await this.store.saveDebateStore(data);
    });
  }

  /**
   * Persist the final transcript and, for completed debates, count the result
   */
  private async finishDebate(result: DebateTranscript): Promise<void> {
    await this.store.withLock(async () => {
      const data: DebateStoreData = await this.store.loadDebateStore();
      data.debates[result.id] = result;
      await this.store.saveDebateStore(data);

      if (result.status !== 'complete') {
        return;
      }

      const stats = await this.store.loadStatistics();
      stats.totalDebates += 1;
      if (result.verdict.winner === 'emotional') {
        stats.emotionalWins += 1;
      } else if (result.verdict.winner === 'logical') {
        stats.logicalWins += 1;
      }
      await this.store.saveStatistics(stats);
    });
  }
}

function failTranscript(transcript: DebateTranscript, reason: string): DebateTranscript {
  const failed = cloneTranscript(transcript);
  markTranscriptFailed(failed, reason);
  return failed;
}
