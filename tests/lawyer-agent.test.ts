/**
 * Tests for LawyerAgent
 */

import { describe, it, expect } from 'vitest';
import { LawyerAgent } from '../src/services/agents/lawyer-agent.js';
import { EMOTIONAL_PERSONA, LOGICAL_PERSONA } from '../src/services/agents/personas.js';
import { countWords, FILLER_SENTENCE } from '../src/services/debate/response-normalizer.js';
import { MAX_TOKENS_ARGUMENT } from '../src/config/debate-protocol.js';
import { TEST_CASE, argumentText, createScriptedClient } from './helpers/debate-fixtures.js';

describe('LawyerAgent', () => {
  describe('generateOpening', () => {
    it('should send persona temperature, token budget and side to the client', async () => {
      const client = createScriptedClient(argumentText('E1'));
      const agent = new LawyerAgent({ persona: EMOTIONAL_PERSONA, role: 'prosecution', client });

      const text = await agent.generateOpening(TEST_CASE);

      expect(text).toBe(argumentText('E1'));
      expect(client.generate).toHaveBeenCalledTimes(1);

      const request = client.generate.mock.calls[0]?.[0];
      expect(request?.temperature).toBe(0.8);
      expect(request?.maxTokens).toBe(MAX_TOKENS_ARGUMENT);
      expect(request?.maxTokens).toBe(466);
      expect(request?.systemPrompt).toContain('Role: You represent the Complainant (prosecution).');
      expect(request?.systemPrompt).toContain(`Case: ${TEST_CASE.title}`);
      expect(request?.systemPrompt).toContain("Opponent's previous argument (if any): \n");
      expect(request?.prompt.startsWith('Round: Opening. You represent the Complainant (prosecution).')).toBe(true);
    });

    it('should use the logical persona temperature and the defense brief', async () => {
      const client = createScriptedClient(argumentText('L1'));
      const agent = new LawyerAgent({ persona: LOGICAL_PERSONA, role: 'defense', client });

      await agent.generateOpening(TEST_CASE);

      const request = client.generate.mock.calls[0]?.[0];
      expect(request?.temperature).toBe(0.25);
      expect(request?.systemPrompt).toContain('Role: You represent the Respondent (defense).');
    });

    it('should ask again with a length hint after a short reply', async () => {
      const client = createScriptedClient('Too short but real.', argumentText('E1'));
      const agent = new LawyerAgent({ persona: EMOTIONAL_PERSONA, role: 'prosecution', client });

      const text = await agent.generateOpening(TEST_CASE);

      expect(text).toBe(argumentText('E1'));
      expect(client.generate).toHaveBeenCalledTimes(2);
      expect(client.generate.mock.calls[0]?.[0].prompt).not.toContain('Your previous response was under');
      expect(client.generate.mock.calls[1]?.[0].prompt).toContain('Your previous response was under 250 words.');
    });

    it('should pad the last reply once the attempts are used up', async () => {
      const client = createScriptedClient('Too short but real.');
      const agent = new LawyerAgent({ persona: EMOTIONAL_PERSONA, role: 'prosecution', client });

      const text = await agent.generateOpening(TEST_CASE);

      expect(client.generate).toHaveBeenCalledTimes(2);
      expect(text).toBe(['Too short but real.', ...Array<string>(16).fill(FILLER_SENTENCE)].join(' '));
      expect(countWords(text)).toBe(260);
    });

    it('should honor a custom attempt count', async () => {
      const client = createScriptedClient('Short.');
      const agent = new LawyerAgent({
        persona: EMOTIONAL_PERSONA,
        role: 'prosecution',
        client,
        lengthAttempts: 3,
      });

      await agent.generateOpening(TEST_CASE);

      expect(client.generate).toHaveBeenCalledTimes(3);
    });

    it('should trim a long reply to the maximum', async () => {
      const client = createScriptedClient(argumentText('L1', 500));
      const agent = new LawyerAgent({ persona: LOGICAL_PERSONA, role: 'defense', client });

      const text = await agent.generateOpening(TEST_CASE);

      expect(text).toBe(argumentText('L1', 350));
    });

    it('should unwrap a fenced reply', async () => {
      const client = createScriptedClient('```\n' + argumentText('E1') + '\n```');
      const agent = new LawyerAgent({ persona: EMOTIONAL_PERSONA, role: 'prosecution', client });

      expect(await agent.generateOpening(TEST_CASE)).toBe(argumentText('E1'));
    });

    it('should propagate client errors', async () => {
      const client = createScriptedClient();
      client.generate.mockRejectedValueOnce(new Error('model unavailable'));
      const agent = new LawyerAgent({ persona: EMOTIONAL_PERSONA, role: 'prosecution', client });

      await expect(agent.generateOpening(TEST_CASE)).rejects.toThrow('model unavailable');
      expect(client.generate).toHaveBeenCalledTimes(1);
    });
  });

  describe('generateCounter', () => {
    it('should put the opponent opening into the system prompt', async () => {
      const client = createScriptedClient(argumentText('L2'));
      const agent = new LawyerAgent({ persona: LOGICAL_PERSONA, role: 'defense', client });

      await agent.generateCounter(TEST_CASE, 'The landlord ignored us.');

      const request = client.generate.mock.calls[0]?.[0];
      expect(request?.systemPrompt).toContain("Opponent's previous argument (if any): The landlord ignored us.");
      expect(request?.systemPrompt).toContain('Your previous argument (if any): \n');
      expect(request?.prompt.startsWith('Round: Counter-Argument.')).toBe(true);
    });
  });

  describe('generateRebuttal', () => {
    it('should carry both the opponent counter and the own counter', async () => {
      const client = createScriptedClient(argumentText('E3'));
      const agent = new LawyerAgent({ persona: EMOTIONAL_PERSONA, role: 'prosecution', client });

      await agent.generateRebuttal(TEST_CASE, 'Rent was owed regardless.', 'The heating never worked.');

      const request = client.generate.mock.calls[0]?.[0];
      expect(request?.systemPrompt).toContain("Opponent's previous argument (if any): Rent was owed regardless.");
      expect(request?.systemPrompt).toContain('Your previous argument (if any): The heating never worked.');
      expect(request?.prompt.startsWith('Round: Rebuttal.')).toBe(true);
    });
  });

  describe('getMetadata', () => {
    it('should report persona, side and model', () => {
      const agent = new LawyerAgent({
        persona: LOGICAL_PERSONA,
        role: 'defense',
        client: createScriptedClient(),
        model: 'test-model',
      });

      expect(agent.getMetadata()).toEqual({
        name: 'Logical Lawyer',
        model: 'test-model',
        temperature: 0.25,
        kind: 'logical',
        role: 'defense',
      });
      expect(agent.kind).toBe('logical');
      expect(agent.role).toBe('defense');
    });
  });
});
