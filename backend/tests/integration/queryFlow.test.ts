/**
 * Integration Tests: Query Flow
 *
 * Ingests the forum fixtures into an in-memory store and runs questions
 * through classification, retrieval, clarification and synthesis.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { fileURLToPath } from 'url';
import { runIngestion } from '../../src/services/ingestion/pipeline.js';
import { MemoryVectorStore } from '../../src/services/vector/memoryStore.js';
import { AnthropicAnswerSynthesizer } from '../../src/services/assistant/responseGenerator.js';
import { MESSAGES } from '../../src/services/assistant/responseFormatter.js';
import type { QueryAnalyzer } from '../../src/services/assistant/queryAnalyzer.js';
import { createIngestionDeps, createQueryAnalyzer } from '../../src/services/runtime.js';
import { FakeMessagesClient, HashingEmbeddingProvider, testConfig } from '../utils/testHelpers.js';

const fixture = (name: string): string => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const BROAD_NOTE = 'The question is broad; answering the clarification questions will sharpen the answer.';

describe('query flow', () => {
  const config = testConfig();
  let store: MemoryVectorStore;
  let provider: HashingEmbeddingProvider;
  let client: FakeMessagesClient;
  let analyzer: QueryAnalyzer;

  function buildAnalyzer(): QueryAnalyzer {
    return createQueryAnalyzer(config, {
      store,
      provider,
      synthesizer: new AnthropicAnswerSynthesizer(client, { model: 'test-model', maxTokens: 256, timeoutMs: 1000 }),
    });
  }

  async function ingestForum(): Promise<void> {
    const report = await runIngestion(
      {
        sources: [
          { path: fixture('forum_historical.jsonl'), sourceType: 'forum' },
          { path: fixture('forum_recent.jsonl'), sourceType: 'forum' },
        ],
      },
      createIngestionDeps(config, { store, provider })
    );
    expect(report.upserted).toBe(4);
  }

  beforeEach(async () => {
    store = new MemoryVectorStore();
    await store.open();
    provider = new HashingEmbeddingProvider();
    client = new FakeMessagesClient();
    analyzer = buildAnalyzer();
  });

  // ---------------------------------------------------------------------------
  // Answers
  // ---------------------------------------------------------------------------

  it('should answer a broad question and ask for clarification alongside', async () => {
    await ingestForum();

    const outcome = await analyzer.handle({ question: 'I want a good job' });

    expect(outcome.answer).toBe('Synthesized answer (Source 1)');
    expect(outcome.synthesized).toBe(true);
    expect(outcome.analysis.category).toBe('jobs');
    expect(outcome.analysis.vague).toBe(true);
    expect(outcome.analysis.clarificationQuestions.map((q) => q.fieldName)).toEqual(['job_location', 'major']);
    expect(outcome.sources.length).toBeGreaterThan(0);
    expect(outcome.incomplete).toBe(false);
    expect(outcome.notes).toEqual([BROAD_NOTE]);
    expect(outcome.confidenceScore).toBeGreaterThanOrEqual(0);
    expect(outcome.confidenceScore).toBeLessThanOrEqual(1);
    expect(client.requests[0]?.content).toContain('User Question:\nI want a good job');
  });

  it('should send only the newest revision of a record to synthesis', async () => {
    await ingestForum();

    await analyzer.handle({ question: 'Is the gym hiring lifeguards?' });

    const prompt = client.requests[0]?.content ?? '';
    expect(prompt).toContain('Update: the gym is hiring lifeguards again this spring.');
    expect(prompt).not.toContain('Old answer: the gym stopped hiring.');
  });

  it('should skip clarification once prior answers resolve the fields', async () => {
    await ingestForum();

    const outcome = await analyzer.handle({
      question: 'I want a good job',
      priorAnswers: { job_location: 'On-campus', major: 'Engineering' },
    });

    expect(outcome.analysis.vague).toBe(false);
    expect(outcome.analysis.clarificationQuestions).toEqual([]);
    expect(outcome.notes).toEqual([]);
  });

  it('should admit missing information for an empty store', async () => {
    const outcome = await analyzer.handle({ question: 'Where is the quantum optics lab?' });

    expect(outcome.answer).toBe(MESSAGES.noInformation);
    expect(outcome.sources).toEqual([]);
    expect(outcome.confidenceScore).toBe(0);
    expect(outcome.confidenceTier).toBe('low');
    expect(client.requests).toEqual([]);
  });

  // ---------------------------------------------------------------------------
  // Degraded paths
  // ---------------------------------------------------------------------------

  it('should fall back to raw passages when synthesis fails', async () => {
    await ingestForum();
    client.reply = new Error('overloaded');

    const outcome = await analyzer.handle({ question: 'library job' });

    expect(outcome.synthesized).toBe(false);
    expect(outcome.answer.split('\n')[0]).toBe(MESSAGES.synthesisUnavailable);
    expect(outcome.notes).toEqual(['Answer synthesis unavailable; showing the most relevant sources instead.']);
    expect(outcome.confidenceScore).toBeLessThanOrEqual(config.confidence.synthesisCap);
  });

  it('should return a partial answer when the deadline passes', async () => {
    await ingestForum();
    client.reply = 'hang';

    const outcome = await analyzer.handle({ question: 'library job', timeoutMs: 50 });

    expect(outcome.incomplete).toBe(true);
    expect(outcome.synthesized).toBe(false);
    expect(outcome.answer.split('\n')[0]).toBe(MESSAGES.synthesisUnavailable);
    expect(outcome.notes).toContain(MESSAGES.incomplete);
    expect(client.requests[0]?.signal?.aborted).toBe(true);
  });

  it('should answer without sources when the store is unreachable', async () => {
    await store.close();

    const outcome = await analyzer.handle({ question: 'library job' });

    expect(outcome.answer).toBe(MESSAGES.storeUnavailable);
    expect(outcome.notes).toEqual(['Memory vector store is not open']);
    expect(outcome.sources).toEqual([]);
    expect(outcome.confidenceScore).toBeLessThanOrEqual(config.confidence.noSourceCap);
  });
});
