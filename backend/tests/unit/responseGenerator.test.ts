// =============================================================================
// Response Generator Tests
// =============================================================================

import { describe, it, expect, beforeEach } from 'vitest';
import {
  AnthropicAnswerSynthesizer,
  DisabledAnswerSynthesizer,
  SYSTEM_PROMPT,
  buildUserPrompt,
  isSynthesisServiceFailure,
} from '../../src/services/assistant/responseGenerator.js';
import { SynthesisUnavailableError } from '../../src/lib/errors.js';
import { FakeMessagesClient } from '../utils/testHelpers.js';

const OPTIONS = { model: 'test-model', maxTokens: 256, timeoutMs: 1000 };

describe('AnthropicAnswerSynthesizer', () => {
  let client: FakeMessagesClient;
  let synthesizer: AnthropicAnswerSynthesizer;

  beforeEach(() => {
    client = new FakeMessagesClient();
    synthesizer = new AnthropicAnswerSynthesizer(client, OPTIONS);
  });

  it('should send the question with its sources and return the text', async () => {
    const answer = await synthesizer.synthesize({ question: 'Who hires?', context: 'Source 1 (forum): Jobs\nThe library.' });

    expect(answer).toBe('Synthesized answer (Source 1)');
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]).toMatchObject({
      model: 'test-model',
      system: SYSTEM_PROMPT,
      content: 'Relevant Context:\nSource 1 (forum): Jobs\nThe library.\n\nUser Question:\nWho hires?',
    });
    expect(buildUserPrompt('q', 'c')).toBe('Relevant Context:\nc\n\nUser Question:\nq');
  });

  it('should wrap upstream failures', async () => {
    client.reply = new Error('overloaded');

    await expect(synthesizer.synthesize({ question: 'q', context: 'c' })).rejects.toThrow(
      new SynthesisUnavailableError('Answer synthesis failed: overloaded')
    );
  });

  it('should reject an empty reply', async () => {
    client.reply = '   ';

    await expect(synthesizer.synthesize({ question: 'q', context: 'c' })).rejects.toThrow(
      'Answer synthesis returned no text'
    );
  });

  it('should stop calling upstream once the circuit opens', async () => {
    client.reply = new Error('overloaded');
    for (let i = 0; i < 3; i++) {
      await expect(synthesizer.synthesize({ question: 'q', context: 'c' })).rejects.toThrow();
    }

    await expect(synthesizer.synthesize({ question: 'q', context: 'c' })).rejects.toThrow(
      'Answer synthesis failed: circuit open'
    );
    expect(client.requests).toHaveLength(3);
  });

  it('should keep the circuit closed for request-specific client errors', async () => {
    client.reply = Object.assign(new Error('prompt is too long'), { status: 400 });
    for (let i = 0; i < 3; i++) {
      await expect(synthesizer.synthesize({ question: 'q', context: 'c' })).rejects.toThrow(
        'Answer synthesis failed: prompt is too long'
      );
    }

    client.reply = 'Recovered answer';
    await expect(synthesizer.synthesize({ question: 'q', context: 'c' })).resolves.toBe('Recovered answer');
    expect(client.requests).toHaveLength(4);
  });

  it('should open the circuit on repeated rate limiting', async () => {
    client.reply = Object.assign(new Error('rate limited'), { status: 429 });
    for (let i = 0; i < 3; i++) {
      await expect(synthesizer.synthesize({ question: 'q', context: 'c' })).rejects.toThrow();
    }

    await expect(synthesizer.synthesize({ question: 'q', context: 'c' })).rejects.toThrow(
      'Answer synthesis failed: circuit open'
    );
  });

  it('should give up on a reply slower than the timeout', async () => {
    client.reply = 'hang';
    const slow = new AnthropicAnswerSynthesizer(client, { ...OPTIONS, timeoutMs: 20 });

    await expect(slow.synthesize({ question: 'q', context: 'c' })).rejects.toThrow(
      'Answer synthesis failed: Request timeout after 20ms'
    );
  });
});

describe('isSynthesisServiceFailure', () => {
  const withStatus = (status: number): Error => Object.assign(new Error('upstream'), { status });

  it('should count server errors, rate limits and errors without a status', () => {
    expect(isSynthesisServiceFailure(withStatus(500))).toBe(true);
    expect(isSynthesisServiceFailure(withStatus(529))).toBe(true);
    expect(isSynthesisServiceFailure(withStatus(429))).toBe(true);
    expect(isSynthesisServiceFailure(withStatus(408))).toBe(true);
    expect(isSynthesisServiceFailure(new Error('Connection error.'))).toBe(true);
  });

  it('should not count other client errors', () => {
    expect(isSynthesisServiceFailure(withStatus(400))).toBe(false);
    expect(isSynthesisServiceFailure(withStatus(401))).toBe(false);
    expect(isSynthesisServiceFailure(withStatus(413))).toBe(false);
  });
});

describe('DisabledAnswerSynthesizer', () => {
  it('should always report synthesis as unavailable', async () => {
    const disabled = new DisabledAnswerSynthesizer();

    expect(disabled.model).toBe('none');
    await expect(disabled.synthesize()).rejects.toBeInstanceOf(SynthesisUnavailableError);
  });
});
