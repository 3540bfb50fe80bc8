import { describe, expect, it } from 'vitest';
import {
  DEFAULT_BEDROCK_EMBEDDING_MODEL,
  DEFAULT_DB_PATH,
  loadConfig,
  requireReasoningCredential,
} from '../index.js';
import { MissingCredentialError, ValidationError } from '../../core/errors.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.dbPath).toBe(DEFAULT_DB_PATH);
    expect(config.topK).toBe(5);
    expect(config.rrfK).toBe(60);
    expect(config.maxIterations).toBe(5);
    expect(config.minParagraphLength).toBe(30);
    expect(config.port).toBe(8000);
    expect(config.embedding).toEqual({ provider: 'bedrock', model: DEFAULT_BEDROCK_EMBEDDING_MODEL });
    expect(config.reasoning.provider).toBe('openai');
    expect(config.reasoning.model).toBe('gpt-4-turbo');
    expect(config.reasoning.apiKey).toBeUndefined();
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({
      LEXLOCATOR_TOP_K: '8',
      LEXLOCATOR_RRF_K: '30',
      LEXLOCATOR_MAX_ITERATIONS: '2',
      PORT: '9100',
    });

    expect(config.topK).toBe(8);
    expect(config.rrfK).toBe(30);
    expect(config.maxIterations).toBe(2);
    expect(config.port).toBe(9100);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ LEXLOCATOR_TOP_K: '  ', OPENAI_API_KEY: '' });
    expect(config.topK).toBe(5);
    expect(config.reasoning.apiKey).toBeUndefined();
  });

  it('rejects a non-positive iteration budget', () => {
    expect(() => loadConfig({ LEXLOCATOR_MAX_ITERATIONS: '0' })).toThrow(ValidationError);
  });

  it('rejects an unknown provider', () => {
    expect(() => loadConfig({ LEXLOCATOR_REASONING_PROVIDER: 'local' })).toThrow(
      /LEXLOCATOR_REASONING_PROVIDER/
    );
  });
});

describe('requireReasoningCredential', () => {
  it('requires OPENAI_API_KEY for the openai provider', () => {
    const config = loadConfig({});
    expect(() => requireReasoningCredential(config)).toThrow(MissingCredentialError);
  });

  it('returns the credential when the key is present', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });
    expect(requireReasoningCredential(config)).toEqual({
      provider: 'openai',
      model: 'gpt-4-turbo',
      apiKey: 'test-secret',
    });
  });

  it('requires a model id for the bedrock provider', () => {
    const config = loadConfig({ LEXLOCATOR_REASONING_PROVIDER: 'bedrock' });
    expect(() => requireReasoningCredential(config)).toThrow(/LEXLOCATOR_REASONING_MODEL/);
  });

  it('accepts bedrock with a model id', () => {
    const config = loadConfig({
      LEXLOCATOR_REASONING_PROVIDER: 'bedrock',
      LEXLOCATOR_REASONING_MODEL: 'anthropic.claude-3-haiku-20240307-v1:0',
    });
    expect(requireReasoningCredential(config).model).toBe('anthropic.claude-3-haiku-20240307-v1:0');
  });
});
