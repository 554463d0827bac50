import { describe, expect, it } from 'vitest';
import { fromDocument, parseDebateJson, serializeDebate, toDocument } from '../../../src/storage/codec.js';
import { StorageError } from '../../../src/utils/errors.js';
import { makeRecord } from '../../helpers/fixtures.js';

describe('debate document codec', () => {
  it('writes snake_case fields with null error_message on success', () => {
    const doc = toDocument(makeRecord('deb_one', { failAgainst: true }));
    expect(doc.debate_id).toBe('deb_one');
    expect(doc.agents_config[0]).toEqual({
      name: 'Claude FOR',
      role: 'FOR',
      model_provider: 'claude',
      model_name: 'haiku',
      model_id: 'claude-haiku-4-5-20251001',
      temperature: 0.7,
      max_tokens: 2000,
      timeout_seconds: 60,
    });
    expect(doc.agent_responses[0].error_message).toBeNull();
    expect(doc.agent_responses[1]).toEqual({
      agent_name: 'Claude AGAINST',
      role: 'AGAINST',
      model_provider: 'claude',
      model_name: 'haiku',
      response_text: '',
      execution_time_ms: 60000,
      success: false,
      error_message: 'Agent Claude AGAINST timed out after 60s',
    });
    expect(doc.total_execution_time_ms).toBe(368.75);
    expect(doc.created_at).toBe('2025-03-04T05:06:07.890Z');
  });

  it('restores the record it wrote', () => {
    const record = makeRecord('deb_two', { failAgainst: true });
    expect(parseDebateJson(serializeDebate(record))).toEqual(record);
  });

  it('rejects invalid JSON with a decode StorageError', () => {
    let caught: unknown;
    try {
      parseDebateJson('{not json');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(StorageError);
    if (!(caught instanceof StorageError)) return;
    expect(caught.operation).toBe('decode');
    expect(caught.message).toMatch(/^Debate document is not valid JSON: /);
  });

  it('rejects a document with the wrong number of responses', () => {
    const doc = toDocument(makeRecord('deb_three'));
    const broken = { ...doc, agent_responses: doc.agent_responses.slice(0, 2) };
    expect(() => fromDocument(broken)).toThrow(StorageError);
    expect(() => fromDocument(broken)).toThrow(/^Malformed debate document: agent_responses/);
  });

  it('rejects an unknown role', () => {
    const doc = toDocument(makeRecord('deb_four'));
    const broken = { ...doc, agents_config: [{ ...doc.agents_config[0], role: 'NEUTRAL' }] };
    expect(() => fromDocument(broken)).toThrow(/agents_config\.0\.role/);
  });
});
