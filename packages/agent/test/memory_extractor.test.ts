import { describe, expect, it } from 'vitest';

import { MemoryExtractionError } from '../src/errors.js';
import { EMPTY_MEMORY_DECISION, MemoryExtractor, normalizeFactText, reconcileDecision } from '../src/memory/extractor.js';
import { SqliteFactStore } from '../src/memory/fact_store.js';
import { ScriptedChatModel, finalAnswer } from './helpers.js';

function extractorReturning(payload: unknown): { extractor: MemoryExtractor; model: ScriptedChatModel } {
  const model = new ScriptedChatModel({
    respond: () => finalAnswer('unused'),
    decide: () => payload,
  });
  return { extractor: new MemoryExtractor(model), model };
}

describe('MemoryExtractor', () => {
  it('marks facts already stored as not new', async () => {
    const { extractor } = extractorReturning({
      should_write: true,
      memories: [
        { text: 'Name is Alice', is_new: true },
        { text: '  Works as a pilot ', is_new: true },
      ],
    });

    expect(await extractor.extract(['name is   alice'], 'I am Alice and I fly planes')).toEqual({
      shouldPersist: true,
      facts: [
        { text: 'Name is Alice', isNew: false },
        { text: 'Works as a pilot', isNew: true },
      ],
    });
  });

  it('does not persist when every fact is already known', async () => {
    const { extractor } = extractorReturning({
      should_write: true,
      memories: [{ text: 'Name is Alice', is_new: true }],
    });

    expect(await extractor.extract(['Name is Alice'], 'My name is Alice')).toEqual({
      shouldPersist: false,
      facts: [{ text: 'Name is Alice', isNew: false }],
    });
  });

  it('passes the stored facts and the message to the model', async () => {
    const { extractor, model } = extractorReturning({ should_write: false, memories: [] });

    await extractor.extract(['Likes tea'], 'hello there');

    expect(model.memoryCalls).toEqual(['Analyze the latest user message and record the decision.\nuser_text: hello there']);
  });

  it('degrades to no memory when the backend fails', async () => {
    const model = new ScriptedChatModel({
      respond: () => finalAnswer('unused'),
      decide: () => {
        throw new Error('backend unavailable');
      },
    });

    expect(await new MemoryExtractor(model).extract([], 'My name is Alice')).toEqual(EMPTY_MEMORY_DECISION);
  });

  it('raises MemoryExtractionError from the strict decision call', async () => {
    const model = new ScriptedChatModel({
      respond: () => finalAnswer('unused'),
      decide: () => {
        throw new Error('backend unavailable');
      },
    });
    const attempt = new MemoryExtractor(model).decide([], 'My name is Alice');

    await expect(attempt).rejects.toBeInstanceOf(MemoryExtractionError);
    await expect(attempt).rejects.toThrow('memory extraction failed: backend unavailable');
  });

  it('degrades to no memory on a malformed decision', async () => {
    const { extractor } = extractorReturning({ should_write: 'yes' });

    expect(await extractor.extract([], 'My name is Alice')).toEqual({ shouldPersist: false, facts: [] });
  });
});

describe('reconcileDecision', () => {
  it('drops blank facts and duplicates within one decision', () => {
    expect(
      reconcileDecision(
        {
          should_write: true,
          memories: [
            { text: '   ', is_new: true },
            { text: 'Has a dog', is_new: true },
            { text: 'has a  DOG', is_new: true },
          ],
        },
        [],
      ),
    ).toEqual({
      shouldPersist: true,
      facts: [
        { text: 'Has a dog', isNew: true },
        { text: 'has a  DOG', isNew: false },
      ],
    });
  });

  it('normalizes case and whitespace', () => {
    expect(normalizeFactText('  Name   IS\nAlice ')).toBe('name is alice');
  });
});

describe('SqliteFactStore', () => {
  it('keeps facts per user in insertion order', () => {
    const store = new SqliteFactStore(':memory:');
    store.addFact('alice', 'Name is Alice');
    store.addFact('bob', 'Name is Bob');
    store.addFact('alice', ' Plays tennis ');

    expect(store.listFacts('alice').map((fact) => fact.text)).toEqual(['Name is Alice', 'Plays tennis']);
    expect(store.listFacts('bob').map((fact) => fact.text)).toEqual(['Name is Bob']);
    expect(() => store.addFact('alice', '  ')).toThrow('memory fact text is required');
    store.close();
  });
});
