// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { describe, expect, it } from 'vitest';
import { adfToPlainText, richTextToPlainText, toAdfDocument } from './adf-utils.js';
import type { AdfDocument } from './types.js';

function paragraph(...texts: string[]) {
  return { type: 'paragraph', content: texts.map(text => ({ type: 'text', text })) };
}

describe('toAdfDocument', () => {
  it('should accept a well-formed doc', () => {
    const value: unknown = JSON.parse('{"type":"doc","version":1,"content":[{"type":"paragraph"}]}');

    expect(toAdfDocument(value)).toEqual({
      version: 1,
      type: 'doc',
      content: [{ type: 'paragraph' }],
    });
  });

  it('should reject values that are not a doc node', () => {
    expect(toAdfDocument(null)).toBeNull();
    expect(toAdfDocument('plain text')).toBeNull();
    expect(toAdfDocument({ type: 'paragraph', content: [] })).toBeNull();
    expect(toAdfDocument({ type: 'doc' })).toBeNull();
  });

  it('should reject malformed nested nodes', () => {
    expect(toAdfDocument({ type: 'doc', content: [{ text: 'no type' }] })).toBeNull();
    expect(
      toAdfDocument({ type: 'doc', content: [{ type: 'paragraph', content: [{ type: 'text', text: 5 }] }] })
    ).toBeNull();
  });
});

describe('adfToPlainText', () => {
  it('should return an empty string for null and undefined', () => {
    expect(adfToPlainText(null)).toBe('');
    expect(adfToPlainText(undefined)).toBe('');
  });

  it('should put each paragraph on its own line', () => {
    const doc: AdfDocument = {
      version: 1,
      type: 'doc',
      content: [paragraph('First paragraph'), paragraph('Second ', 'paragraph')],
    };

    expect(adfToPlainText(doc)).toBe('First paragraph\nSecond paragraph');
  });

  it('should render hard breaks as newlines', () => {
    const doc: AdfDocument = {
      version: 1,
      type: 'doc',
      content: [
        {
          type: 'paragraph',
          content: [{ type: 'text', text: 'line one' }, { type: 'hardBreak' }, { type: 'text', text: 'line two' }],
        },
      ],
    };

    expect(adfToPlainText(doc)).toBe('line one\nline two');
  });

  it('should walk headings and lists', () => {
    const doc: AdfDocument = {
      version: 1,
      type: 'doc',
      content: [
        { type: 'heading', attrs: { level: 2 }, content: [{ type: 'text', text: 'Steps' }] },
        {
          type: 'orderedList',
          content: [
            { type: 'listItem', content: [paragraph('Open the page')] },
            { type: 'listItem', content: [paragraph('Click save')] },
          ],
        },
      ],
    };

    expect(adfToPlainText(doc)).toBe('Steps\nOpen the page\n\nClick save');
  });

  it('should return an empty string for an empty document', () => {
    expect(adfToPlainText({ version: 1, type: 'doc', content: [] })).toBe('');
  });
});

describe('richTextToPlainText', () => {
  it('should trim wiki text', () => {
    expect(richTextToPlainText('  h1. Title \n')).toBe('h1. Title');
  });

  it('should flatten ADF', () => {
    expect(richTextToPlainText({ version: 1, type: 'doc', content: [paragraph('hello')] })).toBe('hello');
  });

  it('should return an empty string for missing values', () => {
    expect(richTextToPlainText(null)).toBe('');
    expect(richTextToPlainText(undefined)).toBe('');
  });
});
