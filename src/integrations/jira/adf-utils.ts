// Licensed under the Hungry Ghost Hive License. See LICENSE.

import type { AdfDocument, AdfNode, RichText } from './types.js';

function isAdfNode(value: unknown): value is AdfNode {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || typeof value.type !== 'string') return false;
  if ('text' in value && value.text !== undefined && typeof value.text !== 'string') return false;
  if ('content' in value && value.content !== undefined) {
    return Array.isArray(value.content) && value.content.every(isAdfNode);
  }
  return true;
}

/**
 * Narrow an arbitrary decoded JSON value to an ADF document.
 * Anything that is not a well-formed `doc` node yields null.
 */
export function toAdfDocument(value: unknown): AdfDocument | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('type' in value) || value.type !== 'doc') return null;
  if (!('content' in value) || !Array.isArray(value.content)) return null;
  if (!value.content.every(isAdfNode)) return null;
  return { version: 1, type: 'doc', content: value.content };
}

/**
 * Extract plain text from an Atlassian Document Format (ADF) document.
 * Recursively walks the node tree and concatenates text content.
 */
export function adfToPlainText(doc: AdfDocument | null | undefined): string {
  if (!doc || !doc.content) return '';

  function extractText(nodes: AdfNode[]): string {
    const parts: string[] = [];

    for (const node of nodes) {
      if (node.type === 'text' && node.text) {
        parts.push(node.text);
      } else if (node.type === 'hardBreak') {
        parts.push('\n');
      } else if (node.content) {
        parts.push(extractText(node.content));
      }

      // Add newline after block-level nodes
      if (
        node.type === 'paragraph' ||
        node.type === 'heading' ||
        node.type === 'bulletList' ||
        node.type === 'orderedList' ||
        node.type === 'listItem' ||
        node.type === 'codeBlock'
      ) {
        parts.push('\n');
      }
    }

    return parts.join('');
  }

  return extractText(doc.content).trim();
}

/**
 * Plain text of a v2 (wiki string) or v3 (ADF) rich text value.
 */
export function richTextToPlainText(value: RichText | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  return adfToPlainText(value);
}
