// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { marked, type Token, type Tokens } from 'marked';

const HTML_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  '#39': "'",
};

/** The lexer entity-encodes code spans and escapes */
function unescapeHtml(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|#39);/g, (entity, name: string) => {
    return HTML_ENTITIES[name] ?? entity;
  });
}

function isList(token: Token): token is Tokens.List {
  return token.type === 'list';
}

function renderInline(tokens: Token[] = []): string {
  return tokens.map(renderInlineToken).join('');
}

function renderInlineToken(token: Token): string {
  switch (token.type) {
    case 'strong':
      return `*${renderInline(token.tokens)}*`;
    case 'em':
      return `_${renderInline(token.tokens)}_`;
    case 'del':
      return `-${renderInline(token.tokens)}-`;
    case 'codespan':
      return `{{${unescapeHtml(token.text)}}}`;
    case 'link': {
      const text = renderInline(token.tokens);
      return text === token.href ? `[${token.href}]` : `[${text}|${token.href}]`;
    }
    case 'image':
      return `!${token.href}!`;
    case 'br':
      return '\n';
    case 'escape':
      return unescapeHtml(token.text);
    case 'text':
      return token.tokens ? renderInline(token.tokens) : token.raw;
    default:
      return token.raw;
  }
}

function renderList(list: Tokens.List, parentBullet: string): string {
  const bullet = parentBullet + (list.ordered ? '#' : '*');
  const lines: string[] = [];

  for (const item of list.items) {
    const text: string[] = [];
    const nested: string[] = [];
    for (const child of item.tokens) {
      if (isList(child)) {
        nested.push(renderList(child, bullet));
      } else {
        const block = renderBlock(child);
        if (block !== null) text.push(block);
      }
    }
    lines.push(`${bullet} ${text.join('\n')}`, ...nested);
  }

  return lines.join('\n');
}

function renderBlock(token: Token): string | null {
  if (isList(token)) {
    return renderList(token, '');
  }

  switch (token.type) {
    case 'space':
      return null;
    case 'heading':
      return `h${token.depth}. ${renderInline(token.tokens)}`;
    case 'paragraph':
      return renderInline(token.tokens);
    case 'text':
      return token.tokens ? renderInline(token.tokens) : token.raw.trimEnd();
    case 'code':
      return `{code${token.lang ? `:${token.lang}` : ''}}\n${token.text}\n{code}`;
    case 'blockquote':
      return `{quote}\n${renderBlocks(token.tokens)}\n{quote}`;
    case 'hr':
      return '----';
    default:
      return token.raw.trimEnd();
  }
}

function renderBlocks(tokens: Token[] = []): string {
  const blocks: string[] = [];
  for (const token of tokens) {
    const block = renderBlock(token);
    if (block !== null) blocks.push(block);
  }
  return blocks.join('\n\n');
}

/**
 * Convert markdown to the wiki markup the v2 API renders.
 *
 * Headings, emphasis, code spans and blocks, lists, links and quotes are
 * translated; anything else is passed through as written.
 */
export function markdownToWiki(markdown: string): string {
  if (markdown.trim() === '') {
    return markdown;
  }
  return renderBlocks(marked.lexer(markdown));
}
