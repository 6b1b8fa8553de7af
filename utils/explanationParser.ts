import type { ExplanationNode, HeadingLevel, ListItem, Span } from '../types';
import { createLogger } from '../services/logger';

const log = createLogger('Parser');

// Deeper indentation is folded into the last allowed level.
const MAX_LIST_DEPTH = 8;

const HEADING_PATTERN = /^(#{1,6})\s+(.*?)(?:\s+#+)?\s*$/;
const LIST_ITEM_PATTERN = /^([ \t]*)([-*+]|\d{1,9}[.)])[ \t]+(.*)$/;
const RULE_PATTERN = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;
const FENCE_PATTERN = /^\s*(```|~~~)/;
const ITALIC_PATTERN = /(^|[^\w*\\])\*(?=\S)([^*\n]+?)(?<=\S)\*(?![\w*])/g;

const degrade = (what: string, fragment: string) => {
  log.debug(`Degraded ${what} to plain text: ${JSON.stringify(fragment.slice(0, 80))}`);
};

// ======================================================================================
// INLINE SPANS
// ======================================================================================

const isEscaped = (text: string, at: number): boolean => {
  let backslashes = 0;
  for (let i = at - 1; i >= 0 && text[i] === '\\'; i--) backslashes++;
  return backslashes % 2 === 1;
};

const findUnescaped = (text: string, delimiter: string, from: number): number => {
  let at = text.indexOf(delimiter, from);
  while (at !== -1 && isEscaped(text, at)) at = text.indexOf(delimiter, at + 1);
  return at;
};

// A single `$` closes only when it hugs its content and is not followed by a
// digit, so prices like "$5 and $10" stay text.
const findInlineDollarClose = (text: string, from: number): number => {
  let at = findUnescaped(text, '$', from);
  while (at !== -1) {
    const before = text[at - 1] ?? '';
    const after = text[at + 1] ?? '';
    if (at > from && !/\s/.test(before) && !/\d/.test(after) && after !== '$') return at;
    at = findUnescaped(text, '$', at + 1);
  }
  return -1;
};

const stripItalics = (text: string): string => text.replace(ITALIC_PATTERN, '$1$2');

class SpanBuilder {
  readonly spans: Span[] = [];
  private plain = '';

  text(value: string): void {
    this.plain += value;
  }

  equation(latex: string): void {
    const trimmed = latex.trim();
    if (!trimmed) return;
    this.flush();
    this.spans.push({ kind: 'inline_equation', latex: trimmed });
  }

  bold(inner: Span[]): void {
    this.flush();
    for (const span of inner) {
      this.spans.push(span.kind === 'text' ? { kind: 'bold', text: span.text } : span);
    }
  }

  /** Broken fragments keep their literal source text as a span of their own. */
  fragment(raw: string): void {
    this.flush();
    this.spans.push({ kind: 'text', text: raw });
  }

  flush(): void {
    const text = stripItalics(this.plain);
    this.plain = '';
    if (!text) return;
    const last = this.spans[this.spans.length - 1];
    if (last && last.kind === 'text') {
      this.spans[this.spans.length - 1] = { kind: 'text', text: last.text + text };
    } else {
      this.spans.push({ kind: 'text', text });
    }
  }
}

export const parseSpans = (text: string): Span[] => {
  const builder = new SpanBuilder();
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === '\\' && text[i + 1] === '$') {
      builder.text('$');
      i += 2;
      continue;
    }

    if (ch === '\\' && text[i + 1] === '(') {
      const close = text.indexOf('\\)', i + 2);
      if (close === -1) {
        degrade('inline equation', text.slice(i));
        builder.fragment(text.slice(i));
        break;
      }
      builder.equation(text.slice(i + 2, close));
      i = close + 2;
      continue;
    }

    if (text.startsWith('$$', i)) {
      const close = findUnescaped(text, '$$', i + 2);
      if (close === -1) {
        degrade('display equation', text.slice(i));
        builder.fragment(text.slice(i));
        break;
      }
      builder.equation(text.slice(i + 2, close));
      i = close + 2;
      continue;
    }

    if (ch === '$') {
      if (/\s/.test(text[i + 1] ?? ' ')) {
        builder.text('$');
        i += 1;
        continue;
      }
      const close = findInlineDollarClose(text, i + 1);
      if (close === -1) {
        degrade('inline equation', text.slice(i));
        builder.fragment(text.slice(i));
        break;
      }
      builder.equation(text.slice(i + 1, close));
      i = close + 1;
      continue;
    }

    if (text.startsWith('**', i)) {
      const close = text.indexOf('**', i + 2);
      if (close === -1) {
        degrade('bold marker', text.slice(i));
        builder.text('**');
        i += 2;
        continue;
      }
      builder.bold(parseSpans(text.slice(i + 2, close)));
      i = close + 2;
      continue;
    }

    builder.text(ch);
    i += 1;
  }

  builder.flush();
  return builder.spans;
};

// ======================================================================================
// BLOCKS
// ======================================================================================

const indentOf = (line: string): number => {
  let width = 0;
  for (const ch of line) {
    if (ch === ' ') width += 1;
    else if (ch === '\t') width += 4;
    else break;
  }
  return width;
};

const stripQuote = (line: string): string => {
  let current = line;
  while (/^\s*>/.test(current)) current = current.replace(/^(\s*)>\s?/, '$1');
  return current;
};

interface ListItemMatch {
  indent: number;
  ordered: boolean;
  text: string;
}

const matchListItem = (line: string): ListItemMatch | null => {
  if (RULE_PATTERN.test(line)) return null;
  const match = LIST_ITEM_PATTERN.exec(line);
  if (!match) return null;
  return {
    indent: indentOf(match[1]),
    ordered: /\d/.test(match[2]),
    text: match[3].trim(),
  };
};

const matchOneLineBlockEquation = (trimmed: string): string | null => {
  const dollars = /^\$\$([\s\S]*?)\$\$$/.exec(trimmed);
  if (dollars) return dollars[1];
  const brackets = /^\\\[([\s\S]*?)\\\]$/.exec(trimmed);
  return brackets ? brackets[1] : null;
};

interface BlockEquationMatch {
  latex: string;
  next: number;
  trailing: string;
}

const BLOCK_DELIMITERS: Array<{ open: string; close: string }> = [
  { open: '$$', close: '$$' },
  { open: '\\[', close: '\\]' },
];

/** Returns null when the block never closes. */
const parseBlockEquation = (lines: string[], start: number, open: string, close: string): BlockEquationMatch | null => {
  const firstRest = lines[start].trim().slice(open.length);
  const collected: string[] = [];

  let closeAt = firstRest.indexOf(close);
  if (closeAt !== -1) {
    return { latex: firstRest.slice(0, closeAt), next: start + 1, trailing: firstRest.slice(closeAt + close.length).trim() };
  }
  collected.push(firstRest);

  for (let j = start + 1; j < lines.length; j++) {
    closeAt = lines[j].indexOf(close);
    if (closeAt !== -1) {
      collected.push(lines[j].slice(0, closeAt));
      return { latex: collected.join('\n'), next: j + 1, trailing: lines[j].slice(closeAt + close.length).trim() };
    }
    collected.push(lines[j]);
  }
  return null;
};

interface DraftItem {
  lines: string[];
  children: Array<DraftList | ExplanationNode>;
}

interface DraftList {
  kind: 'draft';
  ordered: boolean;
  indent: number;
  items: DraftItem[];
}

const lastOf = <T>(values: T[]): T => values[values.length - 1];

const finalizeList = (draft: DraftList): ExplanationNode => ({
  kind: 'list',
  ordered: draft.ordered,
  items: draft.items.map(
    (item): ListItem => ({
      spans: parseSpans(item.lines.join(' ')),
      children: item.children.map((child) => (child.kind === 'draft' ? finalizeList(child) : child)),
    }),
  ),
});

const parseList = (lines: string[], start: number, first: ListItemMatch): { node: ExplanationNode; next: number } => {
  const root: DraftList = { kind: 'draft', ordered: first.ordered, indent: first.indent, items: [] };
  const stack: DraftList[] = [root];
  let pendingBlank = false;
  let i = start;

  while (i < lines.length) {
    const line = lines[i];
    if (line.trim() === '') {
      pendingBlank = true;
      i += 1;
      continue;
    }

    const item = matchListItem(line);
    if (item) {
      while (stack.length > 1 && item.indent < lastOf(stack).indent) stack.pop();
      let current = lastOf(stack);

      if (item.indent > current.indent && current.items.length > 0 && stack.length < MAX_LIST_DEPTH) {
        const nested: DraftList = { kind: 'draft', ordered: item.ordered, indent: item.indent, items: [] };
        lastOf(current.items).children.push(nested);
        stack.push(nested);
        current = nested;
      } else if (item.ordered !== current.ordered) {
        if (stack.length === 1) break;
        stack.pop();
        const sibling: DraftList = { kind: 'draft', ordered: item.ordered, indent: item.indent, items: [] };
        lastOf(lastOf(stack).items).children.push(sibling);
        stack.push(sibling);
        current = sibling;
      }

      current.items.push({ lines: [item.text], children: [] });
      pendingBlank = false;
      i += 1;
      continue;
    }

    const indent = indentOf(line);
    if (indent <= root.indent) break;

    while (stack.length > 1 && indent <= lastOf(stack).indent) stack.pop();
    const owner = lastOf(lastOf(stack).items);
    const trimmed = line.trim();
    const latex = matchOneLineBlockEquation(trimmed);
    const opener = latex === null ? BLOCK_DELIMITERS.find(({ open }) => trimmed.startsWith(open)) : undefined;
    const equation = opener ? parseBlockEquation(lines, i, opener.open, opener.close) : null;

    if (latex !== null) {
      if (latex.trim()) owner.children.push({ kind: 'equation', latex: latex.trim(), display: 'block' });
    } else if (opener && equation === null) {
      degrade('unterminated block equation', trimmed);
      owner.children.push({ kind: 'paragraph', spans: [{ kind: 'text', text: trimmed }] });
    } else if (equation && equation.next > i + 1) {
      // Continuation lines carry the item's indentation.
      const body = equation.latex
        .split('\n')
        .map((part) => part.trim())
        .join('\n')
        .trim();
      if (body) owner.children.push({ kind: 'equation', latex: body, display: 'block' });
      if (equation.trailing) owner.children.push({ kind: 'paragraph', spans: parseSpans(equation.trailing) });
      pendingBlank = false;
      i = equation.next;
      continue;
    } else if (pendingBlank || owner.children.length > 0) {
      owner.children.push({ kind: 'paragraph', spans: parseSpans(trimmed) });
    } else {
      owner.lines.push(trimmed);
    }
    pendingBlank = false;
    i += 1;
  }

  return { node: finalizeList(root), next: i };
};

const parseBlocks = (raw: string): ExplanationNode[] => {
  const lines = raw.replace(/\r\n?/g, '\n').split('\n').map(stripQuote);
  const nodes: ExplanationNode[] = [];
  let paragraph: string[] = [];

  const flushParagraph = () => {
    if (paragraph.length === 0) return;
    const spans = parseSpans(paragraph.join(' '));
    paragraph = [];
    if (spans.length > 0) nodes.push({ kind: 'paragraph', spans });
  };

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    const trimmed = line.trim();

    if (trimmed === '') {
      flushParagraph();
      i += 1;
      continue;
    }

    if (FENCE_PATTERN.test(line)) {
      const fence = trimmed.slice(0, 3);
      let end = -1;
      for (let j = i + 1; j < lines.length; j++) {
        if (lines[j].trim().startsWith(fence)) {
          end = j;
          break;
        }
      }
      if (end !== -1) {
        flushParagraph();
        const code = lines.slice(i + 1, end).join('\n');
        if (code.trim()) nodes.push({ kind: 'paragraph', spans: [{ kind: 'text', text: code }] });
        i = end + 1;
        continue;
      }
    }

    const heading = HEADING_PATTERN.exec(trimmed);
    if (heading) {
      flushParagraph();
      const level = Math.min(3, heading[1].length);
      const spans = parseSpans(heading[2]);
      if (spans.length > 0) {
        nodes.push({ kind: 'heading', level: level === 1 ? 1 : level === 2 ? 2 : 3, spans });
      }
      i += 1;
      continue;
    }

    if (RULE_PATTERN.test(line)) {
      flushParagraph();
      degrade('horizontal rule', trimmed);
      i += 1;
      continue;
    }

    const delimiter = BLOCK_DELIMITERS.find(({ open }) => trimmed.startsWith(open));
    if (delimiter) {
      const equation = parseBlockEquation(lines, i, delimiter.open, delimiter.close);
      if (equation === null) {
        flushParagraph();
        degrade('unterminated block equation', trimmed);
        nodes.push({ kind: 'paragraph', spans: [{ kind: 'text', text: trimmed }] });
        i += 1;
        continue;
      }
      if (!equation.trailing) {
        flushParagraph();
        const latex = equation.latex.trim();
        if (latex) nodes.push({ kind: 'equation', latex, display: 'block' });
        i = equation.next;
        continue;
      }
      // "$$x$$ is ..." on one line reads as prose with display math inside.
      if (equation.next === i + 1) {
        paragraph.push(trimmed);
        i += 1;
        continue;
      }
      flushParagraph();
      const latex = equation.latex.trim();
      if (latex) nodes.push({ kind: 'equation', latex, display: 'block' });
      paragraph.push(equation.trailing);
      i = equation.next;
      continue;
    }

    const item = matchListItem(line);
    if (item) {
      flushParagraph();
      const list = parseList(lines, i, item);
      nodes.push(list.node);
      i = list.next;
      continue;
    }

    paragraph.push(trimmed);
    i += 1;
  }

  flushParagraph();
  return nodes;
};

/**
 * Turns model-written text into explanation nodes. Never throws: anything it
 * cannot read structurally comes back as plain paragraphs.
 */
export const parseExplanation = (raw: string): ExplanationNode[] => {
  try {
    return parseBlocks(raw);
  } catch (error: unknown) {
    log.warn('Explanation parser fell back to plain text.', error);
    const text = raw.trim();
    return text ? [{ kind: 'paragraph', spans: [{ kind: 'text', text }] }] : [];
  }
};

export const headingNode = (level: HeadingLevel, text: string): ExplanationNode => ({
  kind: 'heading',
  level,
  spans: parseSpans(text),
});
