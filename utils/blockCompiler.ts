import type {
  DocumentBlock,
  ExplanationNode,
  ListItem,
  RichTextRun,
  Span,
  StructuralLimits,
  TextBlockKind,
} from '../types';

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

/**
 * Splits text into pieces of at most `maxChars`, breaking after the last
 * whitespace that fits. Pieces concatenate back to the input.
 */
export const splitText = (text: string, maxChars: number): string[] => {
  const limit = Math.max(1, maxChars);
  const pieces: string[] = [];
  let rest = text;

  while (rest.length > limit) {
    const window = rest.slice(0, limit);
    let cut = -1;
    for (let i = window.length - 1; i >= 0; i--) {
      if (/\s/.test(window[i])) {
        cut = i + 1;
        break;
      }
    }
    if (cut === -1) {
      cut = limit;
      if (limit > 1 && isHighSurrogate(rest.charCodeAt(limit - 1))) cut = limit - 1;
    }
    pieces.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  if (rest) pieces.push(rest);
  return pieces;
};

const textRuns = (content: string, bold: boolean, maxChars: number): RichTextRun[] =>
  splitText(content, maxChars).map((piece): RichTextRun => ({ type: 'text', content: piece, bold }));

export type RunLimits = Pick<StructuralLimits, 'maxCharsPerRun' | 'maxCharsPerEquation'>;

export const spansToRuns = (spans: Span[], limits: RunLimits): RichTextRun[] => {
  const maxChars = limits.maxCharsPerRun;
  const maxExpression = Math.min(maxChars, limits.maxCharsPerEquation);
  return spans.flatMap((span): RichTextRun[] => {
    switch (span.kind) {
      case 'text':
        return span.text ? textRuns(span.text, false, maxChars) : [];
      case 'bold':
        return span.text ? textRuns(span.text, true, maxChars) : [];
      case 'inline_equation':
        // Equations are never cut; one that cannot fit travels as its source text.
        return span.latex.length <= maxExpression
          ? [{ type: 'equation', expression: span.latex }]
          : textRuns(`$${span.latex}$`, false, maxChars);
    }
  });
};

const chunk = <T>(values: T[], size: number): T[][] => {
  const step = Math.max(1, size);
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += step) {
    chunks.push(values.slice(i, i + step));
  }
  return chunks;
};

const textBlock = (kind: TextBlockKind, runs: RichTextRun[], children: DocumentBlock[] = []): DocumentBlock => ({
  kind,
  runs,
  children,
});

/**
 * One text block, or several once its runs or children pass the array ceiling:
 * extra runs continue in blocks of the same kind, extra children follow as siblings.
 */
const textBlocks = (
  kind: TextBlockKind,
  runs: RichTextRun[],
  children: DocumentBlock[],
  limits: StructuralLimits,
): DocumentBlock[] => {
  const size = Math.max(1, limits.maxArrayLength);
  const groups = runs.length > 0 ? chunk(runs, size) : [[]];
  const kept = children.slice(0, size);
  const blocks = groups.map((group, i) => textBlock(kind, group, i === groups.length - 1 ? kept : []));
  return [...blocks, ...children.slice(size)];
};

const lowerListItem = (
  item: ListItem,
  ordered: boolean,
  depth: number,
  limits: StructuralLimits,
): DocumentBlock[] => {
  const runs = spansToRuns(item.spans, limits);
  const kind: TextBlockKind = ordered ? 'numbered_list_item' : 'bulleted_list_item';

  if (depth < limits.maxNestingDepth) {
    const children = lowerAt(item.children, depth + 1, limits);
    if (runs.length === 0 && children.length === 0) return [];
    return textBlocks(kind, runs, children, limits);
  }

  // At the deepest level a request allows, nested content follows the item.
  const siblings = lowerAt(item.children, depth, limits);
  return runs.length > 0 ? [...textBlocks(kind, runs, [], limits), ...siblings] : siblings;
};

const lowerNode = (node: ExplanationNode, depth: number, limits: StructuralLimits): DocumentBlock[] => {
  switch (node.kind) {
    case 'heading': {
      const runs = spansToRuns(node.spans, limits);
      return runs.length > 0 ? textBlocks(`heading_${node.level}`, runs, [], limits) : [];
    }
    case 'paragraph': {
      const runs = spansToRuns(node.spans, limits);
      return runs.length > 0 ? textBlocks('paragraph', runs, [], limits) : [];
    }
    case 'equation': {
      const latex = node.latex.trim();
      if (!latex) return [];
      if (node.display === 'inline') {
        return textBlocks('paragraph', spansToRuns([{ kind: 'inline_equation', latex }], limits), [], limits);
      }
      return latex.length <= limits.maxCharsPerEquation
        ? [{ kind: 'equation', expression: latex }]
        : textBlocks('paragraph', textRuns(`$$${latex}$$`, false, limits.maxCharsPerRun), [], limits);
    }
    case 'list':
      return node.items.flatMap((item) => lowerListItem(item, node.ordered, depth, limits));
  }
};

const lowerAt = (nodes: ExplanationNode[], depth: number, limits: StructuralLimits): DocumentBlock[] =>
  nodes.flatMap((node) => lowerNode(node, depth, limits));

export const lowerNodes = (nodes: ExplanationNode[], limits: StructuralLimits): DocumentBlock[] =>
  lowerAt(nodes, 0, limits);

export const batchBlocks = (blocks: DocumentBlock[], maxBlocks: number): DocumentBlock[][] => chunk(blocks, maxBlocks);

/**
 * Lowers explanation nodes into append-ready batches that respect every
 * structural limit of the destination.
 */
export const compile = (nodes: ExplanationNode[], limits: StructuralLimits): DocumentBlock[][] =>
  batchBlocks(lowerNodes(nodes, limits), limits.maxBlocksPerRequest);
