/**
 * Document model for markdown inputs.
 *
 * A document is a flat sequence of block nodes (headings, paragraphs, code
 * blocks, one node per list item, ...) whose inline content is held in
 * `children`. Fragments and the empty node are markers produced while
 * rewriting: a fragment splices its children into the node it replaces,
 * the empty node leaves the original in place.
 */

export type MdNode =
  | Heading
  | Paragraph
  | Text
  | Code
  | CodeInline
  | Strong
  | Emphasis
  | Delete
  | Link
  | Image
  | ListItem
  | Blockquote
  | HorizontalRule
  | Html
  | Break
  | TableCell
  | TableAlign
  | Fragment
  | Empty;

export interface Heading { type: 'heading'; depth: number; children: MdNode[] }
export interface Paragraph { type: 'paragraph'; children: MdNode[] }
export interface Text { type: 'text'; value: string }
export interface Code { type: 'code'; value: string; lang: string | null }
export interface CodeInline { type: 'codeInline'; value: string }
export interface Strong { type: 'strong'; children: MdNode[] }
export interface Emphasis { type: 'emphasis'; children: MdNode[] }
export interface Delete { type: 'delete'; children: MdNode[] }
export interface Link { type: 'link'; url: string; title: string | null; children: MdNode[] }
export interface Image { type: 'image'; url: string; alt: string; title: string | null }
export interface ListItem {
  type: 'list';
  level: number;
  index: number;
  /** Number of the first item of an ordered list. */
  start: number;
  ordered: boolean;
  checked: boolean | null;
  children: MdNode[];
}
export interface Blockquote { type: 'blockquote'; children: MdNode[] }
export interface HorizontalRule { type: 'horizontalRule' }
export interface Html { type: 'html'; value: string }
export interface Break { type: 'break' }
export interface TableCell { type: 'tableCell'; row: number; column: number; children: MdNode[] }
/** Delimiter row between a table's header and its body. */
export interface TableAlign { type: 'tableAlign'; align: TableAlignKind[] }
export interface Fragment { type: 'fragment'; children: MdNode[] }
export interface Empty { type: 'empty' }

export type Container = Extract<MdNode, { children: MdNode[] }>;

export type TableAlignKind = 'left' | 'right' | 'center' | 'none';

export type AttributeValue = string | number | boolean | null;

export const EMPTY: Empty = { type: 'empty' };

export function text(value: string): Text {
  return { type: 'text', value };
}

export function fragment(children: MdNode[]): Fragment {
  return { type: 'fragment', children };
}

export function isContainer(node: MdNode): node is Container {
  return 'children' in node;
}

export function isEmpty(node: MdNode): boolean {
  return node.type === 'empty' || (node.type === 'fragment' && node.children.every(isEmpty));
}

// ─── Rendering ───────────────────────────────────────────

function renderInline(children: MdNode[]): string {
  return children.map(toMarkdown).join('');
}

const ALIGN_MARKERS: Record<TableAlignKind, string> = {
  left: ':---',
  right: '---:',
  center: ':---:',
  none: '---',
};

function titleSuffix(title: string | null): string {
  return title ? ` "${title}"` : '';
}

export function toMarkdown(node: MdNode): string {
  switch (node.type) {
    case 'heading':
      return `${'#'.repeat(node.depth)} ${renderInline(node.children)}`;
    case 'paragraph':
    case 'fragment':
      return renderInline(node.children);
    case 'text':
    case 'html':
      return node.value;
    case 'code':
      return '```' + (node.lang ?? '') + '\n' + node.value + '\n```';
    case 'codeInline':
      return '`' + node.value + '`';
    case 'strong':
      return `**${renderInline(node.children)}**`;
    case 'emphasis':
      return `*${renderInline(node.children)}*`;
    case 'delete':
      return `~~${renderInline(node.children)}~~`;
    case 'link':
      return `[${renderInline(node.children)}](${node.url}${titleSuffix(node.title)})`;
    case 'image':
      return `![${node.alt}](${node.url}${titleSuffix(node.title)})`;
    case 'list': {
      const marker = node.ordered ? `${node.start + node.index}.` : '-';
      const checkbox = node.checked === null ? '' : node.checked ? '[x] ' : '[ ] ';
      return `${'  '.repeat(node.level)}${marker} ${checkbox}${renderInline(node.children)}`;
    }
    case 'blockquote':
      return `> ${renderInline(node.children)}`;
    case 'horizontalRule':
      return '---';
    case 'break':
      return '\n';
    case 'tableCell':
      return renderInline(node.children);
    case 'tableAlign':
      return `|${node.align.map(kind => ALIGN_MARKERS[kind]).join('|')}|`;
    case 'empty':
      return '';
  }
}

interface Line {
  node: MdNode;
  text: string;
}

/** Cells sharing a row are written on one line as `|a|b|`. */
function documentLines(nodes: MdNode[]): Line[] {
  const lines: Line[] = [];
  let rowLine: Line | null = null;
  let row = -1;

  for (const node of nodes) {
    if (isEmpty(node)) continue;
    if (node.type === 'tableCell') {
      if (rowLine !== null && row === node.row) {
        rowLine.text += `${toMarkdown(node)}|`;
        continue;
      }
      rowLine = { node, text: `|${toMarkdown(node)}|` };
      row = node.row;
      lines.push(rowLine);
      continue;
    }
    rowLine = null;
    lines.push({ node, text: toMarkdown(node) });
  }
  return lines;
}

function isTableLine(node: MdNode): boolean {
  return node.type === 'tableCell' || node.type === 'tableAlign';
}

/** Render a node sequence as a document. Consecutive list items and table rows stay on adjacent lines. */
export function renderDocument(nodes: MdNode[]): string {
  let out = '';
  let previous: MdNode | null = null;
  for (const { node, text: line } of documentLines(nodes)) {
    if (previous !== null) {
      const adjacent = (previous.type === 'list' && node.type === 'list') || (isTableLine(previous) && isTableLine(node));
      out += adjacent ? '\n' : '\n\n';
    }
    out += line;
    previous = node;
  }
  return out;
}

/** Plain text content of a node. */
export function nodeValue(node: MdNode): string {
  switch (node.type) {
    case 'text':
    case 'code':
    case 'codeInline':
    case 'html':
      return node.value;
    case 'image':
      return node.alt;
    case 'break':
      return '\n';
    case 'horizontalRule':
    case 'tableAlign':
    case 'empty':
      return '';
    default:
      return node.children.map(nodeValue).join('');
  }
}

export function nodeName(node: MdNode): string {
  switch (node.type) {
    case 'codeInline': return 'code_inline';
    case 'horizontalRule': return 'hr';
    case 'tableCell': return 'table_cell';
    case 'tableAlign': return 'table_align';
    default: return node.type;
  }
}

// ─── Rewriting ───────────────────────────────────────────

/**
 * Replace the node's value, keeping its kind. Containers rewrite their first
 * child (or gain a text child when they have none).
 */
export function withValue(node: MdNode, value: string): MdNode {
  switch (node.type) {
    case 'text':
    case 'code':
    case 'codeInline':
    case 'html':
      return { ...node, value };
    case 'image':
      return { ...node, alt: value };
    case 'horizontalRule':
    case 'break':
    case 'tableAlign':
    case 'empty':
      return node;
    default: {
      const [first, ...rest] = node.children;
      const children = first === undefined ? [text(value)] : [withValue(first, value), ...rest];
      return { ...node, children };
    }
  }
}

/** Containers become a fragment of their children; leaves become empty. */
export function toFragment(node: MdNode): MdNode {
  if (node.type === 'fragment') return node;
  return isContainer(node) ? fragment([...node.children]) : EMPTY;
}

/**
 * Splice a fragment back into the node it was derived from. An empty entry
 * keeps the current child; a nested fragment recurses into it.
 */
export function applyFragment(node: MdNode, replacement: Fragment): MdNode {
  if (!isContainer(node)) return node;
  const children = node.children.map((child, i) => {
    const next = replacement.children[i];
    if (next === undefined || next.type === 'empty') return child;
    if (next.type === 'fragment') return applyFragment(child, next);
    return next;
  });
  return { ...node, children };
}

/** Apply `f` to the node; when it returns a fragment, continue into each of the fragment's children. */
export function mapValues(node: MdNode, f: (node: MdNode) => MdNode): MdNode {
  const result = f(node);
  if (result.type === 'fragment') {
    return fragment(result.children.map(child => mapValues(child, f)));
  }
  return result;
}

export function findAtIndex(node: MdNode, index: number): MdNode | null {
  if (!isContainer(node)) return null;
  return node.children[index] ?? null;
}

// ─── Selectors ───────────────────────────────────────────

const HEADING_SELECTOR = /^h([1-6])$/;

const NODE_SELECTORS: Record<string, (node: MdNode) => boolean> = {
  h: node => node.type === 'heading',
  heading: node => node.type === 'heading',
  paragraph: node => node.type === 'paragraph',
  text: node => node.type === 'text',
  code: node => node.type === 'code',
  code_inline: node => node.type === 'codeInline',
  strong: node => node.type === 'strong',
  emphasis: node => node.type === 'emphasis',
  em: node => node.type === 'emphasis',
  delete: node => node.type === 'delete',
  link: node => node.type === 'link',
  image: node => node.type === 'image',
  list: node => node.type === 'list',
  blockquote: node => node.type === 'blockquote',
  hr: node => node.type === 'horizontalRule',
  html: node => node.type === 'html',
  break: node => node.type === 'break',
  table: node => node.type === 'tableCell',
  table_align: node => node.type === 'tableAlign',
};

export const ATTRIBUTE_SELECTORS = new Set([
  'value', 'lang', 'depth', 'level', 'index', 'ordered', 'checked', 'url', 'title', 'alt',
  'start', 'row', 'column', 'align',
]);

export function isNodeSelector(name: string): boolean {
  return HEADING_SELECTOR.test(name) || Object.hasOwn(NODE_SELECTORS, name);
}

export function matchesSelector(node: MdNode, name: string): boolean {
  const heading = HEADING_SELECTOR.exec(name);
  if (heading) {
    return node.type === 'heading' && node.depth === Number(heading[1]);
  }
  return Object.hasOwn(NODE_SELECTORS, name) && NODE_SELECTORS[name](node);
}

/** An attribute of the node, or undefined when the node has no such attribute. */
export function nodeAttr(node: MdNode, name: string): AttributeValue | undefined {
  if (name === 'value') return nodeValue(node);
  switch (node.type) {
    case 'heading':
      return name === 'depth' ? node.depth : undefined;
    case 'code':
      return name === 'lang' ? node.lang : undefined;
    case 'link':
      if (name === 'url') return node.url;
      if (name === 'title') return node.title;
      return undefined;
    case 'image':
      if (name === 'url') return node.url;
      if (name === 'title') return node.title;
      if (name === 'alt') return node.alt;
      return undefined;
    case 'list':
      if (name === 'level') return node.level;
      if (name === 'index') return node.index;
      if (name === 'ordered') return node.ordered;
      if (name === 'checked') return node.checked;
      if (name === 'start') return node.ordered ? node.start : undefined;
      return undefined;
    case 'tableCell':
      if (name === 'row') return node.row;
      if (name === 'column') return node.column;
      return undefined;
    case 'tableAlign':
      return name === 'align' ? node.align.join(',') : undefined;
    default:
      return undefined;
  }
}
