import MarkdownIt from 'markdown-it';
import { MdNode, ListItem, TableAlignKind, TableCell, text } from './node';

type MdToken = ReturnType<MarkdownIt['parse']>[number];

const md = new MarkdownIt({ html: true });

const TASK_MARKER = /^\[([ xX])\]\s+/;
const TEXT_ALIGN = /text-align:\s*(left|right|center)/;

/** Parse a markdown document into the flat node sequence the runtime queries. */
export function parseMarkdown(source: string): MdNode[] {
  const tokens = md.parse(source, {});
  return new BlockReader(tokens).readBlocks(null, 0);
}

/** Render markdown source to HTML. */
export function renderHtml(source: string): string {
  return md.render(source);
}

class BlockReader {
  private pos = 0;

  constructor(private tokens: MdToken[]) {}

  /** Read blocks until the closing token `until` (exclusive of nested structures). */
  readBlocks(until: string | null, level: number): MdNode[] {
    const nodes: MdNode[] = [];

    while (this.pos < this.tokens.length) {
      const tok = this.tokens[this.pos];
      if (tok.type === until) {
        this.pos++;
        return nodes;
      }

      switch (tok.type) {
        case 'heading_open': {
          const children = this.readInlineAfter();
          nodes.push({ type: 'heading', depth: Number(tok.tag.slice(1)), children });
          break;
        }
        case 'paragraph_open':
          nodes.push({ type: 'paragraph', children: this.readInlineAfter() });
          break;
        case 'fence':
        case 'code_block':
          this.pos++;
          nodes.push({
            type: 'code',
            value: tok.content.replace(/\n$/, ''),
            lang: tok.info.trim() === '' ? null : tok.info.trim(),
          });
          break;
        case 'hr':
          this.pos++;
          nodes.push({ type: 'horizontalRule' });
          break;
        case 'html_block':
          this.pos++;
          nodes.push({ type: 'html', value: tok.content.replace(/\n$/, '') });
          break;
        case 'blockquote_open': {
          this.pos++;
          const inner = this.readBlocks('blockquote_close', level);
          nodes.push({ type: 'blockquote', children: joinBlocks(inner) });
          break;
        }
        case 'bullet_list_open':
          this.pos++;
          nodes.push(...this.readList(false, 1, level));
          break;
        case 'ordered_list_open':
          this.pos++;
          nodes.push(...this.readList(true, Number(tok.attrGet('start') ?? 1), level));
          break;
        case 'table_open':
          this.pos++;
          nodes.push(...this.readTable());
          break;
        case 'inline':
          // Inline content outside a paragraph.
          this.pos++;
          nodes.push({ type: 'paragraph', children: readInline(tok.children ?? []) });
          break;
        default:
          this.pos++;
      }
    }
    return nodes;
  }

  /** Each list item becomes one node; nested lists follow their parent item one level deeper. */
  private readList(ordered: boolean, start: number, level: number): MdNode[] {
    const closeType = ordered ? 'ordered_list_close' : 'bullet_list_close';
    const items: MdNode[] = [];
    let index = 0;

    while (this.pos < this.tokens.length) {
      const tok = this.tokens[this.pos];
      this.pos++;
      if (tok.type === closeType) break;
      if (tok.type !== 'list_item_open') continue;

      const blocks = this.readBlocks('list_item_close', level + 1);
      const nested = blocks.filter(node => node.type === 'list');
      const content = joinBlocks(blocks.filter(node => node.type !== 'list'));
      items.push(listItem(content, { level, index, start, ordered }), ...nested);
      index++;
    }
    return items;
  }

  /**
   * Cells are numbered by row, the header being row 0. The delimiter row
   * follows the header as a tableAlign node.
   */
  private readTable(): MdNode[] {
    const nodes: MdNode[] = [];
    const align: TableAlignKind[] = [];
    let row = -1;
    let column = 0;

    while (this.pos < this.tokens.length) {
      const tok = this.tokens[this.pos];
      this.pos++;
      switch (tok.type) {
        case 'table_close':
          return nodes;
        case 'tr_open':
          row++;
          column = 0;
          break;
        case 'thead_close':
          nodes.push({ type: 'tableAlign', align });
          break;
        case 'th_open':
          align.push(alignKind(tok.attrGet('style')));
          nodes.push(this.readCell(row, column++));
          break;
        case 'td_open':
          nodes.push(this.readCell(row, column++));
          break;
        default:
          break;
      }
    }
    return nodes;
  }

  private readCell(row: number, column: number): TableCell {
    const inline = this.tokens[this.pos];
    const children = inline !== undefined && inline.type === 'inline' ? readInline(inline.children ?? []) : [];
    return { type: 'tableCell', row, column, children };
  }

  private readInlineAfter(): MdNode[] {
    // open, inline, close
    const inline = this.tokens[this.pos + 1];
    this.pos += 3;
    return inline && inline.type === 'inline' ? readInline(inline.children ?? []) : [];
  }
}

type ListPosition = Pick<ListItem, 'level' | 'index' | 'start' | 'ordered'>;

function alignKind(style: string | null): TableAlignKind {
  const kind = style === null ? undefined : TEXT_ALIGN.exec(style)?.[1];
  if (kind === 'left' || kind === 'right' || kind === 'center') return kind;
  return 'none';
}

function listItem(children: MdNode[], position: ListPosition): ListItem {
  const first = children[0];
  if (first !== undefined && first.type === 'text') {
    const task = TASK_MARKER.exec(first.value);
    if (task) {
      const rest = first.value.slice(task[0].length);
      return {
        type: 'list',
        ...position,
        checked: task[1] !== ' ',
        children: [text(rest), ...children.slice(1)],
      };
    }
  }
  return { type: 'list', ...position, checked: null, children };
}

/** Flatten block children into inline content, separating blocks with a break. */
function joinBlocks(blocks: MdNode[]): MdNode[] {
  const out: MdNode[] = [];
  blocks.forEach((block, i) => {
    if (i > 0) out.push({ type: 'break' });
    if (block.type === 'paragraph') {
      out.push(...block.children);
    } else {
      out.push(block);
    }
  });
  return out;
}

function readInline(tokens: MdToken[]): MdNode[] {
  const root: MdNode[] = [];
  const stack: MdNode[][] = [root];
  const current = (): MdNode[] => stack[stack.length - 1];
  const open = (node: MdNode & { children: MdNode[] }): void => {
    current().push(node);
    stack.push(node.children);
  };

  for (const tok of tokens) {
    switch (tok.type) {
      case 'text':
        appendText(current(), tok.content);
        break;
      case 'softbreak':
        appendText(current(), '\n');
        break;
      case 'hardbreak':
        current().push({ type: 'break' });
        break;
      case 'code_inline':
        current().push({ type: 'codeInline', value: tok.content });
        break;
      case 'html_inline':
        current().push({ type: 'html', value: tok.content });
        break;
      case 'image':
        current().push({
          type: 'image',
          url: tok.attrGet('src') ?? '',
          alt: tok.content,
          title: tok.attrGet('title'),
        });
        break;
      case 'strong_open':
        open({ type: 'strong', children: [] });
        break;
      case 'em_open':
        open({ type: 'emphasis', children: [] });
        break;
      case 's_open':
        open({ type: 'delete', children: [] });
        break;
      case 'link_open':
        open({ type: 'link', url: tok.attrGet('href') ?? '', title: tok.attrGet('title'), children: [] });
        break;
      case 'strong_close':
      case 'em_close':
      case 's_close':
      case 'link_close':
        if (stack.length > 1) stack.pop();
        break;
      default:
        if (tok.content !== '') appendText(current(), tok.content);
    }
  }
  return root;
}

/** markdown-it splits text at special characters; merge adjacent runs back together. */
function appendText(target: MdNode[], value: string): void {
  const last = target[target.length - 1];
  if (last !== undefined && last.type === 'text') {
    target[target.length - 1] = text(last.value + value);
  } else {
    target.push(text(value));
  }
}
