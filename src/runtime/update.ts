import { applyFragment, withValue } from '../markdown/node';
import {
  MarkdownValue,
  RuntimeValue,
  isEmptyValue,
  markdownValue,
  selectedNode,
  valueText,
} from './values';

/**
 * Merge query results back into the inputs they were computed from, pairing
 * them up by position. Markdown inputs are rewritten; any other input is
 * replaced by its result.
 */
export function updateWith(original: RuntimeValue[], updated: RuntimeValue[]): RuntimeValue[] {
  const out: RuntimeValue[] = [];
  const n = Math.min(original.length, updated.length);
  for (let i = 0; i < n; i++) {
    const before = original[i];
    out.push(...(before.kind === 'markdown' ? updateMarkdown(before, updated[i]) : [updated[i]]));
  }
  return out;
}

function updateMarkdown(original: MarkdownValue, updated: RuntimeValue): RuntimeValue[] {
  switch (updated.kind) {
    case 'none':
    case 'function':
    case 'native':
    case 'module':
      return [original];
    case 'markdown': {
      const node = selectedNode(updated);
      if (node === null || node.type === 'empty') return [original];
      if (node.type === 'fragment') return [markdownValue(applyFragment(original.node, node))];
      return [markdownValue(node)];
    }
    case 'string':
    case 'bool':
    case 'number':
    case 'symbol':
      return [markdownValue(withValue(original.node, valueText(updated)))];
    case 'array':
      return updated.elements
        .filter(el => el.kind !== 'none')
        .flatMap(el => updateMarkdown(original, el));
    case 'dict':
      return [...updated.entries.values()]
        .filter(value => !isEmptyValue(value))
        .flatMap(value => updateMarkdown(original, value));
  }
}
