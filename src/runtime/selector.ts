import * as AST from '../parser/ast';
import { ATTRIBUTE_SELECTORS, AttributeValue, isNodeSelector, matchesSelector, nodeAttr } from '../markdown/node';
import { MarqError } from './errors';
import {
  RuntimeValue,
  boolValue,
  markdownValue,
  noneValue,
  numberValue,
  selectedNode,
  stringValue,
} from './values';

export function attributeToValue(attr: AttributeValue | undefined): RuntimeValue {
  if (attr === undefined || attr === null) return noneValue();
  if (typeof attr === 'string') return stringValue(attr);
  if (typeof attr === 'number') return numberValue(attr);
  return boolValue(attr);
}

/**
 * Apply a selector to the pipeline value. Node selectors pass matching
 * nodes through and yield None otherwise; attribute selectors yield the
 * attribute; `.[n]` indexes arrays and narrows markdown values to a child.
 */
export function applySelector(input: RuntimeValue, node: AST.Selector): RuntimeValue {
  const selector = node.selector;

  if (selector.kind === 'index') {
    if (input.kind === 'array') {
      return input.elements[selector.index] ?? noneValue();
    }
    if (input.kind === 'markdown') {
      return markdownValue(input.node, { index: selector.index });
    }
    return noneValue();
  }

  const name = selector.name;
  if (!isNodeSelector(name) && !ATTRIBUTE_SELECTORS.has(name)) {
    throw new MarqError('InvalidDefinition', `Unknown selector ".${name}"`, node.token);
  }
  if (input.kind !== 'markdown') {
    return noneValue();
  }

  const target = selectedNode(input);
  if (target === null) {
    return noneValue();
  }
  if (isNodeSelector(name)) {
    return matchesSelector(target, name) ? input : noneValue();
  }
  return attributeToValue(nodeAttr(target, name));
}
