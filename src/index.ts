export { Lexer } from './lexer/lexer';
export { Token, TokenType } from './lexer/tokens';
export { Parser, parseSource } from './parser/parser';
export * as AST from './parser/ast';
export { MdNode, toMarkdown, renderDocument } from './markdown/node';
export { parseMarkdown, renderHtml } from './markdown/parse';
export { Engine, EngineOptions, markdownInputs, textInputs, nullInput } from './runtime/engine';
export { Evaluator, EvaluatorOptions } from './runtime/evaluator';
export { Compiler, CompiledProgram, CompiledStep } from './runtime/compiler';
export { MacroExpander } from './runtime/macro-expander';
export { Environment, EnvError } from './runtime/environment';
export { MarqError, MacroExpansionError, ErrorType } from './runtime/errors';
export { Debugger, DebuggerAction, DebuggerHandler, DebugContext } from './runtime/debugger';
export { ModuleLoader, LoadedModule, DEFAULT_SEARCH_PATHS } from './runtime/module-loader';
export { updateWith } from './runtime/update';
export { callNative, isNativeFunction, nativeFunctionNames, NativeContext } from './runtime/builtins';
export {
  RuntimeValue,
  noneValue,
  boolValue,
  numberValue,
  stringValue,
  symbolValue,
  arrayValue,
  dictValue,
  markdownValue,
  isTruthy,
  valueLength,
  isEmptyValue,
  valueToString,
  valueText,
  valuesEqual,
} from './runtime/values';
export { loadConfig, loadConfigForScript, MarqConfig } from './runtime/config';

import { Engine, markdownInputs } from './runtime/engine';
import { RuntimeValue } from './runtime/values';

/**
 * Run a query over a markdown document with a fresh engine and the prelude loaded.
 */
export function query(code: string, markdown: string, options?: { useCompiler?: boolean }): RuntimeValue[] {
  const engine = new Engine({ useCompiler: options?.useCompiler });
  engine.loadBuiltinModule();
  return engine.eval(code, markdownInputs(markdown));
}
