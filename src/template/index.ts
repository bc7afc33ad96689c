/**
 * Template Module
 * @module template
 */

export type {
  TemplateFragment,
  TemplateNode,
  HelperDefinition,
  Pipeline,
  Command,
  Expr,
} from './ast.js';

export { parseTemplate } from './parser.js';
export { scanSegments, tokenizeAction, type Segment, type Token, type TokenType } from './lexer.js';
export { HelperRegistry, overlayHelpers, type HelperLookup } from './helper-registry.js';
export { isTruthy } from './truthiness.js';
export {
  missing,
  isMissing,
  displayString,
  resolveChain,
  type MissingValue,
  type RuntimeValue,
} from './runtime-value.js';
export {
  TEMPLATE_FUNCTIONS,
  RENDERER_FUNCTIONS,
  isKnownFunction,
  lookupFunction,
  type TemplateFunction,
  type FunctionContext,
} from './functions.js';
export {
  TemplateRenderer,
  buildRootContext,
  DEFAULT_RELEASE,
  DEFAULT_MAX_INCLUDE_DEPTH,
  type TemplateRendererOptions,
  type RenderBuiltins,
  type ReleaseInfo,
  type ChartInfo,
} from './renderer.js';
