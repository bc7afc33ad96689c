/**
 * Template AST
 * @module template/ast
 *
 * Node types produced by parseTemplate and walked by TemplateRenderer.
 */

import type { ScalarValue } from '../values/index.js';

// ============================================================================
// Expressions
// ============================================================================

/**
 * `.a.b` chain on the current context. An empty chain is `.` itself.
 */
export interface FieldExpr {
  readonly type: 'field';
  readonly chain: readonly string[];
  /** Expression as written, used in error messages */
  readonly text: string;
}

/**
 * `$`, `$name` or `$name.a.b`
 */
export interface VariableExpr {
  readonly type: 'variable';
  readonly name: string;
  readonly chain: readonly string[];
  readonly text: string;
}

/**
 * String, number, boolean or nil literal
 */
export interface LiteralExpr {
  readonly type: 'literal';
  readonly value: ScalarValue;
}

/**
 * Parenthesised pipeline, optionally followed by a field chain
 */
export interface SubExpr {
  readonly type: 'sub';
  readonly pipeline: Pipeline;
  readonly chain: readonly string[];
  readonly text: string;
}

export type Expr = FieldExpr | VariableExpr | LiteralExpr | SubExpr;

// ============================================================================
// Pipelines
// ============================================================================

export interface CallCommand {
  readonly type: 'call';
  readonly name: string;
  readonly args: readonly Expr[];
}

export interface OperandCommand {
  readonly type: 'operand';
  readonly operand: Expr;
}

export type Command = CallCommand | OperandCommand;

export interface Pipeline {
  /** Variables declared (`:=`) or assigned (`=`) by this pipeline */
  readonly decl: readonly string[];
  readonly assign: boolean;
  readonly commands: readonly Command[];
  readonly line: number;
}

// ============================================================================
// Nodes
// ============================================================================

export interface TextNode {
  readonly type: 'text';
  readonly text: string;
}

export interface ActionNode {
  readonly type: 'action';
  readonly pipeline: Pipeline;
  readonly line: number;
}

export interface IfNode {
  readonly type: 'if';
  readonly pipeline: Pipeline;
  readonly body: readonly TemplateNode[];
  readonly elseBody: readonly TemplateNode[];
  readonly line: number;
}

export interface WithNode {
  readonly type: 'with';
  readonly pipeline: Pipeline;
  readonly body: readonly TemplateNode[];
  readonly elseBody: readonly TemplateNode[];
  readonly line: number;
}

export interface RangeNode {
  readonly type: 'range';
  readonly pipeline: Pipeline;
  /** `$k` of `$k, $v :=`; null when fewer than two variables are declared */
  readonly keyVar: string | null;
  readonly valueVar: string | null;
  readonly body: readonly TemplateNode[];
  readonly elseBody: readonly TemplateNode[];
  readonly line: number;
}

export interface TemplateCallNode {
  readonly type: 'template';
  readonly name: string;
  readonly pipeline: Pipeline | null;
  readonly line: number;
}

export type TemplateNode =
  | TextNode
  | ActionNode
  | IfNode
  | WithNode
  | RangeNode
  | TemplateCallNode;

// ============================================================================
// Fragments
// ============================================================================

/**
 * A named sub-template declared with `define`
 */
export interface HelperDefinition {
  readonly name: string;
  /** Template file the definition came from */
  readonly file: string;
  readonly body: readonly TemplateNode[];
}

/**
 * Parsed template. Immutable and reusable across renders.
 */
export interface TemplateFragment {
  readonly name: string;
  readonly nodes: readonly TemplateNode[];
  readonly defines: ReadonlyMap<string, HelperDefinition>;
  /** False when the source is plain text */
  readonly hasActions: boolean;
}
