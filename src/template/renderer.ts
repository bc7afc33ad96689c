/**
 * Template Renderer
 * @module template/renderer
 *
 * Evaluates a parsed TemplateFragment against merged values. Rendering is
 * synchronous and deterministic: the same fragment and values always give
 * byte-identical output.
 */

import {
  RenderDepthError,
  TemplateFunctionError,
  TemplateSyntaxError,
  UndefinedReferenceError,
  UnknownHelperError,
  type SourceLocation,
} from '../errors/index.js';
import { getModuleLogger, type StructuredLogger } from '../logging/index.js';
import {
  type MappingNode,
  type ValueNode,
  describeKind,
  fromPlain,
  mapping,
  nullNode,
  scalar,
  sortedKeys,
} from '../values/index.js';
import type {
  Command,
  Expr,
  Pipeline,
  RangeNode,
  TemplateFragment,
  TemplateNode,
} from './ast.js';
import { lookupFunction } from './functions.js';
import { type HelperLookup, HelperRegistry, overlayHelpers } from './helper-registry.js';
import { parseTemplate } from './parser.js';
import {
  type RuntimeValue,
  displayString,
  resolveChain,
} from './runtime-value.js';
import { isTruthy } from './truthiness.js';

// ============================================================================
// Built-in objects
// ============================================================================

export interface ReleaseInfo {
  name: string;
  namespace: string;
  revision?: number;
  service?: string;
  isInstall?: boolean;
  isUpgrade?: boolean;
}

export interface ChartInfo {
  name: string;
  version: string;
  appVersion?: string;
  description?: string;
  apiVersion?: string;
}

/**
 * Objects exposed next to `.Values`
 */
export interface RenderBuiltins {
  release?: Partial<ReleaseInfo>;
  chart?: ChartInfo;
}

export const DEFAULT_RELEASE: ReleaseInfo = {
  name: 'release-name',
  namespace: 'default',
};

export const DEFAULT_MAX_INCLUDE_DEPTH = 100;

function definedEntries(record: Record<string, string | number | boolean | undefined>): Record<string, string | number | boolean> {
  const result: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Root context of a render: `.Values`, `.Release`, `.Chart` and `.Template`
 */
export function buildRootContext(
  values: ValueNode,
  builtins: RenderBuiltins,
  templateName: string
): MappingNode {
  const release: ReleaseInfo = { ...DEFAULT_RELEASE, ...builtins.release };
  const entries: Array<[string, ValueNode]> = [
    ['Values', values],
    ['Release', fromPlain(definedEntries({
      Name: release.name,
      Namespace: release.namespace,
      Revision: release.revision ?? 1,
      Service: release.service ?? 'Helm',
      IsInstall: release.isInstall ?? true,
      IsUpgrade: release.isUpgrade ?? false,
    }))],
    ['Template', fromPlain({ Name: templateName, BasePath: 'templates' })],
  ];

  if (builtins.chart) {
    const chart = builtins.chart;
    entries.push(['Chart', fromPlain(definedEntries({
      Name: chart.name,
      Version: chart.version,
      AppVersion: chart.appVersion,
      Description: chart.description,
      ApiVersion: chart.apiVersion,
    }))]);
  }

  return mapping(entries);
}

// ============================================================================
// Execution
// ============================================================================

interface Variable {
  readonly name: string;
  value: RuntimeValue;
}

interface Frame {
  readonly file: string;
  readonly vars: Variable[];
}

function describeArity(min: number, max: number): string {
  if (min === max) return `${min}`;
  if (max === Number.POSITIVE_INFINITY) return `at least ${min}`;
  return `${min} to ${max}`;
}

/**
 * State of one render call. Include depth is tracked across nested
 * include/template/tpl invocations.
 */
class Execution {
  constructor(
    private readonly helpers: HelperLookup,
    private readonly maxDepth: number,
    private depth: number
  ) {}

  run(nodes: readonly TemplateNode[], file: string, data: RuntimeValue): string {
    const out: string[] = [];
    this.walk(nodes, data, { file, vars: [{ name: '$', value: data }] }, out);
    return out.join('');
  }

  private walk(nodes: readonly TemplateNode[], dot: RuntimeValue, frame: Frame, out: string[]): void {
    for (const node of nodes) {
      switch (node.type) {
        case 'text':
          out.push(node.text);
          break;

        case 'action': {
          const value = this.evalPipeline(node.pipeline, dot, frame);
          if (node.pipeline.decl.length === 0) {
            out.push(this.print(value, { file: frame.file, line: node.line }));
          }
          break;
        }

        case 'if': {
          const mark = frame.vars.length;
          const condition = this.evalPipeline(node.pipeline, dot, frame);
          this.walk(isTruthy(condition) ? node.body : node.elseBody, dot, frame, out);
          frame.vars.length = mark;
          break;
        }

        case 'with': {
          const mark = frame.vars.length;
          const value = this.evalPipeline(node.pipeline, dot, frame);
          if (isTruthy(value)) {
            this.walk(node.body, value, frame, out);
          } else {
            this.walk(node.elseBody, dot, frame, out);
          }
          frame.vars.length = mark;
          break;
        }

        case 'range':
          this.range(node, dot, frame, out);
          break;

        case 'template': {
          const data = node.pipeline ? this.evalPipeline(node.pipeline, dot, frame) : nullNode();
          out.push(this.invoke(node.name, data, { file: frame.file, line: node.line }));
          break;
        }
      }
    }
  }

  private range(node: RangeNode, dot: RuntimeValue, frame: Frame, out: string[]): void {
    const mark = frame.vars.length;
    const location = { file: frame.file, line: node.line };
    const items = this.iterationItems(this.evalPipeline(node.pipeline, dot, frame), location);

    if (items.length === 0) {
      this.walk(node.elseBody, dot, frame, out);
      return;
    }

    for (const [key, item] of items) {
      if (node.keyVar !== null) {
        frame.vars.push({ name: node.keyVar, value: key });
      }
      if (node.valueVar !== null) {
        frame.vars.push({ name: node.valueVar, value: item });
      }
      this.walk(node.body, item, frame, out);
      frame.vars.length = mark;
    }
  }

  /**
   * Sequences iterate by position, mappings in sorted key order.
   * Empty or absent values iterate zero times.
   */
  private iterationItems(value: RuntimeValue, location: SourceLocation): Array<[ValueNode, ValueNode]> {
    switch (value.kind) {
      case 'missing':
        return [];
      case 'sequence':
        return value.items.map((item, i): [ValueNode, ValueNode] => [scalar(i), item]);
      case 'mapping': {
        const items: Array<[ValueNode, ValueNode]> = [];
        for (const key of sortedKeys(value)) {
          const item = value.entries.get(key);
          if (item !== undefined) {
            items.push([scalar(key), item]);
          }
        }
        return items;
      }
      case 'scalar':
        if (!isTruthy(value)) {
          return [];
        }
        throw new TemplateFunctionError('range', `cannot iterate over ${describeKind(value)}`, location);
    }
  }

  private print(value: RuntimeValue, location: SourceLocation): string {
    if (value.kind === 'missing') {
      throw new UndefinedReferenceError(value.path, location);
    }
    return displayString(value);
  }

  // --------------------------------------------------------------------------
  // Pipelines
  // --------------------------------------------------------------------------

  private evalPipeline(pipeline: Pipeline, dot: RuntimeValue, frame: Frame): RuntimeValue {
    const location = { file: frame.file, line: pipeline.line };
    let value: RuntimeValue | undefined;
    for (const command of pipeline.commands) {
      value = this.evalCommand(command, dot, frame, value, location);
    }
    if (value === undefined) {
      throw new TemplateSyntaxError('empty pipeline', location);
    }

    for (const name of pipeline.decl) {
      const existing = pipeline.assign ? this.findVar(frame, name) : undefined;
      if (existing) {
        existing.value = value;
      } else {
        frame.vars.push({ name, value });
      }
    }
    return value;
  }

  private evalCommand(
    command: Command,
    dot: RuntimeValue,
    frame: Frame,
    piped: RuntimeValue | undefined,
    location: SourceLocation
  ): RuntimeValue {
    if (command.type === 'operand') {
      return this.evalExpr(command.operand, dot, frame, location);
    }
    const args = command.args.map(arg => this.evalExpr(arg, dot, frame, location));
    if (piped !== undefined) {
      args.push(piped);
    }
    return this.call(command.name, args, location);
  }

  private evalExpr(expr: Expr, dot: RuntimeValue, frame: Frame, location: SourceLocation): RuntimeValue {
    switch (expr.type) {
      case 'literal':
        return scalar(expr.value);
      case 'field':
        return resolveChain(dot, expr.chain, expr.text);
      case 'variable': {
        const variable = this.findVar(frame, expr.name);
        if (!variable) {
          throw new TemplateSyntaxError(`undefined variable "${expr.name}"`, location);
        }
        return resolveChain(variable.value, expr.chain, expr.text);
      }
      case 'sub':
        return resolveChain(this.evalPipeline(expr.pipeline, dot, frame), expr.chain, expr.text);
    }
  }

  private findVar(frame: Frame, name: string): Variable | undefined {
    for (let i = frame.vars.length - 1; i >= 0; i--) {
      const variable = frame.vars[i];
      if (variable.name === name) {
        return variable;
      }
    }
    return undefined;
  }

  // --------------------------------------------------------------------------
  // Functions and helpers
  // --------------------------------------------------------------------------

  private call(name: string, args: RuntimeValue[], location: SourceLocation): RuntimeValue {
    if (name === 'include' || name === 'tpl') {
      if (args.length !== 2) {
        throw new TemplateFunctionError(name, `expected 2 arguments, got ${args.length}`, location);
      }
      const [first, data] = args;
      const source = this.stringArg(name, first, location);
      return scalar(
        name === 'include'
          ? this.invoke(source, data, location)
          : this.renderTpl(source, data, location)
      );
    }

    const fn = lookupFunction(name);
    if (!fn) {
      throw new TemplateSyntaxError(`function "${name}" not defined`, location);
    }
    if (args.length < fn.minArgs || args.length > fn.maxArgs) {
      throw new TemplateFunctionError(
        name,
        `expected ${describeArity(fn.minArgs, fn.maxArgs)} arguments, got ${args.length}`,
        location
      );
    }

    const ctx = { name, location };
    if (fn.acceptsMissing) {
      return fn.call(args, ctx);
    }

    const concrete: ValueNode[] = [];
    for (const arg of args) {
      if (arg.kind === 'missing') {
        throw new UndefinedReferenceError(arg.path, location);
      }
      concrete.push(arg);
    }
    return fn.call(concrete, ctx);
  }

  private stringArg(fnName: string, value: RuntimeValue, location: SourceLocation): string {
    if (value.kind === 'missing') {
      throw new UndefinedReferenceError(value.path, location);
    }
    if (value.kind === 'scalar' && typeof value.value === 'string') {
      return value.value;
    }
    throw new TemplateFunctionError(fnName, `expected a string, got ${describeKind(value)}`, location);
  }

  /**
   * Render a named helper with `data` as both `.` and `$`
   */
  private invoke(name: string, data: RuntimeValue, location: SourceLocation): string {
    const helper = this.helpers.lookup(name);
    if (!helper) {
      throw new UnknownHelperError(name, location);
    }
    if (this.depth >= this.maxDepth) {
      throw new RenderDepthError(name, this.maxDepth, location);
    }

    this.depth++;
    try {
      return this.run(helper.body, helper.file, data);
    } finally {
      this.depth--;
    }
  }

  private renderTpl(source: string, data: RuntimeValue, location: SourceLocation): string {
    if (this.depth >= this.maxDepth) {
      throw new RenderDepthError('tpl', this.maxDepth, location);
    }
    const fragment = parseTemplate(source, location.file);
    const nested = new Execution(
      overlayHelpers(fragment.defines, this.helpers),
      this.maxDepth,
      this.depth + 1
    );
    return nested.run(fragment.nodes, location.file, data);
  }
}

// ============================================================================
// Renderer
// ============================================================================

export interface TemplateRendererOptions {
  /** Helpers available to include/template, usually a chart's _helpers.tpl */
  helpers?: HelperLookup;
  maxIncludeDepth?: number;
  logger?: StructuredLogger;
}

export class TemplateRenderer {
  private readonly helpers: HelperLookup;
  private readonly maxIncludeDepth: number;
  private readonly logger: StructuredLogger;

  constructor(options: TemplateRendererOptions = {}) {
    this.helpers = options.helpers ?? new HelperRegistry();
    this.maxIncludeDepth = options.maxIncludeDepth ?? DEFAULT_MAX_INCLUDE_DEPTH;
    this.logger = options.logger ?? getModuleLogger('template-renderer');
  }

  /**
   * Render a fragment with `values` exposed as `.Values`
   */
  render(fragment: TemplateFragment, values: ValueNode, builtins: RenderBuiltins = {}): string {
    return this.renderWithContext(fragment, buildRootContext(values, builtins, fragment.name));
  }

  /**
   * Render a fragment with an arbitrary value as `.` and `$`
   */
  renderWithContext(fragment: TemplateFragment, context: ValueNode): string {
    const startTime = performance.now();

    const execution = new Execution(
      overlayHelpers(fragment.defines, this.helpers),
      this.maxIncludeDepth,
      0
    );
    const output = execution.run(fragment.nodes, fragment.name, context);

    this.logger.templateRendered(
      fragment.name,
      Buffer.byteLength(output),
      Math.round(performance.now() - startTime)
    );
    return output;
  }
}
