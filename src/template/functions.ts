/**
 * Template Functions
 * @module template/functions
 *
 * The function table available to pipelines. `include` and `tpl` render
 * templates and are implemented by the renderer itself.
 *
 * Functions that accept missing values are the ones where an inline default
 * is possible (default, coalesce, empty, required, hasKey and the boolean
 * operators). Every other function receives concrete values only; the
 * renderer raises UndefinedReferenceError before calling it.
 */

import { stringify } from 'yaml';
import {
  TemplateFunctionError,
  type SourceLocation,
} from '../errors/index.js';
import {
  type ValueNode,
  describeKind,
  mapping,
  nodesEqual,
  nullNode,
  scalar,
  sequence,
  toPlain,
} from '../values/index.js';
import { type RuntimeValue, displayString } from './runtime-value.js';
import { isTruthy } from './truthiness.js';

// ============================================================================
// Types
// ============================================================================

export interface FunctionContext {
  readonly name: string;
  readonly location: SourceLocation;
}

interface FunctionArity {
  readonly minArgs: number;
  readonly maxArgs: number;
}

/**
 * Function that may receive missing values
 */
export interface LenientFunction extends FunctionArity {
  readonly acceptsMissing: true;
  call(args: readonly RuntimeValue[], ctx: FunctionContext): RuntimeValue;
}

/**
 * Function that only ever receives resolved values
 */
export interface StrictFunction extends FunctionArity {
  readonly acceptsMissing: false;
  call(args: readonly ValueNode[], ctx: FunctionContext): ValueNode;
}

export type TemplateFunction = LenientFunction | StrictFunction;

/** Functions evaluated by the renderer rather than the table */
export const RENDERER_FUNCTIONS: ReadonlySet<string> = new Set(['include', 'tpl']);

// ============================================================================
// Argument helpers
// ============================================================================

function fail(ctx: FunctionContext, message: string): never {
  throw new TemplateFunctionError(ctx.name, message, ctx.location);
}

function str(value: ValueNode): string {
  return displayString(value);
}

function num(value: ValueNode, ctx: FunctionContext): number {
  if (value.kind === 'scalar') {
    if (typeof value.value === 'number') {
      return value.value;
    }
    if (typeof value.value === 'string' && /^-?\d+(\.\d+)?$/.test(value.value)) {
      return Number(value.value);
    }
  }
  return fail(ctx, `expected a number, got ${describeKind(value)}`);
}

function isStringNode(value: ValueNode): boolean {
  return value.kind === 'scalar' && typeof value.value === 'string';
}

function text(value: string): ValueNode {
  return scalar(value);
}

function bool(value: boolean): ValueNode {
  return scalar(value);
}

function at<T>(args: readonly T[], index: number, ctx: FunctionContext): T {
  const value = args[index];
  if (value === undefined) {
    return fail(ctx, `missing argument ${index + 1}`);
  }
  return value;
}

function compare(a: ValueNode, b: ValueNode, ctx: FunctionContext): number {
  if (a.kind === 'scalar' && b.kind === 'scalar') {
    const x = a.value;
    const y = b.value;
    if (typeof x === 'number' && typeof y === 'number') {
      return x - y;
    }
    if (typeof x === 'string' && typeof y === 'string') {
      return x < y ? -1 : x > y ? 1 : 0;
    }
  }
  return fail(ctx, `incompatible types for comparison: ${describeKind(a)} and ${describeKind(b)}`);
}

function indentLines(spaces: number, value: string): string {
  const pad = ' '.repeat(Math.max(spaces, 0));
  return pad + value.replace(/\n/g, `\n${pad}`);
}

function toInt(value: ValueNode, ctx: FunctionContext): number {
  if (value.kind !== 'scalar') {
    return fail(ctx, `cannot convert ${describeKind(value)} to int`);
  }
  const v = value.value;
  if (typeof v === 'number') return Math.trunc(v);
  if (typeof v === 'boolean') return v ? 1 : 0;
  if (v === null) return 0;
  const parsed = parseInt(v, 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

const PRINTF_VERB = /%(?:\.(\d+))?([sdvqtf%])/g;

function formatPrintf(format: string, args: readonly ValueNode[], ctx: FunctionContext): string {
  let next = 0;
  return format.replace(PRINTF_VERB, (_match: string, precision: string | undefined, verb: string) => {
    if (verb === '%') {
      return '%';
    }
    const arg = args[next++];
    if (arg === undefined) {
      return `%!${verb}(MISSING)`;
    }
    switch (verb) {
      case 'd':
        return String(Math.trunc(num(arg, ctx)));
      case 'f':
        return num(arg, ctx).toFixed(precision === undefined ? 6 : Number(precision));
      case 'q':
        return JSON.stringify(str(arg));
      case 't':
        return String(isTruthy(arg));
      default:
        return str(arg);
    }
  });
}

function lenient(
  minArgs: number,
  maxArgs: number,
  call: LenientFunction['call']
): LenientFunction {
  return { acceptsMissing: true, minArgs, maxArgs, call };
}

function strict(
  minArgs: number,
  maxArgs: number,
  call: StrictFunction['call']
): StrictFunction {
  return { acceptsMissing: false, minArgs, maxArgs, call };
}

function stringFn(transform: (value: string) => string): StrictFunction {
  return strict(1, 1, ([value]) => text(transform(str(value))));
}

function binaryString(transform: (arg: string, value: string) => ValueNode): StrictFunction {
  return strict(2, 2, (args, ctx) => transform(str(at(args, 0, ctx)), str(at(args, 1, ctx))));
}

const VARIADIC = Number.POSITIVE_INFINITY;

// ============================================================================
// Function table
// ============================================================================

export const TEMPLATE_FUNCTIONS: Readonly<Record<string, TemplateFunction>> = {
  // Defaults and presence
  default: lenient(1, 2, ([fallback, given]) => {
    if (fallback === undefined) return nullNode();
    return given === undefined || !isTruthy(given) ? fallback : given;
  }),

  required: lenient(2, 2, (args, ctx) => {
    const message = at(args, 0, ctx);
    const value = at(args, 1, ctx);
    const empty = value.kind === 'missing'
      || (value.kind === 'scalar' && (value.value === null || value.value === ''));
    if (empty) {
      return fail(ctx, message.kind === 'missing' ? message.path : str(message));
    }
    return value;
  }),

  empty: lenient(1, 1, (args, ctx) => bool(!isTruthy(at(args, 0, ctx)))),

  coalesce: lenient(0, VARIADIC, (args) => args.find(isTruthy) ?? nullNode()),

  hasKey: lenient(2, 2, (args, ctx) => {
    const target = at(args, 0, ctx);
    const key = at(args, 1, ctx);
    if (target.kind !== 'mapping' || key.kind === 'missing') {
      return bool(false);
    }
    return bool(target.entries.has(str(key)));
  }),

  // Boolean operators return the deciding operand
  and: lenient(1, VARIADIC, (args, ctx) => {
    for (const arg of args) {
      if (!isTruthy(arg)) return arg;
    }
    return at(args, args.length - 1, ctx);
  }),

  or: lenient(1, VARIADIC, (args, ctx) => {
    for (const arg of args) {
      if (isTruthy(arg)) return arg;
    }
    return at(args, args.length - 1, ctx);
  }),

  not: lenient(1, 1, (args, ctx) => bool(!isTruthy(at(args, 0, ctx)))),

  // Strings
  quote: strict(0, VARIADIC, (args) =>
    text(args.filter(a => a.kind !== 'scalar' || a.value !== null).map(a => JSON.stringify(str(a))).join(' '))
  ),
  squote: strict(0, VARIADIC, (args) =>
    text(args.filter(a => a.kind !== 'scalar' || a.value !== null).map(a => `'${str(a)}'`).join(' '))
  ),
  upper: stringFn(s => s.toUpperCase()),
  lower: stringFn(s => s.toLowerCase()),
  title: stringFn(s => s.replace(/\b\w/g, c => c.toUpperCase())),
  trim: stringFn(s => s.trim()),
  trimSuffix: binaryString((suffix, s) => text(suffix !== '' && s.endsWith(suffix) ? s.slice(0, -suffix.length) : s)),
  trimPrefix: binaryString((prefix, s) => text(s.startsWith(prefix) ? s.slice(prefix.length) : s)),
  contains: binaryString((sub, s) => bool(s.includes(sub))),
  hasPrefix: binaryString((prefix, s) => bool(s.startsWith(prefix))),
  hasSuffix: binaryString((suffix, s) => bool(s.endsWith(suffix))),

  replace: strict(3, 3, (args, ctx) => {
    const from = str(at(args, 0, ctx));
    const to = str(at(args, 1, ctx));
    return text(str(at(args, 2, ctx)).split(from).join(to));
  }),

  trunc: strict(2, 2, (args, ctx) => {
    const length = num(at(args, 0, ctx), ctx);
    const value = str(at(args, 1, ctx));
    return text(length >= 0 ? value.slice(0, length) : value.slice(Math.max(value.length + length, 0)));
  }),

  indent: strict(2, 2, (args, ctx) =>
    text(indentLines(num(at(args, 0, ctx), ctx), str(at(args, 1, ctx))))
  ),
  nindent: strict(2, 2, (args, ctx) =>
    text(`\n${indentLines(num(at(args, 0, ctx), ctx), str(at(args, 1, ctx)))}`)
  ),

  print: strict(0, VARIADIC, (args) => {
    let out = '';
    args.forEach((arg, i) => {
      const previous = args[i - 1];
      if (previous !== undefined && !isStringNode(previous) && !isStringNode(arg)) {
        out += ' ';
      }
      out += str(arg);
    });
    return text(out);
  }),

  printf: strict(1, VARIADIC, (args, ctx) =>
    text(formatPrintf(str(at(args, 0, ctx)), args.slice(1), ctx))
  ),

  // Encoding
  toYaml: strict(1, 1, ([value]) =>
    text(stringify(toPlain(value), { lineWidth: 0, indentSeq: false }).replace(/\n$/, ''))
  ),
  toJson: strict(1, 1, ([value]) => text(JSON.stringify(toPlain(value)))),
  b64enc: stringFn(s => Buffer.from(s, 'utf8').toString('base64')),
  toString: stringFn(s => s),
  int: strict(1, 1, (args, ctx) => scalar(toInt(at(args, 0, ctx), ctx))),

  // Comparison
  eq: strict(2, VARIADIC, (args, ctx) => {
    const first = at(args, 0, ctx);
    return bool(args.slice(1).some(other => nodesEqual(first, other)));
  }),
  ne: strict(2, 2, (args, ctx) => bool(!nodesEqual(at(args, 0, ctx), at(args, 1, ctx)))),
  lt: strict(2, 2, (args, ctx) => bool(compare(at(args, 0, ctx), at(args, 1, ctx), ctx) < 0)),
  le: strict(2, 2, (args, ctx) => bool(compare(at(args, 0, ctx), at(args, 1, ctx), ctx) <= 0)),
  gt: strict(2, 2, (args, ctx) => bool(compare(at(args, 0, ctx), at(args, 1, ctx), ctx) > 0)),
  ge: strict(2, 2, (args, ctx) => bool(compare(at(args, 0, ctx), at(args, 1, ctx), ctx) >= 0)),

  // Collections
  dict: strict(0, VARIADIC, (args, ctx) => {
    if (args.length % 2 !== 0) {
      return fail(ctx, 'expected an even number of arguments');
    }
    const entries: Array<[string, ValueNode]> = [];
    for (let i = 0; i < args.length; i += 2) {
      entries.push([str(at(args, i, ctx)), at(args, i + 1, ctx)]);
    }
    return mapping(entries);
  }),

  list: strict(0, VARIADIC, (args) => sequence(args)),

  index: strict(1, VARIADIC, (args, ctx) => {
    let current = at(args, 0, ctx);
    for (const key of args.slice(1)) {
      if (current.kind === 'mapping') {
        current = current.entries.get(str(key)) ?? nullNode();
      } else if (current.kind === 'sequence') {
        const position = num(key, ctx);
        const item = current.items[position];
        if (item === undefined) {
          return fail(ctx, `index out of range: ${position}`);
        }
        current = item;
      } else {
        return fail(ctx, `cannot index ${describeKind(current)}`);
      }
    }
    return current;
  }),

  keys: strict(1, VARIADIC, (args, ctx) => {
    const names: string[] = [];
    for (const arg of args) {
      if (arg.kind !== 'mapping') {
        return fail(ctx, `expected a mapping, got ${describeKind(arg)}`);
      }
      names.push(...arg.entries.keys());
    }
    return sequence(names.sort().map(name => scalar(name)));
  }),
};

/**
 * Names the parser accepts as function calls
 */
export function isKnownFunction(name: string): boolean {
  return RENDERER_FUNCTIONS.has(name) || Object.prototype.hasOwnProperty.call(TEMPLATE_FUNCTIONS, name);
}

export function lookupFunction(name: string): TemplateFunction | undefined {
  return Object.prototype.hasOwnProperty.call(TEMPLATE_FUNCTIONS, name)
    ? TEMPLATE_FUNCTIONS[name]
    : undefined;
}
