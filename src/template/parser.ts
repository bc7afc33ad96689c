/**
 * Template Parser
 * @module template/parser
 *
 * Recursive-descent parser from template source to an immutable
 * TemplateFragment. All syntax problems (unbalanced blocks, malformed
 * pipelines, unknown functions, undeclared variables) are reported here,
 * with the line they occur on, so a fragment that parses can only fail at
 * render time because of the values it is given.
 */

import { TemplateSyntaxError } from '../errors/index.js';
import type {
  Command,
  Expr,
  HelperDefinition,
  IfNode,
  Pipeline,
  RangeNode,
  TemplateCallNode,
  TemplateFragment,
  TemplateNode,
  WithNode,
} from './ast.js';
import { isKnownFunction } from './functions.js';
import {
  type Segment,
  type Token,
  type TokenType,
  scanSegments,
  tokenizeAction,
} from './lexer.js';

// ============================================================================
// Token stream
// ============================================================================

class TokenStream {
  private pos = 0;

  constructor(
    private readonly tokens: readonly Token[],
    readonly line: number
  ) {}

  peek(offset = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  next(): Token | undefined {
    const token = this.tokens[this.pos];
    if (token) {
      this.pos++;
    }
    return token;
  }

  atEnd(): boolean {
    return this.pos >= this.tokens.length;
  }
}

type Stop =
  | { readonly kind: 'eof' }
  | { readonly kind: 'end'; readonly line: number }
  | { readonly kind: 'else'; readonly line: number; readonly stream: TokenStream };

const LITERAL_IDENTS = new Set(['true', 'false', 'nil']);

function chainOf(fieldText: string): string[] {
  return fieldText.slice(1).split('.');
}

// ============================================================================
// Parser
// ============================================================================

class Parser {
  private index = 0;
  private depth = 0;
  private hasActions = false;
  private vars: string[] = ['$'];
  private readonly defines = new Map<string, HelperDefinition>();

  constructor(
    private readonly segments: readonly Segment[],
    private readonly file: string
  ) {}

  parse(): TemplateFragment {
    const { nodes, stop } = this.parseList();
    if (stop.kind === 'end') {
      throw this.error('unexpected {{end}}', stop.line);
    }
    if (stop.kind === 'else') {
      throw this.error('unexpected {{else}}', stop.line);
    }

    const fragment: TemplateFragment = {
      name: this.file,
      nodes: Object.freeze(nodes),
      defines: this.defines,
      hasActions: this.hasActions,
    };
    return Object.freeze(fragment);
  }

  private error(message: string, line: number): TemplateSyntaxError {
    return new TemplateSyntaxError(message, { file: this.file, line });
  }

  private expect(stream: TokenStream, type: TokenType, what: string): Token {
    const token = stream.next();
    if (!token || token.type !== type) {
      const found = token ? ` but found "${token.text}"` : '';
      throw this.error(`expected ${what}${found}`, token?.line ?? stream.line);
    }
    return token;
  }

  private expectEnd(stream: TokenStream, keyword: string): void {
    const extra = stream.peek();
    if (extra) {
      throw this.error(`unexpected "${extra.text}" in {{${keyword}}}`, extra.line);
    }
  }

  // --------------------------------------------------------------------------
  // Node lists
  // --------------------------------------------------------------------------

  private parseList(): { nodes: TemplateNode[]; stop: Stop } {
    const nodes: TemplateNode[] = [];

    while (this.index < this.segments.length) {
      const segment = this.segments[this.index++];
      if (segment.kind === 'text') {
        nodes.push({ type: 'text', text: segment.text });
        continue;
      }

      this.hasActions = true;
      const line = segment.line;
      const stream = new TokenStream(tokenizeAction(segment.body, this.file, line), line);
      const first = stream.peek();
      if (!first) {
        throw this.error('missing value for command', line);
      }

      if (first.type === 'ident') {
        switch (first.text) {
          case 'end':
            stream.next();
            this.expectEnd(stream, 'end');
            return { nodes, stop: { kind: 'end', line } };
          case 'else':
            stream.next();
            return { nodes, stop: { kind: 'else', line, stream } };
          case 'if':
            stream.next();
            nodes.push(this.parseIf(stream, line));
            continue;
          case 'with':
            stream.next();
            nodes.push(this.parseWith(stream, line));
            continue;
          case 'range':
            stream.next();
            nodes.push(this.parseRange(stream, line));
            continue;
          case 'define':
            stream.next();
            this.parseDefine(stream, line);
            continue;
          case 'template':
            stream.next();
            nodes.push(this.parseTemplateCall(stream, line));
            continue;
        }
      }

      nodes.push({ type: 'action', pipeline: this.parsePipeline(stream, true), line });
    }

    return { nodes, stop: { kind: 'eof' } };
  }

  /**
   * Body of an else branch, which must be closed by {{end}}
   */
  private parseElseBody(keyword: string, openLine: number): TemplateNode[] {
    const { nodes, stop } = this.parseList();
    if (stop.kind === 'eof') {
      throw this.error(`unclosed {{${keyword}}}`, openLine);
    }
    if (stop.kind === 'else') {
      throw this.error(`unexpected {{else}} after {{else}} of {{${keyword}}}`, stop.line);
    }
    return nodes;
  }

  /**
   * Body of a block plus its optional else branch
   */
  private parseBlock(
    keyword: string,
    openLine: number,
    onElse?: (stream: TokenStream, line: number) => TemplateNode[] | null
  ): { body: TemplateNode[]; elseBody: TemplateNode[] } {
    this.depth++;
    const { nodes: body, stop } = this.parseList();
    let elseBody: TemplateNode[] = [];

    if (stop.kind === 'eof') {
      throw this.error(`unclosed {{${keyword}}}`, openLine);
    }
    if (stop.kind === 'else') {
      const chained = onElse?.(stop.stream, stop.line) ?? null;
      if (chained) {
        elseBody = chained;
      } else {
        this.expectEnd(stop.stream, 'else');
        elseBody = this.parseElseBody(keyword, openLine);
      }
    }

    this.depth--;
    return { body, elseBody };
  }

  // --------------------------------------------------------------------------
  // Control structures
  // --------------------------------------------------------------------------

  private parseIf(stream: TokenStream, line: number): IfNode {
    const mark = this.vars.length;
    const pipeline = this.parsePipeline(stream, true);

    const { body, elseBody } = this.parseBlock('if', line, (elseStream, elseLine) => {
      const next = elseStream.peek();
      if (next?.type === 'ident' && next.text === 'if') {
        elseStream.next();
        return [this.parseIf(elseStream, elseLine)];
      }
      return null;
    });

    this.vars.length = mark;
    return { type: 'if', pipeline, body, elseBody, line };
  }

  private parseWith(stream: TokenStream, line: number): WithNode {
    const mark = this.vars.length;
    const pipeline = this.parsePipeline(stream, true);
    const { body, elseBody } = this.parseBlock('with', line);
    this.vars.length = mark;
    return { type: 'with', pipeline, body, elseBody, line };
  }

  private parseRange(stream: TokenStream, line: number): RangeNode {
    const mark = this.vars.length;
    let keyVar: string | null = null;
    let valueVar: string | null = null;

    const first = stream.peek();
    const second = stream.peek(1);
    if (first?.type === 'variable' && (second?.type === 'declare' || second?.type === 'comma')) {
      stream.next();
      if (second.type === 'comma') {
        stream.next();
        const value = this.expect(stream, 'variable', 'variable after ","');
        keyVar = first.text;
        valueVar = value.text;
      } else {
        valueVar = first.text;
      }
      this.expect(stream, 'declare', '":="');

      for (const name of [keyVar, valueVar]) {
        if (name !== null && name.includes('.')) {
          throw this.error(`invalid variable name "${name}"`, line);
        }
      }
    }

    const pipeline = this.parsePipeline(stream, false);
    if (keyVar !== null) this.vars.push(keyVar);
    if (valueVar !== null) this.vars.push(valueVar);

    const { body, elseBody } = this.parseBlock('range', line);
    this.vars.length = mark;
    return { type: 'range', pipeline, keyVar, valueVar, body, elseBody, line };
  }

  private parseDefine(stream: TokenStream, line: number): void {
    if (this.depth > 0) {
      throw this.error('{{define}} is only allowed at the top level', line);
    }
    const name = this.expect(stream, 'string', 'template name').text;
    this.expectEnd(stream, 'define');

    const outerVars = this.vars;
    this.vars = ['$'];
    this.depth++;
    const { nodes, stop } = this.parseList();
    this.depth--;
    this.vars = outerVars;

    if (stop.kind === 'eof') {
      throw this.error(`unclosed {{define "${name}"}}`, line);
    }
    if (stop.kind === 'else') {
      throw this.error('unexpected {{else}} in {{define}}', stop.line);
    }
    if (this.defines.has(name)) {
      throw this.error(`template "${name}" is defined more than once`, line);
    }

    const definition: HelperDefinition = { name, file: this.file, body: Object.freeze(nodes) };
    this.defines.set(name, Object.freeze(definition));
  }

  private parseTemplateCall(stream: TokenStream, line: number): TemplateCallNode {
    const name = this.expect(stream, 'string', 'template name').text;
    const pipeline = stream.atEnd() ? null : this.parsePipeline(stream, false);
    return { type: 'template', name, pipeline, line };
  }

  // --------------------------------------------------------------------------
  // Pipelines
  // --------------------------------------------------------------------------

  private parsePipeline(stream: TokenStream, allowDecl: boolean, inParens = false): Pipeline {
    const line = stream.peek()?.line ?? stream.line;
    let decl: string[] = [];
    let assign = false;

    const first = stream.peek();
    const second = stream.peek(1);
    if (first?.type === 'variable' && (second?.type === 'declare' || second?.type === 'assign')) {
      if (!allowDecl) {
        throw this.error('variable declaration not allowed here', first.line);
      }
      if (first.text.includes('.')) {
        throw this.error(`invalid variable name "${first.text}"`, first.line);
      }
      stream.next();
      stream.next();
      assign = second.type === 'assign';
      if (assign && !this.vars.includes(first.text)) {
        throw this.error(`undefined variable "${first.text}"`, first.line);
      }
      decl = [first.text];
    }

    const commands: Command[] = [];
    for (;;) {
      commands.push(this.parseCommand(stream, commands.length > 0));

      const next = stream.peek();
      if (next === undefined) {
        if (inParens) {
          throw this.error('unclosed left paren', stream.line);
        }
        break;
      }
      if (next.type === 'pipe') {
        stream.next();
        continue;
      }
      if (next.type === 'rparen' && inParens) {
        break;
      }
      throw this.error(`unexpected "${next.text}" in pipeline`, next.line);
    }

    if (!assign) {
      this.vars.push(...decl);
    }
    return { decl, assign, commands, line };
  }

  private atCommandEnd(stream: TokenStream): boolean {
    const next = stream.peek();
    return next === undefined || next.type === 'pipe' || next.type === 'rparen';
  }

  private parseCommand(stream: TokenStream, piped: boolean): Command {
    const token = stream.peek();
    if (!token || token.type === 'pipe' || token.type === 'rparen') {
      throw this.error('missing value for command', token?.line ?? stream.line);
    }

    if (token.type === 'ident' && !LITERAL_IDENTS.has(token.text)) {
      stream.next();
      if (!isKnownFunction(token.text)) {
        throw this.error(`function "${token.text}" not defined`, token.line);
      }
      const args: Expr[] = [];
      while (!this.atCommandEnd(stream)) {
        args.push(this.parseOperand(stream));
      }
      return { type: 'call', name: token.text, args };
    }

    if (piped) {
      throw this.error(`non-function "${token.text}" in pipeline`, token.line);
    }
    const operand = this.parseOperand(stream);
    const extra = stream.peek();
    if (extra && !this.atCommandEnd(stream)) {
      throw this.error(`can't give argument "${extra.text}" to non-function`, extra.line);
    }
    return { type: 'operand', operand };
  }

  private parseOperand(stream: TokenStream): Expr {
    const token = stream.next();
    if (!token) {
      throw this.error('missing operand', stream.line);
    }

    switch (token.type) {
      case 'field':
        return { type: 'field', chain: chainOf(token.text), text: token.text };
      case 'dot':
        return { type: 'field', chain: [], text: '.' };
      case 'variable': {
        const [name = '$', ...chain] = token.text.split('.');
        if (!this.vars.includes(name)) {
          throw this.error(`undefined variable "${name}"`, token.line);
        }
        return { type: 'variable', name, chain, text: token.text };
      }
      case 'string':
        return { type: 'literal', value: token.text };
      case 'number':
        return { type: 'literal', value: Number(token.text) };
      case 'ident':
        if (token.text === 'true' || token.text === 'false') {
          return { type: 'literal', value: token.text === 'true' };
        }
        if (token.text === 'nil') {
          return { type: 'literal', value: null };
        }
        if (!isKnownFunction(token.text)) {
          throw this.error(`function "${token.text}" not defined`, token.line);
        }
        return {
          type: 'sub',
          pipeline: {
            decl: [],
            assign: false,
            commands: [{ type: 'call', name: token.text, args: [] }],
            line: token.line,
          },
          chain: [],
          text: token.text,
        };
      case 'lparen': {
        const pipeline = this.parsePipeline(stream, false, true);
        const close = this.expect(stream, 'rparen', '")"');
        const after = stream.peek();
        if (after?.type === 'field' && after.start === close.end) {
          stream.next();
          return { type: 'sub', pipeline, chain: chainOf(after.text), text: after.text };
        }
        return { type: 'sub', pipeline, chain: [], text: '(...)' };
      }
      default:
        throw this.error(`unexpected "${token.text}" in operand`, token.line);
    }
  }
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Parse template source. `name` identifies the template in error locations
 * and in the definitions it declares.
 */
export function parseTemplate(source: string, name: string): TemplateFragment {
  return new Parser(scanSegments(source, name), name).parse();
}
