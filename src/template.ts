import { TemplateError } from './errors.js';

export interface TemplateMapping {
  readonly [key: string]: string;
}

export type TemplateValue = string | TemplateValue[] | TemplateMapping;

export type TemplateFilter = (value: TemplateValue) => TemplateValue;

export interface TemplateScope {
  readonly variables: Readonly<Record<string, TemplateValue>>;
  readonly filters: Readonly<Record<string, TemplateFilter>>;
}

type Expression =
  | { type: 'variable'; name: string }
  | { type: 'literal'; value: string }
  | { type: 'list'; items: Expression[] }
  | { type: 'attribute'; object: Expression; name: string }
  | { type: 'index'; object: Expression; index: Expression }
  | { type: 'filter'; input: Expression; name: string }
  | { type: 'concat'; parts: Expression[] };

type Segment = { type: 'text'; text: string } | { type: 'expression'; expression: Expression };

type Token =
  | { type: 'name'; value: string }
  | { type: 'string'; value: string }
  | { type: 'number'; value: string }
  | { type: 'punct'; value: string };

export interface CompiledTemplate {
  source: string;
  segments: Segment[];
}

const OPEN = '{{';
const CLOSE = '}}';
const PUNCTUATION = new Set(['|', '.', '[', ']', '(', ')', ',', '~']);
const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const STRING_ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r' };

function tokenize(source: string, template: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const char = source[i];
    if (/\s/.test(char)) {
      i += 1;
    } else if (NAME_START.test(char)) {
      let end = i + 1;
      while (end < source.length && NAME_PART.test(source[end])) {
        end += 1;
      }
      tokens.push({ type: 'name', value: source.slice(i, end) });
      i = end;
    } else if (DIGIT.test(char)) {
      let end = i + 1;
      while (end < source.length && DIGIT.test(source[end])) {
        end += 1;
      }
      tokens.push({ type: 'number', value: source.slice(i, end) });
      i = end;
    } else if (char === "'" || char === '"') {
      let value = '';
      let end = i + 1;
      let closed = false;
      while (end < source.length) {
        const inner = source[end];
        if (inner === char) {
          closed = true;
          break;
        }
        if (inner === '\\' && end + 1 < source.length) {
          const escaped = source[end + 1];
          value += STRING_ESCAPES[escaped] ?? escaped;
          end += 2;
          continue;
        }
        value += inner;
        end += 1;
      }
      if (!closed) {
        throw new TemplateError('unterminated string literal', template);
      }
      tokens.push({ type: 'string', value });
      i = end + 1;
    } else if (PUNCTUATION.has(char)) {
      tokens.push({ type: 'punct', value: char });
      i += 1;
    } else {
      throw new TemplateError(`unexpected character '${char}'`, template);
    }
  }
  return tokens;
}

class Parser {
  private position = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly template: string,
  ) {}

  parse(): Expression {
    if (this.tokens.length === 0) {
      throw new TemplateError('empty expression', this.template);
    }
    const expression = this.concat();
    const extra = this.peek();
    if (extra) {
      throw new TemplateError(`unexpected '${extra.value}'`, this.template);
    }
    return expression;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (!token) {
      throw new TemplateError('unexpected end of expression', this.template);
    }
    this.position += 1;
    return token;
  }

  private acceptPunct(value: string): boolean {
    const token = this.peek();
    if (token?.type === 'punct' && token.value === value) {
      this.position += 1;
      return true;
    }
    return false;
  }

  private expectPunct(value: string): void {
    if (!this.acceptPunct(value)) {
      const token = this.peek();
      const found = token ? `'${token.value}'` : 'end of expression';
      throw new TemplateError(`expected '${value}' but found ${found}`, this.template);
    }
  }

  private expectName(): string {
    const token = this.next();
    if (token.type !== 'name') {
      throw new TemplateError(`expected a name but found '${token.value}'`, this.template);
    }
    return token.value;
  }

  private concat(): Expression {
    const parts = [this.pipe()];
    while (this.acceptPunct('~')) {
      parts.push(this.pipe());
    }
    return parts.length === 1 ? parts[0] : { type: 'concat', parts };
  }

  private pipe(): Expression {
    let expression = this.postfix();
    while (this.acceptPunct('|')) {
      expression = { type: 'filter', input: expression, name: this.expectName() };
    }
    return expression;
  }

  private postfix(): Expression {
    let expression = this.primary();
    for (;;) {
      if (this.acceptPunct('.')) {
        expression = { type: 'attribute', object: expression, name: this.expectName() };
      } else if (this.acceptPunct('[')) {
        const index = this.concat();
        this.expectPunct(']');
        expression = { type: 'index', object: expression, index };
      } else {
        return expression;
      }
    }
  }

  private primary(): Expression {
    const token = this.next();
    switch (token.type) {
      case 'name':
        return { type: 'variable', name: token.value };
      case 'string':
      case 'number':
        return { type: 'literal', value: token.value };
      default:
        break;
    }
    if (token.value === '(') {
      const inner = this.concat();
      this.expectPunct(')');
      return inner;
    }
    if (token.value === '[') {
      const items: Expression[] = [];
      while (!this.acceptPunct(']')) {
        items.push(this.concat());
        if (!this.acceptPunct(',')) {
          this.expectPunct(']');
          break;
        }
      }
      return { type: 'list', items };
    }
    throw new TemplateError(`unexpected '${token.value}'`, this.template);
  }
}

// Quoted literals may contain the closing delimiter.
function findClose(source: string, from: number): number {
  let i = from;
  while (i < source.length) {
    const char = source[i];
    if (char === "'" || char === '"') {
      let end = i + 1;
      while (end < source.length && source[end] !== char) {
        end += source[end] === '\\' ? 2 : 1;
      }
      if (end >= source.length) {
        // unterminated: let the tokenizer report it
        return source.indexOf(CLOSE, from);
      }
      i = end + 1;
    } else if (source.startsWith(CLOSE, i)) {
      return i;
    } else {
      i += 1;
    }
  }
  return -1;
}

export function compileTemplate(source: string): CompiledTemplate {
  const segments: Segment[] = [];
  let cursor = 0;
  while (cursor < source.length) {
    const open = source.indexOf(OPEN, cursor);
    if (open === -1) {
      segments.push({ type: 'text', text: source.slice(cursor) });
      break;
    }
    if (open > cursor) {
      segments.push({ type: 'text', text: source.slice(cursor, open) });
    }
    const close = findClose(source, open + OPEN.length);
    if (close === -1) {
      throw new TemplateError(`unclosed '${OPEN}'`, source);
    }
    const body = source.slice(open + OPEN.length, close);
    const expression = new Parser(tokenize(body, source), source).parse();
    segments.push({ type: 'expression', expression });
    cursor = close + CLOSE.length;
  }
  return { source, segments };
}

function describe(value: TemplateValue): string {
  if (typeof value === 'string') {
    return 'a string';
  }
  return Array.isArray(value) ? 'a list' : 'a mapping';
}

function evaluate(expression: Expression, scope: TemplateScope, template: string): TemplateValue {
  switch (expression.type) {
    case 'literal':
      return expression.value;
    case 'variable': {
      if (!Object.hasOwn(scope.variables, expression.name)) {
        throw new TemplateError(`'${expression.name}' is undefined`, template);
      }
      return scope.variables[expression.name];
    }
    case 'list':
      return expression.items.map((item) => evaluate(item, scope, template));
    case 'attribute':
    case 'index': {
      const object = evaluate(expression.object, scope, template);
      const key =
        expression.type === 'attribute'
          ? expression.name
          : evaluate(expression.index, scope, template);
      if (typeof key !== 'string') {
        throw new TemplateError(`cannot use ${describe(key)} as a key`, template);
      }
      if (typeof object === 'string') {
        throw new TemplateError(`cannot look up '${key}' in a string`, template);
      }
      if (Array.isArray(object)) {
        const item = /^\d+$/.test(key) ? object[Number(key)] : undefined;
        if (item === undefined) {
          throw new TemplateError(`list index '${key}' is out of range`, template);
        }
        return item;
      }
      if (!Object.hasOwn(object, key)) {
        throw new TemplateError(`'${key}' is undefined`, template);
      }
      return object[key];
    }
    case 'filter': {
      if (!Object.hasOwn(scope.filters, expression.name)) {
        throw new TemplateError(`no filter named '${expression.name}'`, template);
      }
      const input = evaluate(expression.input, scope, template);
      try {
        return scope.filters[expression.name](input);
      } catch (error) {
        if (error instanceof TemplateError) {
          throw error;
        }
        throw new TemplateError(
          `${expression.name}: ${(error as Error).message}`,
          template,
          { cause: error },
        );
      }
    }
    case 'concat':
      return expression.parts
        .map((part) => {
          const value = evaluate(part, scope, template);
          if (typeof value !== 'string') {
            throw new TemplateError(`cannot concatenate ${describe(value)}`, template);
          }
          return value;
        })
        .join('');
  }
}

/**
 * Returns the value of a template made of exactly one `{{ }}` block, or
 * undefined when the template mixes text and expressions.
 */
export function evaluateSoleExpression(
  compiled: CompiledTemplate,
  scope: TemplateScope,
): TemplateValue | undefined {
  const [segment, ...rest] = compiled.segments;
  if (!segment || rest.length > 0 || segment.type !== 'expression') {
    return undefined;
  }
  return evaluate(segment.expression, scope, compiled.source);
}

export function renderCompiled(compiled: CompiledTemplate, scope: TemplateScope): string {
  return compiled.segments
    .map((segment) => {
      if (segment.type === 'text') {
        return segment.text;
      }
      const value = evaluate(segment.expression, scope, compiled.source);
      if (typeof value !== 'string') {
        throw new TemplateError(
          `cannot render ${describe(value)} as text; apply a filter such as 'joincmd'`,
          compiled.source,
        );
      }
      return value;
    })
    .join('');
}

export function renderTemplate(source: string, scope: TemplateScope): string {
  return renderCompiled(compileTemplate(source), scope);
}
