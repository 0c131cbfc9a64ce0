import { ConfigError } from '../errors/bridge-error.js';

/**
 * One selector of a compiled path. Selectors map a node to zero or more
 * nodes; a path is the left-to-right composition of its selectors.
 */
export type PathStep =
  | { type: 'child'; name: string }
  | { type: 'index'; index: number }
  | { type: 'slice'; start?: number; end?: number }
  | { type: 'wildcard' }
  | { type: 'descend'; selector: PathStep };

/**
 * A configured value spec. Strings starting with `$` are compiled into a
 * path, anything else is used verbatim.
 */
export type Expression =
  | { kind: 'literal'; value: string }
  | { kind: 'path'; source: string; steps: PathStep[] };

const NAME = /[^\s.[\]'"*]+/y;
const INTEGER = /-?\d+/y;
const SPACES = /\s*/y;

class PathParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  parse(): PathStep[] {
    this.expect('$');
    const steps: PathStep[] = [];
    while (this.pos < this.source.length) {
      steps.push(this.step());
    }
    return steps;
  }

  private step(): PathStep {
    const ch = this.peek();
    if (ch === '[') {
      return this.bracket();
    }
    if (ch !== '.') {
      throw this.fail(`unexpected '${ch}'`);
    }
    this.pos++;
    if (this.peek() === '.') {
      this.pos++;
      const selector = this.peek() === '[' ? this.bracket() : this.member();
      return { type: 'descend', selector };
    }
    return this.member();
  }

  private member(): PathStep {
    if (this.peek() === '*') {
      this.pos++;
      return { type: 'wildcard' };
    }
    const name = this.take(NAME);
    if (name === undefined) {
      throw this.fail('expected a member name');
    }
    return { type: 'child', name };
  }

  private bracket(): PathStep {
    this.expect('[');
    this.take(SPACES);

    let step: PathStep;
    const ch = this.peek();
    if (ch === '*') {
      this.pos++;
      step = { type: 'wildcard' };
    } else if (ch === "'" || ch === '"') {
      step = { type: 'child', name: this.quoted(ch) };
    } else {
      step = this.indexOrSlice();
    }

    this.take(SPACES);
    this.expect(']');
    return step;
  }

  private indexOrSlice(): PathStep {
    const start = this.integer();
    this.take(SPACES);
    if (this.peek() !== ':') {
      if (start === undefined) {
        throw this.fail('expected an index, a quoted name or *');
      }
      return { type: 'index', index: start };
    }
    this.pos++;
    this.take(SPACES);
    return { type: 'slice', start, end: this.integer() };
  }

  private integer(): number | undefined {
    const text = this.take(INTEGER);
    return text === undefined ? undefined : Number.parseInt(text, 10);
  }

  private quoted(quote: string): string {
    this.pos++;
    let value = '';
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos++];
      if (ch === quote) {
        return value;
      }
      if (ch === '\\') {
        if (this.pos >= this.source.length) break;
        value += this.source[this.pos++];
      } else {
        value += ch;
      }
    }
    throw this.fail('unterminated string');
  }

  private peek(): string {
    return this.source.charAt(this.pos);
  }

  private expect(ch: string): void {
    if (this.peek() !== ch) {
      throw this.fail(this.pos < this.source.length ? `expected '${ch}'` : `missing '${ch}'`);
    }
    this.pos++;
  }

  private take(pattern: RegExp): string | undefined {
    pattern.lastIndex = this.pos;
    const match = pattern.exec(this.source);
    if (!match || match[0].length === 0) {
      return undefined;
    }
    this.pos += match[0].length;
    return match[0];
  }

  private fail(reason: string): ConfigError {
    return new ConfigError(
      `invalid path expression '${this.source}': ${reason} at position ${this.pos}`,
      [this.source]
    );
  }
}

export function compilePath(source: string): PathStep[] {
  return new PathParser(source).parse();
}

export function compileExpression(spec: string): Expression {
  if (!spec.startsWith('$')) {
    return { kind: 'literal', value: spec };
  }
  return { kind: 'path', source: spec, steps: compilePath(spec) };
}

export function describeExpression(expr: Expression): string {
  return expr.kind === 'literal' ? expr.value : expr.source;
}

function isRecord(node: unknown): node is Record<string, unknown> {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

function* children(node: unknown): Generator<unknown> {
  if (Array.isArray(node)) {
    yield* node;
  } else if (isRecord(node)) {
    yield* Object.values(node);
  }
}

function* descendants(node: unknown): Generator<unknown> {
  yield node;
  for (const child of children(node)) {
    yield* descendants(child);
  }
}

function* select(step: PathStep, node: unknown): Generator<unknown> {
  switch (step.type) {
    case 'child':
      if (isRecord(node) && Object.hasOwn(node, step.name)) {
        yield node[step.name];
      }
      return;
    case 'index':
      if (Array.isArray(node)) {
        const index = step.index < 0 ? node.length + step.index : step.index;
        if (index >= 0 && index < node.length) {
          yield node[index];
        }
      }
      return;
    case 'slice':
      if (Array.isArray(node)) {
        yield* node.slice(step.start ?? 0, step.end);
      }
      return;
    case 'wildcard':
      yield* children(node);
      return;
    case 'descend':
      for (const candidate of descendants(node)) {
        yield* select(step.selector, candidate);
      }
      return;
  }
}

function* run(steps: PathStep[], depth: number, node: unknown): Generator<unknown> {
  if (depth === steps.length) {
    yield node;
    return;
  }
  for (const next of select(steps[depth], node)) {
    yield* run(steps, depth + 1, next);
  }
}

/**
 * First value the expression selects from `root`, in document order, or
 * `undefined` when nothing matches. Literals always yield themselves.
 */
export function evaluate(expr: Expression, root: unknown): unknown {
  if (expr.kind === 'literal') {
    return expr.value;
  }
  try {
    for (const value of run(expr.steps, 0, root)) {
      return value;
    }
  } catch (err) {
    // pathologically nested payloads under `..` exhaust the stack
    if (err instanceof RangeError) {
      return undefined;
    }
    throw err;
  }
  return undefined;
}
