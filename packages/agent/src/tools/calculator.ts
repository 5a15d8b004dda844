import { Type } from '@sinclair/typebox';

import { completed, errored, type AgentTool } from './types.js';

export const CALCULATOR_TOOL_NAME = 'calculator';

export const CalculatorInputSchema = Type.Object({
  expression: Type.String({
    minLength: 1,
    description: "Arithmetic expression, e.g. '2 + 2', 'sqrt(16) * 3', '2 ** 10'.",
  }),
});

type Token =
  | { kind: 'number'; value: number; position: number }
  | { kind: 'name'; value: string; position: number }
  | { kind: 'op'; value: string; position: number }
  | { kind: 'end'; position: number };

export class CalculatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalculatorError';
  }
}

const CONSTANTS = new Map<string, number>([
  ['pi', Math.PI],
  ['e', Math.E],
]);

interface MathFunction {
  minArgs: number;
  maxArgs: number;
  apply: (args: number[]) => number;
}

function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

function requireDomain(condition: boolean): void {
  if (!condition) {
    throw new CalculatorError('math domain error');
  }
}

const FUNCTIONS = new Map<string, MathFunction>(Object.entries({
  sqrt: {
    minArgs: 1,
    maxArgs: 1,
    apply: ([x]) => {
      requireDomain(x >= 0);
      return Math.sqrt(x);
    },
  },
  sin: { minArgs: 1, maxArgs: 1, apply: ([x]) => Math.sin(x) },
  cos: { minArgs: 1, maxArgs: 1, apply: ([x]) => Math.cos(x) },
  tan: { minArgs: 1, maxArgs: 1, apply: ([x]) => Math.tan(x) },
  log: {
    minArgs: 1,
    maxArgs: 1,
    apply: ([x]) => {
      requireDomain(x > 0);
      return Math.log10(x);
    },
  },
  ln: {
    minArgs: 1,
    maxArgs: 1,
    apply: ([x]) => {
      requireDomain(x > 0);
      return Math.log(x);
    },
  },
  abs: { minArgs: 1, maxArgs: 1, apply: ([x]) => Math.abs(x) },
  round: {
    minArgs: 1,
    maxArgs: 2,
    apply: ([x, digits]) => {
      if (digits === undefined) {
        return roundHalfEven(x);
      }
      if (!Number.isInteger(digits)) {
        throw new CalculatorError('round() digits must be an integer');
      }
      const factor = 10 ** digits;
      return Math.round(x * factor) / factor;
    },
  },
  min: { minArgs: 1, maxArgs: Number.POSITIVE_INFINITY, apply: (args) => Math.min(...args) },
  max: { minArgs: 1, maxArgs: Number.POSITIVE_INFINITY, apply: (args) => Math.max(...args) },
} satisfies Record<string, MathFunction>));

const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;
const SINGLE_OPERATORS = new Set(['+', '-', '*', '/', '%', '(', ')', ',']);

export function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  while (position < expression.length) {
    const char = expression[position];
    if (char === undefined) {
      break;
    }

    if (/\s/.test(char)) {
      position += 1;
      continue;
    }

    const rest = expression.slice(position);

    const numberMatch = NUMBER_PATTERN.exec(rest);
    if (numberMatch) {
      tokens.push({ kind: 'number', value: Number(numberMatch[0]), position });
      position += numberMatch[0].length;
      continue;
    }

    const nameMatch = NAME_PATTERN.exec(rest);
    if (nameMatch) {
      tokens.push({ kind: 'name', value: nameMatch[0], position });
      position += nameMatch[0].length;
      continue;
    }

    if (rest.startsWith('**')) {
      tokens.push({ kind: 'op', value: '**', position });
      position += 2;
      continue;
    }

    if (SINGLE_OPERATORS.has(char)) {
      tokens.push({ kind: 'op', value: char, position });
      position += 1;
      continue;
    }

    throw new CalculatorError(`unsupported character '${char}' at position ${position}`);
  }

  tokens.push({ kind: 'end', position });
  return tokens;
}

/**
 * Recursive-descent evaluator over an allow-list of operators, functions and
 * constants. Precedence follows the usual rules: `**` binds tighter than unary
 * sign on its left and is right-associative, so `-2 ** 2` is -4 and
 * `2 ** 3 ** 2` is 512.
 */
class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    const value = this.parseAdditive();
    const next = this.peek();
    if (next.kind !== 'end') {
      throw new CalculatorError(`unexpected token at position ${next.position}`);
    }
    return value;
  }

  private peek(): Token {
    const token = this.tokens[this.index];
    if (!token) {
      throw new CalculatorError('unexpected end of expression');
    }
    return token;
  }

  private advance(): Token {
    const token = this.peek();
    this.index += 1;
    return token;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token.kind === 'op' && token.value === value;
  }

  private expectOp(value: string): void {
    if (!this.isOp(value)) {
      throw new CalculatorError(`expected '${value}' at position ${this.peek().position}`);
    }
    this.index += 1;
  }

  private parseAdditive(): number {
    let value = this.parseMultiplicative();
    while (this.isOp('+') || this.isOp('-')) {
      const op = this.advance();
      const right = this.parseMultiplicative();
      value = op.kind === 'op' && op.value === '+' ? value + right : value - right;
    }
    return value;
  }

  private parseMultiplicative(): number {
    let value = this.parseUnary();
    while (this.isOp('*') || this.isOp('/') || this.isOp('%')) {
      const op = this.advance();
      const right = this.parseUnary();
      const symbol = op.kind === 'op' ? op.value : '';

      if (symbol === '*') {
        value *= right;
        continue;
      }
      if (right === 0) {
        throw new CalculatorError('division by zero');
      }
      // Remainder takes the sign of the divisor.
      value = symbol === '/' ? value / right : ((value % right) + right) % right;
    }
    return value;
  }

  private parseUnary(): number {
    if (this.isOp('-')) {
      this.index += 1;
      return -this.parseUnary();
    }
    if (this.isOp('+')) {
      this.index += 1;
      return this.parseUnary();
    }
    return this.parsePower();
  }

  private parsePower(): number {
    const base = this.parsePrimary();
    if (this.isOp('**')) {
      this.index += 1;
      const exponent = this.parseUnary();
      if (base === 0 && exponent < 0) {
        throw new CalculatorError('division by zero');
      }
      return base ** exponent;
    }
    return base;
  }

  private parsePrimary(): number {
    const token = this.advance();

    if (token.kind === 'number') {
      return token.value;
    }

    if (token.kind === 'op' && token.value === '(') {
      const value = this.parseAdditive();
      this.expectOp(')');
      return value;
    }

    if (token.kind === 'name') {
      if (this.isOp('(')) {
        return this.parseCall(token.value, token.position);
      }
      const constant = CONSTANTS.get(token.value);
      if (constant === undefined) {
        throw new CalculatorError(`unknown name '${token.value}'`);
      }
      return constant;
    }

    if (token.kind === 'end') {
      throw new CalculatorError('unexpected end of expression');
    }

    throw new CalculatorError(`unexpected token at position ${token.position}`);
  }

  private parseCall(name: string, position: number): number {
    const fn = FUNCTIONS.get(name);
    if (!fn) {
      throw new CalculatorError(`unknown function '${name}' at position ${position}`);
    }

    this.expectOp('(');
    const args: number[] = [];
    if (!this.isOp(')')) {
      args.push(this.parseAdditive());
      while (this.isOp(',')) {
        this.index += 1;
        args.push(this.parseAdditive());
      }
    }
    this.expectOp(')');

    if (args.length < fn.minArgs || args.length > fn.maxArgs) {
      throw new CalculatorError(`${name}() got ${args.length} argument(s)`);
    }

    return fn.apply(args);
  }
}

export function evaluateExpression(expression: string): number {
  const value = new Parser(tokenize(expression)).parse();

  if (Number.isNaN(value)) {
    throw new CalculatorError('math domain error');
  }
  if (!Number.isFinite(value)) {
    throw new CalculatorError('result out of range');
  }

  return value;
}

export function formatResult(value: number): string {
  if (Number.isInteger(value)) {
    if (Math.abs(value) >= 1e21) {
      return BigInt(value).toString();
    }
    return String(value === 0 ? 0 : value);
  }

  return String(Number(value.toFixed(10)));
}

export function createCalculatorTool(): AgentTool<typeof CalculatorInputSchema> {
  return {
    name: CALCULATOR_TOOL_NAME,
    description:
      'Evaluate a mathematical expression. Supports + - * / % ** and parentheses, ' +
      'functions sqrt, sin, cos, tan, log (base 10), ln, abs, round, min, max, and constants pi and e.',
    parameters: CalculatorInputSchema,
    async execute(input) {
      try {
        const result = formatResult(evaluateExpression(input.expression));
        console.log(`[agent] calculator: ${input.expression} = ${result}`);
        return completed(`Result: ${result}`);
      } catch (error) {
        if (error instanceof CalculatorError) {
          return errored(`Error: ${error.message}`);
        }
        throw error;
      }
    },
  };
}
