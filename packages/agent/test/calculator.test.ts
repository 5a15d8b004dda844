import { describe, expect, it } from 'vitest';

import { createCalculatorTool, evaluateExpression, formatResult } from '../src/tools/calculator.js';
import type { ToolContext } from '../src/tools/types.js';

const context: ToolContext = { userId: 'user-1', threadId: 'thread-1' };

async function calculate(expression: string) {
  return await createCalculatorTool().execute({ expression }, context);
}

describe('calculator tool', () => {
  it('evaluates functions and exponentiation', async () => {
    expect(await calculate('sqrt(16) + 2**3')).toEqual({ text: 'Result: 12', status: 'completed' });
  });

  it.each([
    ['2 + 3 * 4', '14'],
    ['(2 + 3) * 4', '20'],
    ['-2 ** 2', '-4'],
    ['2 ** 3 ** 2', '512'],
    ['2 ** -1', '0.5'],
    ['7 / 2', '3.5'],
    ['0.1 + 0.2', '0.3'],
    ['-7 % 3', '2'],
    ['log(100)', '2'],
    ['ln(e)', '1'],
    ['max(3, 9, 4)', '9'],
    ['min(3, 9, 4)', '3'],
    ['abs(-4.5)', '4.5'],
    ['round(2.5)', '2'],
    ['round(3.14159, 2)', '3.14'],
    ['2e3 + 1', '2001'],
    ['pi', '3.1415926536'],
    ['1 / 3', '0.3333333333'],
  ])('%s = %s', async (expression, expected) => {
    expect((await calculate(expression)).text).toBe(`Result: ${expected}`);
  });

  it('reports division by zero', async () => {
    expect(await calculate('1/0')).toEqual({ text: 'Error: division by zero', status: 'errored' });
    expect((await calculate('5 % 0')).text).toBe('Error: division by zero');
  });

  it('reports domain errors', async () => {
    expect((await calculate('sqrt(-1)')).text).toBe('Error: math domain error');
    expect((await calculate('ln(0)')).text).toBe('Error: math domain error');
  });

  it('rejects anything outside the grammar', async () => {
    expect((await calculate("__import__('os')")).text).toBe("Error: unsupported character ''' at position 11");
    expect((await calculate('foo + 1')).text).toBe("Error: unknown name 'foo'");
    expect((await calculate('open(1)')).text).toBe("Error: unknown function 'open' at position 0");
    expect((await calculate('2 +')).text).toBe('Error: unexpected end of expression');
    expect((await calculate('(1 + 2')).text).toBe("Error: expected ')' at position 6");
    expect((await calculate('sqrt(1, 2)')).text).toBe('Error: sqrt() got 2 argument(s)');
  });

  it('rejects results that overflow', () => {
    expect(() => evaluateExpression('10 ** 400')).toThrow('result out of range');
  });

  it('formats integral floats as integers', () => {
    expect(formatResult(4)).toBe('4');
    expect(formatResult(-0)).toBe('0');
    expect(formatResult(2.00000000001)).toBe('2');
  });

  it('prints large integral results without exponent notation', async () => {
    expect(await calculate('2**70')).toEqual({ text: 'Result: 1180591620717411303424', status: 'completed' });
    expect(await calculate('10**21')).toEqual({ text: 'Result: 1000000000000000000000', status: 'completed' });
    expect(formatResult(-(2 ** 70))).toBe('-1180591620717411303424');
  });
});
