import { evaluate, isSatisfied, parseExpression, references } from '../../src/expression';

function run(source: string, scope: Record<string, number> = {}): number {
  return evaluate(parseExpression(source), new Map(Object.entries(scope)));
}

describe('evaluate', () => {
  it('does arithmetic with C precedence', () => {
    expect(run('2 + 3 * 4')).toBe(14);
    expect(run('(2 + 3) * 4')).toBe(20);
    expect(run('1 << 2 + 1')).toBe(8);
  });

  it('truncates division toward zero', () => {
    expect(run('7 / 2')).toBe(3);
    expect(run('-7 / 2')).toBe(-3);
    expect(run('7 % 3')).toBe(1);
  });

  it('yields NaN for division or modulo by zero', () => {
    expect(run('1 / 0')).toBeNaN();
    expect(run('1 % 0')).toBeNaN();
  });

  it('reads values from the scope', () => {
    expect(run('len - 2', { len: 10 })).toBe(8);
    expect(run('flags.mode == 3', { 'flags.mode': 3 })).toBe(1);
  });

  it('evaluates unknown names to NaN', () => {
    expect(run('missing + 1')).toBeNaN();
  });

  it('returns 1 or 0 from comparisons and logic', () => {
    expect(run('3 > 2')).toBe(1);
    expect(run('3 <= 2')).toBe(0);
    expect(run('1 && 0')).toBe(0);
    expect(run('0 || 5')).toBe(1);
    expect(run('!0')).toBe(1);
    expect(run('!7')).toBe(0);
  });

  it('applies bitwise operators', () => {
    expect(run('flags & 0x08', { flags: 0x0c })).toBe(8);
    expect(run('0xf0 | 0x0f')).toBe(0xff);
    expect(run('6 ^ 3')).toBe(5);
    expect(run('~0')).toBe(-1);
    expect(run('16 >> 2')).toBe(4);
  });

  it('short-circuits && and ||', () => {
    // The right side would be NaN (falsy) if evaluated
    expect(run('1 || missing')).toBe(1);
    expect(run('0 && missing')).toBe(0);
  });
});

describe('isSatisfied', () => {
  it('treats non-zero as true and zero or NaN as false', () => {
    const scope = new Map([['n', 2]]);
    expect(isSatisfied(parseExpression('n'), scope)).toBe(true);
    expect(isSatisfied(parseExpression('n - 2'), scope)).toBe(false);
    expect(isSatisfied(parseExpression('unknown'), scope)).toBe(false);
  });
});

describe('references', () => {
  it('lists each referenced name once, in first-use order', () => {
    expect(references(parseExpression('b + a * b - flags.x'))).toEqual(['b', 'a', 'flags.x']);
  });

  it('returns nothing for constant expressions', () => {
    expect(references(parseExpression('1 + 2'))).toEqual([]);
  });
});
