import { describe, it, expect } from 'vitest';
import { parseKey } from './nodeTerminal';

describe('parseKey', () => {
  it('maps CSI and SS3 arrow sequences', () => {
    expect(parseKey('\x1b[A')).toBe('ArrowUp');
    expect(parseKey('\x1bOB')).toBe('ArrowDown');
    expect(parseKey('\x1b[C')).toBe('ArrowRight');
    expect(parseKey('\x1bOD')).toBe('ArrowLeft');
  });

  it('names control keys', () => {
    expect(parseKey('\r')).toBe('Enter');
    expect(parseKey('\n')).toBe('Enter');
    expect(parseKey('\x1b')).toBe('Escape');
    expect(parseKey('\x7f')).toBe('Backspace');
    expect(parseKey('\t')).toBe('Tab');
  });

  it('passes printable keys through', () => {
    expect(parseKey(' ')).toBe(' ');
    expect(parseKey('W')).toBe('W');
    expect(parseKey('x')).toBe('x');
  });
});
