import { describe, it, expect } from 'vitest';
import { cleanAddress } from './clean-address.js';

describe('cleanAddress', () => {
  it('strips a trailing symbol annotation', () => {
    expect(cleanAddress('0x401020 <main+16>')).toBe('0x401020');
  });

  it('keeps a bare address unchanged', () => {
    expect(cleanAddress('0x1a2b')).toBe('0x1a2b');
  });

  it('handles upper-case digits and prefix', () => {
    expect(cleanAddress('0X7FFF0001 in libc.so.6')).toBe('0X7FFF0001');
  });

  it('ignores surrounding whitespace', () => {
    expect(cleanAddress('  0x0000555555555129 <main+4>\n')).toBe('0x0000555555555129');
  });

  it('returns non-hex input as is', () => {
    expect(cleanAddress('main+16')).toBe('main+16');
  });
});
