import { describe, it, expect } from 'vitest';
import { codepointsFromText, getDefaultCodepoints, parseCodepointRanges, resolveCodepoints } from './unicode-utils';

describe('getDefaultCodepoints', () => {
  it('covers printable ASCII', () => {
    const codepoints = getDefaultCodepoints();
    expect(codepoints).toHaveLength(95);
    expect(codepoints[0]).toBe(32);
    expect(codepoints[94]).toBe(126);
  });

  it('starts at space for any count', () => {
    expect(getDefaultCodepoints(3)).toEqual([32, 33, 34]);
  });
});

describe('codepointsFromText', () => {
  it('keeps first appearance order and drops repeats', () => {
    expect(codepointsFromText('hello')).toEqual([104, 101, 108, 111]);
  });

  it('reads astral characters as one codepoint', () => {
    expect(codepointsFromText('a😀')).toEqual([0x61, 0x1f600]);
  });
});

describe('parseCodepointRanges', () => {
  it('accepts decimal, hex and U+ notation', () => {
    expect(parseCodepointRanges('65-67,0x20AC,U+41')).toEqual([65, 66, 67, 0x20ac]);
  });

  it('ignores blanks around tokens and empty entries', () => {
    expect(parseCodepointRanges(' 32 - 33 ,, 0x41 ')).toEqual([32, 33, 65]);
  });

  it('rejects reversed ranges', () => {
    expect(() => parseCodepointRanges('70-65')).toThrow('Invalid codepoint range: 70-65');
  });

  it('rejects tokens that are not codepoints', () => {
    expect(() => parseCodepointRanges('zz')).toThrow('Invalid codepoint: zz');
    expect(() => parseCodepointRanges('0x110000')).toThrow('Invalid codepoint: 0x110000');
  });

  it('rejects tokens with trailing characters', () => {
    expect(() => parseCodepointRanges('12abc')).toThrow('Invalid codepoint: 12abc');
    expect(() => parseCodepointRanges('0x41g')).toThrow('Invalid codepoint: 0x41g');
    expect(() => parseCodepointRanges('1a')).toThrow('Invalid codepoint: 1a');
    expect(() => parseCodepointRanges('0x')).toThrow('Invalid codepoint: 0x');
  });

  it('caps the number of codepoints one list can request', () => {
    expect(() => parseCodepointRanges('0-0x10FFFF')).toThrow('Too many codepoints requested: more than 65536 (at 0-0x10FFFF)');
    expect(() => parseCodepointRanges('0-0xFFFF,0x10000')).toThrow('Too many codepoints requested: more than 65536 (at 0x10000)');
    expect(parseCodepointRanges('0-0xFFFF')).toHaveLength(65536);
  });
});

describe('resolveCodepoints', () => {
  it('merges characters and ranges', () => {
    expect(resolveCodepoints('AB', '66-67')).toEqual([65, 66, 67]);
  });

  it('is empty when nothing is named', () => {
    expect(resolveCodepoints()).toEqual([]);
  });
});
