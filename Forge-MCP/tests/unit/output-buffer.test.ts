/**
 * Unit tests for bounded head+tail output capture.
 */

import { describe, it, expect } from 'vitest';
import { OutputBuffer } from '../../src/executor/output-buffer.js';

const limits = { maxChars: 10, head: 4, tail: 4 };

function capture(text: string) {
  const buffer = new OutputBuffer(limits);
  buffer.append(text);
  return buffer.result();
}

describe('OutputBuffer', () => {
  it('should keep output under the limit as-is', () => {
    const buffer = new OutputBuffer(limits);
    buffer.append('hello');

    expect(buffer.result()).toEqual({ text: 'hello', truncated: false });
  });

  it('should not truncate output exactly at the limit', () => {
    expect(capture('abcdefghij')).toEqual({ text: 'abcdefghij', truncated: false });
  });

  it('should keep head and tail around a marker when over the limit', () => {
    expect(capture('abcdefghijkl')).toEqual({
      text: 'abcd\n\n[... truncated 4 characters ...]\n\nijkl',
      truncated: true,
    });
  });

  it('should give the same result when output arrives in chunks', () => {
    const buffer = new OutputBuffer(limits);
    buffer.append('abc');
    buffer.append('defgh');
    buffer.append('');
    buffer.append('ijkl');

    expect(buffer.length).toBe(12);
    expect(buffer.toString()).toBe('abcd\n\n[... truncated 4 characters ...]\n\nijkl');
  });
});
