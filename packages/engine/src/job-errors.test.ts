import { describe, expect, it } from 'vitest';

import { describeError } from './job-errors';

describe('describeError', () => {
  it('uses the message of Error instances', () => {
    expect(describeError(new TypeError('bad handle'))).toBe('bad handle');
  });

  it('stringifies anything else', () => {
    expect(describeError('plain text')).toBe('plain text');
    expect(describeError(404)).toBe('404');
    expect(describeError(null)).toBe('null');
  });
});
