import { describe, expect, it } from 'vitest';

import { isValid } from '../report.js';

describe('isValid', () => {
  it('is true only for an empty report', () => {
    expect(isValid({})).toBe(true);
    expect(isValid({ email: 'The email field is required.' })).toBe(false);
  });
});
