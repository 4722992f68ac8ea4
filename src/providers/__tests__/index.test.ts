import { describe, it, expect } from 'vitest';
import { getProvider } from '../index.js';

describe('Provider Registry', () => {
  it('should refuse an unknown provider', () => {
    expect(() => getProvider('kimi')).toThrow('Provider "kimi" is not available or not configured');
  });
});
