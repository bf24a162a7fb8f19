import { describe, it, expect } from 'vitest';
import { envNumber, envString } from '../env/env';

describe('env helpers', () => {
  const env = { NAME: 'sumo', EMPTY: '', COUNT: '3', BAD: 'three' };

  it('reads strings with defaults', () => {
    expect(envString(env, 'NAME')).toBe('sumo');
    expect(envString(env, 'EMPTY', 'fallback')).toBe('fallback');
    expect(envString(env, 'MISSING')).toBeUndefined();
  });

  it('reads numbers and falls back on junk', () => {
    expect(envNumber(env, 'COUNT')).toBe(3);
    expect(envNumber(env, 'BAD', 7)).toBe(7);
    expect(envNumber(env, 'EMPTY', 1)).toBe(1);
  });
});
