import { describe, it, expect } from 'vitest';
import { shouldLogCount } from './logging.js';

describe('shouldLogCount', () => {
  it('should log the first five and every tenth after', () => {
    const logged = Array.from({ length: 30 }, (_, i) => i + 1).filter(shouldLogCount);
    expect(logged).toEqual([1, 2, 3, 4, 5, 10, 20, 30]);
  });
});
