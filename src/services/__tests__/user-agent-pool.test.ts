import { describe, test, expect } from 'vitest';
import { DEFAULT_USER_AGENTS, UserAgentPool } from '../user-agent-pool';

describe('UserAgentPool', () => {
  test('maps the random draw onto the pool', () => {
    const agents = ['a', 'b', 'c', 'd'];
    expect(new UserAgentPool(agents, () => 0).pick()).toBe('a');
    expect(new UserAgentPool(agents, () => 0.5).pick()).toBe('c');
    expect(new UserAgentPool(agents, () => 0.9999).pick()).toBe('d');
  });

  test('ships a pool of browser identities by default', () => {
    const pool = new UserAgentPool();
    expect(pool.size).toBe(DEFAULT_USER_AGENTS.length);
    expect(DEFAULT_USER_AGENTS.every((ua) => ua.startsWith('Mozilla/5.0'))).toBe(true);
    expect(DEFAULT_USER_AGENTS).toContain(pool.pick());
  });

  test('is not affected by later changes to the source list', () => {
    const agents = ['only'];
    const pool = new UserAgentPool(agents, () => 0);
    agents[0] = 'changed';
    expect(pool.pick()).toBe('only');
  });

  test('refuses an empty pool', () => {
    expect(() => new UserAgentPool([])).toThrow('UserAgentPool needs at least one user agent');
  });
});
