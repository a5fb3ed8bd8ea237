export const DEFAULT_USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:109.0) Gecko/20100101 Firefox/111.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 Edg/120.0.0.0',
  'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:120.0) Gecko/20100101 Firefox/120.0',
];

/**
 * UserAgentPool
 * Immutable set of browser identities; safe to share between concurrent requests
 */
export class UserAgentPool {
  private readonly agents: readonly string[];
  private readonly random: () => number;

  constructor(agents: readonly string[] = DEFAULT_USER_AGENTS, random: () => number = Math.random) {
    if (agents.length === 0) {
      throw new Error('UserAgentPool needs at least one user agent');
    }
    this.agents = [...agents];
    this.random = random;
  }

  get size(): number {
    return this.agents.length;
  }

  pick(): string {
    const index = Math.min(Math.floor(this.random() * this.agents.length), this.agents.length - 1);
    return this.agents[index];
  }
}
