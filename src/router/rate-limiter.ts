import { createLogger } from '../utils/logger.js';

const log = createLogger('rate-limiter');

/**
 * Tracks providers that answered 429, with time-based cooldowns. A cooling
 * provider is left out of the first selection for a request while any other
 * candidate remains.
 */
export class RateLimiter {
  private cooldowns = new Map<string, number>(); // providerName → expiresAt (epoch ms)
  private readonly defaultCooldownMs: number;

  constructor(defaultCooldownMs = 60_000) {
    this.defaultCooldownMs = defaultCooldownMs;
  }

  markRateLimited(providerName: string, cooldownMs = this.defaultCooldownMs): void {
    const expiresAt = Date.now() + cooldownMs;
    this.cooldowns.set(providerName, expiresAt);
    log.info(`Rate-limited: ${providerName} for ${cooldownMs}ms (until ${new Date(expiresAt).toISOString()})`);
  }

  /**
   * Check if a provider is currently rate-limited. Auto-prunes expired entries.
   */
  isRateLimited(providerName: string): boolean {
    const expiresAt = this.cooldowns.get(providerName);
    if (expiresAt === undefined) return false;

    if (Date.now() >= expiresAt) {
      this.cooldowns.delete(providerName);
      log.debug(`Rate-limit expired: ${providerName}`);
      return false;
    }

    return true;
  }

  /** The subset of `names` that is currently rate-limited. */
  limitedAmong(names: string[]): string[] {
    return names.filter(name => this.isRateLimited(name));
  }

  /**
   * Names to leave out of a first selection: the cooling subset of `names`,
   * or nothing when every one of them is cooling.
   */
  exclusionsAmong(names: string[]): string[] {
    const limited = this.limitedAmong(names);
    return limited.length < names.length ? limited : [];
  }

  clear(providerName: string): void {
    this.cooldowns.delete(providerName);
  }

  clearAll(): void {
    this.cooldowns.clear();
  }

  get size(): number {
    const now = Date.now();
    for (const [name, expiresAt] of this.cooldowns) {
      if (now >= expiresAt) this.cooldowns.delete(name);
    }
    return this.cooldowns.size;
  }
}
