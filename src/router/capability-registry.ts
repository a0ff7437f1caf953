import type { CapabilityProfile, CapabilityProfileInput } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('capability-registry');

function toProfile(name: string, input: CapabilityProfileInput): CapabilityProfile {
  if (!Number.isInteger(input.maxComplexity) || input.maxComplexity < 1 || input.maxComplexity > 5) {
    throw new Error(`Invalid maxComplexity for ${name}: ${input.maxComplexity} (expected 1..5)`);
  }
  if (!Number.isInteger(input.maxTokens) || input.maxTokens <= 0) {
    throw new Error(`Invalid maxTokens for ${name}: ${input.maxTokens}`);
  }
  if (!Number.isFinite(input.costPerToken) || input.costPerToken < 0) {
    throw new Error(`Invalid costPerToken for ${name}: ${input.costPerToken}`);
  }

  return Object.freeze({
    supportedLanguages: new Set(input.supportedLanguages),
    supportedTasks: new Set(input.supportedTasks),
    maxComplexity: input.maxComplexity,
    maxTokens: input.maxTokens,
    costPerToken: input.costPerToken,
  });
}

/**
 * Provider name → capability profile. Iteration follows registration order,
 * which is what breaks ties during selection.
 */
export class CapabilityRegistry {
  private profiles = new Map<string, CapabilityProfile>();

  constructor(entries: Iterable<readonly [string, CapabilityProfileInput]> = []) {
    for (const [name, input] of entries) {
      this.register(name, input);
    }
    if (this.profiles.size > 0) {
      log.info(`Registered ${this.profiles.size} providers`);
    }
  }

  register(name: string, input: CapabilityProfileInput): CapabilityProfile {
    if (!name) {
      throw new Error('Provider name cannot be empty');
    }
    if (this.profiles.has(name)) {
      throw new Error(`Provider already registered: ${name}`);
    }
    const profile = toProfile(name, input);
    this.profiles.set(name, profile);
    return profile;
  }

  /**
   * Replaces a provider's profile, keeping its registration position.
   * Unknown names are appended.
   */
  update(name: string, input: CapabilityProfileInput): CapabilityProfile {
    if (!name) {
      throw new Error('Provider name cannot be empty');
    }
    const profile = toProfile(name, input);
    this.profiles.set(name, profile);
    log.info(`Updated capabilities for provider: ${name}`);
    return profile;
  }

  get(name: string): CapabilityProfile | undefined {
    return this.profiles.get(name);
  }

  getByName(name: string): CapabilityProfile {
    const profile = this.profiles.get(name);
    if (!profile) {
      throw new Error(`Unknown provider: ${name}`);
    }
    return profile;
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  names(): string[] {
    return Array.from(this.profiles.keys());
  }

  entries(): Array<[string, CapabilityProfile]> {
    return Array.from(this.profiles.entries());
  }

  get size(): number {
    return this.profiles.size;
  }
}
