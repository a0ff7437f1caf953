import type { CapabilityProfile, CompletionRequest, RuleCondition, SelectionRule } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('rules');

export const DYNAMIC_RULE_TTL_MS = 60 * 60 * 1000;

export function defaultRules(now = Date.now()): SelectionRule[] {
  return [
    {
      name: 'high-complexity-code-generation',
      priority: 1,
      condition: { kind: 'min-complexity', level: 4 },
      isDynamic: false,
      lastUpdated: now,
    },
    {
      name: 'cost-optimization',
      priority: 2,
      condition: { kind: 'budget-long-output', minMaxTokens: 1000, maxCostPerToken: 0.00001 },
      isDynamic: false,
      lastUpdated: now,
    },
  ];
}

export function evaluateCondition(
  condition: RuleCondition,
  request: CompletionRequest,
  profile: CapabilityProfile,
): boolean {
  switch (condition.kind) {
    case 'min-complexity':
      return request.complexityLevel >= condition.level && profile.maxComplexity >= condition.level;
    case 'budget-long-output':
      return request.maxTokens > condition.minMaxTokens && profile.costPerToken < condition.maxCostPerToken;
    case 'always':
      return true;
  }
}

/**
 * Built-in and adaptive selection rules. Mutations are synchronous, matching
 * the metrics store's locking discipline.
 */
export class SelectionRuleSet {
  private rules: SelectionRule[];
  private readonly ttlMs: number;

  constructor(initial: SelectionRule[] = defaultRules(), ttlMs = DYNAMIC_RULE_TTL_MS) {
    this.rules = [...initial];
    this.ttlMs = ttlMs;
  }

  add(rule: SelectionRule): void {
    if (this.rules.some(r => r.name === rule.name)) {
      throw new Error(`Selection rule already exists: ${rule.name}`);
    }
    this.rules.push({ ...rule });
    log.info(`Added selection rule: ${rule.name}${rule.isDynamic ? ' (dynamic)' : ''}`);
  }

  /**
   * Drop dynamic rules last updated more than the TTL ago. Built-in rules stay.
   * Returns the number removed.
   */
  pruneStale(now = Date.now()): number {
    const cutoff = now - this.ttlMs;
    const before = this.rules.length;
    this.rules = this.rules.filter(r => !(r.isDynamic && r.lastUpdated < cutoff));
    const pruned = before - this.rules.length;
    if (pruned > 0) {
      log.debug(`Pruned ${pruned} stale dynamic rules, ${this.rules.length} remaining`);
    }
    return pruned;
  }

  /** Rules ordered by priority; equal priorities keep insertion order. */
  list(): SelectionRule[] {
    return this.rules
      .map(r => ({ ...r }))
      .sort((a, b) => a.priority - b.priority);
  }

  matching(request: CompletionRequest, profile: CapabilityProfile): string[] {
    return this.list()
      .filter(r => evaluateCondition(r.condition, request, profile))
      .map(r => r.name);
  }

  get size(): number {
    return this.rules.length;
  }

  get dynamicCount(): number {
    return this.rules.filter(r => r.isDynamic).length;
  }
}
