import type { ResolutionRequirement } from '../theory/harmony.js';
import type { Rules } from '../types.js';
import {
  hiddenFifthsRule,
  hiddenOctavesRule,
  italianAugmentedSixthRule,
  parallelFifthsRule,
  parallelOctavesRule,
  partMovementLimitsRule,
  voiceOverlapRule,
} from './movement.js';
import type { MovementRule } from './rule.js';

// Central registry for the rules checked between consecutive realizations.
export class MovementRuleRegistry {
  private rules = new Map<string, MovementRule>();

  register(rule: MovementRule): void {
    if (this.rules.has(rule.name)) {
      throw new Error(`Movement rule already registered: ${rule.name}`);
    }
    this.rules.set(rule.name, rule);
  }

  get(name: string): MovementRule {
    const rule = this.rules.get(name);
    if (!rule) {
      throw new Error(`Movement rule not found: ${name}`);
    }
    return rule;
  }

  has(name: string): boolean {
    return this.rules.has(name);
  }

  getAll(): MovementRule[] {
    return Array.from(this.rules.values());
  }

  getRuleNames(): string[] {
    return Array.from(this.rules.keys());
  }

  // Rules that take part in one movement, in registration order
  enabledFor(rules: Rules, requirement: ResolutionRequirement): MovementRule[] {
    return this.getAll().filter((rule) => rule.isEnabled(rules, requirement));
  }

  // Factory: create registry with all default rules
  static createDefault(): MovementRuleRegistry {
    const registry = new MovementRuleRegistry();
    registry.register(voiceOverlapRule);
    registry.register(partMovementLimitsRule);
    registry.register(parallelFifthsRule);
    registry.register(parallelOctavesRule);
    registry.register(hiddenFifthsRule);
    registry.register(hiddenOctavesRule);
    registry.register(italianAugmentedSixthRule);
    return registry;
  }
}
