import type { ResolutionRequirement } from '../theory/harmony.js';
import type { Possibility, Rules } from '../types.js';
import type { Voice } from '../voices/voice.js';

export interface MovementContext {
  // Ordered, bass last
  voices: readonly Voice[];
  rules: Rules;
  // Requirement of the slot being left
  requirement: ResolutionRequirement;
}

// Plugin contract for rules on the motion between two consecutive realizations
export interface MovementRule {
  name: string;

  // For display in `continuo rules`
  description: string;

  // Whether the rule takes part in a given movement
  isEnabled(rules: Rules, requirement: ResolutionRequirement): boolean;

  // Does the motion from `a` to `b` obey the rule?
  allows(a: Possibility, b: Possibility, ctx: MovementContext): boolean;
}
