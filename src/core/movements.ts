import type { MovementRuleRegistry } from '../rules/registry.js';
import type { MovementContext } from '../rules/rule.js';
import type { Pitch } from '../theory/pitch.js';
import type { Possibility, Rules } from '../types.js';
import type { Voice } from '../voices/voice.js';
import type { RealizationCache } from './cache.js';
import { planResolution, resolvePossibility } from './resolution.js';
import type { Segment } from './segment.js';

export interface MovementOptions {
  voices: readonly Voice[];
  rules: Rules;
  movementRules: MovementRuleRegistry;
  cache: RealizationCache;
}

function upperVoicesKey(pitches: readonly Pitch[]): string {
  return pitches
    .slice(0, -1)
    .map((pitch) => pitch.midi)
    .join(',');
}

function indexByUpperVoices(realizations: readonly Possibility[]): Map<string, number[]> {
  const index = new Map<string, number[]>();
  realizations.forEach((possibility, i) => {
    const key = upperVoicesKey(possibility);
    const bucket = index.get(key);
    if (bucket) bucket.push(i);
    else index.set(key, [i]);
  });
  return index;
}

// For every realization of `from`, the indices of the `to` realizations it may move to.
// A slot that must resolve only reaches the realizations its resolution plan produces;
// the bass is matched by pitch class, since the bass line fixes its octave.
export function generateMovements(
  from: Segment,
  to: Segment,
  options: MovementOptions,
): Map<number, number[]> {
  const { voices, rules, movementRules, cache } = options;
  const ctx: MovementContext = { voices, rules, requirement: from.requirement };
  const activeRules = movementRules.enabledFor(rules, from.requirement);
  const plan = planResolution(from.requirement, to.chord, rules);
  const checkOrdinaryRules = plan === null || rules.applyConsecutivePossibRulesToResolution;
  const resolutions = plan ? indexByUpperVoices(to.realizations) : null;
  const everyTarget = to.realizations.map((_, j) => j);

  const adjacency = new Map<number, number[]>();
  from.realizations.forEach((a, i) => {
    let candidates = everyTarget;
    if (plan && resolutions) {
      const resolved = resolvePossibility(plan, a, cache);
      const bassPc = resolved[resolved.length - 1].pc;
      candidates = to.bass.pc === bassPc ? (resolutions.get(upperVoicesKey(resolved)) ?? []) : [];
    }
    const targets = checkOrdinaryRules
      ? candidates.filter((j) =>
          activeRules.every((rule) => rule.allows(a, to.realizations[j], ctx)),
        )
      : candidates;
    adjacency.set(i, targets);
  });
  return adjacency;
}
