import { describe, it, expect } from 'vitest';
import { RealizationCache } from '../../src/core/cache.js';
import { planResolution, resolvePossibility } from '../../src/core/resolution.js';
import { analyzeChord, resolutionRequirement } from '../../src/theory/harmony.js';
import { toPitch } from '../../src/theory/pitch.js';
import { DEFAULT_RULES, resolveRules, type Rules } from '../../src/types.js';

function requirementOf(pitchNames: string[]) {
  return resolutionRequirement(analyzeChord(pitchNames), pitchNames, DEFAULT_RULES);
}

function resolve(from: string[], to: string[], voicing: string[], rules: Rules = DEFAULT_RULES) {
  const plan = planResolution(requirementOf(from), analyzeChord(to), rules);
  if (!plan) return null;
  const resolved = resolvePossibility(plan, voicing.map(toPitch), new RealizationCache());
  return { name: plan.name, pitches: resolved.map((pitch) => pitch.name) };
}

describe('dominant seventh', () => {
  const g7 = ['G', 'B', 'D', 'F'];

  it('resolves to the major tonic', () => {
    expect(resolve(g7, ['C', 'E', 'G'], ['F4', 'D4', 'B3', 'G3'])).toEqual({
      name: 'dominant-seventh-to-major-tonic',
      pitches: ['E4', 'C4', 'C4', 'C4'],
    });
  });

  it('holds an upper voice doubling the root', () => {
    expect(resolve(g7, ['C', 'E', 'G'], ['G4', 'F4', 'B3', 'G3'])?.pitches).toEqual([
      'G4',
      'E4',
      'C4',
      'C4',
    ]);
  });

  it('lets the fifth and seventh rise from four-three to six', () => {
    expect(resolve(['D', 'F', 'G', 'B'], ['E', 'G', 'C'], ['B4', 'G4', 'F4', 'D3'])).toEqual({
      name: 'dominant-seventh-to-major-tonic',
      pitches: ['C5', 'G4', 'G4', 'E3'],
    });
  });

  it('resolves deceptively to the submediant', () => {
    expect(resolve(g7, ['A', 'C', 'E'], ['F4', 'D4', 'B3', 'G3'])).toEqual({
      name: 'dominant-seventh-to-minor-submediant',
      pitches: ['E4', 'C4', 'C4', 'A3'],
    });
  });

  it('does not resolve deceptively from four-three', () => {
    expect(resolve(['D', 'F', 'G', 'B'], ['A', 'C', 'E'], ['B4', 'G4', 'F4', 'D3'])).toBeNull();
  });

  it('resolves to the subdominant from six-five', () => {
    expect(resolve(['B', 'D', 'F', 'G'], ['F', 'A', 'C'], ['G4', 'F4', 'D4', 'B3'])).toEqual({
      name: 'dominant-seventh-to-major-subdominant',
      pitches: ['A4', 'F4', 'C4', 'C4'],
    });
  });

  it('does not resolve to the subdominant from four-three', () => {
    expect(resolve(['D', 'F', 'G', 'B'], ['F', 'A', 'C'], ['B4', 'G4', 'F4', 'D3'])).toBeNull();
  });
});

describe('diminished seventh', () => {
  const dim7 = ['D', 'F', 'Ab', 'B'];

  it('doubles the tonic root when the bass falls to it', () => {
    expect(resolve(dim7, ['C', 'E', 'G'], ['B4', 'Ab4', 'F4', 'D3'])).toEqual({
      name: 'diminished-seventh-to-major-tonic',
      pitches: ['C5', 'G4', 'E4', 'C3'],
    });
  });

  it('raises the third when the doubled root is off and not taken from the bass', () => {
    const rules = resolveRules({ dim7DoublingFromContext: false, doubledRootInDim7: false });
    expect(resolve(dim7, ['C', 'E', 'G'], ['B4', 'Ab4', 'F4', 'D3'], rules)?.pitches).toEqual([
      'C5',
      'G4',
      'E4',
      'E3',
    ]);
  });
});

describe('augmented sixth', () => {
  const german = ['F', 'A', 'C', 'D#'];

  it('resolves outward to the dominant', () => {
    expect(resolve(german, ['E', 'G#', 'B'], ['D#5', 'C5', 'A4', 'F3'])).toEqual({
      name: 'german-sixth-to-dominant',
      pitches: ['E5', 'B4', 'G#4', 'E3'],
    });
  });

  it('holds the third and fifth into the cadential six-four', () => {
    expect(resolve(german, ['E', 'A', 'C'], ['D#5', 'C5', 'A4', 'F3'])).toEqual({
      name: 'german-sixth-to-minor-tonic',
      pitches: ['E5', 'C5', 'A4', 'E3'],
    });
  });

  it('has no plan for an unrelated chord', () => {
    expect(resolve(german, ['D', 'F', 'A'], ['D#5', 'C5', 'A4', 'F3'])).toBeNull();
  });
});

describe('planResolution', () => {
  it('has no plan for a slot without a requirement', () => {
    expect(planResolution({ kind: 'none' }, analyzeChord(['C', 'E', 'G']), DEFAULT_RULES)).toBe(
      null,
    );
  });
});
