import {
  harmonicInterval,
  isPerfectFifth,
  isPerfectOctave,
  melodicInterval,
  type Pitch,
  type SpelledInterval,
} from '../theory/pitch.js';
import type { Possibility } from '../types.js';
import type { MovementContext, MovementRule } from './rule.js';

type IntervalTest = (interval: SpelledInterval) => boolean;

// Both voices move, in the same direction
function similarMotion(highA: Pitch, highB: Pitch, lowA: Pitch, lowB: Pitch): boolean {
  const high = Math.sign(highB.midi - highA.midi);
  const low = Math.sign(lowB.midi - lowA.midi);
  return high !== 0 && high === low;
}

function parallelInto(
  a: Possibility,
  b: Possibility,
  high: number,
  low: number,
  isPerfect: IntervalTest,
): boolean {
  return (
    similarMotion(a[high], b[high], a[low], b[low]) &&
    isPerfect(harmonicInterval(a[low], a[high])) &&
    isPerfect(harmonicInterval(b[low], b[high]))
  );
}

function hiddenInto(
  a: Possibility,
  b: Possibility,
  high: number,
  low: number,
  isPerfect: IntervalTest,
): boolean {
  return (
    similarMotion(a[high], b[high], a[low], b[low]) &&
    !isPerfect(harmonicInterval(a[low], a[high])) &&
    isPerfect(harmonicInterval(b[low], b[high]))
  );
}

function anyPair(size: number, test: (high: number, low: number) => boolean): boolean {
  for (let high = 0; high < size; high++) {
    for (let low = high + 1; low < size; low++) {
      if (test(high, low)) return true;
    }
  }
  return false;
}

export const parallelFifthsRule: MovementRule = {
  name: 'parallel-fifths',
  description: 'No two voices move in parallel perfect fifths',
  isEnabled: (rules) => rules.forbidParallelFifths,
  allows: (a, b) =>
    !anyPair(a.length, (high, low) => parallelInto(a, b, high, low, isPerfectFifth)),
};

export const parallelOctavesRule: MovementRule = {
  name: 'parallel-octaves',
  description: 'No two voices move in parallel octaves or unisons',
  isEnabled: (rules) => rules.forbidParallelOctaves,
  allows: (a, b) =>
    !anyPair(a.length, (high, low) => parallelInto(a, b, high, low, isPerfectOctave)),
};

// Outer voices only
export const hiddenFifthsRule: MovementRule = {
  name: 'hidden-fifths',
  description: 'Outer voices do not approach a perfect fifth in similar motion',
  isEnabled: (rules) => rules.forbidHiddenFifths,
  allows: (a, b) => !hiddenInto(a, b, 0, a.length - 1, isPerfectFifth),
};

export const hiddenOctavesRule: MovementRule = {
  name: 'hidden-octaves',
  description: 'Outer voices do not approach an octave in similar motion',
  isEnabled: (rules) => rules.forbidHiddenOctaves,
  allows: (a, b) => !hiddenInto(a, b, 0, a.length - 1, isPerfectOctave),
};

// A voice may not move past where any voice below or above it just was
export const voiceOverlapRule: MovementRule = {
  name: 'voice-overlap',
  description: 'No voice moves past the previous pitch of another voice',
  isEnabled: (rules) => rules.forbidVoiceOverlap,
  allows: (a, b) =>
    !anyPair(
      a.length,
      (high, low) => b[low].midi > a[high].midi || b[high].midi < a[low].midi,
    ),
};

export const partMovementLimitsRule: MovementRule = {
  name: 'part-movement-limits',
  description: 'Configured voices leap no further than their semitone limit',
  isEnabled: (rules) => rules.partMovementLimits.length > 0,
  allows: (a, b, ctx: MovementContext) => {
    for (const limit of ctx.rules.partMovementLimits) {
      const index = ctx.voices.findIndex((voice) => voice.label === limit.voice);
      if (index < 0) continue;
      if (Math.abs(b[index].midi - a[index].midi) > limit.maxSemitones) return false;
    }
    return true;
  },
};

function movesBy(from: Pitch, to: Pitch, semitones: number, steps: number): boolean {
  const interval = melodicInterval(from, to);
  return interval.semitones === semitones && interval.steps === steps;
}

// Directed intervals the major third above the bass may take out of an Italian sixth
const ITALIAN_THIRD_MOTIONS: Array<[number, number]> = [
  [4, 2],
  [3, 2],
  [2, 1],
  [-1, -1],
];

export const italianAugmentedSixthRule: MovementRule = {
  name: 'italian-augmented-sixth',
  description: 'An Italian sixth resolves outward with its doublings kept in check',
  isEnabled: (rules, requirement) =>
    rules.resolveAugmentedSixthProperly && requirement.kind === 'italian-augmented-sixth',
  allows: (a, b, ctx) => {
    const req = ctx.requirement;
    if (req.kind !== 'italian-augmented-sixth') return true;
    const restrict = ctx.rules.restrictDoublingsInItalianA6Resolution;
    const bass = a[a.length - 1];
    let sixthResolved = false;

    for (let i = 0; i < a.length; i++) {
      const from = a[i];
      const to = b[i];
      if (from.pc === req.third) {
        if (from.midi === to.midi) continue;
        if (Math.abs(to.midi - from.midi) > 4) return false;
        if (!ITALIAN_THIRD_MOTIONS.some(([semis, steps]) => movesBy(from, to, semis, steps))) {
          return false;
        }
      } else if (from.pc === req.bass && from.name === bass.name) {
        if (!movesBy(from, to, -1, -1)) return false;
      } else if (from.pc === req.sixth) {
        if (sixthResolved && restrict) return false;
        if (!movesBy(from, to, 1, 1)) return false;
        sixthResolved = true;
      } else if (from.pc === req.bass) {
        // Upper voice doubling the bass
        if (restrict) return false;
        if (!movesBy(from, to, -1, -1)) return false;
      }
    }
    return true;
  },
};
