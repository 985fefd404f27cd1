import type { Pitch } from './theory/pitch.js';

// One realization of a slot: pitches indexed by the ordered voice list, bass last
export type Possibility = readonly Pitch[];

// One realization index per slot
export type IndexProgression = number[];

export interface BassEntry {
  pitch: string; // "C3", "B-2", "F#2"
  figure: string; // "", "6", "6,-5", "#"
  duration?: number; // quarter lengths, rendering only
}

export interface FiguredBassLine {
  key: string; // tonic, e.g. "C" or "B-"
  mode: string; // "major", "minor", ...
  bass: BassEntry[];
}

export interface PartMovementLimit {
  voice: string; // voice label
  maxSemitones: number;
}

export interface Rules {
  // Single realization
  forbidIncompletePossibilities: boolean;
  upperPartsMaxSemitoneSeparation: number | null;
  forbidVoiceCrossing: boolean;
  forbidDoubledAlterations: boolean;

  // Consecutive realizations
  forbidParallelFifths: boolean;
  forbidParallelOctaves: boolean;
  forbidHiddenFifths: boolean;
  forbidHiddenOctaves: boolean;
  forbidVoiceOverlap: boolean;
  partMovementLimits: readonly PartMovementLimit[];

  // Special resolutions
  resolveDominantSeventhProperly: boolean;
  resolveDiminishedSeventhProperly: boolean;
  resolveAugmentedSixthProperly: boolean;
  doubledRootInDim7: boolean;
  dim7DoublingFromContext: boolean;
  restrictDoublingsInItalianA6Resolution: boolean;
  applyConsecutivePossibRulesToResolution: boolean;

  // Search
  maxRealizationsPerSlot: number;
}

export const DEFAULT_RULES: Rules = Object.freeze({
  forbidIncompletePossibilities: true,
  upperPartsMaxSemitoneSeparation: 12,
  forbidVoiceCrossing: true,
  forbidDoubledAlterations: true,

  forbidParallelFifths: true,
  forbidParallelOctaves: true,
  forbidHiddenFifths: true,
  forbidHiddenOctaves: true,
  forbidVoiceOverlap: true,
  partMovementLimits: Object.freeze([]),

  resolveDominantSeventhProperly: true,
  resolveDiminishedSeventhProperly: true,
  resolveAugmentedSixthProperly: true,
  doubledRootInDim7: false,
  dim7DoublingFromContext: true,
  restrictDoublingsInItalianA6Resolution: true,
  applyConsecutivePossibRulesToResolution: true,

  maxRealizationsPerSlot: 20000,
});

// Rules are frozen before a run begins
export function resolveRules(overrides: Partial<Rules> = {}): Rules {
  return Object.freeze({
    ...DEFAULT_RULES,
    ...overrides,
    partMovementLimits: Object.freeze(
      (overrides.partMovementLimits ?? DEFAULT_RULES.partMovementLimits).map((limit) =>
        Object.freeze({ ...limit }),
      ),
    ),
  });
}
