import { ChainStateError, type SlotLabel } from '../errors.js';
import {
  analyzeChord,
  isMajorTriad,
  isMinorTriad,
  resolutionRequirement,
  type ChordAnalysis,
  type ResolutionRequirement,
} from '../theory/harmony.js';
import { parseFigure, type Figure, type ShorthandTable } from '../theory/notation.js';
import { transposePitchClass, type Pitch } from '../theory/pitch.js';
import type { FiguredBassScale } from '../theory/scale.js';
import type { BassEntry, Possibility, Rules } from '../types.js';
import type { Voice } from '../voices/voice.js';
import type { RealizationCache } from './cache.js';
import { generatePossibilities, type SlotContext } from './possibilities.js';

// One chord slot of the chain: a bass note, its figure and the realizations found for it.
export class Segment {
  readonly index: number;
  readonly entry: BassEntry;
  readonly bass: Pitch;
  readonly figure: Figure;
  readonly pitchNames: readonly string[];
  readonly alteredPitchNames: readonly string[];
  readonly chord: ChordAnalysis;
  readonly requirement: ResolutionRequirement;
  private incompleteAllowed = false;
  // Set once; indices are stable from then on
  private generated: readonly Possibility[] | null = null;

  constructor(
    index: number,
    entry: BassEntry,
    scale: FiguredBassScale,
    rules: Rules,
    shorthand: ShorthandTable,
    cache: RealizationCache,
  ) {
    this.index = index;
    this.entry = entry;
    this.bass = cache.pitch(entry.pitch);
    this.figure = parseFigure(entry.figure, shorthand);
    const spelling = scale.pitchNames(this.bass, this.figure);
    this.pitchNames = spelling.pitchNames;
    this.alteredPitchNames = spelling.alteredPitchNames;
    this.chord = analyzeChord(spelling.pitchNames);
    this.requirement = resolutionRequirement(this.chord, spelling.pitchNames, rules);
  }

  get allowIncomplete(): boolean {
    return this.incompleteAllowed;
  }

  get realizations(): readonly Possibility[] {
    return this.generated ?? [];
  }

  allowIncompleteRealizations(): void {
    this.expectUngenerated('allowIncompleteRealizations');
    this.incompleteAllowed = true;
  }

  generateRealizations(voices: readonly Voice[], rules: Rules, cache: RealizationCache): void {
    this.expectUngenerated('generateRealizations');
    this.generated = Object.freeze(
      generatePossibilities(this.toSlotContext(), voices, rules, cache),
    );
  }

  private expectUngenerated(pass: string): void {
    if (this.generated !== null) {
      throw new ChainStateError(`${pass} on slot ${this.index}`, 'ungenerated', 'generated');
    }
  }

  get label(): SlotLabel {
    return { bass: this.bass.name, figure: this.entry.figure };
  }

  toSlotContext(): SlotContext {
    return {
      slotIndex: this.index,
      bass: this.bass,
      figure: this.entry.figure,
      pitchNames: this.pitchNames,
      alteredPitchNames: this.alteredPitchNames,
      allowIncomplete: this.allowIncomplete,
    };
  }
}

// A root-position dominant seventh resolving to its tonic triad leaves the tonic without its fifth.
export function allowsIncompleteResolution(previous: Segment, next: Segment): boolean {
  const req = previous.requirement;
  if (req.kind !== 'dominant-seventh' || req.inversion !== 0) return false;
  const tonic = transposePitchClass(req.root, '4P');
  return next.chord.root === tonic && (isMajorTriad(next.chord) || isMinorTriad(next.chord));
}
