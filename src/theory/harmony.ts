import { pitchClassInterval, type SpelledInterval } from './pitch.js';

export type ChordQuality =
  | 'major'
  | 'minor'
  | 'diminished'
  | 'augmented'
  | 'dominant-seventh'
  | 'diminished-seventh'
  | 'half-diminished-seventh'
  | 'italian-sixth'
  | 'french-sixth'
  | 'german-sixth'
  | 'swiss-sixth'
  | 'other';

export interface ChordAnalysis {
  quality: ChordQuality;
  bass: string;
  // Tertian chords only; augmented sixths use the fields below
  root: string | null;
  third: string | null;
  fifth: string | null;
  seventh: string | null;
  // 0 = root position, 1 = first inversion, ...
  inversion: number | null;
}

export interface AugmentedSixthTones {
  bass: string;
  third: string; // major third above the bass
  sixth: string; // augmented sixth above the bass
  other: string | null; // French A4, German P5, Swiss AA4
}

export interface SeventhChordTones {
  root: string;
  third: string;
  fifth: string;
  seventh: string;
  inversion: number;
}

// What a slot demands of the movement into the next slot
export type ResolutionRequirement =
  | { kind: 'none' }
  | ({ kind: 'dominant-seventh' } & SeventhChordTones)
  | ({ kind: 'diminished-seventh' } & SeventhChordTones)
  | ({ kind: 'augmented-sixth'; variant: 'french' | 'german' | 'swiss' } & AugmentedSixthTones)
  | ({ kind: 'italian-augmented-sixth' } & AugmentedSixthTones);

export interface ResolutionToggles {
  resolveDominantSeventhProperly: boolean;
  resolveDiminishedSeventhProperly: boolean;
  resolveAugmentedSixthProperly: boolean;
}

function key(interval: SpelledInterval): string {
  return `${interval.semitones}/${interval.steps}`;
}

const MAJOR_THIRD = '4/2';
const AUGMENTED_SIXTH = '10/5';

const AUGMENTED_SIXTHS: Array<{ quality: ChordQuality; other: string | null }> = [
  { quality: 'italian-sixth', other: null },
  { quality: 'french-sixth', other: '6/3' },
  { quality: 'german-sixth', other: '7/4' },
  { quality: 'swiss-sixth', other: '7/3' },
];

// Semitones above the root of the third, fifth and (optional) seventh
const TERTIAN_QUALITIES: Array<{ quality: ChordQuality; semitones: number[] }> = [
  { quality: 'major', semitones: [4, 7] },
  { quality: 'minor', semitones: [3, 7] },
  { quality: 'diminished', semitones: [3, 6] },
  { quality: 'augmented', semitones: [4, 8] },
  { quality: 'dominant-seventh', semitones: [4, 7, 10] },
  { quality: 'diminished-seventh', semitones: [3, 6, 9] },
  { quality: 'half-diminished-seventh', semitones: [3, 6, 10] },
];

function unknownChord(bass: string): ChordAnalysis {
  return {
    quality: 'other',
    bass,
    root: null,
    third: null,
    fifth: null,
    seventh: null,
    inversion: null,
  };
}

function findAugmentedSixth(bass: string, upper: string[]): ChordAnalysis | null {
  const byInterval = new Map(
    upper.map((pc): [string, string] => [key(pitchClassInterval(bass, pc)), pc]),
  );
  if (!byInterval.has(MAJOR_THIRD) || !byInterval.has(AUGMENTED_SIXTH)) return null;

  for (const candidate of AUGMENTED_SIXTHS) {
    const expected = candidate.other ? 3 : 2;
    if (byInterval.size !== expected) continue;
    if (candidate.other && !byInterval.has(candidate.other)) continue;
    return { ...unknownChord(bass), quality: candidate.quality };
  }
  return null;
}

// Spelled tertian analysis: every other tone must be a third, fifth or seventh above the root.
function findTertian(bass: string, pitchClasses: string[]): ChordAnalysis | null {
  for (const root of pitchClasses) {
    const byStep = new Map<number, { pc: string; semitones: number }>();
    let stacked = true;
    for (const pc of pitchClasses) {
      if (pc === root) continue;
      const interval = pitchClassInterval(root, pc);
      if (![2, 4, 6].includes(interval.steps) || byStep.has(interval.steps)) {
        stacked = false;
        break;
      }
      byStep.set(interval.steps, { pc, semitones: interval.semitones });
    }
    if (!stacked) continue;

    const third = byStep.get(2);
    const fifth = byStep.get(4);
    const seventh = byStep.get(6);
    if (!third || !fifth) continue;

    const semitones = [third.semitones, fifth.semitones];
    if (seventh) semitones.push(seventh.semitones);
    const match = TERTIAN_QUALITIES.find(
      (q) =>
        q.semitones.length === semitones.length &&
        q.semitones.every((s, i) => s === semitones[i]),
    );

    const members = [root, third.pc, fifth.pc, seventh?.pc];
    return {
      quality: match?.quality ?? 'other',
      bass,
      root,
      third: third.pc,
      fifth: fifth.pc,
      seventh: seventh?.pc ?? null,
      inversion: members.indexOf(bass),
    };
  }
  return null;
}

// pitchNames: bass pitch class first
export function analyzeChord(pitchNames: readonly string[]): ChordAnalysis {
  const bass = pitchNames[0];
  const pitchClasses = [...new Set(pitchNames)];
  const upper = pitchClasses.filter((pc) => pc !== bass);

  return (
    findAugmentedSixth(bass, upper) ?? findTertian(bass, pitchClasses) ?? unknownChord(bass)
  );
}

export function isMajorTriad(chord: ChordAnalysis): boolean {
  return chord.quality === 'major';
}

export function isMinorTriad(chord: ChordAnalysis): boolean {
  return chord.quality === 'minor';
}

function seventhTones(chord: ChordAnalysis): SeventhChordTones | null {
  const { root, third, fifth, seventh, inversion } = chord;
  if (!root || !third || !fifth || !seventh || inversion === null) return null;
  return { root, third, fifth, seventh, inversion };
}

function augmentedSixthTones(
  chord: ChordAnalysis,
  pitchNames: readonly string[],
): AugmentedSixthTones {
  const tones: AugmentedSixthTones = { bass: chord.bass, third: '', sixth: '', other: null };
  for (const pc of new Set(pitchNames)) {
    if (pc === chord.bass) continue;
    const interval = key(pitchClassInterval(chord.bass, pc));
    if (interval === MAJOR_THIRD) tones.third = pc;
    else if (interval === AUGMENTED_SIXTH) tones.sixth = pc;
    else tones.other = pc;
  }
  return tones;
}

export function resolutionRequirement(
  chord: ChordAnalysis,
  pitchNames: readonly string[],
  toggles: ResolutionToggles,
): ResolutionRequirement {
  switch (chord.quality) {
    case 'dominant-seventh': {
      const tones = seventhTones(chord);
      if (!tones || !toggles.resolveDominantSeventhProperly) return { kind: 'none' };
      return { kind: 'dominant-seventh', ...tones };
    }
    case 'diminished-seventh': {
      const tones = seventhTones(chord);
      if (!tones || !toggles.resolveDiminishedSeventhProperly) return { kind: 'none' };
      return { kind: 'diminished-seventh', ...tones };
    }
    case 'italian-sixth':
      if (!toggles.resolveAugmentedSixthProperly) return { kind: 'none' };
      return { kind: 'italian-augmented-sixth', ...augmentedSixthTones(chord, pitchNames) };
    case 'french-sixth':
    case 'german-sixth':
    case 'swiss-sixth': {
      if (!toggles.resolveAugmentedSixthProperly) return { kind: 'none' };
      const variant =
        chord.quality === 'french-sixth'
          ? 'french'
          : chord.quality === 'german-sixth'
            ? 'german'
            : 'swiss';
      return { kind: 'augmented-sixth', variant, ...augmentedSixthTones(chord, pitchNames) };
    }
    default:
      return { kind: 'none' };
  }
}
