import { InputError } from '../errors.js';
import { toPitch, transposePitch, type Pitch } from '../theory/pitch.js';

export interface PitchRange {
  readonly lowest: Pitch;
  readonly highest: Pitch;
}

export interface Voice {
  readonly label: string;
  // Written range
  readonly range: PitchRange;
  readonly soundingRange: PitchRange;
  readonly transposition: string | null;
  // Max semitones to the voice immediately above; null = unlimited
  readonly maxSeparation: number | null;
  readonly clef: string | null;
}

// Voice as written in config/voices.yaml or passed by a caller
export interface VoiceSpec {
  label: string;
  lowest: string;
  highest: string;
  transposition?: string | null;
  maxSeparation?: number | null;
  clef?: string | null;
}

export function createRange(lowest: string | Pitch, highest: string | Pitch): PitchRange {
  const low = typeof lowest === 'string' ? toPitch(lowest) : lowest;
  const high = typeof highest === 'string' ? toPitch(highest) : highest;
  if (low.midi > high.midi) {
    throw new InputError(`Invalid range: ${low.name} is above ${high.name}`);
  }
  return Object.freeze({ lowest: low, highest: high });
}

export function pitchInRange(range: PitchRange, pitch: Pitch): boolean {
  return pitch.midi >= range.lowest.midi && pitch.midi <= range.highest.midi;
}

export function compareRanges(a: PitchRange, b: PitchRange): number {
  return a.lowest.midi - b.lowest.midi || a.highest.midi - b.highest.midi;
}

export function createVoice(spec: VoiceSpec): Voice {
  if (!spec.label.trim()) {
    throw new InputError('Voice label must not be empty');
  }
  if (spec.maxSeparation !== undefined && spec.maxSeparation !== null && spec.maxSeparation < 0) {
    throw new InputError(`Voice ${spec.label}: maxSeparation must not be negative`);
  }
  const range = createRange(spec.lowest, spec.highest);
  const transposition = spec.transposition ?? null;
  const soundingRange = transposition
    ? createRange(
        transposePitch(range.lowest, transposition),
        transposePitch(range.highest, transposition),
      )
    : range;

  return Object.freeze({
    label: spec.label,
    range,
    soundingRange,
    transposition,
    maxSeparation: spec.maxSeparation ?? null,
    clef: spec.clef ?? null,
  });
}

// Highest sounding range first; the last voice is the bass. Ties go by label.
export function orderVoices(voices: readonly Voice[]): Voice[] {
  const labels = new Set<string>();
  for (const voice of voices) {
    if (labels.has(voice.label)) {
      throw new InputError(`Duplicate voice label: ${voice.label}`);
    }
    labels.add(voice.label);
  }
  return [...voices].sort(
    (a, b) =>
      compareRanges(b.soundingRange, a.soundingRange) ||
      (a.label < b.label ? -1 : a.label > b.label ? 1 : 0),
  );
}
