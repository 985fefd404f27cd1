import { Note } from 'tonal';
import { InputError } from '../errors.js';

// A spelled pitch with an octave. Voice-leading comparisons use `midi`;
// chord membership and resolutions compare the spelled pitch class `pc`.
export interface Pitch {
  readonly name: string; // "F#4"
  readonly pc: string; // "F#"
  readonly step: number; // letter index, C = 0 .. B = 6
  readonly alt: number; // -1 flat, +1 sharp, ...
  readonly octave: number;
  readonly midi: number;
}

// Interval measured upward from the lower pitch
export interface SpelledInterval {
  semitones: number;
  steps: number;
}

// Accepts "Bb4", "F#3", and the "B-4" / "E--3" flat spelling used by older score tools.
export function normalizePitchName(name: string): string {
  const trimmed = name.trim();
  const match = /^([A-Ga-g])(-+)(.*)$/.exec(trimmed);
  if (match) {
    return match[1].toUpperCase() + 'b'.repeat(match[2].length) + match[3];
  }
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1);
}

export function toPitch(name: string): Pitch {
  const note = Note.get(normalizePitchName(name));
  const { step, alt, oct, midi } = note;
  if (
    step === undefined ||
    alt === undefined ||
    oct === undefined ||
    midi === undefined ||
    midi === null ||
    !note.name
  ) {
    throw new InputError(`Invalid pitch: "${name}" (expected a note name with an octave, e.g. C3)`);
  }
  return Object.freeze({ name: note.name, pc: note.pc, step, alt, octave: oct, midi });
}

export function transposePitch(pitch: Pitch, interval: string): Pitch {
  const name = Note.transpose(pitch.name, interval);
  if (!name) {
    throw new InputError(`Cannot transpose ${pitch.name} by ${interval}`);
  }
  return toPitch(name);
}

export function transposePitchClass(pc: string, interval: string): string {
  const name = Note.transpose(pc, interval);
  if (!name) {
    throw new InputError(`Cannot transpose ${pc} by ${interval}`);
  }
  return name;
}

export function letterIndex(pc: string): number {
  const step = Note.get(pc).step;
  if (step === undefined) {
    throw new InputError(`Invalid pitch class: "${pc}"`);
  }
  return step;
}

export function comparePitches(a: Pitch, b: Pitch): number {
  return a.midi - b.midi;
}

export function samePitchClass(a: Pitch, b: Pitch): boolean {
  return a.pc === b.pc;
}

function mod(n: number, m: number): number {
  return ((n % m) + m) % m;
}

function diatonicNumber(pitch: Pitch): number {
  return pitch.octave * 7 + pitch.step;
}

export function harmonicInterval(a: Pitch, b: Pitch): SpelledInterval {
  const [lower, upper] = a.midi <= b.midi ? [a, b] : [b, a];
  return {
    semitones: upper.midi - lower.midi,
    steps: diatonicNumber(upper) - diatonicNumber(lower),
  };
}

// Signed distance; positive when `to` is higher
export function melodicInterval(from: Pitch, to: Pitch): SpelledInterval {
  return {
    semitones: to.midi - from.midi,
    steps: diatonicNumber(to) - diatonicNumber(from),
  };
}

// Simple interval from one pitch class up to another, within an octave
export function pitchClassInterval(fromPc: string, toPc: string): SpelledInterval {
  const from = Note.get(fromPc);
  const to = Note.get(toPc);
  if (from.step === undefined || to.step === undefined) {
    throw new InputError(`Invalid pitch classes: "${fromPc}", "${toPc}"`);
  }
  const fromChroma = Note.chroma(fromPc);
  const toChroma = Note.chroma(toPc);
  if (fromChroma === undefined || toChroma === undefined) {
    throw new InputError(`Invalid pitch classes: "${fromPc}", "${toPc}"`);
  }
  return {
    semitones: mod(toChroma - fromChroma, 12),
    steps: mod(to.step - from.step, 7),
  };
}

export function isPerfectFifth(interval: SpelledInterval): boolean {
  return mod(interval.semitones, 12) === 7 && mod(interval.steps, 7) === 4;
}

// Unisons count as octaves
export function isPerfectOctave(interval: SpelledInterval): boolean {
  return mod(interval.semitones, 12) === 0 && mod(interval.steps, 7) === 0;
}
