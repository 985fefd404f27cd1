import { Note, Scale } from 'tonal';
import { InputError } from '../errors.js';
import { modifyAlteration, type Figure } from './notation.js';
import { letterIndex, normalizePitchName, toPitch, type Pitch } from './pitch.js';
import type { PitchRange } from '../voices/voice.js';

export interface ChordSpelling {
  // Bass pitch class first, then the figure tones from the lowest figure up
  pitchNames: string[];
  // Pitch classes a figure modifier changed
  alteredPitchNames: string[];
}

const ACCIDENTALS = ['bbb', 'bb', 'b', '', '#', '##', '###'];

function spellPitchClass(letter: string, alt: number): string {
  const accidental = ACCIDENTALS[alt + 3];
  if (accidental === undefined) {
    throw new InputError(`Alteration out of range for ${letter}: ${alt}`);
  }
  return letter + accidental;
}

// Spells figures against a key: each figure number counts scale degrees up from the bass.
export class FiguredBassScale {
  readonly tonic: string;
  readonly mode: string;
  readonly notes: readonly string[];

  constructor(tonic: string, mode: string = 'major') {
    const scale = Scale.get(`${normalizePitchName(tonic)} ${mode}`);
    if (scale.empty || scale.notes.length !== 7) {
      throw new InputError(`Unsupported key: ${tonic} ${mode}`);
    }
    this.tonic = scale.tonic ?? normalizePitchName(tonic);
    this.mode = mode;
    this.notes = scale.notes;
  }

  // 0-based degree of the scale note sharing the bass's letter
  degreeOf(pitch: Pitch): number {
    const degree = this.notes.findIndex((note) => letterIndex(note) === pitch.step);
    if (degree < 0) {
      throw new InputError(`${pitch.name} has no degree in ${this.tonic} ${this.mode}`);
    }
    return degree;
  }

  pitchNames(bass: Pitch, figure: Figure): ChordSpelling {
    const bassDegree = this.degreeOf(bass);
    const tones: string[] = [];
    const altered: string[] = [];

    for (const tone of figure.tones) {
      const scaleNote = Note.get(this.notes[(bassDegree + tone.number - 1) % 7]);
      if (scaleNote.alt === undefined || !scaleNote.letter) {
        throw new InputError(`Invalid scale note in ${this.tonic} ${this.mode}`);
      }
      const alt = modifyAlteration(scaleNote.alt, tone.modifier);
      const name = spellPitchClass(scaleNote.letter, alt);
      tones.push(name);
      if (alt !== scaleNote.alt) {
        altered.push(name);
      }
    }

    return {
      pitchNames: [bass.pc, ...tones.reverse()],
      alteredPitchNames: altered,
    };
  }
}

// Every pitch of the given pitch classes inside the range, lowest first
export function pitchesForScaleDegrees(pitchNames: readonly string[], range: PitchRange): Pitch[] {
  const pitches: Pitch[] = [];
  const seen = new Set<string>();
  for (const pc of new Set(pitchNames)) {
    const lastOctave = range.highest.octave + 1;
    for (let octave = Math.max(0, range.lowest.octave - 1); octave <= lastOctave; octave++) {
      const pitch = toPitch(`${pc}${octave}`);
      if (pitch.midi < range.lowest.midi || pitch.midi > range.highest.midi) continue;
      if (seen.has(pitch.name)) continue;
      seen.add(pitch.name);
      pitches.push(pitch);
    }
  }
  return pitches.sort((a, b) => a.midi - b.midi || a.name.localeCompare(b.name));
}
