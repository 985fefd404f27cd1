import { describe, it, expect } from 'vitest';
import { InputError } from '../../src/errors.js';
import { parseFigure } from '../../src/theory/notation.js';
import { toPitch } from '../../src/theory/pitch.js';
import { FiguredBassScale, pitchesForScaleDegrees } from '../../src/theory/scale.js';
import { createRange } from '../../src/voices/voice.js';

describe('FiguredBassScale', () => {
  it('spells the scale with tonal', () => {
    expect(new FiguredBassScale('C').notes).toEqual(['C', 'D', 'E', 'F', 'G', 'A', 'B']);
  });

  it('finds the degree of a bass by its letter', () => {
    const scale = new FiguredBassScale('C');
    expect(scale.degreeOf(toPitch('F#3'))).toBe(3);
  });

  it('spells a figure above the bass and reports the altered tones', () => {
    const scale = new FiguredBassScale('C');
    expect(scale.pitchNames(toPitch('D3'), parseFigure('6,-5'))).toEqual({
      pitchNames: ['D', 'F', 'Ab', 'B'],
      alteredPitchNames: ['Ab'],
    });
  });

  it('raises the third in minor', () => {
    const scale = new FiguredBassScale('A', 'minor');
    expect(scale.pitchNames(toPitch('E3'), parseFigure('5,#3'))).toEqual({
      pitchNames: ['E', 'G#', 'B'],
      alteredPitchNames: ['G#'],
    });
  });

  it('spells a flat bass', () => {
    const scale = new FiguredBassScale('D', 'minor');
    expect(scale.pitchNames(toPitch('B-2'), parseFigure('6')).pitchNames).toEqual([
      'Bb',
      'D',
      'G',
    ]);
  });

  it('rejects keys without seven degrees', () => {
    expect(() => new FiguredBassScale('C', 'blues')).toThrow(InputError);
    expect(() => new FiguredBassScale('H')).toThrow(InputError);
  });
});

describe('pitchesForScaleDegrees', () => {
  it('lists every pitch of the chord inside the range, lowest first', () => {
    const pitches = pitchesForScaleDegrees(['C', 'E', 'G'], createRange('C4', 'C5'));
    expect(pitches.map((pitch) => pitch.name)).toEqual(['C4', 'E4', 'G4', 'C5']);
  });

  it('includes the range limits', () => {
    const pitches = pitchesForScaleDegrees(['E', 'B'], createRange('E2', 'B2'));
    expect(pitches.map((pitch) => pitch.name)).toEqual(['E2', 'B2']);
  });
});
