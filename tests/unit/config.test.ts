import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadExercise, loadRules, loadShorthand, loadVoices } from '../../src/config.js';
import { InputError } from '../../src/errors.js';
import { DEFAULT_SHORTHAND } from '../../src/theory/notation.js';
import { DEFAULT_RULES } from '../../src/types.js';

const configDir = path.join(process.cwd(), 'config');

describe('shipped configuration', () => {
  it('matches the built-in rules', () => {
    expect(loadRules(path.join(configDir, 'rules.yaml'))).toEqual(DEFAULT_RULES);
  });

  it('matches the built-in figure table', () => {
    expect([...loadShorthand(path.join(configDir, 'figures.yaml'))]).toEqual([
      ...DEFAULT_SHORTHAND,
    ]);
  });

  it('defines four voices', () => {
    const voices = loadVoices(path.join(configDir, 'voices.yaml'));
    expect(voices.map((voice) => voice.label)).toEqual(['soprano', 'alto', 'tenor', 'bass']);
    expect(voices[3]).toEqual({
      label: 'bass',
      lowest: 'E2',
      highest: 'C4',
      transposition: null,
      maxSeparation: 24,
      clef: 'bass',
    });
  });
});

describe('config files', () => {
  let dir: string;

  const write = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'continuo-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to the defaults when files are missing', () => {
    expect(loadRules(path.join(dir, 'rules.yaml'))).toBe(DEFAULT_RULES);
    expect(loadShorthand(path.join(dir, 'figures.yaml'))).toBe(DEFAULT_SHORTHAND);
  });

  it('merges rule overrides over the defaults', () => {
    const file = write(
      'rules.yaml',
      [
        'forbid_parallel_fifths: false',
        'upper_parts_max_semitone_separation: null',
        'part_movement_limits:',
        '  - voice: soprano',
        '    max_semitones: 3',
      ].join('\n'),
    );
    expect(loadRules(file)).toEqual({
      ...DEFAULT_RULES,
      forbidParallelFifths: false,
      upperPartsMaxSemitoneSeparation: null,
      partMovementLimits: [{ voice: 'soprano', maxSemitones: 3 }],
    });
  });

  it('rejects unknown rule keys', () => {
    const file = write('rules.yaml', 'forbid_everything: true\n');
    expect(() => loadRules(file)).toThrow(InputError);
    expect(() => loadRules(file)).toThrow(/^Invalid rules\.yaml: /);
  });

  it('rejects malformed YAML', () => {
    const file = write('rules.yaml', 'forbid_parallel_fifths: [\n');
    expect(() => loadRules(file)).toThrow(/^Invalid YAML in /);
  });

  it('needs at least two voices', () => {
    const file = write(
      'voices.yaml',
      ['voices:', '  - label: solo', '    lowest: C4', '    highest: C5'].join('\n'),
    );
    expect(() => loadVoices(file)).toThrow(InputError);
  });

  it('reads an exercise, defaulting the mode and empty figures', () => {
    const file = write(
      'exercise.yaml',
      [
        'key: B-',
        'bass:',
        '  - pitch: B-2',
        '  - pitch: E-3',
        '    figure: 6',
        '  - pitch: F3',
        "    figure: '7'",
        '    duration: 2',
      ].join('\n'),
    );
    expect(loadExercise(file)).toEqual({
      key: 'B-',
      mode: 'major',
      bass: [
        { pitch: 'B-2', figure: '' },
        { pitch: 'E-3', figure: '6' },
        { pitch: 'F3', figure: '7', duration: 2 },
      ],
    });
  });

  it('reports a missing exercise file', () => {
    expect(() => loadExercise(path.join(dir, 'missing.yaml'))).toThrow(/^Cannot read /);
  });
});
