import { describe, it, expect } from 'vitest';
import {
  ChainInfeasibleError,
  ChainStateError,
  InputError,
  QueryOnUnbuiltChainError,
  SlotInfeasibleError,
} from '../../src/errors.js';
import { createChain } from '../../src/core/chain.js';
import { MovementGraph } from '../../src/core/movement-graph.js';
import { resolveRules } from '../../src/types.js';
import {
  allRealizations,
  buildScenario,
  closeVoices,
  defaultVoices,
  loadScenario,
  names,
} from './harness.js';

describe('Single slot', () => {
  it('counts every voicing of the slot', () => {
    const chain = buildScenario('single-tonic.yaml', closeVoices('C4', 'C5'));
    expect(chain.count()).toBe(4n);
  });

  it('enumerates in voice order, lowest pitches first', () => {
    const chain = buildScenario('single-tonic.yaml', closeVoices('C4', 'C5'));
    const voicings = allRealizations(chain).map((progression) => names(progression[0]));

    expect(voicings).toEqual([
      ['G4', 'E4', 'C4', 'C3'],
      ['G4', 'E4', 'E4', 'C3'],
      ['G4', 'G4', 'E4', 'C3'],
      ['C5', 'G4', 'E4', 'C3'],
    ]);
  });

  it('returns every progression when more samples are asked for than exist', () => {
    const chain = buildScenario('single-tonic.yaml', closeVoices('C4', 'C5'));
    expect(chain.sampleMany(10)).toEqual([[0], [1], [2], [3]]);
  });
});

describe('Diminished seventh resolution', () => {
  const movesByVoice = (from: string): number => (from === 'B' ? 1 : -1);

  it('resolves every upper voice by step into the tonic', () => {
    const chain = buildScenario('diminished-seventh.yaml');
    expect(chain.count()).toBeGreaterThan(0n);

    for (const [dim7, tonic] of allRealizations(chain)) {
      expect(new Set(dim7.slice(0, -1).map((pitch) => pitch.pc))).toEqual(
        new Set(['F', 'Ab', 'B']),
      );
      for (let voice = 0; voice < dim7.length - 1; voice++) {
        expect(tonic[voice].midi - dim7[voice].midi).toBe(movesByVoice(dim7[voice].pc));
      }
      expect(tonic[tonic.length - 1].name).toBe('C3');
    }
  });

  it('reaches the close-position tonic', () => {
    const chain = buildScenario('diminished-seventh.yaml');
    const voicings = allRealizations(chain).map((progression) => progression.map(names));

    expect(voicings).toContainEqual([
      ['B4', 'Ab4', 'F4', 'D3'],
      ['C5', 'G4', 'E4', 'C3'],
    ]);
  });

  it('still resolves when the doubled root is configured instead of taken from the bass', () => {
    const rules = resolveRules({ dim7DoublingFromContext: false, doubledRootInDim7: true });
    const chain = buildScenario('diminished-seventh.yaml', defaultVoices(), rules);
    expect(chain.count()).toBeGreaterThan(0n);
  });

  it('has no solution when the bass must rise to the third of the tonic', () => {
    const rules = resolveRules({ dim7DoublingFromContext: false, doubledRootInDim7: false });

    expect(() => buildScenario('diminished-seventh.yaml', defaultVoices(), rules)).toThrow(
      ChainInfeasibleError,
    );
  });
});

describe('Infeasible slot', () => {
  it('names the slot whose chord the voices cannot reach', () => {
    let caught: unknown;
    try {
      buildScenario('unreachable-seventh.yaml', closeVoices('C4', 'G4'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SlotInfeasibleError);
    if (caught instanceof SlotInfeasibleError) {
      expect(caught.slotIndex).toBe(1);
      expect(caught.bass).toBe('D3');
      expect(caught.figure).toBe('7');
    }
  });
});

describe('Infeasible chain', () => {
  it('fails at pruning when no movement reaches the last slot', () => {
    const rules = resolveRules({
      partMovementLimits: [
        { voice: 'soprano', maxSemitones: 0 },
        { voice: 'alto', maxSemitones: 0 },
        { voice: 'tenor', maxSemitones: 0 },
      ],
    });
    const chain = createChain(loadScenario('frozen-voices.yaml'), defaultVoices(), rules);

    chain.generateRealizations();
    chain.generateMovements();
    expect(chain.state).toBe('movements-built');

    let caught: unknown;
    try {
      chain.prune();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ChainInfeasibleError);
    if (caught instanceof ChainInfeasibleError) {
      expect(caught.first).toEqual({ bass: 'C3', figure: '' });
      expect(caught.last).toEqual({ bass: 'D3', figure: '' });
    }
  });
});

describe('Sampler', () => {
  it('favours realizations with few successors', () => {
    // Slot 0 has two realizations; the first has one successor, the second three.
    const graph = new MovementGraph([2, 4]);
    graph.connect(0, 0, [0]);
    graph.connect(0, 1, [1, 2, 3]);
    graph.prune();

    // Evenly spread draws: (k + 0.5) / 100 for k = 0..99, repeated
    let draw = 0;
    const random = () => ((draw++ % 100) + 0.5) / 100;

    let lonePath = 0;
    const samples = 10000;
    for (let i = 0; i < samples; i++) {
      const [first, second] = graph.samplePath(random);
      if (first === 0 && second === 0) lonePath++;
    }

    expect(graph.countPaths()).toBe(4n);
    expect(lonePath / samples).toBe(0.5);
  });
});

describe('Chain lifecycle', () => {
  const rules = resolveRules();

  it('rejects queries before pruning', () => {
    const chain = createChain(loadScenario('single-tonic.yaml'), closeVoices('C4', 'C5'), rules);
    expect(() => chain.count()).toThrow(QueryOnUnbuiltChainError);
    chain.generateRealizations();
    expect(() => chain.sampleOne()).toThrow(QueryOnUnbuiltChainError);
  });

  it('rejects passes run out of order', () => {
    const chain = createChain(loadScenario('single-tonic.yaml'), closeVoices('C4', 'C5'), rules);
    expect(() => chain.generateMovements()).toThrow(ChainStateError);
    expect(() => chain.prune()).toThrow(ChainStateError);
  });

  it('rejects an empty bass line and a single voice', () => {
    const line = loadScenario('single-tonic.yaml');
    expect(() => createChain({ ...line, bass: [] }, defaultVoices(), rules)).toThrow(
      InputError,
    );
    expect(() => createChain(line, defaultVoices().slice(0, 1), rules)).toThrow(
      InputError,
    );
  });

  it('rejects a movement limit for a voice that does not exist', () => {
    const limited = resolveRules({ partMovementLimits: [{ voice: 'cantus', maxSemitones: 2 }] });
    expect(() => createChain(loadScenario('single-tonic.yaml'), defaultVoices(), limited)).toThrow(
      'Part movement limit names unknown voice: cantus',
    );
  });

  it('rejects a progression that does not index surviving realizations', () => {
    const chain = buildScenario('single-tonic.yaml', closeVoices('C4', 'C5'));
    expect(() => chain.progressionToPossibilities([4])).toThrow(InputError);
    expect(() => chain.progressionToPossibilities([0, 0])).toThrow(InputError);
  });

  it('reports progress through the log hook', () => {
    const messages: string[] = [];
    buildScenario('diminished-seventh.yaml', defaultVoices(), rules, {
      log: (message) => messages.push(message),
    });

    expect(messages).toEqual([
      'Finding all possibilities for D3 "6,-5"',
      'Finding all possibilities for C3 ""',
      'Finding legal movements from D3 to C3',
      'Pruning dead ends',
    ]);
  });
});
