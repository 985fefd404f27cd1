import {
  ChainInfeasibleError,
  ChainStateError,
  InputError,
  QueryOnUnbuiltChainError,
} from '../errors.js';
import { DEFAULT_SHORTHAND, type ShorthandTable } from '../theory/notation.js';
import { FiguredBassScale } from '../theory/scale.js';
import type { FiguredBassLine, IndexProgression, Possibility, Rules } from '../types.js';
import { createVoice, orderVoices, type Voice, type VoiceSpec } from '../voices/voice.js';
import { MovementRuleRegistry } from '../rules/registry.js';
import { RealizationCache } from './cache.js';
import { MovementGraph } from './movement-graph.js';
import { generateMovements } from './movements.js';
import type { RandomFn } from './random.js';
import { allowsIncompleteResolution, Segment } from './segment.js';

export type ChainState = 'unbuilt' | 'realizations-built' | 'movements-built' | 'pruned';

export interface ChainOptions {
  // Request-scoped memo tables; a fresh one is made when omitted
  cache?: RealizationCache;
  random?: RandomFn;
  shorthand?: ShorthandTable;
  movementRules?: MovementRuleRegistry;
  // Progress messages
  log?: (message: string) => void;
}

export class Chain {
  readonly segments: readonly Segment[];
  readonly voices: readonly Voice[];
  readonly rules: Rules;
  private readonly cache: RealizationCache;
  private readonly random: RandomFn;
  private readonly movementRules: MovementRuleRegistry;
  private readonly log: (message: string) => void;
  private graph: MovementGraph | null = null;
  private currentState: ChainState = 'unbuilt';

  constructor(
    segments: readonly Segment[],
    voices: readonly Voice[],
    rules: Rules,
    options: ChainOptions = {},
  ) {
    this.segments = segments;
    this.voices = voices;
    this.rules = rules;
    this.cache = options.cache ?? new RealizationCache();
    this.random = options.random ?? Math.random;
    this.movementRules = options.movementRules ?? MovementRuleRegistry.createDefault();
    this.log = options.log ?? (() => {});
  }

  get state(): ChainState {
    return this.currentState;
  }

  generateRealizations(): void {
    this.expectState('generateRealizations', 'unbuilt');
    for (let i = 1; i < this.segments.length; i++) {
      if (allowsIncompleteResolution(this.segments[i - 1], this.segments[i])) {
        this.segments[i].allowIncompleteRealizations();
      }
    }
    for (const segment of this.segments) {
      this.log(`Finding all possibilities for ${segment.bass.name} "${segment.entry.figure}"`);
      segment.generateRealizations(this.voices, this.rules, this.cache);
    }
    this.currentState = 'realizations-built';
  }

  generateMovements(): void {
    this.expectState('generateMovements', 'realizations-built');
    const graph = new MovementGraph(this.segments.map((s) => s.realizations.length));
    for (let i = 0; i < this.segments.length - 1; i++) {
      const from = this.segments[i];
      const to = this.segments[i + 1];
      this.log(`Finding legal movements from ${from.bass.name} to ${to.bass.name}`);
      const adjacency = generateMovements(from, to, {
        voices: this.voices,
        rules: this.rules,
        movementRules: this.movementRules,
        cache: this.cache,
      });
      adjacency.forEach((targets, index) => graph.connect(i, index, targets));
    }
    this.graph = graph;
    this.currentState = 'movements-built';
  }

  prune(): void {
    if (this.currentState === 'pruned') return;
    this.expectState('prune', 'movements-built');
    const graph = this.requireGraph();
    this.log('Pruning dead ends');
    graph.prune();
    if (graph.aliveIndices(0).length === 0) {
      const first = this.segments[0];
      const last = this.segments[this.segments.length - 1];
      throw new ChainInfeasibleError(first.label, last.label);
    }
    this.currentState = 'pruned';
  }

  count(): bigint {
    return this.queryGraph().countPaths();
  }

  enumerateAll(): Iterable<IndexProgression> {
    return this.queryGraph().paths();
  }

  sampleOne(random: RandomFn = this.random): IndexProgression {
    return this.queryGraph().samplePath(random);
  }

  // `amount` samples, or every progression when that many or fewer exist
  sampleMany(amount: number, random: RandomFn = this.random): IndexProgression[] {
    const graph = this.queryGraph();
    if (BigInt(amount) >= graph.countPaths()) {
      return Array.from(graph.paths());
    }
    return Array.from({ length: amount }, () => graph.samplePath(random));
  }

  progressionToPossibilities(progression: readonly number[]): Possibility[] {
    const graph = this.queryGraph();
    if (progression.length !== this.segments.length) {
      throw new InputError(
        `Progression has ${progression.length} entries for ${this.segments.length} slots`,
      );
    }
    return progression.map((index, slot) => {
      const realization = this.segments[slot].realizations[index];
      if (!realization || !graph.isAlive(slot, index)) {
        throw new InputError(`Slot ${slot} has no surviving realization ${index}`);
      }
      return realization;
    });
  }

  // Survivors of one slot, by stable index
  survivingIndices(slot: number): number[] {
    return this.queryGraph().aliveIndices(slot);
  }

  successors(slot: number, index: number): readonly number[] {
    return this.queryGraph().successors(slot, index);
  }

  private queryGraph(): MovementGraph {
    if (this.currentState !== 'pruned') {
      throw new QueryOnUnbuiltChainError(this.currentState);
    }
    return this.requireGraph();
  }

  private requireGraph(): MovementGraph {
    if (!this.graph) {
      throw new QueryOnUnbuiltChainError(this.currentState);
    }
    return this.graph;
  }

  private expectState(pass: string, expected: ChainState): void {
    if (this.currentState !== expected) {
      throw new ChainStateError(pass, expected, this.currentState);
    }
  }
}

function validateRules(rules: Rules, voices: readonly Voice[]): void {
  for (const limit of rules.partMovementLimits) {
    if (!voices.some((voice) => voice.label === limit.voice)) {
      throw new InputError(`Part movement limit names unknown voice: ${limit.voice}`);
    }
    if (limit.maxSemitones < 0) {
      throw new InputError(`Part movement limit for ${limit.voice} must not be negative`);
    }
  }
  if (rules.maxRealizationsPerSlot < 1) {
    throw new InputError('maxRealizationsPerSlot must be at least 1');
  }
}

// Validates the whole line and builds every slot, without generating anything yet.
export function createChain(
  line: FiguredBassLine,
  voiceSpecs: ReadonlyArray<Voice | VoiceSpec>,
  rules: Rules,
  options: ChainOptions = {},
): Chain {
  if (line.bass.length === 0) {
    throw new InputError('Bass line is empty');
  }
  if (voiceSpecs.length < 2) {
    throw new InputError(`At least two voices are required, got ${voiceSpecs.length}`);
  }
  const voices = orderVoices(
    voiceSpecs.map((spec) => ('soundingRange' in spec ? spec : createVoice(spec))),
  );
  validateRules(rules, voices);

  const cache = options.cache ?? new RealizationCache();
  const scale = new FiguredBassScale(line.key, line.mode);
  const shorthand = options.shorthand ?? DEFAULT_SHORTHAND;
  const segments = line.bass.map(
    (entry, index) => new Segment(index, entry, scale, rules, shorthand, cache),
  );
  return new Chain(segments, voices, rules, { ...options, cache });
}

// Builds, links and prunes every slot of the line; the returned chain answers queries.
export function buildChain(
  line: FiguredBassLine,
  voices: ReadonlyArray<Voice | VoiceSpec>,
  rules: Rules,
  options: ChainOptions = {},
): Chain {
  const chain = createChain(line, voices, rules, options);
  chain.generateRealizations();
  chain.generateMovements();
  chain.prune();
  return chain;
}
