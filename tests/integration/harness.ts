import path from 'path';
import { loadExercise, loadVoices } from '../../src/config.js';
import { buildChain, type Chain, type ChainOptions } from '../../src/core/chain.js';
import {
  DEFAULT_RULES,
  type FiguredBassLine,
  type Possibility,
  type Rules,
} from '../../src/types.js';
import type { VoiceSpec } from '../../src/voices/voice.js';

export { createSeededRandom } from '../../src/core/random.js';

const scenarioDir = path.join(process.cwd(), 'tests/integration/scenarios');

export function loadScenario(name: string): FiguredBassLine {
  return loadExercise(path.join(scenarioDir, name));
}

// The SATB ensemble shipped in config/voices.yaml
export function defaultVoices(): VoiceSpec[] {
  return loadVoices(path.join(process.cwd(), 'config/voices.yaml'));
}

// Three upper voices sharing one narrow range over a bass
export function closeVoices(lowest: string, highest: string): VoiceSpec[] {
  return [
    { label: 'v1', lowest, highest, maxSeparation: 12 },
    { label: 'v2', lowest, highest, maxSeparation: 12 },
    { label: 'v3', lowest, highest, maxSeparation: 12 },
    { label: 'bass', lowest: 'C3', highest: 'C4', maxSeparation: 24 },
  ];
}

export function buildScenario(
  name: string,
  voices: VoiceSpec[] = defaultVoices(),
  rules: Rules = DEFAULT_RULES,
  options: ChainOptions = {},
): Chain {
  return buildChain(loadScenario(name), voices, rules, options);
}

// Every progression of a pruned chain, as pitch names per slot
export function allRealizations(chain: Chain): Possibility[][] {
  return Array.from(chain.enumerateAll(), (progression) =>
    chain.progressionToPossibilities(progression),
  );
}

export function names(possibility: Possibility): string[] {
  return possibility.map((pitch) => pitch.name);
}
