export { buildChain, createChain, Chain } from './core/chain.js';
export type { ChainOptions, ChainState } from './core/chain.js';
export { RealizationCache } from './core/cache.js';
export { MovementGraph } from './core/movement-graph.js';
export { createSeededRandom } from './core/random.js';
export type { RandomFn } from './core/random.js';
export { planResolution, resolvePossibility } from './core/resolution.js';
export type { ResolutionPlan, ResolutionStep } from './core/resolution.js';
export { MovementRuleRegistry } from './rules/registry.js';
export type { MovementContext, MovementRule } from './rules/rule.js';
export { DEFAULT_SHORTHAND, parseFigure } from './theory/notation.js';
export type { Figure, FigureTone, Modifier, ShorthandTable } from './theory/notation.js';
export {
  comparePitches,
  harmonicInterval,
  melodicInterval,
  samePitchClass,
  toPitch,
  transposePitch,
} from './theory/pitch.js';
export type { Pitch, SpelledInterval } from './theory/pitch.js';
export { FiguredBassScale, pitchesForScaleDegrees } from './theory/scale.js';
export { analyzeChord } from './theory/harmony.js';
export type { ChordAnalysis, ResolutionRequirement } from './theory/harmony.js';
export { createVoice, orderVoices } from './voices/voice.js';
export type { PitchRange, Voice, VoiceSpec } from './voices/voice.js';
export { renderProgression } from './commands/format.js';
export type { RenderStyle } from './commands/format.js';
export { loadExercise, loadRules, loadShorthand, loadVoices } from './config.js';
export { DEFAULT_RULES, resolveRules } from './types.js';
export type {
  BassEntry,
  FiguredBassLine,
  IndexProgression,
  PartMovementLimit,
  Possibility,
  Rules,
} from './types.js';
export * from './errors.js';
