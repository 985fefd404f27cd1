import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { InputError } from './errors.js';
import { DEFAULT_SHORTHAND, type ShorthandTable } from './theory/notation.js';
import { DEFAULT_RULES, resolveRules, type FiguredBassLine, type Rules } from './types.js';
import type { VoiceSpec } from './voices/voice.js';

// YAML files use snake_case keys, like the rest of config/
const rulesFileSchema = z
  .object({
    forbid_incomplete_possibilities: z.boolean(),
    upper_parts_max_semitone_separation: z.number().int().nonnegative().nullable(),
    forbid_voice_crossing: z.boolean(),
    forbid_doubled_alterations: z.boolean(),
    forbid_parallel_fifths: z.boolean(),
    forbid_parallel_octaves: z.boolean(),
    forbid_hidden_fifths: z.boolean(),
    forbid_hidden_octaves: z.boolean(),
    forbid_voice_overlap: z.boolean(),
    part_movement_limits: z.array(
      z.object({ voice: z.string().min(1), max_semitones: z.number().int().nonnegative() }),
    ),
    resolve_dominant_seventh_properly: z.boolean(),
    resolve_diminished_seventh_properly: z.boolean(),
    resolve_augmented_sixth_properly: z.boolean(),
    doubled_root_in_dim7: z.boolean(),
    dim7_doubling_from_context: z.boolean(),
    restrict_doublings_in_italian_a6_resolution: z.boolean(),
    apply_consecutive_possib_rules_to_resolution: z.boolean(),
    max_realizations_per_slot: z.number().int().positive(),
  })
  .partial()
  .strict();

const voicesFileSchema = z.object({
  voices: z
    .array(
      z
        .object({
          label: z.string().min(1),
          lowest: z.string().min(1),
          highest: z.string().min(1),
          transposition: z.string().nullable().optional(),
          max_separation: z.number().int().nonnegative().nullable().optional(),
          clef: z.string().nullable().optional(),
        })
        .strict(),
    )
    .min(2),
});

const figuresFileSchema = z.object({
  shorthand: z.array(
    z.object({
      figure: z.union([z.string(), z.number()]).transform(String),
      longhand: z.array(z.number().int().min(2)).min(1),
    }),
  ),
});

// A bare `figure: 6` in YAML is a number
const figureSchema = z
  .union([z.string(), z.number()])
  .nullable()
  .optional()
  .transform((figure) => (figure === null || figure === undefined ? '' : String(figure)));

const exerciseFileSchema = z.object({
  key: z.string().min(1),
  mode: z.string().min(1).default('major'),
  bass: z
    .array(
      z.object({
        pitch: z.string().min(1),
        figure: figureSchema,
        duration: z.number().positive().optional(),
      }),
    )
    .min(1),
});

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readYaml(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new InputError(`Cannot read ${filePath}: ${describeError(error)}`);
  }
  try {
    return yaml.load(content);
  } catch (error) {
    throw new InputError(`Invalid YAML in ${filePath}: ${describeError(error)}`);
  }
}

function parseFile<T extends z.ZodTypeAny>(filePath: string, schema: T): z.output<T> {
  const result = schema.safeParse(readYaml(filePath));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InputError(`Invalid ${path.basename(filePath)}: ${issues}`);
  }
  return result.data;
}

export function defaultConfigDir(): string {
  return path.join(process.cwd(), 'config');
}

// Load rules from a YAML file, falling back to the defaults when it does not exist
export function loadRules(
  filePath: string = path.join(defaultConfigDir(), 'rules.yaml'),
): Rules {
  if (!fs.existsSync(filePath)) {
    return DEFAULT_RULES;
  }
  const raw = parseFile(filePath, rulesFileSchema);
  const d = DEFAULT_RULES;

  return resolveRules({
    forbidIncompletePossibilities:
      raw.forbid_incomplete_possibilities ?? d.forbidIncompletePossibilities,
    upperPartsMaxSemitoneSeparation:
      raw.upper_parts_max_semitone_separation === undefined
        ? d.upperPartsMaxSemitoneSeparation
        : raw.upper_parts_max_semitone_separation,
    forbidVoiceCrossing: raw.forbid_voice_crossing ?? d.forbidVoiceCrossing,
    forbidDoubledAlterations: raw.forbid_doubled_alterations ?? d.forbidDoubledAlterations,
    forbidParallelFifths: raw.forbid_parallel_fifths ?? d.forbidParallelFifths,
    forbidParallelOctaves: raw.forbid_parallel_octaves ?? d.forbidParallelOctaves,
    forbidHiddenFifths: raw.forbid_hidden_fifths ?? d.forbidHiddenFifths,
    forbidHiddenOctaves: raw.forbid_hidden_octaves ?? d.forbidHiddenOctaves,
    forbidVoiceOverlap: raw.forbid_voice_overlap ?? d.forbidVoiceOverlap,
    partMovementLimits:
      raw.part_movement_limits?.map((limit) => ({
        voice: limit.voice,
        maxSemitones: limit.max_semitones,
      })) ?? d.partMovementLimits,
    resolveDominantSeventhProperly:
      raw.resolve_dominant_seventh_properly ?? d.resolveDominantSeventhProperly,
    resolveDiminishedSeventhProperly:
      raw.resolve_diminished_seventh_properly ?? d.resolveDiminishedSeventhProperly,
    resolveAugmentedSixthProperly:
      raw.resolve_augmented_sixth_properly ?? d.resolveAugmentedSixthProperly,
    doubledRootInDim7: raw.doubled_root_in_dim7 ?? d.doubledRootInDim7,
    dim7DoublingFromContext: raw.dim7_doubling_from_context ?? d.dim7DoublingFromContext,
    restrictDoublingsInItalianA6Resolution:
      raw.restrict_doublings_in_italian_a6_resolution ??
      d.restrictDoublingsInItalianA6Resolution,
    applyConsecutivePossibRulesToResolution:
      raw.apply_consecutive_possib_rules_to_resolution ??
      d.applyConsecutivePossibRulesToResolution,
    maxRealizationsPerSlot: raw.max_realizations_per_slot ?? d.maxRealizationsPerSlot,
  });
}

export function loadVoices(
  filePath: string = path.join(defaultConfigDir(), 'voices.yaml'),
): VoiceSpec[] {
  const raw = parseFile(filePath, voicesFileSchema);
  return raw.voices.map((voice) => ({
    label: voice.label,
    lowest: voice.lowest,
    highest: voice.highest,
    transposition: voice.transposition ?? null,
    maxSeparation: voice.max_separation ?? null,
    clef: voice.clef ?? null,
  }));
}

// Shorthand table from a YAML file, or the built-in table when it does not exist
export function loadShorthand(
  filePath: string = path.join(defaultConfigDir(), 'figures.yaml'),
): ShorthandTable {
  if (!fs.existsSync(filePath)) {
    return DEFAULT_SHORTHAND;
  }
  const raw = parseFile(filePath, figuresFileSchema);
  return new Map(raw.shorthand.map((entry) => [entry.figure, entry.longhand] as const));
}

export function loadExercise(filePath: string): FiguredBassLine {
  const raw = parseFile(filePath, exerciseFileSchema);
  return {
    key: raw.key,
    mode: raw.mode,
    bass: raw.bass.map((entry) => ({
      pitch: entry.pitch,
      figure: entry.figure,
      ...(entry.duration !== undefined ? { duration: entry.duration } : {}),
    })),
  };
}
