import chalk from 'chalk';
import type { MovementRuleRegistry } from '../rules/registry.js';
import type { Rules } from '../types.js';
import type { Voice } from '../voices/voice.js';

const RULE_KEYS = [
  'forbidIncompletePossibilities',
  'upperPartsMaxSemitoneSeparation',
  'forbidVoiceCrossing',
  'forbidDoubledAlterations',
  'forbidParallelFifths',
  'forbidParallelOctaves',
  'forbidHiddenFifths',
  'forbidHiddenOctaves',
  'forbidVoiceOverlap',
  'partMovementLimits',
  'resolveDominantSeventhProperly',
  'resolveDiminishedSeventhProperly',
  'resolveAugmentedSixthProperly',
  'doubledRootInDim7',
  'dim7DoublingFromContext',
  'restrictDoublingsInItalianA6Resolution',
  'applyConsecutivePossibRulesToResolution',
  'maxRealizationsPerSlot',
] as const satisfies ReadonlyArray<keyof Rules>;

// Same spelling as config/rules.yaml
export function yamlKey(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

function formatValue(value: Rules[keyof Rules]): string {
  if (typeof value === 'object' && value !== null) {
    return value.length === 0
      ? 'none'
      : value.map((limit) => `${limit.voice} ≤ ${limit.maxSemitones}`).join(', ');
  }
  if (value === null) return 'off';
  return String(value);
}

export function rulesCommand(
  rules: Rules,
  registry: MovementRuleRegistry,
  voices: readonly Voice[],
): void {
  console.log(chalk.yellow.bold('\n  RULES\n'));
  for (const key of RULE_KEYS) {
    console.log(`  ${yamlKey(key).padEnd(46)}${chalk.cyan(formatValue(rules[key]))}`);
  }

  console.log(chalk.yellow.bold('\n  MOVEMENT CHECKS\n'));
  const enabled = new Set(registry.enabledFor(rules, { kind: 'none' }).map((rule) => rule.name));
  for (const rule of registry.getAll()) {
    const marker = enabled.has(rule.name) ? chalk.green('on ') : chalk.gray('off');
    console.log(`  ${marker} ${rule.name.padEnd(26)}${chalk.gray(rule.description)}`);
  }

  console.log(chalk.yellow.bold('\n  VOICES\n'));
  for (const voice of voices) {
    const { lowest, highest } = voice.soundingRange;
    const separation = voice.maxSeparation === null ? '' : `, max ${voice.maxSeparation} below`;
    console.log(
      `  ${chalk.cyan(voice.label.padEnd(10))}${lowest.name}-${highest.name}` +
        chalk.gray(separation),
    );
  }
  console.log();
}
