#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import path from 'path';
import { loadExercise, loadRules, loadShorthand, loadVoices } from './config.js';
import { buildChain, type Chain } from './core/chain.js';
import { RealizationCache } from './core/cache.js';
import { createSeededRandom } from './core/random.js';
import { RealizerError } from './errors.js';
import { MovementRuleRegistry } from './rules/registry.js';
import type { FiguredBassLine } from './types.js';
import { createVoice, orderVoices } from './voices/voice.js';
import { countCommand } from './commands/count.js';
import { allCommand, realizeCommand } from './commands/realize.js';
import { rulesCommand } from './commands/rules.js';
import { RENDER_STYLES, type RenderStyle } from './commands/format.js';

interface GlobalOptions {
  configDir?: string;
  rules?: string;
  voices?: string;
  figures?: string;
  verbose?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseSeed(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Expected an integer seed.');
  }
  return parsed;
}

function parseStyle(value: string): RenderStyle {
  const style = RENDER_STYLES.find((s) => s === value);
  if (!style) {
    throw new InvalidArgumentError(`Expected one of: ${RENDER_STYLES.join(', ')}.`);
  }
  return style;
}

function configPaths(opts: GlobalOptions) {
  const dir = opts.configDir ?? path.join(process.cwd(), 'config');
  return {
    rules: opts.rules ?? path.join(dir, 'rules.yaml'),
    voices: opts.voices ?? path.join(dir, 'voices.yaml'),
    figures: opts.figures ?? path.join(dir, 'figures.yaml'),
  };
}

function loadChain(file: string, opts: GlobalOptions): { chain: Chain; line: FiguredBassLine } {
  const paths = configPaths(opts);
  const line = loadExercise(file);
  const chain = buildChain(line, loadVoices(paths.voices), loadRules(paths.rules), {
    cache: new RealizationCache(),
    shorthand: loadShorthand(paths.figures),
    log: opts.verbose ? (message) => console.log(chalk.gray(`  ${message}`)) : undefined,
  });
  return { chain, line };
}

// Realizer errors are reported; anything else is a bug and propagates.
function run(action: () => void): void {
  try {
    action();
  } catch (error) {
    if (error instanceof RealizerError) {
      console.error(chalk.red(`\n  ${error.name}: ${error.message}\n`));
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

const program = new Command();

program
  .name('continuo')
  .description('Figured bass realizer - count, list and sample every legal voicing of a bass line')
  .version('1.0.0')
  .option('-c, --config-dir <dir>', 'Directory holding rules.yaml, voices.yaml and figures.yaml')
  .option('-r, --rules <file>', 'Rules file')
  .option('--voices <file>', 'Voices file')
  .option('--figures <file>', 'Figure shorthand file')
  .option('-v, --verbose', 'Print progress while building');

program
  .command('count <exercise>')
  .description('Count the legal realizations of an exercise')
  .action(function (this: Command, exercise: string) {
    run(() => {
      const { chain, line } = loadChain(exercise, this.optsWithGlobals<GlobalOptions>());
      countCommand(chain, line);
    });
  });

program
  .command('realize <exercise>')
  .description('Print randomly chosen realizations')
  .option('-n, --number <count>', 'Number of realizations', parsePositiveInt, 1)
  .option('-s, --seed <seed>', 'Seed for reproducible choices', parseSeed)
  .option('--style <style>', 'chorale or keyboard', parseStyle, 'chorale')
  .action(function (this: Command, exercise: string) {
    run(() => {
      const opts = this.optsWithGlobals<
        GlobalOptions & { number: number; seed?: number; style: RenderStyle }
      >();
      const { chain } = loadChain(exercise, opts);
      realizeCommand(chain, {
        count: opts.number,
        style: opts.style,
        random: opts.seed === undefined ? undefined : createSeededRandom(opts.seed),
      });
    });
  });

program
  .command('all <exercise>')
  .description('List realizations in order')
  .option('-l, --limit <count>', 'Maximum number to print', parsePositiveInt, 20)
  .option('--style <style>', 'chorale or keyboard', parseStyle, 'chorale')
  .action(function (this: Command, exercise: string) {
    run(() => {
      const opts = this.optsWithGlobals<GlobalOptions & { limit: number; style: RenderStyle }>();
      const { chain } = loadChain(exercise, opts);
      allCommand(chain, { limit: opts.limit, style: opts.style });
    });
  });

program
  .command('rules')
  .description('Show the active rules, movement checks and voices')
  .action(function (this: Command) {
    run(() => {
      const paths = configPaths(this.optsWithGlobals<GlobalOptions>());
      const voices = orderVoices(loadVoices(paths.voices).map(createVoice));
      rulesCommand(loadRules(paths.rules), MovementRuleRegistry.createDefault(), voices);
    });
  });

program.parse();
