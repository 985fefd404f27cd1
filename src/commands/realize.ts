import chalk from 'chalk';
import type { Chain } from '../core/chain.js';
import type { RandomFn } from '../core/random.js';
import type { IndexProgression } from '../types.js';
import { renderProgression, type RenderStyle } from './format.js';

export interface RealizeOptions {
  count: number;
  style: RenderStyle;
  random?: RandomFn;
}

export interface ListOptions {
  limit: number;
  style: RenderStyle;
}

function printProgression(
  chain: Chain,
  progression: IndexProgression,
  heading: string,
  style: RenderStyle,
): void {
  const possibilities = chain.progressionToPossibilities(progression);
  const bassLine = chain.segments.map((segment) => segment.bass);
  console.log(chalk.cyan(`  ${heading}`));
  for (const line of renderProgression(bassLine, chain.voices, possibilities, style)) {
    console.log(`    ${line}`);
  }
  console.log();
}

// Random realizations (every realization when there are no more than requested)
export function realizeCommand(chain: Chain, options: RealizeOptions): void {
  const progressions = chain.sampleMany(options.count, options.random);

  console.log(chalk.yellow.bold('\n  REALIZATIONS\n'));
  progressions.forEach((progression, i) => {
    printProgression(chain, progression, `#${i + 1}`, options.style);
  });
}

export function allCommand(chain: Chain, options: ListOptions): void {
  const total = chain.count();
  console.log(chalk.yellow.bold('\n  ALL REALIZATIONS\n'));

  let shown = 0;
  for (const progression of chain.enumerateAll()) {
    if (shown >= options.limit) break;
    shown++;
    printProgression(chain, progression, `#${shown}`, options.style);
  }

  if (BigInt(shown) < total) {
    console.log(chalk.gray(`  Showing ${shown} of ${total}. Use --limit to see more.\n`));
  }
}
