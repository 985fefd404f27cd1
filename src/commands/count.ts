import chalk from 'chalk';
import type { Chain } from '../core/chain.js';
import type { FiguredBassLine } from '../types.js';

export function describeLine(line: FiguredBassLine): string {
  const bass = line.bass
    .map((entry) => (entry.figure ? `${entry.pitch}(${entry.figure})` : entry.pitch))
    .join(' ');
  return `${line.key} ${line.mode}: ${bass}`;
}

export function countCommand(chain: Chain, line: FiguredBassLine): void {
  const total = chain.count();

  console.log(chalk.yellow.bold('\n  SOLUTIONS\n'));
  console.log(`  ${chalk.gray(describeLine(line))}`);
  console.log(`  ${chalk.cyan(total.toString())} legal realization${total === 1n ? '' : 's'}`);

  chain.segments.forEach((segment, slot) => {
    const survivors = chain.survivingIndices(slot).length;
    console.log(
      chalk.gray(
        `    ${segment.bass.name.padEnd(5)}${segment.entry.figure.padEnd(8)}` +
          `${survivors}/${segment.realizations.length} chords in use`,
      ),
    );
  });
  console.log();
}
