import { RenderError } from '../errors.js';
import type { Pitch } from '../theory/pitch.js';
import type { Possibility } from '../types.js';
import type { Voice } from '../voices/voice.js';

export type RenderStyle = 'chorale' | 'keyboard';

export const RENDER_STYLES: readonly RenderStyle[] = ['chorale', 'keyboard'];

function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

// Rejects a progression whose bass differs from the bass line it claims to realize.
export function assertBassFidelity(
  bassLine: readonly Pitch[],
  progression: readonly Possibility[],
): void {
  if (bassLine.length !== progression.length) {
    throw new RenderError(
      `Progression has ${progression.length} chords for a bass line of ${bassLine.length}`,
    );
  }
  progression.forEach((possibility, slot) => {
    const bass = possibility[possibility.length - 1];
    if (bass.name !== bassLine[slot].name) {
      throw new RenderError(
        `Slot ${slot}: realization bass ${bass.name} does not match ${bassLine[slot].name}`,
      );
    }
  });
}

// Plain-text rendering. Chorale style prints one row per voice; keyboard style
// stacks the upper voices into a right hand over the bass.
export function renderProgression(
  bassLine: readonly Pitch[],
  voices: readonly Voice[],
  progression: readonly Possibility[],
  style: RenderStyle = 'chorale',
): string[] {
  assertBassFidelity(bassLine, progression);

  const rows: Array<{ label: string; cells: string[] }> =
    style === 'chorale'
      ? voices.map((voice, i) => ({
          label: voice.label,
          cells: progression.map((possibility) => possibility[i].name),
        }))
      : [
          {
            label: 'RH',
            cells: progression.map((possibility) =>
              possibility
                .slice(0, -1)
                .map((pitch) => pitch.name)
                .join('/'),
            ),
          },
          {
            label: 'LH',
            cells: progression.map((possibility) => possibility[possibility.length - 1].name),
          },
        ];

  const labelWidth = Math.max(...rows.map((row) => row.label.length)) + 2;
  const cellWidth = Math.max(...rows.flatMap((row) => row.cells.map((cell) => cell.length))) + 2;

  return rows.map((row) => {
    const cells = row.cells.map((cell) => padRight(cell, cellWidth)).join('');
    return (padRight(row.label, labelWidth) + cells).trimEnd();
  });
}
