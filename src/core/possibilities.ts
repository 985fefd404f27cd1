import { RealizationLimitError, SlotInfeasibleError } from '../errors.js';
import type { Pitch } from '../theory/pitch.js';
import { pitchesForScaleDegrees } from '../theory/scale.js';
import type { Possibility, Rules } from '../types.js';
import type { Voice } from '../voices/voice.js';
import type { RealizationCache } from './cache.js';

export interface SlotContext {
  slotIndex: number;
  bass: Pitch;
  figure: string;
  pitchNames: readonly string[];
  alteredPitchNames: readonly string[];
  // Set on the tonic after a root-position dominant seventh
  allowIncomplete: boolean;
}

function candidatesFor(
  slot: SlotContext,
  voice: Voice,
  cache: RealizationCache,
): readonly Pitch[] {
  const { lowest, highest } = voice.soundingRange;
  const key = `${slot.pitchNames.join(',')}|${lowest.name}-${highest.name}`;
  return cache
    .candidatesFor(key, () => pitchesForScaleDegrees(slot.pitchNames, voice.soundingRange))
    .filter((pitch) => pitch.midi >= slot.bass.midi);
}

// Every realization of a slot that satisfies the single-chord rules, in lexicographic
// order over (voice order, ascending pitch). `voices` must already be ordered.
export function generatePossibilities(
  slot: SlotContext,
  voices: readonly Voice[],
  rules: Rules,
  cache: RealizationCache,
): Possibility[] {
  const upperVoices = voices.slice(0, -1);
  const bassVoice = voices[voices.length - 1];
  const candidates = upperVoices.map((voice) => candidatesFor(slot, voice, cache));
  const allowIncomplete = slot.allowIncomplete || !rules.forbidIncompletePossibilities;
  const altered = new Set(slot.alteredPitchNames);
  const limit = rules.upperPartsMaxSemitoneSeparation;

  const counts = new Map<string, number>([[slot.bass.pc, 1]]);
  let missing = new Set(slot.pitchNames).size - 1;

  const chosen: Pitch[] = [];
  const results: Possibility[] = [];

  const visit = (index: number, low: number, high: number): void => {
    if (index === upperVoices.length) {
      const lowestUpper = chosen[chosen.length - 1];
      const separation = bassVoice.maxSeparation;
      if (separation !== null && lowestUpper.midi - slot.bass.midi > separation) return;
      if (!allowIncomplete && missing > 0) return;
      results.push(Object.freeze([...chosen, slot.bass]));
      if (results.length > rules.maxRealizationsPerSlot) {
        throw new RealizationLimitError(slot.slotIndex, rules.maxRealizationsPerSlot);
      }
      return;
    }

    const voice = upperVoices[index];
    const above = index > 0 ? chosen[index - 1] : null;
    const remaining = upperVoices.length - index - 1;

    for (const pitch of candidates[index]) {
      if (above) {
        // Candidates ascend, so every later one crosses too
        if (rules.forbidVoiceCrossing && pitch.midi > above.midi) break;
        if (voice.maxSeparation !== null && above.midi - pitch.midi > voice.maxSeparation) {
          continue;
        }
      }
      const nextLow = Math.min(low, pitch.midi);
      const nextHigh = Math.max(high, pitch.midi);
      if (limit !== null && nextHigh - nextLow > limit) continue;

      const count = counts.get(pitch.pc) ?? 0;
      if (rules.forbidDoubledAlterations && count > 0 && altered.has(pitch.pc)) continue;

      const nextMissing = count === 0 ? missing - 1 : missing;
      if (!allowIncomplete && nextMissing > remaining) continue;

      const previousMissing = missing;
      counts.set(pitch.pc, count + 1);
      missing = nextMissing;
      chosen.push(pitch);
      visit(index + 1, nextLow, nextHigh);
      chosen.pop();
      missing = previousMissing;
      counts.set(pitch.pc, count);
    }
  };

  visit(0, Infinity, -Infinity);

  if (results.length === 0) {
    throw new SlotInfeasibleError(slot.slotIndex, slot.bass.name, slot.figure);
  }
  return results;
}
