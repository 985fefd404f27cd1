import { toPitch, transposePitch, type Pitch } from '../theory/pitch.js';

// Memo tables for one realization request. Never shared between requests.
export class RealizationCache {
  private pitches = new Map<string, Pitch>();
  private transpositions = new Map<string, Pitch>();
  private candidates = new Map<string, readonly Pitch[]>();
  private hits = 0;
  private misses = 0;

  pitch(name: string): Pitch {
    return this.remember(this.pitches, name, () => toPitch(name));
  }

  transpose(pitch: Pitch, interval: string): Pitch {
    return this.remember(this.transpositions, `${pitch.name}|${interval}`, () =>
      transposePitch(pitch, interval),
    );
  }

  // Candidate pitches for one voice, keyed by chord spelling and range
  candidatesFor(key: string, compute: () => readonly Pitch[]): readonly Pitch[] {
    return this.remember(this.candidates, key, compute);
  }

  get stats(): { hits: number; misses: number } {
    return { hits: this.hits, misses: this.misses };
  }

  private remember<T>(table: Map<string, T>, key: string, compute: () => T): T {
    const cached = table.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }
    this.misses++;
    const value = compute();
    table.set(key, value);
    return value;
  }
}
