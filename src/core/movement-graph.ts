import type { IndexProgression } from '../types.js';
import { pickIndex, type RandomFn } from './random.js';

// Layered DAG over realization indices. Layer i holds the realizations of slot i;
// edges only join layer i to layer i + 1. Pruning clears alive flags and filters
// adjacency lists; indices are never renumbered.
export class MovementGraph {
  private readonly alive: Uint8Array[];
  private readonly adjacency: Array<Map<number, number[]>>;

  constructor(layerSizes: readonly number[]) {
    this.alive = layerSizes.map((size) => new Uint8Array(size).fill(1));
    this.adjacency = layerSizes.slice(0, -1).map(() => new Map<number, number[]>());
  }

  get layerCount(): number {
    return this.alive.length;
  }

  layerSize(layer: number): number {
    return this.alive[layer].length;
  }

  connect(layer: number, from: number, targets: number[]): void {
    if (layer >= this.adjacency.length) {
      throw new Error(`Layer ${layer} has no successors`);
    }
    this.adjacency[layer].set(from, [...targets].sort((x, y) => x - y));
  }

  successors(layer: number, index: number): readonly number[] {
    return this.adjacency[layer]?.get(index) ?? [];
  }

  isAlive(layer: number, index: number): boolean {
    return this.alive[layer][index] === 1;
  }

  aliveIndices(layer: number): number[] {
    const indices: number[] = [];
    this.alive[layer].forEach((flag, index) => {
      if (flag === 1) indices.push(index);
    });
    return indices;
  }

  // Backward sweep: keep a realization only if one of its successors survives.
  // Forward sweep: drop what no surviving first-layer realization reaches.
  prune(): void {
    for (let layer = this.layerCount - 2; layer >= 0; layer--) {
      const next = this.alive[layer + 1];
      const edges = this.adjacency[layer];
      this.alive[layer].forEach((flag, index) => {
        if (flag === 0) {
          edges.delete(index);
          return;
        }
        const targets = (edges.get(index) ?? []).filter((target) => next[target] === 1);
        if (targets.length === 0) {
          this.alive[layer][index] = 0;
          edges.delete(index);
        } else {
          edges.set(index, targets);
        }
      });
    }

    for (let layer = 1; layer < this.layerCount; layer++) {
      const reached = new Uint8Array(this.layerSize(layer));
      for (const targets of this.adjacency[layer - 1].values()) {
        for (const target of targets) reached[target] = 1;
      }
      const current = this.alive[layer];
      current.forEach((flag, index) => {
        if (flag === 1 && reached[index] === 0) {
          current[index] = 0;
          this.adjacency[layer]?.delete(index);
        }
      });
    }
  }

  // Number of complete paths, counted from the last layer back
  countPaths(): bigint {
    if (this.layerCount === 0) return 0n;
    let ways = Array.from(this.alive[this.layerCount - 1], (flag) => BigInt(flag));
    for (let layer = this.layerCount - 2; layer >= 0; layer--) {
      const next = ways;
      ways = Array.from(this.alive[layer], (flag, index) => {
        if (flag === 0) return 0n;
        return this.successors(layer, index).reduce((sum, target) => sum + next[target], 0n);
      });
    }
    return ways.reduce((sum, n) => sum + n, 0n);
  }

  // Lazy depth-first walk over every complete path; each call to the iterator restarts it.
  paths(): Iterable<IndexProgression> {
    return {
      [Symbol.iterator]: () => this.walk(),
    };
  }

  // Uniform at the first layer, then uniform among the current node's successors
  samplePath(random: RandomFn = Math.random): IndexProgression {
    const first = this.aliveIndices(0);
    const path = [first[pickIndex(first.length, random)]];
    for (let layer = 0; layer < this.layerCount - 1; layer++) {
      const targets = this.successors(layer, path[layer]);
      path.push(targets[pickIndex(targets.length, random)]);
    }
    return path;
  }

  private *walk(): Generator<IndexProgression> {
    if (this.layerCount === 0) return;
    const path: number[] = [];
    const last = this.layerCount - 1;

    function* extend(graph: MovementGraph, layer: number): Generator<IndexProgression> {
      const choices =
        layer === 0 ? graph.aliveIndices(0) : graph.successors(layer - 1, path[layer - 1]);
      for (const index of choices) {
        path[layer] = index;
        if (layer === last) {
          yield [...path];
        } else {
          yield* extend(graph, layer + 1);
        }
      }
      path.length = layer;
    }

    yield* extend(this, 0);
  }
}
