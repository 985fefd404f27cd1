// Base class for everything the realizer reports to callers.
export class RealizerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RealizerError';
  }
}

// Malformed pitch, figure, range, voice list, bass line or config file
export class InputError extends RealizerError {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

// A single slot has no realization at all under the active rules.
export class SlotInfeasibleError extends RealizerError {
  readonly slotIndex: number;
  readonly bass: string;
  readonly figure: string;

  constructor(slotIndex: number, bass: string, figure: string) {
    super(`No legal realization for slot ${slotIndex} (bass ${bass}, figure "${figure}")`);
    this.name = 'SlotInfeasibleError';
    this.slotIndex = slotIndex;
    this.bass = bass;
    this.figure = figure;
  }
}

export interface SlotLabel {
  bass: string;
  figure: string;
}

// Every slot has realizations but no complete path survives pruning.
export class ChainInfeasibleError extends RealizerError {
  readonly first: SlotLabel;
  readonly last: SlotLabel;

  constructor(first: SlotLabel, last: SlotLabel) {
    super(
      `No complete realization from ${first.bass} "${first.figure}" ` +
        `to ${last.bass} "${last.figure}"`,
    );
    this.name = 'ChainInfeasibleError';
    this.first = first;
    this.last = last;
  }
}

export class QueryOnUnbuiltChainError extends RealizerError {
  readonly state: string;

  constructor(state: string) {
    super(`Chain must be pruned before it can be queried (current state: ${state})`);
    this.name = 'QueryOnUnbuiltChainError';
    this.state = state;
  }
}

// A build pass was invoked out of order.
export class ChainStateError extends RealizerError {
  constructor(pass: string, expected: string, actual: string) {
    super(`Cannot run ${pass}: chain is ${actual}, expected ${expected}`);
    this.name = 'ChainStateError';
  }
}

export class RealizationLimitError extends RealizerError {
  readonly slotIndex: number;
  readonly limit: number;

  constructor(slotIndex: number, limit: number) {
    super(`Slot ${slotIndex} has more than ${limit} realizations; tighten the rules or voices`);
    this.name = 'RealizationLimitError';
    this.slotIndex = slotIndex;
    this.limit = limit;
  }
}

export class RenderError extends RealizerError {
  constructor(message: string) {
    super(message);
    this.name = 'RenderError';
  }
}
