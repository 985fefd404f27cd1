import {
  isMajorTriad,
  isMinorTriad,
  type ChordAnalysis,
  type ResolutionRequirement,
} from '../theory/harmony.js';
import { transposePitchClass, type Pitch } from '../theory/pitch.js';
import type { Possibility, Rules } from '../types.js';
import type { RealizationCache } from './cache.js';

// How one chord tone moves. The first step whose pitch class matches wins;
// a tone no step matches holds its pitch.
export interface ResolutionStep {
  pc: string;
  interval: string;
  // Only the bass pitch itself (not an upper voice doubling it)
  bassOnly?: boolean;
}

export interface ResolutionPlan {
  name: string;
  steps: readonly ResolutionStep[];
}

type SeventhRequirement = Extract<
  ResolutionRequirement,
  { kind: 'dominant-seventh' | 'diminished-seventh' }
>;
type AugmentedSixthRequirement = Extract<ResolutionRequirement, { kind: 'augmented-sixth' }>;

function plan(name: string, steps: Array<ResolutionStep | false>): ResolutionPlan {
  return { name, steps: steps.filter((step): step is ResolutionStep => step !== false) };
}

function dominantSeventhPlan(req: SeventhRequirement, to: ChordAnalysis): ResolutionPlan | null {
  const tonic = transposePitchClass(req.root, '4P');
  const majorSubmediant = transposePitchClass(req.root, '2M');
  const minorSubmediant = transposePitchClass(req.root, '2m');
  const subdominant = req.seventh;
  const v43ToI6 = req.inversion === 2 && to.inversion === 1;
  const { root, third, fifth, seventh } = req;

  if (to.root === tonic && isMajorTriad(to)) {
    return plan('dominant-seventh-to-major-tonic', [
      { pc: root, interval: '4P', bassOnly: true },
      { pc: third, interval: '2m' },
      { pc: fifth, interval: v43ToI6 ? '2M' : '-2M' },
      { pc: seventh, interval: v43ToI6 ? '2M' : '-2m' },
    ]);
  }
  if (to.root === tonic && isMinorTriad(to)) {
    return plan('dominant-seventh-to-minor-tonic', [
      { pc: root, interval: '4P', bassOnly: true },
      { pc: third, interval: '2m' },
      { pc: fifth, interval: v43ToI6 ? '2m' : '-2M' },
      { pc: seventh, interval: v43ToI6 ? '2M' : '-2M' },
    ]);
  }
  // Deceptive motion is not taken from the four-three position
  if (req.inversion !== 2 && to.root === majorSubmediant && isMinorTriad(to)) {
    return plan('dominant-seventh-to-minor-submediant', [
      { pc: root, interval: '2M' },
      { pc: third, interval: '2m' },
      { pc: fifth, interval: '-2M' },
      { pc: seventh, interval: '-2m' },
    ]);
  }
  if (req.inversion !== 2 && to.root === minorSubmediant && isMajorTriad(to)) {
    return plan('dominant-seventh-to-major-submediant', [
      { pc: root, interval: '2m' },
      { pc: third, interval: '2m' },
      { pc: fifth, interval: '-2M' },
      { pc: seventh, interval: '-2M' },
    ]);
  }
  if (req.inversion !== 2 && to.root === subdominant && isMajorTriad(to)) {
    return plan('dominant-seventh-to-major-subdominant', [
      { pc: root, interval: '2M' },
      { pc: third, interval: '2m' },
      { pc: fifth, interval: '-2M' },
    ]);
  }
  if (req.inversion !== 2 && to.root === subdominant && isMinorTriad(to)) {
    return plan('dominant-seventh-to-minor-subdominant', [
      { pc: root, interval: '2m' },
      { pc: third, interval: '2m' },
      { pc: fifth, interval: '-2M' },
    ]);
  }
  return null;
}

function diminishedSeventhPlan(
  req: SeventhRequirement,
  to: ChordAnalysis,
  rules: Rules,
): ResolutionPlan | null {
  const tonic = transposePitchClass(req.root, '2m');
  const subdominant = transposePitchClass(tonic, '4P');
  const { root, third, fifth, seventh } = req;

  // With the third in the bass, the bass line decides which tone is doubled
  let doubledRoot = rules.doubledRootInDim7;
  if (req.inversion === 1 && rules.dim7DoublingFromContext) {
    if (to.inversion === 0) doubledRoot = true;
    else if (to.inversion === 1) doubledRoot = false;
  }

  if (to.root === tonic && isMajorTriad(to)) {
    return plan('diminished-seventh-to-major-tonic', [
      { pc: root, interval: '2m' },
      { pc: third, interval: doubledRoot ? '-2M' : '2M' },
      { pc: fifth, interval: '-2m' },
      { pc: seventh, interval: '-2m' },
    ]);
  }
  if (to.root === tonic && isMinorTriad(to)) {
    return plan('diminished-seventh-to-minor-tonic', [
      { pc: root, interval: '2m' },
      { pc: third, interval: doubledRoot ? '-2M' : '2m' },
      { pc: fifth, interval: '-2M' },
      { pc: seventh, interval: '-2m' },
    ]);
  }
  if (to.root === subdominant && isMajorTriad(to)) {
    return plan('diminished-seventh-to-major-subdominant', [
      { pc: root, interval: '2m' },
      { pc: third, interval: '-2M' },
      { pc: seventh, interval: '1A' },
    ]);
  }
  if (to.root === subdominant && isMinorTriad(to)) {
    return plan('diminished-seventh-to-minor-subdominant', [
      { pc: root, interval: '2m' },
      { pc: third, interval: '-2M' },
    ]);
  }
  return null;
}

const OTHER_TONE_INTERVALS: Record<
  AugmentedSixthRequirement['variant'],
  { dominant: string; majorTonic: string; minorTonic: string }
> = {
  french: { dominant: '1P', majorTonic: '2M', minorTonic: '2m' },
  german: { dominant: '-2m', majorTonic: '1A', minorTonic: '1P' },
  swiss: { dominant: '1d', majorTonic: '2m', minorTonic: '2d' },
};

function augmentedSixthPlan(
  req: AugmentedSixthRequirement,
  to: ChordAnalysis,
): ResolutionPlan | null {
  const tonic = transposePitchClass(req.bass, '3M');
  const dominant = transposePitchClass(tonic, '5P');
  const other = OTHER_TONE_INTERVALS[req.variant];
  const steps = (
    thirdInterval: string,
    otherInterval: string,
  ): Array<ResolutionStep | false> => [
    { pc: req.bass, interval: '-2m' },
    { pc: req.sixth, interval: '2m' },
    { pc: req.third, interval: thirdInterval },
    req.other !== null && { pc: req.other, interval: otherInterval },
  ];

  if (to.inversion === 2 && to.root === tonic && isMajorTriad(to)) {
    return plan(`${req.variant}-sixth-to-major-tonic`, steps('1P', other.majorTonic));
  }
  if (to.inversion === 2 && to.root === tonic && isMinorTriad(to)) {
    return plan(`${req.variant}-sixth-to-minor-tonic`, steps('1P', other.minorTonic));
  }
  if (to.bass === dominant && isMajorTriad(to)) {
    return plan(`${req.variant}-sixth-to-dominant`, steps('-2m', other.dominant));
  }
  return null;
}

// The voice-by-voice plan for leaving a slot, or null when ordinary voice leading applies
export function planResolution(
  requirement: ResolutionRequirement,
  to: ChordAnalysis,
  rules: Rules,
): ResolutionPlan | null {
  switch (requirement.kind) {
    case 'dominant-seventh':
      return dominantSeventhPlan(requirement, to);
    case 'diminished-seventh':
      return diminishedSeventhPlan(requirement, to, rules);
    case 'augmented-sixth':
      return augmentedSixthPlan(requirement, to);
    case 'italian-augmented-sixth':
    case 'none':
      return null;
  }
}

// Where each voice of `possibility` goes under the plan
export function resolvePossibility(
  plan: ResolutionPlan,
  possibility: Possibility,
  cache: RealizationCache,
): Pitch[] {
  const bass = possibility[possibility.length - 1];
  return possibility.map((pitch) => {
    const step = plan.steps.find(
      (s) => s.pc === pitch.pc && (!s.bassOnly || pitch.name === bass.name),
    );
    return step ? cache.transpose(pitch, step.interval) : pitch;
  });
}
