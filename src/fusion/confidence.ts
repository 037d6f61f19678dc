import type { ConfidencePolicyName, SourceValues } from '../config/index.js';
import type { FusionSource } from '../types.js';

export type SourceContribution = {
  source: FusionSource;
  value: number;
  threshold: number;
  ceiling: number;
  /** `(value - threshold) / (ceiling - threshold)` clamped to [0, 1]. */
  normalized: number;
};

/**
 * Maps the exceedances of the triggered sources to a confidence in [0, 1].
 * Alarm gating is decided by `minSources`, never by the policy.
 */
export type ConfidencePolicy = {
  readonly name: string;
  score(contributions: readonly SourceContribution[]): number;
};

export function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

export function normalizeExceedance(value: number, threshold: number, ceiling: number): number {
  if (ceiling <= threshold) {
    return value >= threshold ? 1 : 0;
  }
  return clamp01((value - threshold) / (ceiling - threshold));
}

export const meanPolicy: ConfidencePolicy = {
  name: 'mean',
  score(contributions) {
    if (contributions.length === 0) {
      return 0;
    }
    const total = contributions.reduce((sum, entry) => sum + entry.normalized, 0);
    return clamp01(total / contributions.length);
  }
};

export const maxPolicy: ConfidencePolicy = {
  name: 'max',
  score(contributions) {
    return clamp01(contributions.reduce((max, entry) => Math.max(max, entry.normalized), 0));
  }
};

export function createWeightedPolicy(weights: Readonly<SourceValues>): ConfidencePolicy {
  return {
    name: 'weighted',
    score(contributions) {
      let weighted = 0;
      let totalWeight = 0;
      for (const entry of contributions) {
        const weight = weights[entry.source];
        weighted += weight * entry.normalized;
        totalWeight += weight;
      }
      return totalWeight > 0 ? clamp01(weighted / totalWeight) : 0;
    }
  };
}

export function createConfidencePolicy(name: ConfidencePolicyName, weights: Readonly<SourceValues>): ConfidencePolicy {
  switch (name) {
    case 'mean':
      return meanPolicy;
    case 'max':
      return maxPolicy;
    case 'weighted':
      return createWeightedPolicy(weights);
  }
}
