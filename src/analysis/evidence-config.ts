/**
 * Evidence Scoring Configuration
 * Zero-trust bands: only near-exact similarity earns a meaningful sub-score
 */

import { EvidenceLevel, EvidenceThresholds, Tier } from '../lib/types.js';

/** A similarity strictly above `above` scores `similarity * multiplier` */
export interface SimilarityBand {
  above: number;
  multiplier: number;
}

// Bands are checked in order; the first match wins, nothing matching scores 0
export const TEXT_SIMILARITY_BANDS: readonly SimilarityBand[] = [
  { above: 95, multiplier: 0.8 },
  { above: 85, multiplier: 0.3 },
  { above: 75, multiplier: 0.1 },
];

export const VISUAL_SIMILARITY_BANDS: readonly SimilarityBand[] = [
  { above: 95, multiplier: 0.9 },
  { above: 90, multiplier: 0.5 },
  { above: 80, multiplier: 0.3 },
  { above: 70, multiplier: 0.1 },
];

export const PRODUCT_SIMILARITY_BANDS: readonly SimilarityBand[] = [
  { above: 95, multiplier: 0.8 },
  { above: 90, multiplier: 0.4 },
  { above: 80, multiplier: 0.2 },
];

/** Mention counts below `below` score `score`; zero and one mention are special-cased */
export const MENTION_STEPS: readonly { below: number; score: number }[] = [
  { below: 5, score: 20 },
  { below: 10, score: 35 },
  { below: 25, score: 50 },
];

export const SINGLE_MENTION_SCORE = 10;
export const MAX_MENTION_SCORE = 70;

/** Flat bonus for a verified identical logo, applied before the 0-100 clamp */
export const LOGO_BONUS = 20;

export const SCORE_WEIGHTS = {
  text: 0.25,
  visual: 0.35,
  product: 0.2,
  confusion: 0.2,
} as const;

export const CONFUSION_FACTORS = {
  text: 0.3,
  visual: 0.5,
  product: 0.2,
  dampening: 0.7,
} as const;

export const TIER_THRESHOLDS = {
  high: 80,
  moderate: 50,
} as const;

/** Two presentation vocabularies for the same three tiers */
export const TIER_LABELS: Readonly<Record<Tier, { confusion: string; evidence: EvidenceLevel }>> = {
  HIGH: { confusion: 'HIGH', evidence: 'STRONG' },
  MODERATE: { confusion: 'MODERATE', evidence: 'POTENTIAL' },
  LOW: { confusion: 'LOW', evidence: 'INSUFFICIENT' },
};

export const EVIDENCE_THRESHOLDS: EvidenceThresholds = Object.freeze({
  textThreshold: '95% for high confidence, 85% for moderate confidence',
  visualThreshold: '95% for high confidence, 90% for moderate confidence',
  logoThreshold: 'Exact matches only',
  productThreshold: '95% for high confidence, 90% for moderate confidence',
});
