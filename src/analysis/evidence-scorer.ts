/** Evidence Scorer - Zero-trust scoring of brand similarity signals */
import { SimilaritySignals } from '../lib/schemas.js';
import { EvidenceScoreResult, ScoreBreakdown, ScoreComponents, Tier } from '../lib/types.js';
import { engineLogger } from '../lib/logger.js';
import {
  CONFUSION_FACTORS,
  EVIDENCE_THRESHOLDS,
  LOGO_BONUS,
  MAX_MENTION_SCORE,
  MENTION_STEPS,
  PRODUCT_SIMILARITY_BANDS,
  SCORE_WEIGHTS,
  SINGLE_MENTION_SCORE,
  SimilarityBand,
  TEXT_SIMILARITY_BANDS,
  TIER_LABELS,
  TIER_THRESHOLDS,
  VISUAL_SIMILARITY_BANDS,
} from './evidence-config.js';

/**
 * Round to the nearest integer, ties to even (2.5 → 2, 3.5 → 4).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff === 0.5) return floor % 2 === 0 ? floor : floor + 1;
  return Math.round(value);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export class EvidenceScorer {
  /**
   * Score a set of signals. Pure and total: inputs are assumed to be in range
   * (validate with parseSimilaritySignals first); absent fields count as 0/false.
   */
  static score(signals: Partial<SimilaritySignals>): EvidenceScoreResult {
    const components = this.calculateComponents({
      textSimilarity: signals.textSimilarity ?? 0,
      visualSimilarity: signals.visualSimilarity ?? 0,
      brandMentions: signals.brandMentions ?? 0,
      logoUsage: signals.logoUsage ?? false,
      productSimilarity: signals.productSimilarity ?? 0,
    });

    // Rounded once, from the unrounded sum
    const total =
      components.weightedText + components.weightedVisual + components.weightedProduct + components.weightedConfusion;
    const overallScore = clamp(roundHalfEven(total), 0, 100);
    const tier = this.determineTier(overallScore);

    engineLogger.debug('Evidence scoring completed', {
      overallScore,
      tier,
      textScore: components.textScore,
      visualScore: components.visualScore,
      productScore: components.productScore,
    });

    return {
      overallScore,
      scoreBreakdown: this.toDisplayBreakdown(components),
      components: Object.freeze(components),
      tier,
      evidenceLevel: TIER_LABELS[tier].evidence,
      evidenceThresholds: EVIDENCE_THRESHOLDS,
    };
  }

  private static calculateComponents(signals: SimilaritySignals): ScoreComponents {
    const textScore = this.adjustedTextScore(signals.brandMentions, signals.textSimilarity);
    const visualScore = this.visualScore(signals.visualSimilarity, signals.logoUsage);
    const productScore = this.productScore(signals.productSimilarity);
    const confusionScore = this.confusionScore(textScore, visualScore, productScore);

    return {
      textScore,
      visualScore,
      productScore,
      confusionScore,
      weightedText: textScore * SCORE_WEIGHTS.text,
      weightedVisual: visualScore * SCORE_WEIGHTS.visual,
      weightedProduct: productScore * SCORE_WEIGHTS.product,
      weightedConfusion: confusionScore * SCORE_WEIGHTS.confusion,
    };
  }

  /**
   * Step score for brand-name mentions, capped at 70
   */
  static mentionScore(mentions: number): number {
    if (mentions === 0) return 0;
    if (mentions === 1) return SINGLE_MENTION_SCORE;
    const step = MENTION_STEPS.find((s) => mentions < s.below);
    return step ? step.score : MAX_MENTION_SCORE;
  }

  static textSimilarityScore(similarity: number): number {
    return this.bandScore(similarity, TEXT_SIMILARITY_BANDS);
  }

  /**
   * Mentions and text similarity are evidence of the same fact; take the stronger
   */
  static adjustedTextScore(mentions: number, similarity: number): number {
    return Math.max(this.mentionScore(mentions), this.textSimilarityScore(similarity));
  }

  static visualScore(similarity: number, logoUsage: boolean): number {
    const score = this.bandScore(similarity, VISUAL_SIMILARITY_BANDS);
    return logoUsage ? clamp(score + LOGO_BONUS, 0, 100) : clamp(score, 0, 100);
  }

  static productScore(similarity: number): number {
    return this.bandScore(similarity, PRODUCT_SIMILARITY_BANDS);
  }

  /**
   * Dampened composite; visual deception dominates consumer-confusion risk
   */
  static confusionScore(textScore: number, visualScore: number, productScore: number): number {
    const composite =
      textScore * CONFUSION_FACTORS.text + visualScore * CONFUSION_FACTORS.visual + productScore * CONFUSION_FACTORS.product;
    return composite * CONFUSION_FACTORS.dampening;
  }

  static determineTier(overallScore: number): Tier {
    if (overallScore >= TIER_THRESHOLDS.high) return 'HIGH';
    if (overallScore >= TIER_THRESHOLDS.moderate) return 'MODERATE';
    return 'LOW';
  }

  private static bandScore(similarity: number, bands: readonly SimilarityBand[]): number {
    const band = bands.find((b) => similarity > b.above);
    return band ? similarity * band.multiplier : 0;
  }

  /**
   * Independently rounded copy for display; may not sum to the overall score
   */
  private static toDisplayBreakdown(components: ScoreComponents): ScoreBreakdown {
    return Object.freeze({
      textScore: roundHalfEven(components.textScore),
      visualScore: roundHalfEven(components.visualScore),
      productScore: roundHalfEven(components.productScore),
      confusionScore: roundHalfEven(components.confusionScore),
      weightedText: roundHalfEven(components.weightedText),
      weightedVisual: roundHalfEven(components.weightedVisual),
      weightedProduct: roundHalfEven(components.weightedProduct),
      weightedConfusion: roundHalfEven(components.weightedConfusion),
    });
  }
}
