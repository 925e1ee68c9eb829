import { describe, it, expect, vi } from 'vitest';

vi.mock('../lib/logger.js', () => ({
  engineLogger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), audit: vi.fn() },
}));

const { EvidenceScorer, roundHalfEven } = await import('./evidence-scorer.js');

describe('EvidenceScorer', () => {
  describe('No Evidence', () => {
    it('should score all-zero signals as 0 and LOW', () => {
      const result = EvidenceScorer.score({
        textSimilarity: 0,
        visualSimilarity: 0,
        brandMentions: 0,
        logoUsage: false,
        productSimilarity: 0,
      });

      expect(result.overallScore).toBe(0);
      expect(result.tier).toBe('LOW');
      expect(result.evidenceLevel).toBe('INSUFFICIENT');
      expect(Object.values(result.scoreBreakdown).every((v) => v === 0)).toBe(true);
    });

    it('should treat absent fields as zero', () => {
      expect(EvidenceScorer.score({})).toEqual(
        EvidenceScorer.score({
          textSimilarity: 0,
          visualSimilarity: 0,
          brandMentions: 0,
          logoUsage: false,
          productSimilarity: 0,
        })
      );
    });
  });

  describe('Near-Saturating Evidence', () => {
    const result = EvidenceScorer.score({
      brandMentions: 30,
      textSimilarity: 96,
      visualSimilarity: 96,
      logoUsage: true,
      productSimilarity: 96,
    });

    it('should take the similarity score over the capped mention score', () => {
      expect(result.components.textScore).toBeCloseTo(76.8, 10);
    });

    it('should clamp visual score after the logo bonus', () => {
      expect(result.components.visualScore).toBe(100);
    });

    it('should compute product and confusion scores', () => {
      expect(result.components.productScore).toBeCloseTo(76.8, 10);
      expect(result.components.confusionScore).toBeCloseTo(61.88, 10);
    });

    it('should weight each component', () => {
      expect(result.components.weightedText).toBeCloseTo(19.2, 10);
      expect(result.components.weightedVisual).toBeCloseTo(35, 10);
      expect(result.components.weightedProduct).toBeCloseTo(15.36, 10);
      expect(result.components.weightedConfusion).toBeCloseTo(12.376, 10);
    });

    it('should round the combined sum to 82 and classify HIGH', () => {
      expect(result.overallScore).toBe(82);
      expect(result.tier).toBe('HIGH');
      expect(result.evidenceLevel).toBe('STRONG');
    });

    it('should round the display breakdown field by field', () => {
      expect(result.scoreBreakdown).toEqual({
        textScore: 77,
        visualScore: 100,
        productScore: 77,
        confusionScore: 62,
        weightedText: 19,
        weightedVisual: 35,
        weightedProduct: 15,
        weightedConfusion: 12,
      });
    });

    it('should keep the display breakdown independent of the overall score', () => {
      const b = result.scoreBreakdown;
      expect(b.weightedText + b.weightedVisual + b.weightedProduct + b.weightedConfusion).toBe(81);
    });
  });

  describe('Moderate Evidence', () => {
    it('should classify strong mentions plus a copied logo as MODERATE', () => {
      const result = EvidenceScorer.score({ brandMentions: 30, visualSimilarity: 96, logoUsage: true });

      expect(result.components.textScore).toBe(70);
      expect(result.components.confusionScore).toBeCloseTo(49.7, 10);
      expect(result.overallScore).toBe(62);
      expect(result.tier).toBe('MODERATE');
      expect(result.evidenceLevel).toBe('POTENTIAL');
    });

    it('should keep a single strong visual signal LOW', () => {
      const result = EvidenceScorer.score({ visualSimilarity: 100 });

      expect(result.components.visualScore).toBeCloseTo(90, 10);
      expect(result.components.confusionScore).toBeCloseTo(31.5, 10);
      expect(result.overallScore).toBe(38);
      expect(result.tier).toBe('LOW');
    });
  });

  describe('mentionScore', () => {
    it.each([
      [0, 0],
      [1, 10],
      [2, 20],
      [4, 20],
      [5, 35],
      [9, 35],
      [10, 50],
      [24, 50],
      [25, 70],
      [1000, 70],
    ])('should score %i mentions as %i', (mentions, expected) => {
      expect(EvidenceScorer.mentionScore(mentions)).toBe(expected);
    });
  });

  describe('textSimilarityScore', () => {
    it.each([
      [0, 0],
      [75, 0],
      [80, 8],
      [85, 8.5],
      [90, 27],
      [95, 28.5],
      [96, 76.8],
      [100, 80],
    ])('should score similarity %d as %d', (similarity, expected) => {
      expect(EvidenceScorer.textSimilarityScore(similarity)).toBeCloseTo(expected, 10);
    });
  });

  describe('visualScore', () => {
    it.each([
      [70, false, 0],
      [75, false, 7.5],
      [85, false, 25.5],
      [92, false, 46],
      [96, false, 86.4],
      [100, false, 90],
      [0, true, 20],
      [85, true, 45.5],
      [100, true, 100],
    ])('should score similarity %d (logo %s) as %d', (similarity, logo, expected) => {
      expect(EvidenceScorer.visualScore(similarity, logo)).toBeCloseTo(expected, 10);
    });
  });

  describe('productScore', () => {
    it.each([
      [80, 0],
      [85, 17],
      [92, 36.8],
      [96, 76.8],
    ])('should score similarity %d as %d', (similarity, expected) => {
      expect(EvidenceScorer.productScore(similarity)).toBeCloseTo(expected, 10);
    });
  });

  describe('adjustedTextScore', () => {
    it('should take the maximum rather than the sum', () => {
      expect(EvidenceScorer.adjustedTextScore(30, 90)).toBe(70);
      expect(EvidenceScorer.adjustedTextScore(1, 90)).toBeCloseTo(27, 10);
    });
  });

  describe('Monotonicity', () => {
    const sweep = (from: number, to: number, fn: (v: number) => number): number[] => {
      const values: number[] = [];
      for (let v = from; v <= to; v += 0.5) values.push(fn(v));
      return values;
    };
    const nonDecreasing = (values: number[]): boolean => values.every((v, i) => i === 0 || v >= values[i - 1]);

    it('should never decrease text score within a band', () => {
      expect(nonDecreasing(sweep(85.5, 95, (v) => EvidenceScorer.textSimilarityScore(v)))).toBe(true);
      expect(nonDecreasing(sweep(95.5, 100, (v) => EvidenceScorer.textSimilarityScore(v)))).toBe(true);
    });

    it('should never decrease visual score within a band', () => {
      expect(nonDecreasing(sweep(80.5, 90, (v) => EvidenceScorer.visualScore(v, false)))).toBe(true);
      expect(nonDecreasing(sweep(90.5, 95, (v) => EvidenceScorer.visualScore(v, true)))).toBe(true);
    });

    it('should never decrease product score within a band', () => {
      expect(nonDecreasing(sweep(90.5, 95, (v) => EvidenceScorer.productScore(v)))).toBe(true);
    });

    it('should never decrease mention score', () => {
      const scores = Array.from({ length: 40 }, (_, m) => EvidenceScorer.mentionScore(m));
      expect(nonDecreasing(scores)).toBe(true);
    });
  });

  describe('determineTier', () => {
    it.each([
      [0, 'LOW'],
      [49, 'LOW'],
      [50, 'MODERATE'],
      [79, 'MODERATE'],
      [80, 'HIGH'],
      [100, 'HIGH'],
    ])('should classify %i as %s', (score, tier) => {
      expect(EvidenceScorer.determineTier(score)).toBe(tier);
    });
  });

  describe('Purity', () => {
    it('should return identical results for identical inputs', () => {
      const signals = { textSimilarity: 88, visualSimilarity: 93, brandMentions: 7, logoUsage: false, productSimilarity: 91 };
      expect(EvidenceScorer.score(signals)).toEqual(EvidenceScorer.score(signals));
    });

    it('should freeze the breakdowns it returns', () => {
      const result = EvidenceScorer.score({ textSimilarity: 99 });
      expect(Object.isFrozen(result.scoreBreakdown)).toBe(true);
      expect(Object.isFrozen(result.components)).toBe(true);
    });

    it('should attach the fixed evidence thresholds', () => {
      expect(EvidenceScorer.score({}).evidenceThresholds).toEqual({
        textThreshold: '95% for high confidence, 85% for moderate confidence',
        visualThreshold: '95% for high confidence, 90% for moderate confidence',
        logoThreshold: 'Exact matches only',
        productThreshold: '95% for high confidence, 90% for moderate confidence',
      });
    });
  });
});

describe('roundHalfEven', () => {
  it.each([
    [0.5, 0],
    [1.5, 2],
    [2.5, 2],
    [3.5, 4],
    [1.4999, 1],
    [81.936, 82],
    [62.44, 62],
  ])('should round %d to %i', (value, expected) => {
    expect(roundHalfEven(value)).toBe(expected);
  });
});
