/**
 * Report Synthesizer
 * Renders a brand infringement report as Markdown. Pure: the clock and score are inputs.
 */

import { BrandReportRequest, SimilaritySignals } from '../lib/schemas.js';
import { BrandReport, EvidenceScoreResult } from '../lib/types.js';
import { formatCompactTimestamp, formatIsoDate } from '../lib/date-format.js';
import { TIER_LABELS } from '../analysis/evidence-config.js';
import {
  CLASSIFICATION_CRITERIA,
  DEFAULT_ANALYST,
  LOGO_CONFIRMED,
  LOGO_NOT_CONFIRMED,
  METHODOLOGY_LINES,
  NO_ADDITIONAL_EVIDENCE,
  RECOMMENDATIONS,
  REPORT_FOOTER,
  REPORT_TITLE,
} from './report-templates.js';

/** Signals the scorer needs, taken from the report's evidence sections */
export function toSimilaritySignals(request: BrandReportRequest): SimilaritySignals {
  return {
    textSimilarity: request.textAnalysis.similarityScore,
    visualSimilarity: request.visualAnalysis.similarityScore,
    brandMentions: request.textAnalysis.brandMentions,
    logoUsage: request.visualAnalysis.logoPresent,
    productSimilarity: request.visualAnalysis.productSimilarity,
  };
}

export function buildCaseId(brand: string, now: Date): string {
  return `${brand.toUpperCase()}-${formatCompactTimestamp(now)}`;
}

/**
 * Default filename, or the caller's own with `.md` appended when missing
 */
/** Last path segment only, restricted to [A-Za-z0-9._-], without leading dots */
function toSafeFilename(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? '';
  return base.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '');
}

export function buildReportFilename(brand: string, now: Date, customFilename?: string): string {
  const custom = customFilename ? toSafeFilename(customFilename) : '';
  if (custom) {
    return custom.endsWith('.md') ? custom : `${custom}.md`;
  }
  const safeBrand = brand.replace(/[^A-Za-z0-9_-]/g, '_');
  return `brand_infringement_report_${safeBrand}_${formatCompactTimestamp(now)}.md`;
}

function cell(value: string | number): string {
  return String(value).replace(/\|/g, '\\|');
}

function bullets(lines: readonly string[]): string {
  return lines.map((line) => `* ${line}`).join('\n');
}

export function synthesizeBrandReport(
  request: BrandReportRequest,
  score: EvidenceScoreResult,
  now: Date,
  analyst: string = DEFAULT_ANALYST
): BrandReport {
  const caseId = buildCaseId(request.originalBrand, now);
  const date = formatIsoDate(now);

  const sections = [
    buildHeader(caseId, date, analyst),
    buildExecutiveSummary(request, score),
    buildSubjectDetails(request, date),
    buildEvidenceCollection(request),
    buildObjectiveAnalysis(request, score),
    buildEvidenceAssessment(score),
    buildRecommendations(score),
    `---\n\n${REPORT_FOOTER}`,
  ];

  return Object.freeze({
    caseId,
    filename: buildReportFilename(request.originalBrand, now, request.customFilename),
    content: `${sections.join('\n\n')}\n`,
    tier: score.tier,
    overallScore: score.overallScore,
    generatedAt: now,
  });
}

function buildHeader(caseId: string, date: string, analyst: string): string {
  // Trailing double spaces are Markdown line breaks
  return [REPORT_TITLE, '', `**CASE ID:** ${caseId}  `, `**DATE:** ${date}  `, `**ANALYST:** ${analyst}  `].join('\n');
}

function buildExecutiveSummary(request: BrandReportRequest, score: EvidenceScoreResult): string {
  return `## 1. EXECUTIVE SUMMARY

This report presents findings from an investigation into potential brand usage by **${request.suspectedUrl}** in relation to the **${request.originalBrand}** brand. This analysis follows a zero-trust methodology where no infringement is assumed unless conclusively proven with direct evidence.

The investigation has calculated an **Evidence-Based Score of ${score.overallScore}/100**, indicating ${score.evidenceLevel} EVIDENCE of brand usage that may warrant further investigation.`;
}

function buildSubjectDetails(request: BrandReportRequest, date: string): string {
  return `## 2. SUBJECT DETAILS

| Original Brand | Website Under Analysis |
|----------------|---------------------------|
| Brand Name: **${cell(request.originalBrand)}** | Site URL: **${cell(request.suspectedUrl)}** |
| Official URL: **${cell(request.originalUrl)}** | Analysis Date: **${date}** |`;
}

function buildEvidenceCollection(request: BrandReportRequest): string {
  const text = request.textAnalysis;
  const visual = request.visualAnalysis;

  return `## 3. EVIDENCE COLLECTION

### 3.1 Textual Evidence

${bullets([
  `**Exact Brand Name Matches:** ${text.brandMentions} verified instances of "${request.originalBrand}" found`,
  `**Context of Mentions:** ${text.context}`,
  `**Product Description Matches:** ${text.productDescriptions}`,
  `**Meta Tag Analysis:** ${text.metaTags}`,
])}

### 3.2 Visual Evidence

${bullets([
  `**Verified Logo Usage:** ${visual.logoPresent ? LOGO_CONFIRMED : LOGO_NOT_CONFIRMED}`,
  `**Color Scheme Analysis:** ${visual.colorScheme}`,
  `**Layout Comparison:** ${visual.layoutSimilarity}`,
  `**Product Image Analysis:** ${visual.productImageAnalysis}`,
])}

### 3.3 Additional Evidence

${request.additionalEvidence || NO_ADDITIONAL_EVIDENCE}`;
}

function buildObjectiveAnalysis(request: BrandReportRequest, score: EvidenceScoreResult): string {
  return `## 4. OBJECTIVE ANALYSIS

### 4.1 Pattern Identification

${request.textAnalysis.patternAnalysis}

### 4.2 Factual Observations

${request.textAnalysis.intentIndicators}

### 4.3 Potential for Consumer Confusion

Based solely on verified evidence, the potential for consumer confusion is assessed as ${TIER_LABELS[score.tier].confusion}.`;
}

function buildEvidenceAssessment(score: EvidenceScoreResult): string {
  const b = score.scoreBreakdown;
  const t = score.evidenceThresholds;

  return `## 5. EVIDENCE ASSESSMENT

### 5.1 Zero-Trust Scoring Methodology

The evidence score is calculated using a zero-trust methodology with very high thresholds for evidence:
${bullets(METHODOLOGY_LINES)}

### 5.2 Evidence Score Breakdown

| Factor | Weight | Evidence Rating | Weighted Score |
|--------|--------|-----------|---------------|
| Brand Name Usage | 25% | ${b.textScore}/100 | ${b.weightedText} |
| Visual Similarity | 35% | ${b.visualScore}/100 | ${b.weightedVisual} |
| Product Similarity | 20% | ${b.productScore}/100 | ${b.weightedProduct} |
| Consumer Confusion | 20% | ${b.confusionScore}/100 | ${b.weightedConfusion} |
| **TOTAL** | **100%** | | **${score.overallScore}/100** |

### 5.3 Evidence Classification

**Evidence Level:** ${score.evidenceLevel}

**Classification Criteria:**
${bullets(CLASSIFICATION_CRITERIA)}

### 5.4 Evidence Thresholds Applied

${bullets([
  `**Text Analysis Threshold:** ${t.textThreshold}`,
  `**Visual Analysis Threshold:** ${t.visualThreshold}`,
  `**Logo Detection Threshold:** ${t.logoThreshold}`,
  `**Product Similarity Threshold:** ${t.productThreshold}`,
])}`;
}

function buildRecommendations(score: EvidenceScoreResult): string {
  return `## 6. RECOMMENDATIONS

Based on the objective analysis and evidence score of **${score.overallScore}/100**, the following actions are recommended:

${bullets(RECOMMENDATIONS[score.tier])}`;
}
