/**
 * DMCA Notice Builder
 * Renders a takedown notice from a validated request
 */

import { DmcaNoticeRequest } from '../lib/schemas.js';
import { DmcaNotice } from '../lib/types.js';
import { formatCompactTimestamp, formatLongDate } from '../lib/date-format.js';

/**
 * Host part of a URL: scheme and a leading `www.` removed, path, query and fragment dropped
 */
export function extractDomain(url: string): string {
  const host = url
    .trim()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//i, '')
    .replace(/^www\./i, '')
    .split(/[/?#]/)[0];
  return host || url.trim();
}

function defaultWorkDescription(request: DmcaNoticeRequest): string {
  return (
    `The original copyrighted work is the '${request.brandName}' brand, including its name, logo, ` +
    `product designs, and associated elements as displayed on ${request.originalUrl}.`
  );
}

export function buildDmcaNotice(request: DmcaNoticeRequest, now: Date): DmcaNotice {
  const infringingDomain = extractDomain(request.infringingUrl);
  const workDescription = request.originalWorkDescription ?? defaultWorkDescription(request);
  const safeDomain = infringingDomain.replace(/[^A-Za-z0-9._-]/g, '_');

  const content = `# DMCA TAKEDOWN NOTICE

**Date:** ${formatLongDate(now)}

**VIA EMAIL**

**RE: Copyright Infringement Notice - ${request.brandName}**

To Whom It May Concern:

This letter serves as notification under the Digital Millennium Copyright Act (DMCA), 17 USC § 512(c)(3)(A) that the following copyright infringement has occurred. I request that you immediately remove or disable access to the infringing material as described below.

## 1. Contact Information

**Copyright Owner:** ${request.copyrightOwner}
**Represented by:** ${request.contactName}
**Email:** ${request.contactEmail}
**Phone:** ${request.contactPhone}
**Address:** ${request.contactAddress}

## 2. Identification of Copyrighted Work

${workDescription}

## 3. Identification of Infringing Material

The unauthorized and infringing copy of this material can be found at:
${request.infringingUrl}

## 4. Specific Description of Infringement

${request.infringementDetails}

## 5. Good Faith Statement

I have a good faith belief that the use of the material in the manner complained of is not authorized by the copyright owner, its agent, or the law.

## 6. Accuracy Statement

Under penalty of perjury, I state that the information in this notification is accurate, and I am authorized to act on behalf of the owner of the exclusive right that is allegedly infringed.

## 7. Fair Use Statement

I have taken into consideration fair use aspects before sending this notice.

## 8. Request for Removal

I respectfully ask that you immediately remove or disable access to the infringing material identified above. Please notify me when this action has been taken.

Sincerely,

${request.contactName}
${request.copyrightOwner}
${request.contactEmail}
${request.contactPhone}
`;

  return Object.freeze({
    filename: `dmca_notice_${safeDomain}_${formatCompactTimestamp(now)}.md`,
    content,
    infringingDomain,
  });
}
