/**
 * Typo Variant Generator
 * Produces single-edit typosquatting candidates for a domain label
 * All functions are atomic (max 25 lines)
 */

export interface DomainParts {
  /** Registrable label, e.g. "example" */
  label: string;
  /** Everything after the first dot, e.g. "co.uk"; empty for a bare label */
  suffix: string;
}

/**
 * Generate every label one deletion or one adjacent transposition away.
 * Characters are code points; nothing is validated against a hostname charset.
 * Insertions and keyboard-adjacent substitutions are not generated.
 */
export function generateTypoVariants(label: string): string[] {
  const chars = Array.from(label);
  const variants = new Set<string>();

  for (const variant of deletionVariants(chars)) variants.add(variant);
  for (const variant of transpositionVariants(chars)) variants.add(variant);

  return [...variants];
}

/** Remove one character at each position, dropping empty results */
function deletionVariants(chars: string[]): string[] {
  const results: string[] = [];
  for (let i = 0; i < chars.length; i++) {
    const variant = [...chars.slice(0, i), ...chars.slice(i + 1)].join('');
    if (variant) results.push(variant);
  }
  return results;
}

/** Swap each pair of neighbouring characters */
function transpositionVariants(chars: string[]): string[] {
  const results: string[] = [];
  for (let i = 0; i < chars.length - 1; i++) {
    const swapped = [...chars];
    [swapped[i], swapped[i + 1]] = [swapped[i + 1], swapped[i]];
    results.push(swapped.join(''));
  }
  return results;
}

/**
 * Normalise a user-supplied domain or URL and split it at the first dot.
 * "https://www.Example.co.uk/path" → { label: "example", suffix: "co.uk" }
 */
export function splitDomain(input: string): DomainParts {
  const host = input
    .trim()
    .toLowerCase()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//, '')
    .split(/[/?#]/)[0]
    .replace(/:\d+$/, '')
    .replace(/^www\./, '')
    .replace(/\.$/, '');

  const dot = host.indexOf('.');
  if (dot === -1) return { label: host, suffix: '' };
  return { label: host.slice(0, dot), suffix: host.slice(dot + 1) };
}

/** Re-attach a suffix to a label */
export function joinDomain(label: string, suffix: string): string {
  return suffix ? `${label}.${suffix}` : label;
}
