/**
 * QA-artifact signatures: text shapes that show a snippet was lifted from an
 * already-answered exam item (option lists, answer keys, explanations).
 *
 * The runtime evidence gate and the offline audit/filter both read this table,
 * so audited leakage rates match what the gate drops at run time.
 */

export interface NamedPattern {
  name: string;
  pattern: RegExp;
}

export const QA_ARTIFACT_PATTERNS: readonly NamedPattern[] = [
  { name: 'option_label', pattern: /\bOption\s*[A-E]\s*:/i },
  { name: 'options_header', pattern: /\bOptions?\s*:/i },
  { name: 'answer_header', pattern: /\bAnswer\s*:/i },
  { name: 'correct_answer_header', pattern: /\bCorrect\s*answer\s*:/i },
  { name: 'explanation_header', pattern: /\bExplanation\s*:/i },
  { name: 'paren_choice', pattern: /\([A-E]\)/ },
  { name: 'choice_line', pattern: /^\s*[A-E]\s*[.)]\s+/im },
];

export function normalizeWhitespace(text: string): string {
  return (text || '').trim().replace(/\s+/g, ' ');
}

export function matchesAny(text: string, patterns: readonly (RegExp | NamedPattern)[]): boolean {
  return patterns.some(p => (p instanceof RegExp ? p : p.pattern).test(text || ''));
}

export function hasArtifact(text: string): boolean {
  return matchesAny(text, QA_ARTIFACT_PATTERNS);
}

/** Names of every artifact pattern the text trips, in table order. */
export function artifactHitNames(text: string): string[] {
  return QA_ARTIFACT_PATTERNS.filter(p => p.pattern.test(text || '')).map(p => p.name);
}

/**
 * Lowercase alphanumeric form used when comparing question texts from
 * different sources: curly quotes folded, degree signs spelled out,
 * everything else collapsed to single spaces.
 */
export function normalizeForComparison(text: string): string {
  return (text || '')
    .trim()
    .toLowerCase()
    .replace(/’/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/°/g, ' degrees ')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .replace(/\s+/g, ' ');
}

interface Match {
  a: number;
  b: number;
  size: number;
}

function longestCommonBlock(a: string, aLo: number, aHi: number, b: string, bLo: number, bHi: number): Match {
  let best: Match = { a: aLo, b: bLo, size: 0 };
  let prev = new Array<number>(bHi - bLo + 1).fill(0);
  for (let i = aLo; i < aHi; i++) {
    const cur = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const len = prev[j - bLo] + 1;
      cur[j - bLo + 1] = len;
      if (len > best.size) {
        best = { a: i - len + 1, b: j - len + 1, size: len };
      }
    }
    prev = cur;
  }
  return best;
}

/**
 * Gestalt similarity in [0, 1]: twice the characters covered by recursively
 * found longest common blocks, over the combined length.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;

  let matched = 0;
  const ranges: [number, number, number, number][] = [[0, a.length, 0, b.length]];
  while (ranges.length > 0) {
    const range = ranges.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const m = longestCommonBlock(a, aLo, aHi, b, bLo, bHi);
    if (m.size === 0) continue;
    matched += m.size;
    ranges.push([aLo, m.a, bLo, m.b], [m.a + m.size, aHi, m.b + m.size, bHi]);
  }
  return (2 * matched) / total;
}

/**
 * Pull the question text out of an `instances.input` provenance string
 * ("QUESTION: ... Option A: ..."). Empty when there is no QUESTION: header.
 */
export function extractQuestionSection(input: string): string {
  const match = /QUESTION:\s*([\s\S]*?)(?:\nOption\s*[A-E]\s*:|\nOptions?\s*:|$)/i.exec(input || '');
  if (!match) return '';
  return match[1].trim().replace(/^"+|"+$/g, '').trim();
}
