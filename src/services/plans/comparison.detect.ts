export interface ComparisonHint {
  isComparison: boolean;
  cues: string[];
  entities: string[];
}

const EXPLICIT_CUES: Array<{ cue: string; pattern: RegExp }> = [
  { cue: "compare", pattern: /\bcompar(?:e|es|ed|ing|ison)\b/i },
  { cue: "vs", pattern: /\bvs\.?(?=\s|$)/i },
  { cue: "versus", pattern: /\bversus\b/i },
  { cue: "difference between", pattern: /\bdifferences? between\b/i },
  { cue: "which is better", pattern: /\bwhich (?:is|one is) (?:better|faster|warmer|colder|bigger|more popular)\b/i },
  { cue: "better than", pattern: /\bbetter than\b/i },
  { cue: "contrast", pattern: /\bcontrast\b/i },
];

const SEPARATOR_PATTERN = /,|;|\band\b|\bor\b|\bvs\.?(?=\s|$)|\bversus\b|\bwith\b/i;

// Capitalised words that open a request rather than name something.
const LEADING_WORDS = new Set([
  "compare",
  "comparison",
  "contrast",
  "what",
  "what's",
  "whats",
  "which",
  "how",
  "is",
  "are",
  "show",
  "tell",
  "find",
  "get",
  "give",
  "list",
  "search",
  "summarize",
  "the",
  "i",
  "please",
]);

function isEntityToken(token: string): boolean {
  const word = token.replace(/^[("'`]+|[)"'`?!.:]+$/g, "");
  if (!word) {
    return false;
  }

  if (LEADING_WORDS.has(word.toLowerCase())) {
    return false;
  }

  return /^[A-Z]/.test(word) || /^\d+(?:[.,]\d+)?[a-zA-Z%]*$/.test(word);
}

function trailingEntity(segment: string): string | null {
  const tokens = segment.trim().split(/\s+/).filter((token) => token.length > 0);
  const collected: string[] = [];
  for (let index = tokens.length - 1; index >= 0; index -= 1) {
    if (!isEntityToken(tokens[index])) {
      break;
    }
    collected.unshift(tokens[index].replace(/^[("'`]+|[)"'`?!.:]+$/g, ""));
  }

  return collected.length > 0 ? collected.join(" ") : null;
}

/**
 * Looks for explicit comparison phrasing, or for two or more proper nouns
 * or quantities joined by list separators ("London, Paris and Berlin").
 * The result only biases the planner prompt.
 */
export function detectComparison(query: string): ComparisonHint {
  const text = String(query ?? "").trim();
  const cues = EXPLICIT_CUES
    .filter(({ pattern }) => pattern.test(text))
    .map(({ cue }) => cue);

  const seen = new Set<string>();
  const entities: string[] = [];
  const segments = text.split(SEPARATOR_PATTERN);
  if (segments.length > 1) {
    for (const segment of segments) {
      const entity = trailingEntity(segment);
      if (entity && !seen.has(entity.toLowerCase())) {
        seen.add(entity.toLowerCase());
        entities.push(entity);
      }
    }
  }

  const joinedEntities = entities.length >= 2;
  if (joinedEntities && cues.length === 0) {
    cues.push("joined entities");
  }

  return {
    isComparison: cues.length > 0,
    cues,
    entities: joinedEntities ? entities : [],
  };
}
