import type { TitleHeuristics } from '../types.js';

const LEADING_TAGS = /^(?:\s*\[[^\]]*\]\s*)+/;
const ANNOUNCEMENT_PREFIX = /^(?:dibuka\b[\s,:]*)?(?:pendaftaran\b[\s,:]*)?/i;
const DUPLICATED_YEAR = /\b(\d{4})\s*\/\s*\1\b/g;
const BRACKETED_TITLE = /\[([^\]]{15,120})\]/;

/**
 * Strip announcement noise from a title: leading [TAGS], a leading
 * "Dibuka Pendaftaran", and a doubled year such as "2025/2025".
 */
export function cleanTitle(raw: string | null | undefined): string {
  if (!raw) {
    return '';
  }
  if (typeof raw !== 'string') {
    throw new TypeError(`cleanTitle expects a string, got ${typeof raw}`);
  }

  return raw
    .trim()
    .replace(LEADING_TAGS, '')
    .replace(ANNOUNCEMENT_PREFIX, '')
    .replace(LEADING_TAGS, '')
    .replace(DUPLICATED_YEAR, '$1')
    .replace(/\s+/g, ' ')
    .trim();
}

// Title case as in "Lomba Esai Nasional": an uppercase letter may only start
// a run of letters, a lowercase one may only continue it.
function isTitleCase(text: string): boolean {
  let hasLetters = false;
  let previousIsLetter = false;

  for (const char of text) {
    const isUpper = char !== char.toLowerCase();
    const isLower = char !== char.toUpperCase();

    if (isUpper) {
      if (previousIsLetter) return false;
      previousIsLetter = true;
      hasLetters = true;
    } else if (isLower) {
      if (!previousIsLetter) return false;
      previousIsLetter = true;
      hasLetters = true;
    } else {
      previousIsLetter = false;
    }
  }

  return hasLetters;
}

function isShouting(word: string): boolean {
  return word.length > 3 && word === word.toUpperCase() && word !== word.toLowerCase();
}

/**
 * Score how much a caption line looks like an event title. Positive scores
 * are candidates, higher is better.
 */
export function scoreLineAsTitle(line: string, heuristics: TitleHeuristics): number {
  const lower = line.toLowerCase();
  const words = line.split(/\s+/).filter(Boolean);
  let score = 0;

  if (heuristics.noisePhrases.some(phrase => lower.includes(phrase.toLowerCase()))) {
    score -= 100;
  }

  if (heuristics.linePrefixes.some(prefix => lower.startsWith(prefix.toLowerCase()))) {
    score -= 50;
  }

  if (words.length < 3) {
    score -= 20;
  }

  if (line.length > 150) {
    score -= 20;
  }

  if (line.length >= 15 && line.length <= 120) {
    score += 30;
  }

  if (words.length > 2 && isTitleCase(line)) {
    score += 50;
  }

  if (heuristics.eventKeywords.some(keyword => lower.includes(keyword.toLowerCase()))) {
    score += 40;
  }

  if (words.some(isShouting)) {
    score += 20;
  }

  return score;
}

/**
 * Pick a title out of a social-media caption. An explicit [bracketed title]
 * wins outright; otherwise the best-scoring line is cleaned and returned.
 */
export function extractTitleFromCaption(caption: string | null | undefined, heuristics: TitleHeuristics): string {
  if (!caption) {
    return '';
  }
  if (typeof caption !== 'string') {
    throw new TypeError(`extractTitleFromCaption expects a string, got ${typeof caption}`);
  }

  const lines = caption
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);

  for (const line of lines) {
    const bracketed = BRACKETED_TITLE.exec(line);
    if (bracketed) {
      const content = bracketed[1].trim();
      if (scoreLineAsTitle(content, heuristics) > 0) {
        return content;
      }
    }
  }

  const candidates = lines
    .map((line, index) => ({ line, index, score: scoreLineAsTitle(line, heuristics) }))
    .filter(candidate => candidate.score > 0)
    .sort((a, b) => b.score - a.score || a.index - b.index);

  return candidates.length > 0 ? cleanTitle(candidates[0].line) : '';
}
