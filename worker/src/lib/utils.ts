import { createHash } from 'crypto';

export interface HashInput {
  title: string;
  deadline: Date | null;
  url?: string | null;
}

/**
 * Stable deduplication key for a canonical record.
 */
export function generateContentHash(input: HashInput): string {
  const hashData = {
    title: normalizeText(input.title),
    deadline: input.deadline ? input.deadline.toISOString() : null,
    url: input.url?.trim() ?? '',
  };

  const hashString = JSON.stringify(hashData, Object.keys(hashData).sort());
  return createHash('sha256').update(hashString).digest('hex').substring(0, 16);
}

export function normalizeText(text?: string | null): string {
  if (!text) return '';
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ') // Remove special chars
    .replace(/\s+/g, ' ')              // Collapse whitespace
    .trim();
}

const ONLINE_PATTERN = /(?<![\p{L}\p{N}_])(?:online|daring)(?![\p{L}\p{N}_])/iu;
const OFFLINE_PATTERN = /(?<![\p{L}\p{N}_])(?:offline|luring)(?![\p{L}\p{N}_])/iu;

/**
 * Online when the text says "online"/"daring", offline for "offline"/"luring",
 * otherwise whatever the collector reported.
 */
export function detectOnline(text: string, fallback: boolean | null | undefined): boolean | null {
  if (ONLINE_PATTERN.test(text)) return true;
  if (OFFLINE_PATTERN.test(text)) return false;
  return fallback ?? null;
}

export function emptyToNull(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
