import type { RawEventRecord, RegistrationHints } from '../types.js';

const URL_PATTERN = /https?:\/\/[^\s<>"'`]+/gi;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}]+$/;
// @handle not preceded by a word character, so e-mail addresses do not match
const MENTION_PATTERN = /(?<![\w.])@([A-Za-z0-9_](?:[A-Za-z0-9_.]*[A-Za-z0-9_])?)/;
const CONTEXT_RADIUS = 50;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// keyword at the start of a word: "form" matches "formulir", not "informasi"
function startsWord(text: string, keyword: string): boolean {
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(keyword)}`, 'iu').test(text);
}

interface FoundUrl {
  url: string;
  index: number;
}

function findUrls(text: string): FoundUrl[] {
  const urls: FoundUrl[] = [];
  for (const match of text.matchAll(URL_PATTERN)) {
    const url = match[0].replace(TRAILING_PUNCTUATION, '');
    if (url.length > 'https://'.length) {
      urls.push({ url, index: match.index ?? 0 });
    }
  }
  return urls;
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return null;
  }
}

function onDomain(host: string | null, domains: string[]): boolean {
  if (!host) return false;
  return domains.some(domain => host === domain || host.endsWith(`.${domain}`));
}

function looksLikeRegistration(text: string, found: FoundUrl, hints: RegistrationHints): boolean {
  if (onDomain(hostOf(found.url), hints.shortenerDomains)) {
    return true;
  }

  const from = Math.max(0, found.index - CONTEXT_RADIUS);
  const to = found.index + found.url.length + CONTEXT_RADIUS;
  const context = text.slice(from, to);
  return hints.registrationKeywords.some(keyword => startsWord(context, keyword));
}

/**
 * Best registration link in a description: one near a registration keyword
 * or on a link shortener, else the first link that is not a social profile.
 */
export function findRegistrationUrl(description: string, hints: RegistrationHints): string | null {
  const urls = findUrls(description);
  if (urls.length === 0) return null;

  const registration = urls.find(found => looksLikeRegistration(description, found, hints));
  if (registration) return registration.url;

  const external = urls.find(found => !onDomain(hostOf(found.url), hints.socialDomains));
  return external ? external.url : null;
}

export function findMentionedHandle(description: string): string | null {
  const match = MENTION_PATTERN.exec(description);
  return match ? match[1] : null;
}

export function humanizeHandle(handle: string): string {
  return handle
    .split(/[._\-]+/)
    .filter(Boolean)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(' ');
}

function isPlaceholderOrganizer(organizer: string | undefined, hints: RegistrationHints): boolean {
  if (!organizer || !organizer.trim()) return true;
  const normalized = organizer.trim().toLowerCase();
  return hints.organizerPlaceholders.some(placeholder => placeholder.toLowerCase() === normalized);
}

function needsRegistrationUrl(record: RawEventRecord): boolean {
  const current = record.registrationUrl?.trim();
  if (!current) return true;
  // a registration link equal to the page it was scraped from carries no information
  return Boolean(record.url) && current === record.url?.trim();
}

/**
 * Fill a missing or low-quality registration URL and organizer from links
 * and @mentions in the description. Returns a new record.
 */
export function enhanceRegistrationInfo(record: RawEventRecord, hints: RegistrationHints): RawEventRecord {
  const description = record.description ?? '';
  if (!description.trim()) {
    return { ...record };
  }

  const enhanced: RawEventRecord = { ...record };

  if (needsRegistrationUrl(record)) {
    const url = findRegistrationUrl(description, hints);
    if (url) {
      enhanced.registrationUrl = url;
    }
  }

  if (isPlaceholderOrganizer(record.organizer, hints)) {
    const handle = findMentionedHandle(description);
    if (handle) {
      enhanced.organizer = humanizeHandle(handle);
      if (needsRegistrationUrl(enhanced)) {
        enhanced.registrationUrl = `${hints.profileUrlBase.replace(/\/+$/, '')}/${handle}/`;
      }
    }
  }

  return enhanced;
}
