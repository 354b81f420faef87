// Entity extraction
// Pulls names, ids, dates and payload hints out of a request. Never throws; what
// cannot be recognised is simply left out of the bag.

import type { EntityBag, Requester } from '../assistant/types.js';
import { EXPENSE_CATEGORIES, WORK_ORDER_PRIORITIES } from '../finance-store.js';
import { findDates, findMonthRange } from './dates.js';
import { NAME_STOP_WORDS } from './lexicon.js';

const EMPLOYEE_ID_REGEX = /\b[Ee](\d{3,})\b/;
const SELF_REFERENCE_REGEX = /\b(?:I|[Mm]e|[Mm]y|[Mm]ine|[Mm]yself)\b/;
const EMAIL_REGEX = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const CAPITALISED_RUN_REGEX = /\b[A-Z][a-z]+(?:[-'][A-Z][a-z]+)?(?:\s+[A-Z][a-z]+(?:[-'][A-Z][a-z]+)?)+/g;
const DEPARTMENT_REGEX = /\b([A-Za-z]+)\s+(?:department|dept\.?|team)\b|\bdepartment\s+(?:of\s+)?([A-Za-z]+)\b/i;
const PRIORITY_REGEX = /\b(low|medium|high|urgent)(?:\s+priority)?\b/i;
const QUOTED_REGEX = /["“]([^"”]{3,120})["”]/;
const ABOUT_REGEX = /\b(?:about|regarding|re:|titled|subject(?: line)?:?)\s+(.{3,120}?)(?:[.?!;]|\s+(?:and|then)\s+(?:send|email|create|open)\b|$)/i;

const CATEGORY_ALIASES: Record<string, string> = {
  meal: 'meals',
  dining: 'meals',
  trip: 'travel',
  travelling: 'travel',
  traveling: 'travel',
  supplies: 'office',
  course: 'training',
  courses: 'training',
};

const capitalise = (word: string) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();

export function extractEmployeeName(text: string): string | undefined {
  for (const match of text.matchAll(CAPITALISED_RUN_REGEX)) {
    const words = match[0].split(/\s+/);
    // Trim stop words at either end: "Show Alice Chen" → "Alice Chen"
    while (words.length > 0 && NAME_STOP_WORDS.has(words[0].toLowerCase())) words.shift();
    while (words.length > 0 && NAME_STOP_WORDS.has(words[words.length - 1].toLowerCase())) words.pop();
    if (words.length >= 2 && words.every(w => !NAME_STOP_WORDS.has(w.toLowerCase()))) {
      return words.join(' ');
    }
  }
  return undefined;
}

function extractDepartment(text: string): string | undefined {
  const match = text.match(DEPARTMENT_REGEX);
  const word = match ? (match[1] ?? match[2]) : undefined;
  if (!word || ['the', 'my', 'our', 'your', 'this', 'that', 'a'].includes(word.toLowerCase())) {
    return undefined;
  }
  return capitalise(word);
}

function extractCategory(text: string): string | undefined {
  const lower = text.toLowerCase();
  for (const word of lower.split(/[^a-z]+/)) {
    if (EXPENSE_CATEGORIES.includes(word)) return word;
    const alias = CATEGORY_ALIASES[word];
    if (alias) return alias;
  }
  return undefined;
}

function extractPriority(text: string): string | undefined {
  const match = text.match(PRIORITY_REGEX);
  if (!match) return undefined;
  const value = match[1].toLowerCase();
  // bare "high"/"low" are too common to mean priority on their own
  if (value !== 'urgent' && !/priority/i.test(match[0])) return undefined;
  return WORK_ORDER_PRIORITIES.find(p => p === value);
}

export function extractSubject(text: string): string | undefined {
  const quoted = text.match(QUOTED_REGEX);
  if (quoted) return quoted[1].trim();

  const about = text.match(ABOUT_REGEX);
  if (about) return about[1].trim();

  const trimmed = text.trim().replace(/\s+/g, ' ');
  if (!trimmed) return undefined;
  return trimmed.length > 160 ? `${trimmed.slice(0, 157)}...` : trimmed;
}

export function extractDateRange(text: string, now: Date): { startDate?: string; endDate?: string } {
  const dates = findDates(text);
  if (dates.length >= 2) {
    const [a, b] = dates;
    return a <= b ? { startDate: a, endDate: b } : { startDate: b, endDate: a };
  }
  if (dates.length === 1) {
    return { startDate: dates[0], endDate: dates[0] };
  }

  const range = findMonthRange(text, now);
  return range ? { startDate: range.start, endDate: range.end } : {};
}

export function extractEntities(text: string, now: Date = new Date()): EntityBag {
  const idMatch = text.match(EMPLOYEE_ID_REGEX);
  const recipient = text.match(EMAIL_REGEX)?.[0];

  const bag: EntityBag = {
    employeeName: extractEmployeeName(text),
    employeeId: idMatch ? `E${idMatch[1]}` : undefined,
    department: extractDepartment(text),
    ...extractDateRange(text, now),
    subject: extractSubject(text),
    recipient: recipient?.toLowerCase(),
    priority: extractPriority(text),
    category: extractCategory(text),
  };

  return compactEntities(bag);
}

/** Drops undefined and empty values and freezes the bag. */
export function compactEntities(bag: EntityBag): EntityBag {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(bag)) {
    if (typeof value === 'string' && value.trim() !== '') out[key] = value.trim();
  }
  return Object.freeze(out);
}

/**
 * Makes the requester the employee of a first-person request ("my claims",
 * "did I spend") unless the request already names someone.
 */
export function applyRequester(bag: EntityBag, text: string, requester?: Requester): EntityBag {
  if (!requester || bag.employeeName || bag.employeeId || !SELF_REFERENCE_REGEX.test(text)) {
    return bag;
  }
  return compactEntities({
    ...bag,
    employeeId: requester.employeeId?.toUpperCase(),
    employeeName: requester.employeeName,
    department: bag.department ?? requester.department,
  });
}
