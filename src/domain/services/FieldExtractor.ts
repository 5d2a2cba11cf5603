/**
 * Field Extractor - Resume text to structured fields
 *
 * A pipeline of small extractor functions. Each one is pure and total:
 * when a pattern is absent it returns UNKNOWN (or an empty list) rather
 * than a guessed default, so extraction as a whole never fails.
 *
 * Name extraction is a heuristic and is allowed to be wrong.
 */

import {
  UNKNOWN,
  type AvailabilityTag,
  type CandidateFields,
  type Hint,
  type TrainingTag,
  type Unknown,
  type VisaTag,
} from '../entities/Candidate.js';

// =============================================================================
// PATTERNS
// =============================================================================

export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;

// Optional +CC, then 2-4 / 3 / 4 digit groups: "+353 087 123 4567", "(555) 123-4567"
export const PHONE_PATTERN =
  /(?:\+\d{1,3}[-.\s]?)?\(?\d{2,4}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/;

const SECTION_HEADER =
  /^(?:personal statement|profile|summary|objective|(?:professional |work )?experience|work history|employment(?: history)?|education|skills|key skills|qualifications|certifications|training|references|availability|interests)\s*:?\s*$/i;

const EXPERIENCE_HEADER =
  /^(?:(?:professional |work )?experience|work history|employment(?: history)?)\s*:?\s*$/i;

const SKILLS_HEADER = /^(?:(?:key )?skills|qualifications)\s*:?\s*$/i;

const YEARS_PATTERN = /\b(\d{1,2})\s*\+?\s*(?:years?|yrs?)\b(?!\s+(?:old|of\s+age)\b)/gi;

const MAX_SUMMARY_CHARS = 500;
const MAX_YEARS = 60;
const NAME_SCAN_LINES = 5;

// =============================================================================
// VOCABULARIES (priority ordered: first matching entry wins)
// =============================================================================

export interface VocabularyEntry<T extends string> {
  tag: T;
  patterns: RegExp[];
}

export const AVAILABILITY_VOCABULARY: ReadonlyArray<VocabularyEntry<AvailabilityTag>> = [
  {
    tag: 'full',
    patterns: [
      /\bfull[\s-]?availability\b/i,
      /\bfully available\b/i,
      /\bany shifts?\b/i,
      /\bflexible hours\b/i,
      /\bfull[\s-]?time\b/i,
    ],
  },
  {
    tag: 'morning',
    patterns: [/\bmornings?\b/i, /\bearly shifts?\b/i, /\bbreakfast shifts?\b/i],
  },
  {
    tag: 'night',
    patterns: [/\bnights?\b/i, /\bevenings?\b/i, /\blate shifts?\b/i],
  },
];

export const VISA_VOCABULARY: ReadonlyArray<VocabularyEntry<VisaTag>> = [
  {
    tag: 'irish',
    patterns: [/\birish (?:citizen(?:ship)?|national|passport)\b/i],
  },
  {
    tag: 'eu',
    patterns: [/\b(?:eu|eea|european) (?:citizen(?:ship)?|national|passport)\b/i],
  },
  { tag: 'stamp_4', patterns: [/\bstamp\s*4\b/i] },
  { tag: 'stamp_1g', patterns: [/\bstamp\s*1\s*g\b/i] },
  { tag: 'stamp_2', patterns: [/\bstamp\s*2\b/i] },
  { tag: 'stamp_1', patterns: [/\bstamp\s*1\b(?!\s*g)/i] },
];

const CREDENTIAL = '(?:certificate|certification|certified|course|training)';

export const TRAINING_VOCABULARY: ReadonlyArray<VocabularyEntry<TrainingTag>> = [
  {
    tag: 'haccp',
    patterns: [/\bhaccp\b/i, /\bfood handling\b/i],
  },
  {
    tag: 'food_safety',
    patterns: [
      new RegExp(`\\bfood safety ${CREDENTIAL}\\b`, 'i'),
      new RegExp(`\\b${CREDENTIAL} in food safety\\b`, 'i'),
    ],
  },
  {
    tag: 'customer_service',
    patterns: [
      new RegExp(`\\bcustomer service ${CREDENTIAL}\\b`, 'i'),
      new RegExp(`\\b${CREDENTIAL} in customer service\\b`, 'i'),
    ],
  },
  {
    tag: 'other',
    patterns: [new RegExp(`\\b${CREDENTIAL}\\b`, 'i')],
  },
];

// =============================================================================
// EXTRACTORS
// =============================================================================

export function extractEmail(text: string): string {
  return text.match(EMAIL_PATTERN)?.[0] ?? UNKNOWN;
}

export function extractPhone(text: string): string {
  for (const line of text.split(/\r?\n/)) {
    const withoutEmail = line.replace(new RegExp(EMAIL_PATTERN.source, 'g'), ' ');
    const match = withoutEmail.match(PHONE_PATTERN);
    if (match) {
      return match[0].trim();
    }
  }
  return UNKNOWN;
}

/**
 * First of the opening lines that is not contact info, a labelled field or
 * a section header; its first three words.
 */
export function extractName(text: string): string {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, NAME_SCAN_LINES);

  for (const line of lines) {
    if (EMAIL_PATTERN.test(line) || PHONE_PATTERN.test(line)) continue;
    if (line.includes(':')) continue;
    if (SECTION_HEADER.test(line)) continue;

    const words = line.split(/\s+/).slice(0, 3);
    if (words.some((word) => /[A-Za-z]/.test(word))) {
      return words.join(' ');
    }
  }

  return UNKNOWN;
}

export function extractYearsExperience(text: string): number | Unknown {
  let best: number | undefined;
  for (const match of text.matchAll(YEARS_PATTERN)) {
    const years = Number.parseInt(match[1], 10);
    if (Number.isFinite(years) && years <= MAX_YEARS && (best === undefined || years > best)) {
      best = years;
    }
  }
  return best ?? UNKNOWN;
}

/**
 * Split text into sections keyed by the header line that opens them.
 */
export function splitSections(text: string): Array<{ header: string; body: string }> {
  const sections: Array<{ header: string; body: string[] }> = [];
  let current: { header: string; body: string[] } | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (SECTION_HEADER.test(line)) {
      current = { header: line.replace(/:\s*$/, '').trim(), body: [] };
      sections.push(current);
      continue;
    }
    current?.body.push(line);
  }

  return sections.map((s) => ({ header: s.header, body: s.body.join('\n').trim() }));
}

export function extractSkills(text: string): string[] {
  const section = splitSections(text).find((s) => SKILLS_HEADER.test(s.header));
  if (!section) {
    return [];
  }

  const seen = new Set<string>();
  const skills: string[] = [];
  for (const item of section.body.split(/[\n,;•●▪*]+|\s-\s/)) {
    const skill = item.replace(/^[-–\s]+/, '').trim();
    const key = skill.toLowerCase();
    if (!skill || seen.has(key)) continue;
    seen.add(key);
    skills.push(skill);
  }
  return skills;
}

export function extractExperienceSummary(text: string): string {
  const section = splitSections(text).find((s) => EXPERIENCE_HEADER.test(s.header));
  if (!section || !section.body) {
    return UNKNOWN;
  }
  return section.body.slice(0, MAX_SUMMARY_CHARS);
}

export function matchVocabulary<T extends string>(
  text: string,
  vocabulary: ReadonlyArray<VocabularyEntry<T>>
): Hint<T> {
  for (const entry of vocabulary) {
    if (entry.patterns.some((pattern) => pattern.test(text))) {
      return entry.tag;
    }
  }
  return UNKNOWN;
}

export function extractAvailabilityHint(text: string): Hint<AvailabilityTag> {
  return matchVocabulary(text, AVAILABILITY_VOCABULARY);
}

export function extractVisaHint(text: string): Hint<VisaTag> {
  return matchVocabulary(text, VISA_VOCABULARY);
}

export function extractTrainingHint(text: string): Hint<TrainingTag> {
  return matchVocabulary(text, TRAINING_VOCABULARY);
}

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Extract all structured fields from raw resume text. Never throws.
 */
export function extract(rawText: string): CandidateFields {
  return {
    name: extractName(rawText),
    email: extractEmail(rawText),
    phone: extractPhone(rawText),
    yearsExperience: extractYearsExperience(rawText),
    skills: extractSkills(rawText),
    experienceSummary: extractExperienceSummary(rawText),
    availabilityHint: extractAvailabilityHint(rawText),
    visaHint: extractVisaHint(rawText),
    trainingHint: extractTrainingHint(rawText),
  };
}
