/**
 * Pattern-based rendering of zoned instants.
 *
 * Patterns use date-fns tokens. A pattern containing "%" is read as strftime
 * and translated first, so "%B %d, %Y %H:%M %Z" and "MMMM dd, yyyy HH:mm zzz"
 * render the same text.
 */

import type { Locale } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { de, enGB, enUS, fr } from 'date-fns/locale';

import { InvalidPatternError } from '../errors';
import type { FormatPattern, FormatPreset, Instant, LocaleCode, PresetTable } from '../types';
import { requireZone } from './instant';

export const DEFAULT_LOCALE: LocaleCode = 'en-US';

// Zone abbreviations come from Intl for this locale: en-US gives "EDT", en-GB gives "BST".
const LOCALES: Record<LocaleCode, Locale> = {
  'en-US': enUS,
  'en-GB': enGB,
  de,
  fr,
};

const SUPPORTED_TOKENS = new Set([
  'yyyy', 'yy',
  'MMMM', 'MMM', 'MM', 'M',
  'dd', 'd',
  'EEEE', 'EEE',
  'HH', 'H', 'hh', 'h',
  'mm', 'm',
  'ss', 's',
  'a',
  'zzz', 'zzzz',
  'xxx', 'xx', 'XXX',
]);

const STRFTIME_DIRECTIVES: Record<string, string> = {
  Y: 'yyyy',
  y: 'yy',
  m: 'MM',
  d: 'dd',
  B: 'MMMM',
  b: 'MMM',
  A: 'EEEE',
  a: 'EEE',
  H: 'HH',
  I: 'hh',
  M: 'mm',
  S: 'ss',
  p: 'a',
  Z: 'zzz',
  z: 'xx',
};

const LATIN_LETTER = /[A-Za-z]/;

export interface FormatOptions {
  locale?: LocaleCode;
}

function findClosingQuote(pattern: string, from: number): number {
  let index = from;
  while (index < pattern.length) {
    if (pattern[index] === "'") {
      if (pattern[index + 1] === "'") {
        index += 2;
        continue;
      }
      return index;
    }
    index += 1;
  }
  return -1;
}

/**
 * Reject empty patterns, unterminated quotes and any letter run outside quotes
 * that is not a supported token.
 */
export function validatePattern(pattern: FormatPattern, original: string = pattern): void {
  if (pattern.trim().length === 0) {
    throw new InvalidPatternError(original, 'pattern is empty');
  }

  let index = 0;
  while (index < pattern.length) {
    const char = pattern[index];

    if (char === "'") {
      const close = findClosingQuote(pattern, index + 1);
      if (close === -1) {
        throw new InvalidPatternError(original, 'unterminated quoted text');
      }
      index = close + 1;
      continue;
    }

    if (LATIN_LETTER.test(char)) {
      let end = index + 1;
      while (pattern[end] === char) {
        end += 1;
      }
      const token = pattern.slice(index, end);
      if (!SUPPORTED_TOKENS.has(token)) {
        throw new InvalidPatternError(original, `unsupported token "${token}"`);
      }
      index = end;
      continue;
    }

    index += 1;
  }
}

export function translateStrftime(pattern: string): FormatPattern {
  let output = '';
  let literal = '';

  const flushLiteral = () => {
    if (literal.length === 0) return;
    output += /[A-Za-z']/.test(literal) ? `'${literal.replace(/'/g, "''")}'` : literal;
    literal = '';
  };

  for (let index = 0; index < pattern.length; index++) {
    const char = pattern[index];
    if (char !== '%') {
      literal += char;
      continue;
    }

    if (index + 1 >= pattern.length) {
      throw new InvalidPatternError(pattern, 'dangling "%" at end of pattern');
    }
    index += 1;
    const directive = pattern[index];

    if (directive === '%') {
      literal += '%';
      continue;
    }

    const token = STRFTIME_DIRECTIVES[directive];
    if (!token) {
      throw new InvalidPatternError(pattern, `unsupported directive "%${directive}"`);
    }
    flushLiteral();
    output += token;
  }

  flushLiteral();
  return output;
}

export function format(
  instant: Instant,
  pattern: FormatPattern,
  options: FormatOptions = {},
): string {
  const { epochMs, zone } = requireZone(instant);

  const tokens = pattern.includes('%') ? translateStrftime(pattern) : pattern;
  validatePattern(tokens, pattern);

  try {
    return formatInTimeZone(epochMs, zone, tokens, {
      locale: LOCALES[options.locale ?? DEFAULT_LOCALE],
    });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new InvalidPatternError(pattern, error.message);
    }
    throw error;
  }
}

export function formatWithPreset(instant: Instant, preset: FormatPreset): string {
  return format(instant, preset.pattern, { locale: preset.locale });
}

export function findPreset(name: string, presets: PresetTable): FormatPreset | undefined {
  const wanted = name.trim().toLowerCase();
  return Object.values(presets).find((preset) => preset.name.toLowerCase() === wanted);
}

/**
 * Look `choice` up as a preset name (case-insensitive); anything else is a raw pattern
 */
export function resolveFormatChoice(choice: string, presets: PresetTable): FormatPreset {
  const preset = findPreset(choice, presets);
  if (preset) {
    return preset;
  }

  return { name: 'custom', pattern: choice, locale: DEFAULT_LOCALE };
}
