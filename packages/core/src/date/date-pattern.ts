import {
  MONTH_ABBREVIATIONS,
  MONTH_NAMES,
  SECONDS_PER_DAY,
  WEEKDAY_ABBREVIATIONS,
  WEEKDAY_NAMES,
  civilFromDays,
  daysFromCivil,
  daysInMonth,
  floorDiv,
  floorMod,
  weekdayFromDays,
} from './calendar.js';
import { TimePoint } from './time-point.js';

/**
 * Fields a pattern can reference:
 *
 * - `%a` weekday; parses a full or abbreviated name, formats abbreviated
 * - `%A` full weekday name
 * - `%d` day of month, 1–2 digits, formatted zero-padded
 * - `%b` month; parses a full or abbreviated name, formats abbreviated
 * - `%Y` year; parses four or more digits, formats at least four
 * - `%y` two-digit year (69–99 → 19xx, 00–68 → 20xx)
 * - `%T` `HH:MM:SS`
 * - `%Z` zone token; discarded when parsing
 */
export type PatternField =
  | 'weekday'
  | 'weekday-full'
  | 'day'
  | 'month'
  | 'year'
  | 'year-two-digit'
  | 'time'
  | 'zone';

export type PatternToken =
  | { type: 'literal'; text: string }
  | { type: 'whitespace' }
  | { type: 'field'; field: PatternField };

export interface DatePattern {
  readonly source: string;
  readonly tokens: ReadonlyArray<PatternToken>;
}

const SPECIFIERS = new Map<string, PatternField>([
  ['a', 'weekday'],
  ['A', 'weekday-full'],
  ['d', 'day'],
  ['b', 'month'],
  ['Y', 'year'],
  ['y', 'year-two-digit'],
  ['T', 'time'],
  ['Z', 'zone'],
]);

const WHITESPACE = /\s/;
const ZONE_CHAR = /[A-Za-z0-9_+/-]/;

export function compilePattern(source: string): DatePattern {
  const tokens: Array<PatternToken> = [];
  let literal = '';

  const flush = () => {
    if (literal) {
      tokens.push({ type: 'literal', text: literal });
      literal = '';
    }
  };

  for (let i = 0; i < source.length; i++) {
    const ch = source.charAt(i);
    if (ch === '%') {
      const spec = source.charAt(++i);
      const field = SPECIFIERS.get(spec);
      if (!field) {
        throw new Error(`Unsupported date pattern specifier "%${spec}" in "${source}"`);
      }
      flush();
      tokens.push({ type: 'field', field });
    } else if (WHITESPACE.test(ch)) {
      flush();
      if (tokens.at(-1)?.type !== 'whitespace') {
        tokens.push({ type: 'whitespace' });
      }
    } else {
      literal += ch;
    }
  }
  flush();

  return { source, tokens };
}

class Scanner {
  private pos = 0;

  constructor(private readonly text: string) {}

  get atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  skipWhitespace(): void {
    while (!this.atEnd && WHITESPACE.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
  }

  literal(expected: string): boolean {
    if (this.text.startsWith(expected, this.pos)) {
      this.pos += expected.length;
      return true;
    }
    return false;
  }

  digits(min: number, max: number): number | undefined {
    const run = this.digitRun(min, max);
    return run === undefined ? undefined : Number(run);
  }

  digitRun(min: number, max = Infinity): string | undefined {
    let end = this.pos;
    while (end - this.pos < max && isDigit(this.text.charAt(end))) {
      end++;
    }
    if (end - this.pos < min) return undefined;
    const run = this.text.slice(this.pos, end);
    this.pos = end;
    return run;
  }

  /**
   * Match one of `names` case-insensitively and return its index. Longer
   * candidates should come first so "Monday" is not read as "Mon".
   */
  name(...candidates: ReadonlyArray<ReadonlyArray<string>>): number | undefined {
    for (const names of candidates) {
      for (const [index, name] of names.entries()) {
        const slice = this.text.slice(this.pos, this.pos + name.length);
        if (slice.toLowerCase() === name.toLowerCase()) {
          this.pos += name.length;
          return index;
        }
      }
    }
    return undefined;
  }

  zone(): boolean {
    const start = this.pos;
    while (!this.atEnd && ZONE_CHAR.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
    return this.pos > start;
  }
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

interface ParsedFields {
  weekday?: number;
  day?: number;
  /** 1–12 */
  month?: number;
  year?: bigint;
  hour?: number;
  minute?: number;
  second?: number;
}

function expandTwoDigitYear(year: number): bigint {
  return BigInt(year >= 69 ? 1900 + year : 2000 + year);
}

function readField(
  scanner: Scanner,
  field: PatternField,
  fields: ParsedFields,
): boolean {
  switch (field) {
    case 'weekday':
      fields.weekday = scanner.name(WEEKDAY_NAMES, WEEKDAY_ABBREVIATIONS);
      return fields.weekday !== undefined;
    case 'weekday-full':
      fields.weekday = scanner.name(WEEKDAY_NAMES);
      return fields.weekday !== undefined;
    case 'day':
      fields.day = scanner.digits(1, 2);
      return fields.day !== undefined;
    case 'month': {
      const index = scanner.name(MONTH_NAMES, MONTH_ABBREVIATIONS);
      if (index === undefined) return false;
      fields.month = index + 1;
      return true;
    }
    case 'year': {
      const run = scanner.digitRun(4);
      if (run === undefined) return false;
      fields.year = BigInt(run);
      return true;
    }
    case 'year-two-digit': {
      const year = scanner.digits(2, 2);
      if (year === undefined) return false;
      fields.year = expandTwoDigitYear(year);
      return true;
    }
    case 'time':
      fields.hour = scanner.digits(1, 2);
      if (fields.hour === undefined || !scanner.literal(':')) return false;
      fields.minute = scanner.digits(1, 2);
      if (fields.minute === undefined || !scanner.literal(':')) return false;
      fields.second = scanner.digits(1, 2);
      return fields.second !== undefined;
    case 'zone':
      return scanner.zone();
  }
}

function toTimePoint(fields: ParsedFields): TimePoint | undefined {
  const { weekday, day, month, year, hour, minute, second } = fields;
  if (
    day === undefined ||
    month === undefined ||
    year === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return undefined;
  }

  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;

  const days = daysFromCivil(year, month, day);
  if (weekday !== undefined && weekday !== weekdayFromDays(days)) {
    return undefined;
  }

  return TimePoint.fromSeconds(
    days * SECONDS_PER_DAY + BigInt(hour * 3600 + minute * 60 + second),
  );
}

/**
 * Match the whole of `text` against `pattern`. Surrounding whitespace is
 * tolerated; any other unconsumed input fails the match. Parsed values are
 * taken as UTC whatever the zone token says.
 */
export function parseWithPattern(
  pattern: DatePattern,
  text: string,
): TimePoint | undefined {
  const scanner = new Scanner(text);
  const fields: ParsedFields = {};

  scanner.skipWhitespace();
  for (const token of pattern.tokens) {
    switch (token.type) {
      case 'whitespace':
        scanner.skipWhitespace();
        break;
      case 'literal':
        if (!scanner.literal(token.text)) return undefined;
        break;
      case 'field':
        if (!readField(scanner, token.field, fields)) return undefined;
        break;
    }
  }
  scanner.skipWhitespace();
  if (!scanner.atEnd) return undefined;

  return toTimePoint(fields);
}

function pad(value: number | bigint, width: number): string {
  return String(value).padStart(width, '0');
}

function formatYear(year: bigint): string {
  return year < 0n ? `-${pad(-year, 4)}` : pad(year, 4);
}

/**
 * Render `timePoint` in UTC calendar fields using `pattern`. `zoneName`
 * is written wherever the pattern has `%Z`.
 */
export function formatWithPattern(
  pattern: DatePattern,
  timePoint: TimePoint,
  zoneName: string,
): string {
  const seconds = timePoint.toSeconds();
  const days = floorDiv(seconds, SECONDS_PER_DAY);
  const secondOfDay = Number(floorMod(seconds, SECONDS_PER_DAY));
  const { year, month, day } = civilFromDays(days);
  const weekday = weekdayFromDays(days);

  let out = '';
  for (const token of pattern.tokens) {
    switch (token.type) {
      case 'whitespace':
        out += ' ';
        break;
      case 'literal':
        out += token.text;
        break;
      case 'field':
        switch (token.field) {
          case 'weekday':
            out += WEEKDAY_ABBREVIATIONS[weekday];
            break;
          case 'weekday-full':
            out += WEEKDAY_NAMES[weekday];
            break;
          case 'day':
            out += pad(day, 2);
            break;
          case 'month':
            out += MONTH_ABBREVIATIONS[month - 1];
            break;
          case 'year':
            out += formatYear(year);
            break;
          case 'year-two-digit':
            out += pad(floorMod(year, 100n), 2);
            break;
          case 'time':
            out += [
              Math.floor(secondOfDay / 3600),
              Math.floor((secondOfDay % 3600) / 60),
              secondOfDay % 60,
            ]
              .map((part) => pad(part, 2))
              .join(':');
            break;
          case 'zone':
            out += zoneName;
            break;
        }
        break;
    }
  }
  return out;
}
