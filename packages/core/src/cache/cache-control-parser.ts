import {
  CacheDirective,
  isDirectiveToken,
  isDurationDirectiveKind,
  toStandardDirectiveKind,
} from './cache-directive.js';

/**
 * Parse a delta-seconds argument. Returns undefined for anything other
 * than plain decimal digits (optionally quoted) that fit a safe integer.
 */
function parseSeconds(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const unquoted = raw.trim().replace(/^"(.*)"$/, '$1');
  if (!/^[0-9]+$/.test(unquoted)) return undefined;
  const n = Number(unquoted);
  return Number.isSafeInteger(n) ? n : undefined;
}

/**
 * Parse a Cache-Control header value into directives, in header order.
 *
 * Unrecognised directives are kept as `ext` directives with their raw
 * argument. Lenient: duration directives with a malformed argument and
 * names that are not tokens are skipped. `max-stale` without an argument
 * is kept with a zero delta.
 */
export function parseCacheControl(
  header: string | null | undefined,
): Array<CacheDirective> {
  if (!header) return [];

  const directives: Array<CacheDirective> = [];

  for (const part of header.split(',')) {
    const trimmed = part.trim();
    if (!trimmed) continue;

    const eqIdx = trimmed.indexOf('=');
    const key = (eqIdx === -1 ? trimmed : trimmed.slice(0, eqIdx))
      .trim()
      .toLowerCase();
    const value = eqIdx === -1 ? undefined : trimmed.slice(eqIdx + 1).trim();

    const kind = toStandardDirectiveKind(key);
    if (kind === undefined) {
      if (isDirectiveToken(key)) {
        directives.push(new CacheDirective('ext', key, value));
      }
      continue;
    }

    if (!isDurationDirectiveKind(kind)) {
      directives.push(new CacheDirective(kind));
      continue;
    }

    const seconds = parseSeconds(value);
    if (seconds !== undefined) {
      directives.push(new CacheDirective(kind, seconds));
    } else if (kind === 'max-stale' && value === undefined) {
      directives.push(new CacheDirective(kind));
    }
  }

  return directives;
}

/** Serialise directives into a Cache-Control header value. */
export function formatCacheControl(
  directives: ReadonlyArray<CacheDirective>,
): string {
  return directives.map((directive) => directive.toString()).join(', ');
}
