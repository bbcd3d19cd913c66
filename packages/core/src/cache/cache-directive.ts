import { InvalidOperationError } from '../errors/invalid-operation-error.js';

/** Directives whose argument is a number of seconds. */
export type DurationDirectiveKind = 'max-age' | 's-maxage' | 'max-stale' | 'min-fresh';

export type FlagDirectiveKind =
  | 'no-cache'
  | 'no-store'
  | 'no-transform'
  | 'only-if-cached'
  | 'public'
  | 'private'
  | 'must-revalidate'
  | 'proxy-revalidate';

export type StandardDirectiveKind = DurationDirectiveKind | FlagDirectiveKind;

/**
 * `ext` covers every other directive (`immutable`,
 * `stale-while-revalidate=60`, vendor tokens), kept verbatim.
 */
export type CacheDirectiveKind = StandardDirectiveKind | 'ext';

export const STANDARD_DIRECTIVE_KINDS: ReadonlyArray<StandardDirectiveKind> = [
  'max-age',
  's-maxage',
  'max-stale',
  'min-fresh',
  'no-cache',
  'no-store',
  'no-transform',
  'only-if-cached',
  'public',
  'private',
  'must-revalidate',
  'proxy-revalidate',
];

type CacheDirectiveValue =
  | { kind: DurationDirectiveKind; deltaSeconds: number }
  | { kind: FlagDirectiveKind }
  | { kind: 'ext'; name: string; argument: string | undefined };

// RFC 9110 token characters
const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

export function isDirectiveToken(text: string): boolean {
  return TOKEN.test(text);
}

export function toStandardDirectiveKind(
  token: string,
): StandardDirectiveKind | undefined {
  return STANDARD_DIRECTIVE_KINDS.find((kind) => kind === token);
}

export function isDurationDirectiveKind(
  kind: CacheDirectiveKind,
): kind is DurationDirectiveKind {
  switch (kind) {
    case 'max-age':
    case 's-maxage':
    case 'max-stale':
    case 'min-fresh':
      return true;
    default:
      return false;
  }
}

/**
 * A single Cache-Control directive. Only `max-age`, `s-maxage`,
 * `max-stale` and `min-fresh` carry a delta; a delta passed with any other
 * standard kind is dropped. Extension directives keep their name and raw
 * argument.
 */
export class CacheDirective {
  private readonly value: CacheDirectiveValue;

  constructor(kind: StandardDirectiveKind, deltaSeconds?: number);
  constructor(kind: 'ext', name: string, argument?: string);
  constructor(
    kind: CacheDirectiveKind,
    payload: number | string = 0,
    argument?: string,
  ) {
    if (kind === 'ext') {
      if (
        typeof payload !== 'string' ||
        !isDirectiveToken(payload) ||
        toStandardDirectiveKind(payload.toLowerCase()) !== undefined
      ) {
        throw new RangeError(
          `ext requires a non-standard directive token, got ${String(payload)}`,
        );
      }
      this.value = { kind, name: payload, argument };
    } else if (isDurationDirectiveKind(kind)) {
      if (
        typeof payload !== 'number' ||
        !Number.isSafeInteger(payload) ||
        payload < 0
      ) {
        throw new RangeError(
          `${kind} requires a non-negative whole number of seconds, got ${payload}`,
        );
      }
      this.value = { kind, deltaSeconds: payload };
    } else {
      this.value = { kind };
    }
  }

  get kind(): CacheDirectiveKind {
    return this.value.kind;
  }

  /** Directive name as written on the wire. */
  get name(): string {
    const { value } = this;
    return value.kind === 'ext' ? value.name : value.kind;
  }

  /** Raw argument of an extension directive, quotes included. */
  get argument(): string | undefined {
    const { value } = this;
    return value.kind === 'ext' ? value.argument : undefined;
  }

  hasDelta(): boolean {
    return 'deltaSeconds' in this.value;
  }

  /**
   * Seconds argument of a duration directive.
   * Throws `InvalidOperationError` for flag-only and extension directives.
   */
  delta(): number {
    const { value } = this;
    if ('deltaSeconds' in value) {
      return value.deltaSeconds;
    }
    throw new InvalidOperationError(this.name);
  }

  /** Wire form, e.g. `max-age=3600`, `no-cache` or `x-custom=hello`. */
  toString(): string {
    const { value } = this;
    if ('deltaSeconds' in value) {
      return `${value.kind}=${value.deltaSeconds}`;
    }
    if (value.kind === 'ext' && value.argument !== undefined) {
      return `${value.name}=${value.argument}`;
    }
    return this.name;
  }
}
