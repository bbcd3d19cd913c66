import { codeString, type Code } from '../protocol/code.js';
import { Version, versionString } from '../protocol/version.js';

/**
 * Protocol-level failure to be surfaced to the peer: a status code and a
 * human-readable reason. Accepts either a `Code` member or a raw integer,
 * so extension codes can be reported too.
 */
export class HttpError extends Error {
  public readonly code: number;
  public readonly reason: string;

  constructor(code: Code | number, reason: string) {
    super(reason);
    this.name = 'HttpError';
    this.code = code;
    this.reason = reason;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Render the status line for this error, e.g. `HTTP/1.1 404 Not Found`.
   * The canonical reason phrase of the code is used; codes without one
   * end after the number.
   */
  statusLine(version: Version = Version.Http11): string {
    const phrase = codeString(this.code);
    const line = `${versionString(version)} ${this.code}`;
    return phrase ? `${line} ${phrase}` : line;
  }
}
