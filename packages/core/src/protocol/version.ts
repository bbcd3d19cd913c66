import { assertNever } from '../utils/assert-never.js';

export enum Version {
  Http10,
  Http11,
}

export function versionString(version: Version): string {
  switch (version) {
    case Version.Http10:
      return 'HTTP/1.0';
    case Version.Http11:
      return 'HTTP/1.1';
  }
  return assertNever(version, 'HTTP version');
}
