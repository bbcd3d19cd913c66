import { assertNever } from '../utils/assert-never.js';

export enum Method {
  Options,
  Get,
  Post,
  Head,
  Put,
  Patch,
  Delete,
  Trace,
  Connect,
}

/** Request-line token for a method, e.g. `GET`. */
export function methodString(method: Method): string {
  switch (method) {
    case Method.Options:
      return 'OPTIONS';
    case Method.Get:
      return 'GET';
    case Method.Post:
      return 'POST';
    case Method.Head:
      return 'HEAD';
    case Method.Put:
      return 'PUT';
    case Method.Patch:
      return 'PATCH';
    case Method.Delete:
      return 'DELETE';
    case Method.Trace:
      return 'TRACE';
    case Method.Connect:
      return 'CONNECT';
  }
  return assertNever(method, 'HTTP method');
}
