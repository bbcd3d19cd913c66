export { Code, codeString } from './code.js';
export { Method, methodString } from './method.js';
export { Version, versionString } from './version.js';
