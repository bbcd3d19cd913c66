export { HttpError } from './http-error.js';
export { InvalidDateFormatError } from './invalid-date-format-error.js';
export { InvalidOperationError } from './invalid-operation-error.js';
