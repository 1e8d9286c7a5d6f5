export { readBody, readQuery, type Parsed } from './validation.js';
export { errorHandler } from './error-handler.js';
