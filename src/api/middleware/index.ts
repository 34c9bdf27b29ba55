/**
 * Middleware for the status API
 */

export { default as logging } from './logging';
export { default as errors, NotFoundError } from './errors';
