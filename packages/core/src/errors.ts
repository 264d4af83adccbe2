/**
 * Error Handling
 *
 * All error classes raised by the tree toolkit, plus helpers to recognise
 * them and flatten them for logs.
 */

export * from './errors/index.js';
