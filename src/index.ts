/**
 * mua-mime-codec - encoder and decoder for the constrained internet mail
 * dialect of a personal mail user agent
 *
 * Messages render to an exact text form and parse back from it.
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Export encoding utilities
export * from './encoding/index.js';

// Export wire-level codecs
export * from './mime/index.js';

// Export the message model
export * from './message/index.js';
