/**
 * Intent Module Exports
 *
 * @module intent
 */

export { classifyIntents, explainIntents } from './classifier.js';
