/**
 * Matcher module: deterministic pairing of system and supplier items.
 */

export { matchItems, findRepeatedCodes } from './match-items.js';
export { findByCode, findByName } from './find-candidate.js';
export type { CandidateResult } from './types.js';
