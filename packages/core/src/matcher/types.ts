/**
 * Result of a candidate search among supplier items.
 */
export interface CandidateResult {
    /** Index into the supplier item list, null when nothing matched */
    index: number | null;
    /** How many unconsumed supplier items qualified */
    candidateCount: number;
}
