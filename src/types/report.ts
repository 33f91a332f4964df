import type { CandidateInfoRecord } from './candidate';

export interface ReportAnswer {
    index: number;
    question: string;
    answer: string;
}

export interface ReportScore {
    index: number;
    question: string;
    score: number;
}

/**
 * Structured report document. Key order is part of the export format.
 */
export interface RecommendationReport {
    candidate_info: CandidateInfoRecord;
    answers: ReportAnswer[];
    scores: ReportScore[];
    recommendation: string;
}

export type ReportFormat = 'json' | 'text';
