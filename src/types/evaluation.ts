/**
 * Question, answer and score records exchanged between the generator,
 * the evaluator, the stopping policy and the report.
 */

export type QuestionSource = 'bank' | 'generated' | 'focused' | 'template';

export interface Question {
    text: string;
    topics: string[];
    source: QuestionSource;
}

/** Recorded in place of answer text when a question is skipped. */
export const SKIPPED_ANSWER = 'Skipped';

// Entries are keyed by ask order plus text, so a repeated question text
// produces two entries instead of overwriting the first.
export interface AnswerEntry {
    index: number;
    question: string;
    answer: string;
    skipped: boolean;
}

export type EvaluationMode = 'llm' | 'fallback' | 'skipped';

export interface ScoreEntry {
    index: number;
    question: string;
    score: number;
    feedback: string[];
    mode: EvaluationMode;
}

export interface AnswerEvaluation {
    score: number;
    feedback: string[];
    technicalTerms: string[];
    mode: Exclude<EvaluationMode, 'skipped'>;
}

export type SentimentLabel = 'Confident' | 'Moderate' | 'Uncertain';

export interface SentimentSnapshot {
    confidenceScore: number;
    sentiment: SentimentLabel;
    wordCount: number;
    sentenceCount: number;
    technicalDepth: number;
    positiveIndicators: number;
    uncertainIndicators: number;
    fillerCount: number;
}
