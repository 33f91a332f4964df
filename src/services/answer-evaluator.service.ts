import { z } from 'zod';
import { logger as defaultLogger, errorFields, type ILogger } from '../config/logger';
import { FALLBACK_SCORING } from '../config/assessment-policy';
import { isStubHandle } from './chat-handles';
import { buildAnswerEvaluationPrompt } from '../prompts/evaluation.prompt';
import { extractJsonObject } from '../utils/json.util';
import { extractTechnicalTerms } from '../utils/technical-terms';
import type { ChatHandle } from '../types/llm';
import type { AnswerEvaluation } from '../types/evaluation';

const llmEvaluationSchema = z.object({
    score: z.coerce.number().min(0).max(10),
    feedback: z.union([z.array(z.string()), z.string()])
        .transform(value => (Array.isArray(value) ? value : [value]))
        .default([])
});

const HEDGE_PHRASES = ["i don't know", 'not sure', 'no idea', 'i think', 'maybe', 'probably', 'i guess'];

const QUESTION_STOPWORDS = new Set([
    'question', 'what', 'which', 'when', 'where', 'does', 'with', 'that', 'this',
    'your', 'from', 'have', 'would', 'could', 'should', 'explain', 'describe',
    'between', 'difference', 'about', 'there', 'their', 'into', 'they', 'will',
    'some', 'more', 'most', 'other', 'work', 'works', 'used', 'using', 'handle'
]);

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

// a fractional score below 1 is already on the [0, 1] scale
function normalizeModelScore(raw: number): number {
    return raw < 1 && !Number.isInteger(raw) ? round2(raw) : round2(raw / 10);
}

function keywordsOf(text: string): Set<string> {
    return new Set(
        text.toLowerCase()
            .split(/[^a-z0-9+#]+/)
            .filter(word => word.length >= 4 && !QUESTION_STOPWORDS.has(word))
    );
}

function lengthBase(wordCount: number): number {
    const bucket = FALLBACK_SCORING.LENGTH_BUCKETS.find(entry => wordCount < entry.maxWords);
    return bucket ? bucket.score : FALLBACK_SCORING.LONG_ANSWER_SCORE;
}

/**
 * Deterministic scoring used whenever the model cannot grade an answer.
 * Pure: the same question and answer always produce the same result.
 */
export function fallbackEvaluation(question: string, answer: string): AnswerEvaluation {
    const trimmed = answer.trim();
    if (!trimmed) {
        return {
            score: FALLBACK_SCORING.EMPTY_ANSWER_SCORE,
            feedback: ['No answer was provided.'],
            technicalTerms: [],
            mode: 'fallback'
        };
    }

    const wordCount = trimmed.split(/\s+/).length;
    const technicalTerms = extractTechnicalTerms(trimmed);
    const lowered = trimmed.toLowerCase();

    const answerWords = keywordsOf(trimmed);
    const reusesKeywords = [...keywordsOf(question)].some(word => answerWords.has(word));
    const hedgeCount = HEDGE_PHRASES.filter(phrase => lowered.includes(phrase)).length;

    const termBonus = Math.min(technicalTerms.length * FALLBACK_SCORING.TERM_BONUS, FALLBACK_SCORING.MAX_TERM_BONUS);
    const hedgePenalty = Math.min(hedgeCount * FALLBACK_SCORING.HEDGE_PENALTY, FALLBACK_SCORING.MAX_HEDGE_PENALTY);
    const raw = lengthBase(wordCount)
        + termBonus
        + (reusesKeywords ? FALLBACK_SCORING.KEYWORD_OVERLAP_BONUS : 0)
        - hedgePenalty;
    const score = round2(Math.min(FALLBACK_SCORING.MAX_SCORE, Math.max(FALLBACK_SCORING.MIN_SCORE, raw)));

    const feedback: string[] = [];
    if (wordCount < 10) {
        feedback.push('Answer is very brief; expand on the reasoning.');
    } else if (wordCount >= 80) {
        feedback.push('Answer is detailed.');
    }
    if (technicalTerms.length > 0) {
        feedback.push(`Uses relevant terminology: ${technicalTerms.join(', ')}.`);
    } else {
        feedback.push('No specific technical terminology detected.');
    }
    if (!reusesKeywords) {
        feedback.push('Answer does not clearly address the key terms of the question.');
    }
    if (hedgeCount > 0) {
        feedback.push('Answer contains hedging language.');
    }

    return { score, feedback, technicalTerms, mode: 'fallback' };
}

/**
 * Answer Evaluator Service
 *
 * Grades one answer with the evaluation model and normalizes the 0-10
 * rubric score to [0, 1]. Stub handles, transport failures and malformed
 * replies all degrade to fallbackEvaluation.
 */
export class AnswerEvaluatorService {
    constructor(
        private llm: ChatHandle,
        private logger: ILogger = defaultLogger
    ) { }

    async evaluate(question: string, answer: string, techStack: string[]): Promise<AnswerEvaluation> {
        if (!answer.trim() || isStubHandle(this.llm)) {
            return fallbackEvaluation(question, answer);
        }

        try {
            const reply = await this.llm.invoke(buildAnswerEvaluationPrompt({ question, answer, techStack }));
            const parsed = llmEvaluationSchema.parse(extractJsonObject(reply));
            const feedback = parsed.feedback.map(item => item.trim()).filter(Boolean);
            const evaluation: AnswerEvaluation = {
                score: normalizeModelScore(parsed.score),
                feedback: feedback.length > 0 ? feedback : ['No feedback returned.'],
                technicalTerms: extractTechnicalTerms(answer),
                mode: 'llm'
            };

            this.logger.info({
                score: evaluation.score,
                backend: this.llm.backend.label
            }, 'answer.evaluated');

            return evaluation;
        } catch (error) {
            this.logger.warn({ ...errorFields(error) }, 'Model evaluation failed; using heuristic scoring');
            return fallbackEvaluation(question, answer);
        }
    }
}
