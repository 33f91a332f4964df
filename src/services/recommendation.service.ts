import { logger as defaultLogger, errorFields, type ILogger } from '../config/logger';
import { RECOMMENDATION_TIERS } from '../config/assessment-policy';
import { isStubHandle } from './chat-handles';
import { buildRecommendationPrompt } from '../prompts/recommendation.prompt';
import type { ChatHandle } from '../types/llm';
import type { CandidateProfile } from '../types/candidate';
import type { AnswerEntry, ScoreEntry } from '../types/evaluation';

export const NO_EVALUATIONS_RECOMMENDATION = 'No questions evaluated yet.';

export type RecommendationTier = 'Strong Candidate' | 'Qualified Candidate' | 'Needs Further Assessment';

export function averageScore(scores: ScoreEntry[]): number {
    if (scores.length === 0) {
        return 0;
    }
    return scores.reduce((sum, entry) => sum + entry.score, 0) / scores.length;
}

export function recommendationTier(average: number): RecommendationTier {
    if (average >= RECOMMENDATION_TIERS.STRONG) {
        return 'Strong Candidate';
    }
    if (average >= RECOMMENDATION_TIERS.QUALIFIED) {
        return 'Qualified Candidate';
    }
    return 'Needs Further Assessment';
}

/**
 * Templated recommendation chosen by average-score tier.
 */
export function fallbackRecommendation(scores: ScoreEntry[]): string {
    if (scores.length === 0) {
        return NO_EVALUATIONS_RECOMMENDATION;
    }

    const average = averageScore(scores);
    const summary = `Average score ${(average * 100).toFixed(1)}% across ${scores.length} question(s).`;

    switch (recommendationTier(average)) {
        case 'Strong Candidate':
            return `Strong Candidate. ${summary} The candidate showed solid command of the assessed stack; recommend advancing to the next interview round.`;
        case 'Qualified Candidate':
            return `Qualified Candidate. ${summary} The candidate meets the baseline for the role; a follow-up interview should probe the weaker answers.`;
        default:
            return `Needs Further Assessment. ${summary} Significant gaps were observed; proceed with caution.`;
    }
}

/**
 * Recommendation Service
 *
 * Writes the closing hiring narrative with the recommendation model,
 * or the tier template when no model is available.
 */
export class RecommendationService {
    constructor(
        private llm: ChatHandle,
        private logger: ILogger = defaultLogger
    ) { }

    async finalRecommendation(profile: CandidateProfile, answers: AnswerEntry[], scores: ScoreEntry[]): Promise<string> {
        if (scores.length === 0) {
            return NO_EVALUATIONS_RECOMMENDATION;
        }
        if (isStubHandle(this.llm)) {
            return fallbackRecommendation(scores);
        }

        const history = scores.map(entry => ({
            question: entry.question,
            answer: answers.find(answer => answer.index === entry.index)?.answer ?? '',
            score: entry.score
        }));

        try {
            const text = (await this.llm.invoke(buildRecommendationPrompt({
                profile,
                history,
                averageScore: averageScore(scores)
            }))).trim();

            if (text) {
                this.logger.info({ backend: this.llm.backend.label, length: text.length }, 'recommendation.generated');
                return text;
            }
            this.logger.warn({}, 'Recommendation model returned no text');
        } catch (error) {
            this.logger.warn({ ...errorFields(error) }, 'Recommendation generation failed; using tier template');
        }

        return fallbackRecommendation(scores);
    }
}
