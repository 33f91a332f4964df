/**
 * Assessment policy constants.
 *
 * Every threshold the stopping policy, the heuristic evaluator and the
 * resume consistency check read lives here. Values can be overridden per
 * deployment through the environment (see environment.ts).
 */

/** Absolute ceiling on questions in one session. */
export const HARD_QUESTION_CAP = 15;

export interface AssessmentPolicyConfig {
    maxQuestions: number;
    skipThreshold: number;
    strongThreshold: number;
    noHireThreshold: number;
    minQuestionsBeforeDecision: number;
    /** Answers scoring below this mark their topics as focus areas. */
    weakAnswerThreshold: number;
}

export const DEFAULT_ASSESSMENT_POLICY: AssessmentPolicyConfig = {
    maxQuestions: HARD_QUESTION_CAP,
    skipThreshold: 3,
    strongThreshold: 0.75,
    noHireThreshold: 0.4,
    minQuestionsBeforeDecision: 5,
    weakAnswerThreshold: 0.6
};

export function buildAssessmentPolicy(overrides: Partial<AssessmentPolicyConfig> = {}): AssessmentPolicyConfig {
    const merged = { ...DEFAULT_ASSESSMENT_POLICY, ...overrides };
    return {
        ...merged,
        maxQuestions: Math.min(Math.max(1, merged.maxQuestions), HARD_QUESTION_CAP),
        skipThreshold: Math.max(1, merged.skipThreshold),
        minQuestionsBeforeDecision: Math.max(1, merged.minQuestionsBeforeDecision)
    };
}

export const FALLBACK_SCORING = {
    EMPTY_ANSWER_SCORE: 0.1,
    LENGTH_BUCKETS: [
        { maxWords: 10, score: 0.2 },
        { maxWords: 30, score: 0.4 },
        { maxWords: 80, score: 0.55 }
    ],
    LONG_ANSWER_SCORE: 0.6,
    TERM_BONUS: 0.05,
    MAX_TERM_BONUS: 0.25,
    KEYWORD_OVERLAP_BONUS: 0.1,
    HEDGE_PENALTY: 0.05,
    MAX_HEDGE_PENALTY: 0.15,
    MIN_SCORE: 0.1,
    MAX_SCORE: 0.9
} as const;

export const RECOMMENDATION_TIERS = {
    STRONG: 0.8,
    QUALIFIED: 0.6
} as const;

export const RESUME_CONSISTENCY = {
    EXPERIENCE_TOLERANCE_YEARS: 2,
    EXPERIENCE_MISMATCH_PENALTY: -0.2,
    SKILL_MISMATCH_PENALTY: -0.1,
    POSITION_MISMATCH_PENALTY: -0.15,
    POSITION_MATCH_BONUS: 0.05
} as const;
