import { z } from 'zod';
import { logger as defaultLogger, errorFields, type ILogger } from '../config/logger';
import { DEFAULT_ASSESSMENT_POLICY, type AssessmentPolicyConfig } from '../config/assessment-policy';
import { isStubHandle } from './chat-handles';
import { detectExitIntent } from './question-generator.service';
import { buildFocusAreasPrompt } from '../prompts/assessment.prompt';
import { extractJsonObject } from '../utils/json.util';
import type { ChatHandle } from '../types/llm';
import type { AssessmentDecision, AssessmentTrigger, PolicyInput, PolicyOutcome } from '../types/assessment';
import type { ScoreEntry } from '../types/evaluation';

const focusAreasSchema = z.object({
    focus_areas: z.array(z.string().min(1)).min(1),
    reasoning: z.string().default('')
});

function percent(value: number): string {
    return `${(value * 100).toFixed(1)}%`;
}

/**
 * Mean score over every asked question; skipped questions carry 0.
 */
export function computeConfidence(scores: ScoreEntry[]): number {
    if (scores.length === 0) {
        return 0;
    }
    const total = scores.reduce((sum, entry) => sum + entry.score, 0);
    return Math.min(1, Math.max(0, total / scores.length));
}

/**
 * Stack tags mentioned by questions whose answers scored below the weak
 * threshold, in stack order. The full stack when nothing weak maps to a tag.
 */
export function determineFocusAreas(
    techStack: string[],
    scores: ScoreEntry[],
    weakThreshold: number = DEFAULT_ASSESSMENT_POLICY.weakAnswerThreshold
): string[] {
    const weakQuestions = scores
        .filter(entry => entry.score < weakThreshold)
        .map(entry => entry.question.toLowerCase());

    const focus = techStack.filter(tech => {
        const tag = tech.toLowerCase();
        return weakQuestions.some(question => question.includes(tag));
    });

    return focus.length > 0 ? focus : [...techStack];
}

/**
 * Assessment Policy Service
 *
 * Turns the running score history into a decision and says whether more
 * questions are needed. Forced stops (exit intent, skip threshold,
 * question cap) are checked before the confidence bands.
 */
export class AssessmentPolicyService {
    constructor(
        private llm: ChatHandle,
        private config: AssessmentPolicyConfig = DEFAULT_ASSESSMENT_POLICY,
        private logger: ILogger = defaultLogger
    ) { }

    async assess(input: PolicyInput): Promise<PolicyOutcome> {
        const confidence = computeConfidence(input.scores);
        const fallbackFocus = determineFocusAreas(input.techStack, input.scores, this.config.weakAnswerThreshold);

        if (input.latestAnswer !== undefined && detectExitIntent(input.latestAnswer)) {
            return this.outcome(confidence, 'Early Exit', false, [], 'Candidate asked to end the assessment.', 'exit_intent');
        }

        const skipped = input.answers.filter(answer => answer.skipped).length;
        if (skipped >= this.config.skipThreshold) {
            return this.outcome(
                confidence,
                'No Hire',
                false,
                [],
                `Candidate skipped ${skipped} questions (limit ${this.config.skipThreshold}).`,
                'skip_threshold'
            );
        }

        if (input.questionsAsked >= this.config.maxQuestions) {
            const decision = this.band(confidence);
            return this.outcome(
                confidence,
                decision,
                false,
                decision === 'Borderline' ? fallbackFocus : [],
                `Question limit of ${this.config.maxQuestions} reached at confidence ${percent(confidence)}.`,
                'question_cap'
            );
        }

        const minimum = Math.max(1, Math.min(
            this.config.minQuestionsBeforeDecision,
            input.plannedQuestions ?? this.config.minQuestionsBeforeDecision
        ));
        if (!input.final && input.questionsAsked < minimum) {
            return this.outcome(
                confidence,
                'In Progress',
                true,
                fallbackFocus,
                `${input.questionsAsked} of ${minimum} questions needed before a decision.`,
                'insufficient_evidence'
            );
        }

        const decision = this.band(confidence);
        const trigger: AssessmentTrigger = input.final ? 'manual_completion' : 'confidence_band';

        if (decision === 'Strong') {
            return this.outcome(confidence, decision, false, [],
                `Confidence ${percent(confidence)} meets the strong threshold of ${percent(this.config.strongThreshold)}.`, trigger);
        }
        if (decision === 'No Hire') {
            return this.outcome(confidence, decision, false, [],
                `Confidence ${percent(confidence)} is below the no-hire threshold of ${percent(this.config.noHireThreshold)}.`, trigger);
        }
        if (input.final) {
            return this.outcome(confidence, decision, false, fallbackFocus,
                `Assessment ended with mixed results at confidence ${percent(confidence)}.`, trigger);
        }

        const focus = await this.modelFocusAreas(input, confidence);
        return this.outcome(
            confidence,
            decision,
            true,
            focus?.focusAreas ?? fallbackFocus,
            focus?.reasoning || `Confidence ${percent(confidence)} is between thresholds; probing weaker areas.`,
            trigger
        );
    }

    private band(confidence: number): Exclude<AssessmentDecision, 'Early Exit' | 'In Progress'> {
        if (confidence >= this.config.strongThreshold) {
            return 'Strong';
        }
        if (confidence < this.config.noHireThreshold) {
            return 'No Hire';
        }
        return 'Borderline';
    }

    private async modelFocusAreas(input: PolicyInput, confidence: number): Promise<{ focusAreas: string[]; reasoning: string } | null> {
        if (isStubHandle(this.llm)) {
            return null;
        }

        const history = input.scores.map(entry => ({
            question: entry.question,
            answer: input.answers.find(answer => answer.index === entry.index)?.answer ?? '',
            score: entry.score
        }));

        try {
            const reply = await this.llm.invoke(buildFocusAreasPrompt({ techStack: input.techStack, confidence, history }));
            const parsed = focusAreasSchema.parse(extractJsonObject(reply));
            const focusAreas = parsed.focus_areas.map(area => area.trim()).filter(Boolean);
            if (focusAreas.length === 0) {
                return null;
            }
            return { focusAreas, reasoning: parsed.reasoning.trim() };
        } catch (error) {
            this.logger.warn({ ...errorFields(error) }, 'Focus area request failed; using weakest stack tags');
            return null;
        }
    }

    private outcome(
        confidence: number,
        decision: AssessmentDecision,
        needMore: boolean,
        focusAreas: string[],
        reasoning: string,
        trigger: AssessmentTrigger
    ): PolicyOutcome {
        this.logger.debug({ confidence, decision, needMore, trigger }, 'assessment.assessed');
        return { confidence, decision, needMore, focusAreas, reasoning, trigger };
    }
}
