import { describe, it, expect, beforeEach } from 'vitest';
import {
    AssessmentPolicyService,
    computeConfidence,
    determineFocusAreas
} from '../../../src/services/assessment-policy.service';
import { StubChatHandle } from '../../../src/services/chat-handles';
import { DEFAULT_ASSESSMENT_POLICY } from '../../../src/config/assessment-policy';
import type { PolicyInput } from '../../../src/types/assessment';
import type { AnswerEntry, ScoreEntry } from '../../../src/types/evaluation';
import type { MockLogger } from '../../setup';

const STACK = ['Python', 'SQL'];

function history(values: number[], question = 'Explain a Python feature'): Pick<PolicyInput, 'scores' | 'answers' | 'questionsAsked'> {
    const scores: ScoreEntry[] = values.map((score, index) => ({
        index,
        question,
        score,
        feedback: [],
        mode: 'fallback'
    }));
    const answers: AnswerEntry[] = values.map((_, index) => ({
        index,
        question,
        answer: `Answer ${index}`,
        skipped: false
    }));
    return { scores, answers, questionsAsked: values.length };
}

describe('Assessment Policy', () => {
    let mockLogger: MockLogger;
    let policy: AssessmentPolicyService;

    beforeEach(() => {
        mockLogger = globalThis.testUtils.createMockLogger();
        policy = new AssessmentPolicyService(new StubChatHandle(), DEFAULT_ASSESSMENT_POLICY, mockLogger);
    });

    describe('forced stops', () => {
        it('should end on exit intent before anything else', async () => {
            const outcome = await policy.assess({
                ...history([0.9, 0.9]),
                techStack: STACK,
                latestAnswer: 'Please stop the interview'
            });

            expect(outcome).toEqual({
                confidence: 0.9,
                decision: 'Early Exit',
                needMore: false,
                focusAreas: [],
                reasoning: 'Candidate asked to end the assessment.',
                trigger: 'exit_intent'
            });
        });

        it('should return No Hire once the skip threshold is reached', async () => {
            const skipped: AnswerEntry[] = [0, 1, 2].map(index => ({
                index,
                question: `Question ${index}`,
                answer: 'Skipped',
                skipped: true
            }));
            const scores: ScoreEntry[] = skipped.map(entry => ({
                index: entry.index,
                question: entry.question,
                score: 0,
                feedback: [],
                mode: 'skipped'
            }));

            const outcome = await policy.assess({ scores, answers: skipped, techStack: STACK, questionsAsked: 3 });

            expect(outcome.decision).toBe('No Hire');
            expect(outcome.needMore).toBe(false);
            expect(outcome.trigger).toBe('skip_threshold');
            expect(outcome.reasoning).toBe('Candidate skipped 3 questions (limit 3).');
        });

        it('should stop at the question cap with a banded decision', async () => {
            const outcome = await policy.assess({
                ...history(new Array<number>(15).fill(0.5)),
                techStack: STACK
            });

            expect(outcome).toEqual({
                confidence: 0.5,
                decision: 'Borderline',
                needMore: false,
                focusAreas: ['Python'],
                reasoning: 'Question limit of 15 reached at confidence 50.0%.',
                trigger: 'question_cap'
            });
        });
    });

    describe('evidence gate', () => {
        it('should keep going before the minimum number of answers', async () => {
            const outcome = await policy.assess({ ...history([1, 1]), techStack: STACK });

            expect(outcome.decision).toBe('In Progress');
            expect(outcome.needMore).toBe(true);
            expect(outcome.trigger).toBe('insufficient_evidence');
            expect(outcome.reasoning).toBe('2 of 5 questions needed before a decision.');
        });

        it('should bound the minimum by the planned question count', async () => {
            const outcome = await policy.assess({ ...history([0.9, 0.9, 0.9]), techStack: STACK, plannedQuestions: 3 });

            expect(outcome.decision).toBe('Strong');
            expect(outcome.needMore).toBe(false);
            expect(outcome.reasoning).toBe('Confidence 90.0% meets the strong threshold of 75.0%.');
        });

        it('should decide immediately when the session is final', async () => {
            const outcome = await policy.assess({ ...history([0.9]), techStack: STACK, final: true });

            expect(outcome.decision).toBe('Strong');
            expect(outcome.trigger).toBe('manual_completion');
        });
    });

    describe('confidence bands', () => {
        it('should return No Hire below the lower threshold', async () => {
            const outcome = await policy.assess({ ...history([0.2, 0.2, 0.2, 0.2, 0.2]), techStack: STACK });

            expect(outcome.decision).toBe('No Hire');
            expect(outcome.needMore).toBe(false);
            expect(outcome.reasoning).toBe('Confidence 20.0% is below the no-hire threshold of 40.0%.');
        });

        it('should ask the model for focus areas when borderline', async () => {
            const handle = globalThis.testUtils.createScriptedHandle([
                '{"focus_areas": ["Query planning"], "reasoning": "Probe indexing decisions."}'
            ]);
            policy = new AssessmentPolicyService(handle, DEFAULT_ASSESSMENT_POLICY, mockLogger);

            const outcome = await policy.assess({ ...history([0.5, 0.5, 0.5, 0.5, 0.5]), techStack: STACK });

            expect(outcome).toEqual({
                confidence: 0.5,
                decision: 'Borderline',
                needMore: true,
                focusAreas: ['Query planning'],
                reasoning: 'Probe indexing decisions.',
                trigger: 'confidence_band'
            });
            expect(handle.prompts[0]).toContain('"running_confidence": 0.5');
            expect(handle.prompts[0]).toContain('"answer": "Answer 4"');
        });

        it('should use the weakest stack tags when the model reply is unusable', async () => {
            const handle = globalThis.testUtils.createScriptedHandle(['{"focus_areas": []}']);
            policy = new AssessmentPolicyService(handle, DEFAULT_ASSESSMENT_POLICY, mockLogger);

            const outcome = await policy.assess({ ...history([0.5, 0.5, 0.5, 0.5, 0.5]), techStack: STACK });

            expect(outcome.needMore).toBe(true);
            expect(outcome.focusAreas).toEqual(['Python']);
            expect(outcome.reasoning).toBe('Confidence 50.0% is between thresholds; probing weaker areas.');
            expect(mockLogger.warn).toHaveBeenCalledTimes(1);
        });

        it('should not call a stub handle for focus areas', async () => {
            const outcome = await policy.assess({ ...history([0.5, 0.5, 0.5, 0.5, 0.5]), techStack: STACK });

            expect(outcome.decision).toBe('Borderline');
            expect(outcome.focusAreas).toEqual(['Python']);
            expect(mockLogger.warn).not.toHaveBeenCalled();
        });

        it('should close a borderline session when final', async () => {
            const handle = globalThis.testUtils.createScriptedHandle(['{"focus_areas": ["Unused"]}']);
            policy = new AssessmentPolicyService(handle, DEFAULT_ASSESSMENT_POLICY, mockLogger);

            const outcome = await policy.assess({ ...history([0.5, 0.5, 0.5, 0.5, 0.5]), techStack: STACK, final: true });

            expect(outcome.needMore).toBe(false);
            expect(outcome.trigger).toBe('manual_completion');
            expect(outcome.reasoning).toBe('Assessment ended with mixed results at confidence 50.0%.');
            expect(handle.invoke).not.toHaveBeenCalled();
        });
    });

    describe('computeConfidence', () => {
        it('should average scores and treat an empty history as zero', () => {
            expect(computeConfidence([])).toBe(0);
            expect(computeConfidence(history([1, 0]).scores)).toBe(0.5);
        });
    });

    describe('determineFocusAreas', () => {
        it('should return stack tags named by weak answers in stack order', () => {
            const scores: ScoreEntry[] = [
                { index: 0, question: 'Explain SQL joins', score: 0.3, feedback: [], mode: 'llm' },
                { index: 1, question: 'What is a Python generator?', score: 0.9, feedback: [], mode: 'llm' },
                { index: 2, question: 'How does Docker layer caching work?', score: 0.2, feedback: [], mode: 'llm' }
            ];

            expect(determineFocusAreas(['Python', 'SQL', 'Docker'], scores)).toEqual(['SQL', 'Docker']);
        });

        it('should fall back to the full stack when nothing weak maps to a tag', () => {
            const scores: ScoreEntry[] = [
                { index: 0, question: 'Describe your last project', score: 0.2, feedback: [], mode: 'llm' }
            ];

            expect(determineFocusAreas(STACK, scores)).toEqual(['Python', 'SQL']);
        });
    });
});
