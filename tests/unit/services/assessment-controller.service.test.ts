import { describe, it, expect, beforeEach } from 'vitest';
import { AssessmentController } from '../../../src/services/assessment-controller.service';
import { SessionStore } from '../../../src/services/session-store.service';
import { ResumeService } from '../../../src/services/resume.service';
import { DEFAULT_ASSESSMENT_POLICY } from '../../../src/config/assessment-policy';
import { NO_EVALUATIONS_RECOMMENDATION } from '../../../src/services/recommendation.service';
import { SessionNotFoundError, SessionStateError, ValidationError } from '../../../src/utils/errors';
import type { ChatHandle } from '../../../src/types/llm';
import type { TurnResult } from '../../../src/types/assessment';
import type { FakeRegistry, MockLogger } from '../../setup';

// Three hedged words: 0.2 length base minus 0.05 for "no idea"
const WEAK_ANSWER = 'Honestly no idea.';

function borderlineEvaluator(): ChatHandle {
    return globalThis.testUtils.createScriptedHandle([
        (input: string) => input.includes('focus_areas')
            ? '{"focus_areas": ["Python"], "reasoning": "Probe Python internals."}'
            : '{"score": 5, "feedback": ["Partially correct"]}'
    ]);
}

describe('AssessmentController', () => {
    let mockLogger: MockLogger;
    let registry: FakeRegistry;
    let controller: AssessmentController;

    function buildController(handles: Partial<Record<'evaluation' | 'conversation' | 'recommendation', ChatHandle>> = {}): void {
        let counter = 0;
        registry = globalThis.testUtils.createFakeRegistry(handles);
        controller = new AssessmentController(
            registry,
            new SessionStore(() => `session-${++counter}`),
            DEFAULT_ASSESSMENT_POLICY,
            mockLogger,
            new ResumeService(mockLogger)
        );
    }

    beforeEach(() => {
        mockLogger = globalThis.testUtils.createMockLogger();
        buildController();
    });

    describe('startSession', () => {
        it('should freeze a normalised profile and plan bank questions', async () => {
            const session = await controller.startSession(globalThis.testUtils.sampleIntake({ fullName: '  Ada Example ' }));

            expect(session.id).toBe('session-1');
            expect(session.profile.fullName).toBe('Ada Example');
            expect(session.profile.techStack).toEqual(['Python', 'Django', 'SQL']);
            expect(Object.isFrozen(session.profile)).toBe(true);
            expect(session.persona).toBe('Default');
            expect(session.plannedQuestions).toHaveLength(5);
            expect(session.plannedQuestions[0]).toEqual({
                text: 'What is the difference between a list and a tuple in Python?',
                topics: ['python'],
                source: 'bank'
            });
            expect(session.phase).toBe('awaiting_first_question');
        });

        it('should reject invalid intake with field details', async () => {
            const intake = globalThis.testUtils.sampleIntake({ email: 'not-an-email', techStack: ' , ' });

            await expect(controller.startSession(intake)).rejects.toMatchObject({
                statusCode: 400,
                details: [
                    { field: 'email', message: 'Invalid email format' },
                    { field: 'techStack', message: 'At least one technology is required' }
                ]
            });
        });

        it('should pass the session credential to the registry and keep it out of views', async () => {
            const session = await controller.startSession(globalThis.testUtils.sampleIntake(), { apiKey: ' test-secret ' });

            expect(registry.getClient).toHaveBeenCalledWith('conversation', {
                apiKey: 'test-secret',
                allowLocalFallback: undefined
            });
            expect(session.credential).toBe('test-secret');
            expect(JSON.stringify(controller.describeSession(session.id, true))).not.toContain('test-secret');
        });

        it('should check the resume against the intake when text is supplied', async () => {
            const session = await controller.startSession(globalThis.testUtils.sampleIntake(), {
                resumeText: 'Backend engineer, 4 years of experience with Python, Django and SQL.'
            });

            expect(session.resumeConsistency).toEqual({ score: 1, findings: [] });
        });
    });

    describe('question flow', () => {
        it('should hand out the same pending question until it is answered', async () => {
            const session = await controller.startSession(globalThis.testUtils.sampleIntake());

            const first = await controller.nextQuestion(session.id);
            const again = await controller.nextQuestion(session.id);

            expect(first).toEqual({
                sessionId: 'session-1',
                completed: false,
                number: 1,
                question: 'What is the difference between a list and a tuple in Python?',
                topics: ['python'],
                questionsAsked: 0,
                maxQuestions: 15,
                decision: 'In Progress'
            });
            expect(again).toEqual(first);
        });

        it('should reject answers without a pending question or with blank text', async () => {
            const session = await controller.startSession(globalThis.testUtils.sampleIntake());

            await expect(controller.submitAnswer(session.id, 'Tuples are immutable.')).rejects.toThrow(
                'No question is pending; request the next question first'
            );

            await controller.nextQuestion(session.id);
            await expect(controller.submitAnswer(session.id, '   ')).rejects.toBeInstanceOf(ValidationError);
        });

        it('should grade with the heuristic and decide once enough evidence exists', async () => {
            const session = await controller.startSession(globalThis.testUtils.sampleIntake());

            await controller.nextQuestion(session.id);
            const firstTurn = await controller.submitAnswer(session.id, WEAK_ANSWER);

            expect(firstTurn).toMatchObject({
                recorded: true,
                score: 0.15,
                completed: false,
                decision: 'In Progress',
                questionsAsked: 1
            });

            let last = firstTurn;
            for (let i = 2; i <= 5; i++) {
                await controller.nextQuestion(session.id);
                last = await controller.submitAnswer(session.id, WEAK_ANSWER);
            }

            expect(last.completed).toBe(true);
            expect(last.decision).toBe('No Hire');

            const report = controller.getReport(session.id);
            expect(report.answers).toHaveLength(5);
            expect(report.scores.map(entry => entry.score)).toEqual([0.15, 0.15, 0.15, 0.15, 0.15]);
            expect(report.recommendation).toBe(
                'Needs Further Assessment. Average score 15.0% across 5 question(s). Significant gaps were observed; proceed with caution.'
            );
        });

        it('should end on exit intent without recording the answer', async () => {
            const session = await controller.startSession(globalThis.testUtils.sampleIntake());
            await controller.nextQuestion(session.id);

            const turn = await controller.submitAnswer(session.id, 'I would like to quit now');

            expect(turn).toEqual({
                recorded: false,
                score: 0,
                feedback: [],
                sentiment: null,
                sentimentFeedback: null,
                completed: true,
                decision: 'Early Exit',
                questionsAsked: 0
            });
            const report = controller.getReport(session.id);
            expect(report.answers).toEqual([]);
            expect(report.recommendation).toBe(NO_EVALUATIONS_RECOMMENDATION);
            expect(controller.getTextReport(session.id).split('\n')).toContain('Questions Completed: 0/5');
        });

        it('should return No Hire after three skips', async () => {
            const session = await controller.startSession(globalThis.testUtils.sampleIntake());

            const turns: TurnResult[] = [];
            for (let i = 0; i < 3; i++) {
                await controller.nextQuestion(session.id);
                turns.push(await controller.skipQuestion(session.id));
            }

            expect(turns.map(turn => turn.completed)).toEqual([false, false, true]);
            expect(turns[2].decision).toBe('No Hire');
            expect(controller.getSession(session.id).reasoning).toBe('Candidate skipped 3 questions (limit 3).');
            expect(controller.getReport(session.id).answers.map(entry => entry.answer)).toEqual(['Skipped', 'Skipped', 'Skipped']);
        });

        it('should stop at the question cap with focused follow-ups after the plan', async () => {
            buildController({ evaluation: borderlineEvaluator() });
            const session = await controller.startSession(globalThis.testUtils.sampleIntake());

            const sources: string[] = [];
            let completed = false;
            while (!completed) {
                const view = await controller.nextQuestion(session.id);
                sources.push(controller.getSession(session.id).currentQuestion?.source ?? 'none');
                completed = (await controller.submitAnswer(session.id, 'Generators yield values lazily.')).completed;
                expect(view.number).toBe(sources.length);
            }

            const state = controller.getSession(session.id);
            expect(state.questionsAsked).toBe(15);
            expect(state.decision).toBe('Borderline');
            expect(sources.slice(0, 5)).toEqual(['bank', 'bank', 'bank', 'bank', 'bank']);
            expect(sources[5]).toBe('template');
            expect(new Set(state.answers.map(entry => entry.question)).size).toBe(15);

            const after = await controller.nextQuestion(session.id);
            expect(after.completed).toBe(true);
            expect(after.question).toBeNull();
        });

        it('should complete on request and generate the recommendation once', async () => {
            const recommender = globalThis.testUtils.createScriptedHandle(['Hire.']);
            buildController({ recommendation: recommender });
            const session = await controller.startSession(globalThis.testUtils.sampleIntake());
            await controller.nextQuestion(session.id);
            await controller.submitAnswer(session.id, WEAK_ANSWER);

            await controller.completeNow(session.id);
            await controller.completeNow(session.id);

            expect(controller.getSession(session.id).decision).toBe('No Hire');
            expect(controller.getReport(session.id).recommendation).toBe('Hire.');
            expect(recommender.invoke).toHaveBeenCalledTimes(1);
            await expect(controller.skipQuestion(session.id)).rejects.toThrow('Assessment is already completed');
        });
    });

    describe('reporting and reset', () => {
        it('should refuse a report before completion', async () => {
            const session = await controller.startSession(globalThis.testUtils.sampleIntake());

            expect(() => controller.getReport(session.id)).toThrow(SessionStateError);
            expect(() => controller.getReport(session.id)).toThrow('Report is available once the assessment is completed');
        });

        it('should describe a session with assessment details only when asked', async () => {
            const session = await controller.startSession(globalThis.testUtils.sampleIntake());

            const basic = controller.describeSession(session.id);
            const admin = controller.describeSession(session.id, true);

            expect(basic.confidence).toBeUndefined();
            expect(admin.focusAreas).toEqual(['Python', 'Django', 'SQL']);
            expect(basic).toMatchObject({ candidate: 'Ada Example', answered: 0, skipped: 0, completedAt: null });
        });

        it('should discard a session on reset', async () => {
            const session = await controller.startSession(globalThis.testUtils.sampleIntake());

            controller.resetSession(session.id);

            expect(() => controller.getSession(session.id)).toThrow(SessionNotFoundError);
            expect(() => controller.resetSession(session.id)).toThrow(SessionNotFoundError);
            expect(mockLogger.info).toHaveBeenCalledWith({ sessionId: 'session-1' }, 'assessment.reset');
        });
    });
});
