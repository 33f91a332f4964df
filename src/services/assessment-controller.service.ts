import { logger as defaultLogger, type ILogger } from '../config/logger';
import { DEFAULT_ASSESSMENT_POLICY, type AssessmentPolicyConfig } from '../config/assessment-policy';
import { AnswerEvaluatorService } from './answer-evaluator.service';
import { AssessmentPolicyService } from './assessment-policy.service';
import { QuestionGeneratorService, detectExitIntent } from './question-generator.service';
import { RecommendationService } from './recommendation.service';
import { ResumeService } from './resume.service';
import { SessionStore } from './session-store.service';
import { buildReport, renderTextReport } from './report.service';
import { determinePersona, personaHistory } from '../prompts/persona.prompt';
import { analyzeSentiment, sentimentFeedback } from '../utils/sentiment.util';
import { parseTechStack, validateIntake } from '../utils/validators';
import { SessionNotFoundError, SessionStateError, ValidationError } from '../utils/errors';
import type { ILlmRegistry } from './llm-registry.service';
import type { ChatHandle, LlmProfile } from '../types/llm';
import type { CandidateIntake, CandidateProfile } from '../types/candidate';
import type { AssessmentDecision, PolicyInput, PolicyOutcome, SessionState, TurnResult } from '../types/assessment';
import { SKIPPED_ANSWER, type Question } from '../types/evaluation';
import type { RecommendationReport } from '../types/report';

export interface StartSessionOptions {
    apiKey?: string;
    allowLocalFallback?: boolean;
    resumeText?: string;
}

export interface QuestionView {
    sessionId: string;
    completed: boolean;
    number: number | null;
    question: string | null;
    topics: string[];
    questionsAsked: number;
    maxQuestions: number;
    decision: AssessmentDecision;
}

export interface SessionView {
    sessionId: string;
    candidate: string;
    persona: SessionState['persona'];
    phase: SessionState['phase'];
    questionsAsked: number;
    answered: number;
    skipped: number;
    decision: AssessmentDecision;
    createdAt: string;
    completedAt: string | null;
    confidence?: number;
    focusAreas?: string[];
    reasoning?: string;
}

/**
 * Assessment Controller
 *
 * Drives one screening session from intake to report: hands out planned
 * questions then focused follow-ups, records and grades answers, and asks
 * the stopping policy after every turn. Each operation holds the session
 * exclusively for its duration.
 */
export class AssessmentController {
    constructor(
        private registry: ILlmRegistry,
        private store: SessionStore = new SessionStore(),
        private policy: AssessmentPolicyConfig = DEFAULT_ASSESSMENT_POLICY,
        private logger: ILogger = defaultLogger,
        private resumeService: ResumeService = new ResumeService(logger)
    ) { }

    async startSession(intake: CandidateIntake, options: StartSessionOptions = {}): Promise<SessionState> {
        const issues = validateIntake(intake);
        if (issues.length > 0) {
            throw new ValidationError('Invalid candidate details', issues);
        }

        const profile: CandidateProfile = Object.freeze({
            fullName: intake.fullName.trim(),
            email: intake.email.trim(),
            phone: intake.phone.trim(),
            yearsOfExperience: intake.yearsOfExperience,
            desiredPosition: intake.desiredPosition.trim(),
            location: intake.location.trim(),
            techStack: parseTechStack(intake.techStack)
        });
        const persona = determinePersona(profile);
        const credential = options.apiKey?.trim() || undefined;
        const allowLocalFallback = options.allowLocalFallback;

        const conversation = this.registry.getClient('conversation', { apiKey: credential, allowLocalFallback });
        const generator = new QuestionGeneratorService(conversation, this.logger, personaHistory(persona));
        const plannedQuestions = await generator.initialQuestions(profile.techStack);

        const session = this.store.create({
            profile,
            credential,
            allowLocalFallback,
            persona,
            phase: 'awaiting_first_question',
            plannedQuestions,
            nextPlannedIndex: 0,
            currentQuestion: null,
            answers: [],
            scores: [],
            sentiments: [],
            questionsAsked: 0,
            confidence: 0,
            decision: 'In Progress',
            needMore: true,
            focusAreas: [...profile.techStack],
            reasoning: '',
            recommendation: null,
            resumeConsistency: options.resumeText
                ? this.resumeService.analyzeResumeConsistency(options.resumeText, profile)
                : undefined,
            completedAt: null
        });

        this.logger.info({
            sessionId: session.id,
            persona,
            plannedQuestions: plannedQuestions.length,
            backend: conversation.backend.label
        }, 'assessment.started');

        return session;
    }

    getSession(id: string): SessionState {
        return this.store.require(id);
    }

    backendLabel(id: string): string {
        return this.client(this.store.require(id), 'conversation').backend.label;
    }

    describeSession(id: string, includeAssessment: boolean = false): SessionView {
        const session = this.store.require(id);
        const skipped = session.answers.filter(answer => answer.skipped).length;
        const view: SessionView = {
            sessionId: session.id,
            candidate: session.profile.fullName,
            persona: session.persona,
            phase: session.phase,
            questionsAsked: session.questionsAsked,
            answered: session.answers.length - skipped,
            skipped,
            decision: session.decision,
            createdAt: session.createdAt.toISOString(),
            completedAt: session.completedAt ? session.completedAt.toISOString() : null
        };
        if (includeAssessment) {
            view.confidence = session.confidence;
            view.focusAreas = [...session.focusAreas];
            view.reasoning = session.reasoning;
        }
        return view;
    }

    async nextQuestion(id: string): Promise<QuestionView> {
        return this.store.runExclusive(id, async (session) => {
            if (session.phase === 'completed' || session.currentQuestion) {
                return this.questionView(session);
            }

            if (session.questionsAsked >= this.policy.maxQuestions) {
                const outcome = await this.policyFor(session).assess(this.policyInput(session, { final: true }));
                await this.complete(session, outcome);
                return this.questionView(session);
            }

            session.currentQuestion = await this.pickQuestion(session);
            session.phase = 'in_progress';
            return this.questionView(session);
        });
    }

    async submitAnswer(id: string, text: string): Promise<TurnResult> {
        return this.store.runExclusive(id, async (session) => {
            const question = this.requirePendingQuestion(session);
            if (!text.trim()) {
                throw new ValidationError('Answer must not be empty', [{ field: 'answer', message: 'Answer is required' }]);
            }

            if (detectExitIntent(text)) {
                const outcome = await this.policyFor(session).assess(this.policyInput(session, { latestAnswer: text }));
                await this.complete(session, outcome);
                return this.turnResult(session, { recorded: false, score: 0, feedback: [], sentiment: null });
            }

            const index = session.questionsAsked + 1;
            const sentiment = analyzeSentiment(text);
            const evaluation = await this.evaluatorFor(session).evaluate(question.text, text, session.profile.techStack);

            session.answers.push({ index, question: question.text, answer: text, skipped: false });
            session.scores.push({
                index,
                question: question.text,
                score: evaluation.score,
                feedback: evaluation.feedback,
                mode: evaluation.mode
            });
            session.sentiments.push({ index, snapshot: sentiment });
            session.questionsAsked = index;
            session.currentQuestion = null;

            this.logger.info({
                sessionId: session.id,
                index,
                score: evaluation.score,
                mode: evaluation.mode
            }, 'answer.recorded');

            await this.afterTurn(session, text);
            return this.turnResult(session, {
                recorded: true,
                score: evaluation.score,
                feedback: evaluation.feedback,
                sentiment
            });
        });
    }

    async skipQuestion(id: string): Promise<TurnResult> {
        return this.store.runExclusive(id, async (session) => {
            const question = this.requirePendingQuestion(session);
            const index = session.questionsAsked + 1;

            session.answers.push({ index, question: question.text, answer: SKIPPED_ANSWER, skipped: true });
            session.scores.push({ index, question: question.text, score: 0, feedback: [], mode: 'skipped' });
            session.questionsAsked = index;
            session.currentQuestion = null;

            this.logger.info({ sessionId: session.id, index }, 'answer.skipped');

            await this.afterTurn(session);
            return this.turnResult(session, { recorded: true, score: 0, feedback: [], sentiment: null });
        });
    }

    async completeNow(id: string): Promise<SessionState> {
        return this.store.runExclusive(id, async (session) => {
            if (session.phase !== 'completed') {
                const outcome = await this.policyFor(session).assess(this.policyInput(session, { final: true }));
                await this.complete(session, outcome);
            }
            return session;
        });
    }

    getReport(id: string): RecommendationReport {
        const session = this.store.require(id);
        if (session.phase !== 'completed' || session.recommendation === null) {
            throw new SessionStateError('Report is available once the assessment is completed');
        }
        return buildReport(session.profile, session.answers, session.scores, session.recommendation);
    }

    getTextReport(id: string, generatedAt: Date = new Date()): string {
        const report = this.getReport(id);
        const session = this.store.require(id);
        return renderTextReport(report, generatedAt, session.plannedQuestions.length);
    }

    resetSession(id: string): void {
        if (!this.store.delete(id)) {
            throw new SessionNotFoundError(id);
        }
        this.logger.info({ sessionId: id }, 'assessment.reset');
    }

    private client(session: SessionState, profile: LlmProfile): ChatHandle {
        return this.registry.getClient(profile, {
            apiKey: session.credential,
            allowLocalFallback: session.allowLocalFallback
        });
    }

    private policyFor(session: SessionState): AssessmentPolicyService {
        return new AssessmentPolicyService(this.client(session, 'evaluation'), this.policy, this.logger);
    }

    private evaluatorFor(session: SessionState): AnswerEvaluatorService {
        return new AnswerEvaluatorService(this.client(session, 'evaluation'), this.logger);
    }

    private async pickQuestion(session: SessionState): Promise<Question> {
        if (session.nextPlannedIndex < session.plannedQuestions.length) {
            const planned = session.plannedQuestions[session.nextPlannedIndex];
            session.nextPlannedIndex++;
            return planned;
        }

        const generator = new QuestionGeneratorService(
            this.client(session, 'conversation'),
            this.logger,
            personaHistory(session.persona)
        );
        const focusAreas = session.focusAreas.length > 0 ? session.focusAreas : session.profile.techStack;
        return generator.focusedQuestion(
            session.profile.techStack,
            focusAreas,
            session.answers.map(answer => answer.question)
        );
    }

    private requirePendingQuestion(session: SessionState): Question {
        if (session.phase === 'completed') {
            throw new SessionStateError('Assessment is already completed');
        }
        if (!session.currentQuestion) {
            throw new SessionStateError('No question is pending; request the next question first');
        }
        return session.currentQuestion;
    }

    private policyInput(session: SessionState, extra: Pick<PolicyInput, 'latestAnswer' | 'final'>): PolicyInput {
        return {
            scores: session.scores,
            answers: session.answers,
            techStack: session.profile.techStack,
            questionsAsked: session.questionsAsked,
            plannedQuestions: session.plannedQuestions.length,
            ...extra
        };
    }

    private async afterTurn(session: SessionState, latestAnswer?: string): Promise<void> {
        const outcome = await this.policyFor(session).assess(this.policyInput(session, { latestAnswer }));
        if (!outcome.needMore || session.questionsAsked >= this.policy.maxQuestions) {
            await this.complete(session, outcome);
            return;
        }
        this.apply(session, outcome);
    }

    private apply(session: SessionState, outcome: PolicyOutcome): void {
        session.confidence = outcome.confidence;
        session.decision = outcome.decision;
        session.needMore = outcome.needMore;
        session.focusAreas = outcome.focusAreas;
        session.reasoning = outcome.reasoning;
    }

    private async complete(session: SessionState, outcome: PolicyOutcome): Promise<void> {
        this.apply(session, outcome);
        session.needMore = false;
        session.phase = 'completed';
        session.currentQuestion = null;
        session.completedAt = new Date();

        if (session.recommendation === null) {
            const recommender = new RecommendationService(this.client(session, 'recommendation'), this.logger);
            session.recommendation = await recommender.finalRecommendation(session.profile, session.answers, session.scores);
        }

        this.logger.info({
            sessionId: session.id,
            decision: session.decision,
            confidence: session.confidence,
            questionsAsked: session.questionsAsked,
            trigger: outcome.trigger
        }, 'assessment.completed');
    }

    private questionView(session: SessionState): QuestionView {
        const current = session.currentQuestion;
        return {
            sessionId: session.id,
            completed: session.phase === 'completed',
            number: current ? session.questionsAsked + 1 : null,
            question: current ? current.text : null,
            topics: current ? [...current.topics] : [],
            questionsAsked: session.questionsAsked,
            maxQuestions: this.policy.maxQuestions,
            decision: session.decision
        };
    }

    private turnResult(
        session: SessionState,
        turn: Pick<TurnResult, 'recorded' | 'score' | 'feedback' | 'sentiment'>
    ): TurnResult {
        return {
            ...turn,
            sentimentFeedback: turn.sentiment ? sentimentFeedback(turn.sentiment) : null,
            completed: session.phase === 'completed',
            decision: session.decision,
            questionsAsked: session.questionsAsked
        };
    }
}
