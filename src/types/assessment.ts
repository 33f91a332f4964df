import type { CandidateProfile, InterviewPersona, ResumeConsistency } from './candidate';
import type { AnswerEntry, Question, ScoreEntry, SentimentSnapshot } from './evaluation';

export type AssessmentDecision = 'Strong' | 'Borderline' | 'No Hire' | 'Early Exit' | 'In Progress';

export type TerminalDecision = Exclude<AssessmentDecision, 'In Progress'>;

export type AssessmentPhase = 'awaiting_first_question' | 'in_progress' | 'completed';

/** What drove the latest policy outcome. */
export type AssessmentTrigger =
    | 'exit_intent'
    | 'skip_threshold'
    | 'question_cap'
    | 'insufficient_evidence'
    | 'confidence_band'
    | 'manual_completion';

export interface PolicyInput {
    scores: ScoreEntry[];
    answers: AnswerEntry[];
    techStack: string[];
    questionsAsked: number;
    /** Text submitted in the current round, checked for exit intent. */
    latestAnswer?: string;
    /** Planned (initial) question count; bounds the minimum-evidence gate. */
    plannedQuestions?: number;
    /** Set when the session must end now; never yields 'In Progress'. */
    final?: boolean;
}

export interface PolicyOutcome {
    confidence: number;
    decision: AssessmentDecision;
    needMore: boolean;
    focusAreas: string[];
    reasoning: string;
    trigger: AssessmentTrigger;
}

export interface SessionState {
    id: string;
    profile: Readonly<CandidateProfile>;
    credential?: string;
    /** Unset means the deployment default applies. */
    allowLocalFallback?: boolean;
    persona: InterviewPersona;
    phase: AssessmentPhase;
    plannedQuestions: Question[];
    nextPlannedIndex: number;
    currentQuestion: Question | null;
    answers: AnswerEntry[];
    scores: ScoreEntry[];
    sentiments: Array<{ index: number; snapshot: SentimentSnapshot }>;
    questionsAsked: number;
    confidence: number;
    decision: AssessmentDecision;
    needMore: boolean;
    focusAreas: string[];
    reasoning: string;
    recommendation: string | null;
    resumeConsistency?: ResumeConsistency;
    createdAt: Date;
    completedAt: Date | null;
}

export interface TurnResult {
    recorded: boolean;
    score: number;
    feedback: string[];
    sentiment: SentimentSnapshot | null;
    sentimentFeedback: string | null;
    completed: boolean;
    decision: AssessmentDecision;
    questionsAsked: number;
}
