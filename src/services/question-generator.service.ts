import questionBankData from '../data/question-bank.json';
import { logger as defaultLogger, errorFields, type ILogger } from '../config/logger';
import { isStubHandle } from './chat-handles';
import {
    ANTI_DUPLICATION_INSTRUCTION,
    buildFocusedQuestionPrompt,
    buildQuestionLadderPrompt
} from '../prompts/question.prompts';
import type { ChatHandle, ChatMessage } from '../types/llm';
import type { Question } from '../types/evaluation';

export type QuestionBank = Record<string, string[]>;

export const QUESTION_BANK: QuestionBank = questionBankData;
export const INITIAL_QUESTION_COUNT = 5;
export const SIMILARITY_THRESHOLD = 0.7;
export const EXIT_PHRASES: readonly string[] = ['exit', 'quit', 'stop', 'end assessment', 'end'];

const QUESTION_LINE = /^Question\s+\d+\s*:/i;

/**
 * Curated questions for every bank key that matches a declared tag.
 * A tag matches a key when either contains the other (case-insensitive).
 * Banks are taken in declaration order, each at most once.
 */
export function matchBankQuestions(techStack: string[], bank: QuestionBank = QUESTION_BANK): Question[] {
    const usedKeys = new Set<string>();
    const questions: Question[] = [];

    for (const tech of techStack) {
        const tag = tech.toLowerCase().trim();
        if (!tag) {
            continue;
        }
        for (const [key, bankQuestions] of Object.entries(bank)) {
            if (usedKeys.has(key) || !(key.includes(tag) || tag.includes(key))) {
                continue;
            }
            usedKeys.add(key);
            questions.push(...bankQuestions.map(text => ({ text, topics: [key], source: 'bank' as const })));
        }
    }

    return questions;
}

/**
 * Word-set overlap: shared words over the size of the larger set.
 */
export function similarity(first: string, second: string): number {
    const firstWords = new Set(first.toLowerCase().split(/\s+/).filter(Boolean));
    const secondWords = new Set(second.toLowerCase().split(/\s+/).filter(Boolean));
    const larger = Math.max(firstWords.size, secondWords.size);
    if (larger === 0) {
        return 0;
    }
    let shared = 0;
    for (const word of firstWords) {
        if (secondWords.has(word)) {
            shared++;
        }
    }
    return shared / larger;
}

/**
 * Substring match against the exit phrases, so "backend" also matches.
 */
export function detectExitIntent(text: string): boolean {
    const normalized = text.toLowerCase().trim();
    return EXIT_PHRASES.some(phrase => normalized.includes(phrase));
}

export function parseQuestionLines(reply: string): string[] {
    return reply
        .split(/\r?\n/)
        .map(line => line.replace(/\*\*/g, '').replace(/^[\s>#*-]+/, '').trim())
        .filter(line => QUESTION_LINE.test(line));
}

function cleanSingleQuestion(reply: string): string {
    return reply
        .trim()
        .replace(/\*\*/g, '')
        .replace(/^["'“]+|["'”]+$/g, '')
        .trim();
}

export function templateLadder(techStack: string[]): Question[] {
    const primary = techStack[0] ?? 'your primary technology';
    const stack = techStack.length > 0 ? techStack.join(', ') : 'your stack';
    const texts = [
        `Question 1: What is the core purpose of ${primary}, and where is it typically used?`,
        `Question 2: How does ${primary} handle errors or failure cases at a fundamental level?`,
        `Question 3: In a simple web application built with ${stack}, how would you handle invalid user input?`,
        `Question 4: How would you track down a slow operation in a system built with ${stack}?`,
        `Question 5: Explain the trade-offs you would consider when scaling an application built with ${stack}.`
    ];
    return texts.map(text => ({ text, topics: [...techStack], source: 'template' as const }));
}

export function templateFocusedQuestion(techStack: string[], focusAreas: string[], previousQuestions: string[]): Question {
    const areas = focusAreas.length > 0 ? focusAreas : techStack.length > 0 ? techStack : ['software engineering'];
    const asked = new Set(previousQuestions);
    const templates = [
        (area: string) => `Walk through a production problem you solved involving ${area}. What trade-offs did you weigh?`,
        (area: string) => `How would you debug a performance issue related to ${area}?`,
        (area: string) => `What are common pitfalls when working with ${area}, and how do you avoid them?`,
        (area: string) => `How would you explain the key design decisions behind ${area} to a junior engineer?`
    ];

    for (const template of templates) {
        for (const area of areas) {
            const text = template(area);
            if (!asked.has(text)) {
                return { text, topics: [area], source: 'template' };
            }
        }
    }

    const area = areas[previousQuestions.length % areas.length];
    return {
        text: `Describe another challenging ${area} problem you have worked on (follow-up ${previousQuestions.length + 1}).`,
        topics: [area],
        source: 'template'
    };
}

/**
 * Question Generator Service
 *
 * Supplies the opening question set (curated bank first, model-generated
 * ladder otherwise) and single focused follow-ups. Falls back to fixed
 * templates whenever the model is unavailable.
 */
export class QuestionGeneratorService {
    constructor(
        private llm: ChatHandle,
        private logger: ILogger = defaultLogger,
        private history: ChatMessage[] = []
    ) { }

    async initialQuestions(techStack: string[]): Promise<Question[]> {
        const banked = matchBankQuestions(techStack);
        if (banked.length > 0) {
            this.logger.info({
                techStack,
                matched: banked.length
            }, 'Initial questions taken from question bank');
            return banked.slice(0, INITIAL_QUESTION_COUNT);
        }

        if (isStubHandle(this.llm)) {
            this.logger.info({ techStack }, 'No bank match and no model available; using template ladder');
            return templateLadder(techStack);
        }

        try {
            const reply = await this.llm.invoke(buildQuestionLadderPrompt(techStack.join(', ')), this.history);
            const lines = parseQuestionLines(reply).slice(0, INITIAL_QUESTION_COUNT);
            if (lines.length > 0) {
                this.logger.info({ techStack, generated: lines.length }, 'Initial questions generated');
                return lines.map(text => ({ text, topics: [...techStack], source: 'generated' }));
            }
            this.logger.warn({ techStack }, 'Generated question ladder had no usable lines');
        } catch (error) {
            this.logger.warn({ techStack, ...errorFields(error) }, 'Question ladder generation failed');
        }

        return templateLadder(techStack);
    }

    /**
     * One question aimed at the given focus areas. A candidate too close to
     * an earlier question gets exactly one regeneration; the second result
     * is kept whatever its similarity.
     */
    async focusedQuestion(techStack: string[], focusAreas: string[], previousQuestions: string[]): Promise<Question> {
        if (isStubHandle(this.llm)) {
            return templateFocusedQuestion(techStack, focusAreas, previousQuestions);
        }

        const prompt = buildFocusedQuestionPrompt({ techStack, focusAreas, previousQuestions });
        try {
            let text = cleanSingleQuestion(await this.llm.invoke(prompt, this.history));
            if (previousQuestions.some(previous => similarity(text, previous) > SIMILARITY_THRESHOLD)) {
                this.logger.info({ focusAreas }, 'Focused question too similar to an earlier one; regenerating');
                text = cleanSingleQuestion(await this.llm.invoke(`${prompt}\n${ANTI_DUPLICATION_INSTRUCTION}`, this.history));
            }
            if (text) {
                return { text, topics: [...focusAreas], source: 'focused' };
            }
        } catch (error) {
            this.logger.warn({ focusAreas, ...errorFields(error) }, 'Focused question generation failed');
        }

        return templateFocusedQuestion(techStack, focusAreas, previousQuestions);
    }
}
