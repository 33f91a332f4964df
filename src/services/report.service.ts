import { z } from 'zod';
import { toCandidateInfoRecord, type CandidateProfile } from '../types/candidate';
import type { AnswerEntry, ScoreEntry } from '../types/evaluation';
import type { RecommendationReport } from '../types/report';

const SECTION_RULE = '='.repeat(80);
const ENTRY_RULE = '-'.repeat(80);

const reportSchema = z.object({
    candidate_info: z.object({
        'Full Name': z.string(),
        'Email': z.string(),
        'Phone': z.string(),
        'Years of Experience': z.number(),
        'Desired Position': z.string(),
        'Location': z.string(),
        'Tech Stack': z.array(z.string())
    }),
    answers: z.array(z.object({
        index: z.number().int(),
        question: z.string(),
        answer: z.string()
    })),
    scores: z.array(z.object({
        index: z.number().int(),
        question: z.string(),
        score: z.number()
    })),
    recommendation: z.string()
});

export function buildReport(
    profile: CandidateProfile,
    answers: AnswerEntry[],
    scores: ScoreEntry[],
    recommendation: string
): RecommendationReport {
    return {
        candidate_info: toCandidateInfoRecord(profile),
        answers: answers.map(entry => ({ index: entry.index, question: entry.question, answer: entry.answer })),
        scores: scores.map(entry => ({ index: entry.index, question: entry.question, score: entry.score })),
        recommendation
    };
}

/**
 * Serializes the report with its top-level keys in export order.
 */
export function renderReport(report: RecommendationReport): string {
    const ordered: RecommendationReport = {
        candidate_info: report.candidate_info,
        answers: report.answers,
        scores: report.scores,
        recommendation: report.recommendation
    };
    return JSON.stringify(ordered, null, 2);
}

export function parseReport(json: string): RecommendationReport {
    return reportSchema.parse(JSON.parse(json));
}

function formatTimestamp(date: Date): string {
    return date.toISOString().replace('T', ' ').slice(0, 19);
}

function section(title: string): string {
    return `${SECTION_RULE}\n${title}\n${SECTION_RULE}`;
}

/**
 * Plain-text export. With a planned count the completion line reads
 * answered/planned.
 */
export function renderTextReport(
    report: RecommendationReport,
    generatedAt: Date = new Date(),
    plannedQuestions?: number
): string {
    const average = report.scores.length > 0
        ? report.scores.reduce((sum, entry) => sum + entry.score, 0) / report.scores.length
        : 0;
    const completed = plannedQuestions === undefined
        ? `${report.answers.length}`
        : `${report.answers.length}/${plannedQuestions}`;

    const lines: string[] = [
        'Technical Screening Report',
        `Generated: ${formatTimestamp(generatedAt)}`,
        '',
        section('CANDIDATE INFORMATION'),
        JSON.stringify(report.candidate_info, null, 2),
        '',
        section('TECHNICAL ASSESSMENT RESULTS'),
        `Average Score: ${(average * 100).toFixed(1)}%`,
        `Questions Completed: ${completed}`,
        '',
        section('DETAILED ANSWERS')
    ];

    report.answers.forEach((entry, position) => {
        const score = report.scores.find(candidate => candidate.index === entry.index)?.score ?? 0;
        lines.push(
            '',
            `Question ${position + 1}:`,
            entry.question,
            '',
            'Answer:',
            entry.answer,
            '',
            `Score: ${(score * 100).toFixed(1)}%`,
            ENTRY_RULE
        );
    });

    lines.push('', section('RECOMMENDATION'), report.recommendation, '');

    return lines.join('\n');
}
