import pdf from 'pdf-parse';
import mammoth from 'mammoth';
import { z } from 'zod';
import { logger as defaultLogger, errorFields, type ILogger } from '../config/logger';
import { RESUME_CONSISTENCY } from '../config/assessment-policy';
import { isStubHandle } from './chat-handles';
import { buildResumeParsePrompt } from '../prompts/resume.prompt';
import { extractJsonObject } from '../utils/json.util';
import { parseTechStack } from '../utils/validators';
import type { ChatHandle } from '../types/llm';
import type { CandidateInfoRecord, CandidateProfile, ResumeConsistency } from '../types/candidate';

export const PDF_MIME_TYPE = 'application/pdf';
export const DOCX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
export const SUPPORTED_RESUME_TYPES: readonly string[] = [PDF_MIME_TYPE, DOCX_MIME_TYPE];

const EXPERIENCE_PATTERNS = [
    /(\d+)\+?\s*(?:years?|yrs?).+?experience/g,
    /experience.+?(\d+)\+?\s*(?:years?|yrs?)/g
];
const EMPLOYMENT_SINCE_PATTERN = /(\d{4})\s*-\s*(?:present|current|now)/g;

const SKILL_PATTERN = new RegExp([
    'python', 'java', 'javascript', 'c\\+\\+', 'ruby', 'php', 'swift', 'kotlin', 'go', 'rust',
    'django', 'flask', 'spring', 'react', 'angular', 'vue', 'express', 'rails', 'laravel',
    'sql', 'mysql', 'postgresql', 'mongodb', 'redis', 'elasticsearch', 'cassandra',
    'git', 'docker', 'kubernetes', 'jenkins', 'aws', 'azure', 'gcp', 'terraform', 'ansible'
].join('|'), 'g');

const resumeDraftSchema = z.object({
    'Full Name': z.string().default(''),
    'Email': z.string().default(''),
    'Phone': z.coerce.string().default(''),
    'Years of Experience': z.coerce.number().int().min(0).catch(0),
    'Desired Position': z.string().min(1).catch('Software Engineer'),
    'Location': z.string().default(''),
    'Tech Stack': z.union([z.array(z.string()), z.string()]).transform(parseTechStack).catch([])
});

/**
 * Resume Service
 *
 * Reads uploaded resumes, drafts a candidate profile from them with the
 * conversation model, and checks intake answers against the resume text.
 */
export class ResumeService {
    constructor(private logger: ILogger = defaultLogger) { }

    /**
     * Plain text of a PDF or DOCX upload. Empty string on any failure.
     */
    async extractResumeText(buffer: Buffer, mimeType: string): Promise<string> {
        try {
            let text: string;
            if (mimeType === PDF_MIME_TYPE) {
                text = (await pdf(buffer)).text;
            } else if (mimeType === DOCX_MIME_TYPE) {
                text = (await mammoth.extractRawText({ buffer })).value;
            } else {
                this.logger.warn({ mimeType }, 'Unsupported resume format');
                return '';
            }

            if (!text.trim()) {
                this.logger.warn({ mimeType }, 'Resume contains no extractable text');
                return '';
            }

            this.logger.info({ mimeType, textLength: text.length }, 'Resume text extracted');
            return text;
        } catch (error) {
            this.logger.warn({ mimeType, ...errorFields(error) }, 'Resume text extraction failed');
            return '';
        }
    }

    /**
     * Seven-key profile draft from resume text, or null when the model is a
     * stub, the key is malformed, or the reply cannot be parsed.
     */
    async parseResumeDraft(text: string, llm: ChatHandle): Promise<CandidateInfoRecord | null> {
        if (!text.trim()) {
            return null;
        }
        if (isStubHandle(llm) || !llm.keyFormatValid) {
            this.logger.info({ backend: llm.backend.label }, 'Model unavailable; skipping resume parse');
            return null;
        }

        try {
            const reply = await llm.invoke(buildResumeParsePrompt(text));
            const draft = resumeDraftSchema.parse(extractJsonObject(reply));
            this.logger.info({ skills: draft['Tech Stack'].length }, 'Resume draft parsed');
            return draft;
        } catch (error) {
            this.logger.warn({ ...errorFields(error) }, 'Resume parse failed');
            return null;
        }
    }

    analyzeResumeConsistency(text: string, profile: CandidateProfile, now: Date = new Date()): ResumeConsistency {
        const lowered = text.toLowerCase();
        const findings: string[] = [];
        let score = 1.0;

        const yearsFound: number[] = [];
        for (const pattern of EXPERIENCE_PATTERNS) {
            for (const match of lowered.matchAll(pattern)) {
                yearsFound.push(Number(match[1]));
            }
        }
        for (const match of lowered.matchAll(EMPLOYMENT_SINCE_PATTERN)) {
            yearsFound.push(now.getUTCFullYear() - Number(match[1]));
        }
        if (yearsFound.length > 0) {
            const resumeYears = Math.max(...yearsFound);
            if (Math.abs(resumeYears - profile.yearsOfExperience) > RESUME_CONSISTENCY.EXPERIENCE_TOLERANCE_YEARS) {
                score += RESUME_CONSISTENCY.EXPERIENCE_MISMATCH_PENALTY;
                findings.push(`Experience discrepancy: claimed ${profile.yearsOfExperience} years, resume suggests ${resumeYears} years`);
            }
        }

        const foundSkills = new Set(Array.from(lowered.matchAll(SKILL_PATTERN), match => match[0]));
        const missingSkills = [...new Set(profile.techStack.map(skill => skill.toLowerCase()))]
            .filter(skill => !foundSkills.has(skill));
        if (missingSkills.length > 0) {
            score += missingSkills.length * RESUME_CONSISTENCY.SKILL_MISMATCH_PENALTY;
            findings.push(`Skills mentioned but not found in resume: ${missingSkills.join(', ')}`);
        }

        const positionWords = profile.desiredPosition.toLowerCase().split(/\s+/).filter(word => word.length > 3);
        if (positionWords.some(word => lowered.includes(word))) {
            score += RESUME_CONSISTENCY.POSITION_MATCH_BONUS;
        } else {
            score += RESUME_CONSISTENCY.POSITION_MISMATCH_PENALTY;
            findings.push('Desired position not aligned with resume content');
        }

        return {
            score: Math.round(Math.max(0, Math.min(1, score)) * 100) / 100,
            findings
        };
    }
}
