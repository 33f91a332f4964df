/**
 * Intake and credential validators.
 */
import type { CandidateIntake } from '../types/candidate';
import type { FieldIssue } from './errors';

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const API_KEY_PATTERN = /^gsk_[A-Za-z0-9\-_]{16,128}$/;
const API_KEY_SEARCH = /gsk_[A-Za-z0-9\-_]{16,128}/g;

export const PHONE_MIN_DIGITS = 10;
export const PHONE_MAX_DIGITS = 15;

export function validateEmail(email: string): boolean {
    return EMAIL_PATTERN.test(email.trim());
}

/**
 * Strips spaces, dashes and parentheses plus one leading "+", then
 * requires 10-15 digits.
 */
export function normalizePhone(phone: string): string {
    const stripped = phone.replace(/[\s\-()]/g, '');
    return stripped.startsWith('+') ? stripped.slice(1) : stripped;
}

export function validatePhone(phone: string): boolean {
    const digits = normalizePhone(phone);
    return /^\d+$/.test(digits) && digits.length >= PHONE_MIN_DIGITS && digits.length <= PHONE_MAX_DIGITS;
}

/**
 * Splits a comma-separated stack, trims entries and drops blanks and
 * case-insensitive duplicates while keeping declaration order.
 */
export function parseTechStack(input: string | string[]): string[] {
    const raw = Array.isArray(input) ? input : input.split(',');
    const seen = new Set<string>();
    const techs: string[] = [];
    for (const entry of raw) {
        const tech = entry.trim();
        const normalized = tech.toLowerCase();
        if (tech && !seen.has(normalized)) {
            seen.add(normalized);
            techs.push(tech);
        }
    }
    return techs;
}

export function validateTechStack(input: string | string[]): boolean {
    return parseTechStack(input).length > 0;
}

/**
 * Pattern check only; a well-formed key can still be rejected upstream.
 */
export function validateApiKey(key: string | null | undefined): boolean {
    if (!key) {
        return false;
    }
    return API_KEY_PATTERN.test(key.trim());
}

export interface SanitizedKey {
    key: string | null;
    warnings: string[];
}

/**
 * Pulls the first key-shaped token out of pasted text.
 */
export function sanitizeApiKey(input: string | null | undefined): SanitizedKey {
    if (!input || !input.trim()) {
        return { key: null, warnings: ['No key provided'] };
    }

    const matches: string[] = input.match(API_KEY_SEARCH) ?? [];
    if (matches.length === 0) {
        const candidate = input.trim();
        if (validateApiKey(candidate)) {
            return { key: candidate, warnings: [] };
        }
        return { key: null, warnings: ['No key-shaped credential found in input'] };
    }

    const warnings: string[] = [];
    if (matches.length > 1) {
        warnings.push(`Found multiple keys; using the first one. (${matches.length} keys detected)`);
    }
    return { key: matches[0], warnings };
}

export const MAX_YEARS_OF_EXPERIENCE = 50;

/**
 * Field-level problems with an intake; empty when it is acceptable.
 */
export function validateIntake(intake: CandidateIntake): FieldIssue[] {
    const issues: FieldIssue[] = [];
    const required: Array<[keyof CandidateIntake, string, string]> = [
        ['fullName', intake.fullName, 'Full name is required'],
        ['desiredPosition', intake.desiredPosition, 'Desired position is required'],
        ['location', intake.location, 'Location is required']
    ];

    for (const [field, value, message] of required) {
        if (!value.trim()) {
            issues.push({ field, message });
        }
    }
    if (!validateEmail(intake.email)) {
        issues.push({ field: 'email', message: 'Invalid email format' });
    }
    if (!validatePhone(intake.phone)) {
        issues.push({ field: 'phone', message: `Phone must contain ${PHONE_MIN_DIGITS}-${PHONE_MAX_DIGITS} digits` });
    }
    if (!Number.isInteger(intake.yearsOfExperience)
        || intake.yearsOfExperience < 0
        || intake.yearsOfExperience > MAX_YEARS_OF_EXPERIENCE) {
        issues.push({ field: 'yearsOfExperience', message: `Years of experience must be a whole number from 0 to ${MAX_YEARS_OF_EXPERIENCE}` });
    }
    if (!validateTechStack(intake.techStack)) {
        issues.push({ field: 'techStack', message: 'At least one technology is required' });
    }

    return issues;
}
