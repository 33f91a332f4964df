import { describe, it, expect } from 'vitest';
import {
    normalizePhone,
    parseTechStack,
    sanitizeApiKey,
    validateApiKey,
    validateEmail,
    validateIntake,
    validatePhone,
    validateTechStack
} from '../../../src/utils/validators';

describe('Validators', () => {
    describe('validateEmail', () => {
        it('should accept well-formed addresses', () => {
            expect(validateEmail('ada@example.com')).toBe(true);
            expect(validateEmail('first.last+tag@sub.example.org')).toBe(true);
        });

        it('should reject malformed addresses', () => {
            expect(validateEmail('ada@example')).toBe(false);
            expect(validateEmail('ada.example.com')).toBe(false);
            expect(validateEmail('')).toBe(false);
        });
    });

    describe('validatePhone', () => {
        it('should strip formatting and one leading plus', () => {
            expect(normalizePhone('+1 (555) 010-2030')).toBe('15550102030');
        });

        it('should accept 10 to 15 digits', () => {
            expect(validatePhone('555-010-2030')).toBe(true);
            expect(validatePhone('+351 912 345 678')).toBe(true);
            expect(validatePhone('123456789012345')).toBe(true);
        });

        it('should reject short, long or non-numeric numbers', () => {
            expect(validatePhone('555-0102')).toBe(false);
            expect(validatePhone('1234567890123456')).toBe(false);
            expect(validatePhone('555-010-CALL')).toBe(false);
            expect(validatePhone('++15550102030')).toBe(false);
        });
    });

    describe('parseTechStack', () => {
        it('should split, trim and drop blanks and duplicates in order', () => {
            expect(parseTechStack(' Python, django ,, SQL, python ')).toEqual(['Python', 'django', 'SQL']);
        });

        it('should accept an array', () => {
            expect(parseTechStack(['React', ' react', 'Docker'])).toEqual(['React', 'Docker']);
        });

        it('should require at least one entry', () => {
            expect(validateTechStack(' , ')).toBe(false);
            expect(validateTechStack('Go')).toBe(true);
        });
    });

    describe('validateApiKey', () => {
        it('should accept a key with the expected prefix and length', () => {
            expect(validateApiKey('gsk_abcdefgh12345678')).toBe(true);
            expect(validateApiKey('  gsk_abcdefgh12345678  ')).toBe(true);
        });

        it('should reject short, empty or missing keys', () => {
            expect(validateApiKey('gsk_short')).toBe(false);
            expect(validateApiKey('')).toBe(false);
            expect(validateApiKey(undefined)).toBe(false);
            expect(validateApiKey('sk_abcdefgh12345678')).toBe(false);
        });
    });

    describe('sanitizeApiKey', () => {
        it('should report a missing key', () => {
            expect(sanitizeApiKey('  ')).toEqual({ key: null, warnings: ['No key provided'] });
        });

        it('should pull the key out of surrounding text', () => {
            expect(sanitizeApiKey('KEY="gsk_abcdefgh12345678"')).toEqual({ key: 'gsk_abcdefgh12345678', warnings: [] });
        });

        it('should keep the first of several keys and warn', () => {
            expect(sanitizeApiKey('gsk_abcdefgh12345678 gsk_zyxwvuts87654321')).toEqual({
                key: 'gsk_abcdefgh12345678',
                warnings: ['Found multiple keys; using the first one. (2 keys detected)']
            });
        });

        it('should reject text without a key', () => {
            expect(sanitizeApiKey('test-secret')).toEqual({
                key: null,
                warnings: ['No key-shaped credential found in input']
            });
        });
    });

    describe('validateIntake', () => {
        it('should accept a complete intake', () => {
            expect(validateIntake(globalThis.testUtils.sampleIntake())).toEqual([]);
        });

        it('should report every invalid field', () => {
            const issues = validateIntake(globalThis.testUtils.sampleIntake({
                fullName: ' ',
                email: 'not-an-email',
                phone: '12345',
                yearsOfExperience: 51,
                desiredPosition: '',
                location: 'Porto',
                techStack: ', ,'
            }));

            expect(issues.map(issue => issue.field)).toEqual([
                'fullName',
                'desiredPosition',
                'email',
                'phone',
                'yearsOfExperience',
                'techStack'
            ]);
        });

        it('should reject fractional or negative experience', () => {
            expect(validateIntake(globalThis.testUtils.sampleIntake({ yearsOfExperience: 2.5 }))).toEqual([{
                field: 'yearsOfExperience',
                message: 'Years of experience must be a whole number from 0 to 50'
            }]);
            expect(validateIntake(globalThis.testUtils.sampleIntake({ yearsOfExperience: -1 }))).toHaveLength(1);
        });
    });
});
