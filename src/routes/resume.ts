import { Router, Request, Response, NextFunction } from "express";
import multer from "multer";
import { z } from "zod";
import { SUPPORTED_RESUME_TYPES, type ResumeService } from "../services/resume.service";
import { ResumeProcessingError, ValidationError } from "../utils/errors";
import { parseTechStack } from "../utils/validators";
import { sendError } from "./error-response";
import type { ILlmRegistry } from "../services/llm-registry.service";
import type { ResumeConsistency } from "../types/candidate";

export const MAX_RESUME_BYTES = 10 * 1024 * 1024;

// Optional intake details to check the resume against
const profileFieldSchema = z.object({
    fullName: z.string().default(''),
    email: z.string().default(''),
    phone: z.string().default(''),
    yearsOfExperience: z.coerce.number().default(0),
    desiredPosition: z.string().default(''),
    location: z.string().default(''),
    techStack: z.union([z.string(), z.array(z.string())]).default([])
});

const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
        fileSize: MAX_RESUME_BYTES
    },
    fileFilter: (req, file, cb) => {
        if (SUPPORTED_RESUME_TYPES.includes(file.mimetype)) {
            cb(null, true);
        } else {
            cb(new ValidationError('Only PDF and DOCX resumes are allowed', [
                { field: 'resume', message: `Unsupported file type: ${file.mimetype}` }
            ]));
        }
    }
});

function acceptResume(req: Request, res: Response, next: NextFunction): void {
    upload.single('resume')(req, res, (error: unknown) => {
        if (error instanceof multer.MulterError) {
            sendError(res, new ValidationError(error.message, [{ field: 'resume', message: error.message }]), 'Resume upload');
            return;
        }
        if (error) {
            sendError(res, error, 'Resume upload');
            return;
        }
        next();
    });
}

function consistencyCheck(resumeService: ResumeService, text: string, rawProfile: string): ResumeConsistency {
    const profile = profileFieldSchema.parse(JSON.parse(rawProfile));
    return resumeService.analyzeResumeConsistency(text, {
        ...profile,
        techStack: parseTechStack(profile.techStack)
    });
}

export function createResumeRoutes(resumeService: ResumeService, registry: ILlmRegistry): Router {
    const router = Router();

    /**
     * POST /resume
     *
     * Multipart upload (field "resume", PDF or DOCX up to 10MB). Optional
     * form fields: apiKey, and profile (JSON intake) for a consistency check.
     *
     * Returns: { textLength, draft, consistency? }
     */
    router.post('/', acceptResume, async (req: Request, res: Response) => {
        try {
            if (!req.file) {
                throw new ValidationError('Resume file is required', [{ field: 'resume', message: 'Resume file is required' }]);
            }

            const text = await resumeService.extractResumeText(req.file.buffer, req.file.mimetype);
            if (!text) {
                throw new ResumeProcessingError('Resume file is empty or contains no extractable text');
            }

            const apiKey = typeof req.body.apiKey === 'string' ? req.body.apiKey : undefined;
            const handle = registry.getClient('conversation', { apiKey, temperature: 0.1 });
            const draft = await resumeService.parseResumeDraft(text, handle);

            const consistency = typeof req.body.profile === 'string'
                ? consistencyCheck(resumeService, text, req.body.profile)
                : undefined;

            res.json({
                textLength: text.length,
                draft,
                ...(consistency ? { consistency } : {})
            });
        } catch (error) {
            if (error instanceof SyntaxError) {
                sendError(res, new ValidationError('Profile field is not valid JSON', [
                    { field: 'profile', message: error.message }
                ]), 'Resume processing');
                return;
            }
            sendError(res, error, 'Resume processing');
        }
    });

    return router;
}
