import { Router, Request, Response } from "express";
import { z } from "zod";
import { renderReport } from "../services/report.service";
import { sendError } from "./error-response";
import type { AssessmentController } from "../services/assessment-controller.service";

// Validation schema for session intake
const intakeSchema = z.object({
    fullName: z.string({ required_error: 'Full name is required' }),
    email: z.string({ required_error: 'Email is required' }),
    phone: z.string({ required_error: 'Phone is required' }),
    yearsOfExperience: z.coerce.number({ invalid_type_error: 'Years of experience must be a number' }),
    desiredPosition: z.string({ required_error: 'Desired position is required' }),
    location: z.string({ required_error: 'Location is required' }),
    techStack: z.union([z.string(), z.array(z.string())]),
    apiKey: z.string().optional(),
    allowLocalFallback: z.boolean().optional(),
    resumeText: z.string().optional()
});

const answerSchema = z.object({
    answer: z.string({ required_error: 'Answer is required' })
});

const reportQuerySchema = z.object({
    format: z.enum(['json', 'text']).default('json')
});

export function createSessionRoutes(controller: AssessmentController): Router {
    const router = Router();

    /**
     * POST /sessions
     *
     * Validates the intake, picks the interviewer persona and plans the
     * opening questions.
     *
     * Returns: { sessionId, persona, backend, plannedQuestions }
     */
    router.post('/', async (req: Request, res: Response) => {
        try {
            const { apiKey, allowLocalFallback, resumeText, ...intake } = intakeSchema.parse(req.body);
            const session = await controller.startSession(intake, { apiKey, allowLocalFallback, resumeText });

            res.status(201).json({
                sessionId: session.id,
                persona: session.persona,
                backend: controller.backendLabel(session.id),
                plannedQuestions: session.plannedQuestions.length,
                resumeConsistency: session.resumeConsistency ?? null
            });
        } catch (error) {
            sendError(res, error, 'Session start');
        }
    });

    /**
     * GET /sessions/:id
     *
     * Progress view. Confidence and focus areas only with ?view=admin.
     */
    router.get('/:id', (req: Request, res: Response) => {
        try {
            res.json(controller.describeSession(req.params.id, req.query.view === 'admin'));
        } catch (error) {
            sendError(res, error, 'Session lookup');
        }
    });

    router.get('/:id/question', async (req: Request, res: Response) => {
        try {
            res.json(await controller.nextQuestion(req.params.id));
        } catch (error) {
            sendError(res, error, 'Question retrieval');
        }
    });

    router.post('/:id/answer', async (req: Request, res: Response) => {
        try {
            const { answer } = answerSchema.parse(req.body);
            res.json(await controller.submitAnswer(req.params.id, answer));
        } catch (error) {
            sendError(res, error, 'Answer submission');
        }
    });

    router.post('/:id/skip', async (req: Request, res: Response) => {
        try {
            res.json(await controller.skipQuestion(req.params.id));
        } catch (error) {
            sendError(res, error, 'Question skip');
        }
    });

    router.post('/:id/complete', async (req: Request, res: Response) => {
        try {
            const session = await controller.completeNow(req.params.id);
            res.json({
                sessionId: session.id,
                completed: true,
                decision: session.decision,
                recommendation: session.recommendation
            });
        } catch (error) {
            sendError(res, error, 'Assessment completion');
        }
    });

    /**
     * GET /sessions/:id/report?format=json|text
     *
     * Final report; 409 until the assessment is completed.
     */
    router.get('/:id/report', (req: Request, res: Response) => {
        try {
            const { format } = reportQuerySchema.parse(req.query);

            if (format === 'text') {
                res.type('text/plain').send(controller.getTextReport(req.params.id));
                return;
            }
            res.type('application/json').send(renderReport(controller.getReport(req.params.id)));
        } catch (error) {
            sendError(res, error, 'Report generation');
        }
    });

    router.delete('/:id', (req: Request, res: Response) => {
        try {
            controller.resetSession(req.params.id);
            res.status(204).end();
        } catch (error) {
            sendError(res, error, 'Session reset');
        }
    });

    return router;
}
