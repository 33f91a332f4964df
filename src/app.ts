import express, { Express, Request, Response } from "express";
import { createSessionRoutes } from "./routes/session";
import { createResumeRoutes } from "./routes/resume";
import { createCredentialRoutes } from "./routes/credentials";
import type { AssessmentController } from "./services/assessment-controller.service";
import type { ILlmRegistry } from "./services/llm-registry.service";
import type { ResumeService } from "./services/resume.service";

export interface AppDependencies {
    controller: AssessmentController;
    registry: ILlmRegistry;
    resumeService: ResumeService;
}

export function createApp(deps: AppDependencies): Express {
    const app = express();

    // Middleware
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    // Routes
    app.use("/sessions", createSessionRoutes(deps.controller));
    app.use("/resume", createResumeRoutes(deps.resumeService, deps.registry));
    app.use("/credentials", createCredentialRoutes(deps.registry));

    // Health check
    app.get("/health", (req: Request, res: Response) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    // Root route
    app.get("/", (req: Request, res: Response) => {
        res.json({
            message: "Adaptive Technical Screening API",
            version: "1.0.0",
            description: "Adaptive technical interviews with model-graded answers and a confidence-based stopping policy",
            endpoints: {
                "Sessions": {
                    "POST /sessions": "Start a screening session from candidate intake",
                    "GET /sessions/:id": "Session progress (?view=admin adds confidence)",
                    "GET /sessions/:id/question": "Current or next question",
                    "POST /sessions/:id/answer": "Submit an answer",
                    "POST /sessions/:id/skip": "Skip the current question",
                    "POST /sessions/:id/complete": "End the assessment now",
                    "GET /sessions/:id/report": "Final report (?format=json|text)",
                    "DELETE /sessions/:id": "Reset the session"
                },
                "Intake Helpers": {
                    "POST /resume": "Extract and draft a profile from a PDF or DOCX resume",
                    "POST /credentials/verify": "Check a model API key"
                },
                "System": {
                    "GET /health": "Health check",
                    "GET /": "API information"
                }
            }
        });
    });

    return app;
}
