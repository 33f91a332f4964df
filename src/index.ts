import { loadConfig } from "./config/environment";
import { logger, errorFields } from "./config/logger";
import { buildAssessmentPolicy } from "./config/assessment-policy";
import { createApp } from "./app";
import { LlmRegistry } from "./services/llm-registry.service";
import { SessionStore } from "./services/session-store.service";
import { ResumeService } from "./services/resume.service";
import { AssessmentController } from "./services/assessment-controller.service";

function startServer(): void {
    try {
        const config = loadConfig();

        const registry = LlmRegistry.create(config.llm);
        const resumeService = new ResumeService(logger);
        const controller = new AssessmentController(
            registry,
            new SessionStore(),
            buildAssessmentPolicy(config.policy),
            logger,
            resumeService
        );

        const app = createApp({ controller, registry, resumeService });

        app.listen(config.port, () => {
            logger.info({
                port: config.port,
                nodeEnv: config.nodeEnv,
                primaryModel: config.llm.primaryModel,
                localModels: config.llm.allowLocalModels,
                defaultCredential: Boolean(config.llm.defaultApiKey),
                maxQuestions: config.policy.maxQuestions
            }, `Server running at http://localhost:${config.port}`);
        });
    } catch (error) {
        logger.error({ ...errorFields(error) }, 'Failed to start server');
        process.exit(1);
    }
}

startServer();
