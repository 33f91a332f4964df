import { Router, Request, Response } from "express";
import { z } from "zod";
import { sanitizeApiKey } from "../utils/validators";
import { sendError } from "./error-response";
import type { ILlmRegistry } from "../services/llm-registry.service";

const verifySchema = z.object({
    apiKey: z.string({ required_error: 'apiKey is required' })
});

export function createCredentialRoutes(registry: ILlmRegistry): Router {
    const router = Router();

    /**
     * POST /credentials/verify
     *
     * One short live round-trip with the given key. The key itself is
     * never stored or echoed back.
     *
     * Returns: { ok, message, warnings }
     */
    router.post('/verify', async (req: Request, res: Response) => {
        try {
            const { apiKey } = verifySchema.parse(req.body);
            const { warnings } = sanitizeApiKey(apiKey);
            const check = await registry.verifyCredential(apiKey);

            res.json({ ok: check.ok, message: check.message, warnings });
        } catch (error) {
            sendError(res, error, 'Credential verification');
        }
    });

    return router;
}
