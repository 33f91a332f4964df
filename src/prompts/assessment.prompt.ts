export const FOCUS_AREAS_PROMPT = `You are reviewing a technical screening in progress.
The candidate's results are mixed. Decide which topics the next question should probe.

Output STRICT JSON:
{
  "focus_areas": ["string"] (1-3 short topic names),
  "reasoning": "string" (one or two sentences)
}

Return JSON only. No markdown. No extra text.`;

export function buildFocusAreasPrompt(input: {
    techStack: string[];
    confidence: number;
    history: Array<{ question: string; answer: string; score: number }>;
}): string {
    return [
        FOCUS_AREAS_PROMPT,
        '',
        'Input JSON:',
        JSON.stringify({
            tech_stack: input.techStack,
            running_confidence: Number(input.confidence.toFixed(2)),
            history: input.history.map(entry => ({
                question: entry.question,
                answer: entry.answer,
                score: Number(entry.score.toFixed(2))
            }))
        }, null, 2)
    ].join('\n');
}
