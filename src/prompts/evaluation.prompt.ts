export const ANSWER_EVALUATION_PROMPT = `You are a strict technical interviewer grading one answer.

Grade the answer against the question on:
- technical accuracy
- depth of understanding
- clarity of explanation
- relevance to the declared tech stack

Output STRICT JSON:
{
  "score": integer (0-10),
  "feedback": ["string", "..."] (2-4 short bullet points)
}

Rules:
- An empty, evasive or off-topic answer scores 0-2.
- A correct but shallow answer scores 4-6.
- A correct answer with trade-offs or concrete examples scores 7-10.
- The score is a whole number out of 10, never a fraction of 1.
- Return JSON only. No markdown. No extra text.`;

export function buildAnswerEvaluationPrompt(input: {
    question: string;
    answer: string;
    techStack: string[];
}): string {
    return [
        ANSWER_EVALUATION_PROMPT,
        '',
        'Input JSON:',
        JSON.stringify({
            tech_stack: input.techStack,
            question: input.question,
            answer: input.answer
        }, null, 2)
    ].join('\n');
}
