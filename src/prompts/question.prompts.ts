export const ANTI_DUPLICATION_INSTRUCTION = 'IMPORTANT: Question must be substantially different from previous questions!';

export function buildQuestionLadderPrompt(techStack: string): string {
    return `Based on the tech stack: ${techStack}, generate 5 questions with increasing difficulty:

1. Start with a basic concept/definition question (easy, short answer)
2. Progress to fundamentals application (moderate, brief explanation)
3. Add a practical scenario (moderate, focused solution)
4. Include problem-solving (challenging but specific)
5. End with an advanced trade-off question

Rules:
- First 2 questions should be answerable in 1-2 sentences
- Questions 3-4 should need 3-4 sentences max
- Keep questions focused and specific
- Avoid asking for code implementations
- Put every question on its own line in this format: "Question N: [The question text]"
- Do not add any other lines that start with the word "Question"

Generate questions that are concise and clear.`;
}

export function buildFocusedQuestionPrompt(input: {
    techStack: string[];
    focusAreas: string[];
    previousQuestions: string[];
}): string {
    const focus = input.focusAreas.length > 0 ? input.focusAreas.join(', ') : 'general technical knowledge';
    const previous = input.previousQuestions.length > 0
        ? input.previousQuestions.map((question, i) => `${i + 1}. ${question}`).join('\n')
        : '(none)';

    return `Based on the candidate's previous responses, generate ONE focused technical question.
Tech Stack: ${input.techStack.join(', ')}
Focus Areas Needed: ${focus}

Previous Questions Asked:
${previous}

Generate a NEW question that:
1. Probes deeper into the identified focus areas
2. Is different from previous questions
3. Helps assess technical depth and problem-solving

Return ONLY the question text, no additional formatting or commentary.`;
}
