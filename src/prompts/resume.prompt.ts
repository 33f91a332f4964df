export const RESUME_TEXT_LIMIT = 4000;

export function buildResumeParsePrompt(resumeText: string): string {
    return `You are an expert HR assistant. Extract the following candidate information from the resume text below.
Return ONLY a valid JSON object with these exact keys:
- "Full Name": string (or empty string if not found)
- "Email": string (or empty string if not found)
- "Phone": string (or empty string if not found)
- "Years of Experience": integer (0 if not found)
- "Desired Position": string (infer from experience or objective, default to "Software Engineer")
- "Location": string (or empty string if not found)
- "Tech Stack": list of strings (all technical skills, languages, frameworks)

Resume Text:
${resumeText.substring(0, RESUME_TEXT_LIMIT)}

JSON Response:`;
}
