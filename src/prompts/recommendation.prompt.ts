import type { CandidateProfile } from '../types/candidate';

export function buildRecommendationPrompt(input: {
    profile: CandidateProfile;
    history: Array<{ question: string; answer: string; score: number }>;
    averageScore: number;
}): string {
    const { profile } = input;
    const transcript = input.history
        .map((entry, i) => `Q${i + 1}: ${entry.question}\nA: ${entry.answer}\nScore: ${(entry.score * 100).toFixed(1)}%`)
        .join('\n\n');

    return `Write a hiring recommendation for a technical screening.

Candidate: ${profile.fullName}
Desired Position: ${profile.desiredPosition}
Years of Experience: ${profile.yearsOfExperience}
Tech Stack: ${profile.techStack.join(', ')}
Average Score: ${(input.averageScore * 100).toFixed(1)}%

Transcript:
${transcript}

Write 3-5 sentences: overall verdict (hire, hire with reservations, or do not hire),
key strengths, key gaps, and a suggested next step. Plain text only.`;
}
