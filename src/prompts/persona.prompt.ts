import type { CandidateProfile, InterviewPersona } from '../types/candidate';
import type { ChatMessage } from '../types/llm';

const PERSONA_SYSTEM_PROMPTS: Record<InterviewPersona, string> = {
    Default: `You are a friendly and professional hiring assistant.
Your role is to conduct preliminary technical screenings for candidates.
Focus on gathering essential details, maintaining a conversational tone,
and assessing both technical knowledge and problem-solving abilities.
Provide constructive feedback without overwhelming the candidate.`,

    Expert: `You are a highly experienced technical hiring manager.
Assess candidates thoroughly on technical accuracy, problem-solving strategies,
code quality and optimization, and system design and scalability.
Start with foundational questions, then move to advanced topics and edge cases.
Give precise, actionable feedback that names strengths and improvement areas.`,

    Creative: `You are an engaging interviewer who evaluates candidates through
real-world scenarios and practical challenges.
Assess creative problem-solving, adaptability to unusual scenarios,
application of technical knowledge and clear communication.
Prefer situational questions that encourage critical thinking.`,

    Analytical: `You are a data-driven, analytical evaluator.
Assess logical reasoning and analytical skills alongside technical expertise.
Start with short, specific questions and progress to scenarios that need deeper analysis.
Evaluate clarity of logic, efficiency in problem-solving and the ability to break
complex problems into manageable steps.`
};

const SENIOR_ROLES = ['senior', 'lead', 'architect', 'principal'];
const ANALYTICAL_ROLES = ['research', 'data', 'ml', 'ai'];
const ANALYTICAL_STACK = ['machine learning', 'ai', 'data science'];
const CREATIVE_ROLES = ['design', 'ui', 'ux', 'frontend', 'creative'];

/**
 * Picks the interviewer persona from seniority, role and stack.
 * Role keywords match as substrings of the lowercased position.
 */
export function determinePersona(profile: Pick<CandidateProfile, 'yearsOfExperience' | 'desiredPosition' | 'techStack'>): InterviewPersona {
    const position = profile.desiredPosition.toLowerCase();
    const stack = profile.techStack.map(tech => tech.toLowerCase());

    if (profile.yearsOfExperience >= 8 || SENIOR_ROLES.some(role => position.includes(role))) {
        return 'Expert';
    }
    if (ANALYTICAL_ROLES.some(role => position.includes(role)) || stack.some(tech => ANALYTICAL_STACK.includes(tech))) {
        return 'Analytical';
    }
    if (CREATIVE_ROLES.some(role => position.includes(role))) {
        return 'Creative';
    }
    return 'Default';
}

export function personaHistory(persona: InterviewPersona): ChatMessage[] {
    return [{ role: 'system', content: PERSONA_SYSTEM_PROMPTS[persona] }];
}
