import type { SentimentLabel, SentimentSnapshot } from '../types/evaluation';

const POSITIVE_WORDS = [
    'confident', 'sure', 'definitely', 'absolutely', 'certainly',
    'experience', 'implemented', 'developed', 'created', 'built',
    'successfully', 'achieved', 'optimized', 'improved'
];

const UNCERTAIN_WORDS = [
    'maybe', 'perhaps', 'might', 'possibly', 'not sure',
    'i think', 'probably', 'guess', 'unsure', 'unclear'
];

const FILLER_WORDS = ['um', 'uh', 'like', 'you know', 'basically', 'actually', 'literally'];

const DEPTH_INDICATORS = [
    'algorithm', 'complexity', 'optimization', 'architecture',
    'design pattern', 'framework', 'library', 'api', 'database',
    'performance', 'scalability', 'security'
];

function countPresent(words: string[], text: string): number {
    return words.filter(word => text.includes(word)).length;
}

function labelFor(score: number): SentimentLabel {
    if (score >= 0.7) {
        return 'Confident';
    }
    if (score >= 0.5) {
        return 'Moderate';
    }
    return 'Uncertain';
}

/**
 * Heuristic tone read of a single answer. Indicator words are matched as
 * substrings, so each word counts at most once per answer.
 */
export function analyzeSentiment(text: string): SentimentSnapshot {
    const normalized = text.toLowerCase().trim();

    const positiveIndicators = countPresent(POSITIVE_WORDS, normalized);
    const uncertainIndicators = countPresent(UNCERTAIN_WORDS, normalized);
    const fillerCount = countPresent(FILLER_WORDS, normalized);

    const wordCount = text.split(/\s+/).filter(Boolean).length;
    const sentenceCount = text.split(/[.!?]+/).filter(part => part.trim().length > 0).length;

    let score = 0.5;
    score += Math.min(positiveIndicators * 0.05, 0.3);
    score -= Math.min(uncertainIndicators * 0.1, 0.3);
    score -= Math.min(fillerCount * 0.05, 0.2);

    if (wordCount >= 20 && wordCount <= 150) {
        score += 0.1;
    } else if (wordCount > 200) {
        score -= 0.05;
    }

    const confidenceScore = Math.round(Math.max(0, Math.min(1, score)) * 100) / 100;

    return {
        confidenceScore,
        sentiment: labelFor(confidenceScore),
        wordCount,
        sentenceCount,
        technicalDepth: countPresent(DEPTH_INDICATORS, normalized),
        positiveIndicators,
        uncertainIndicators,
        fillerCount
    };
}

export function sentimentFeedback(snapshot: SentimentSnapshot): string {
    const parts: string[] = [];

    if (snapshot.sentiment === 'Confident') {
        parts.push('Your response shows strong confidence and clarity.');
    } else if (snapshot.sentiment === 'Moderate') {
        parts.push('Your response shows moderate confidence.');
    } else {
        parts.push('Your response could benefit from more confident language.');
    }

    if (snapshot.technicalDepth >= 3) {
        parts.push('Good use of technical terminology.');
    } else if (snapshot.technicalDepth === 0) {
        parts.push('Consider using more technical terms to demonstrate depth.');
    }

    if (snapshot.wordCount < 10) {
        parts.push('Try to provide more detailed explanations.');
    } else if (snapshot.wordCount > 200) {
        parts.push('Consider being more concise in your responses.');
    }

    if (snapshot.fillerCount > 3) {
        parts.push('Reduce filler words for clearer communication.');
    }

    return parts.join(' ');
}
