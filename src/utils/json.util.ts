/**
 * Pulls the first JSON object out of a model reply. Handles fenced code
 * blocks and leading/trailing prose. Throws SyntaxError when nothing parses.
 */
export function extractJsonObject(raw: string): unknown {
    let text = raw.trim();

    const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
    if (fenced) {
        text = fenced[1].trim();
    }

    const firstBrace = text.indexOf('{');
    const lastBrace = text.lastIndexOf('}');
    if (firstBrace < 0 || lastBrace <= firstBrace) {
        throw new SyntaxError('Model output does not include a JSON object');
    }

    return JSON.parse(text.slice(firstBrace, lastBrace + 1));
}
