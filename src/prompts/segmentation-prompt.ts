export const SEGMENTATION_SYSTEM_PROMPT = `You are a JSON-only machine that segments news articles into coherent, contiguous passages.

Rules:
- Return a JSON array and nothing else: no commentary, no markdown, no code fences.
- Each element is {"start": number, "end": number, "topic": string}.
- "start" and "end" are character offsets into the article text exactly as given (0-based, end exclusive).
- Segments must be in order and must not overlap.
- Prefer boundaries at paragraph or sentence ends. Do not cut a sentence in half.
- Each segment should cover one topic and be roughly 800 to 2500 characters long.
- "topic" is a short label of at most 8 words.`;

export function buildSegmentationPrompt(text: string, maxSegments: number): string {
  const limit = maxSegments > 0 ? `Return at most ${maxSegments} segments.\n` : '';

  return `The article below is ${text.length} characters long. Offsets must stay within [0, ${text.length}].
${limit}
ARTICLE:
${text}`;
}
