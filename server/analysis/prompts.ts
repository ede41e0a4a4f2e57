/**
 * Analyzer prompts
 *
 * Each builder returns the user message; `systemPrompt()` is shared and only
 * varies by output language. Responses are requested as bare JSON and parsed
 * by `jsonResponse.ts`.
 */

export const MATERIALS_BUDGET_CHARS = 2000;

const LANGUAGE_NAMES: Record<string, string> = {
  en: "English",
  english: "English",
  zh: "Chinese",
  cn: "Chinese",
  chinese: "Chinese",
  es: "Spanish",
  fr: "French",
  de: "German",
  ja: "Japanese",
  ko: "Korean",
};

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code.trim().toLowerCase()] ?? code;
}

export function systemPrompt(outputLanguage: string): string {
  return `You are a classroom assistant helping a student follow a live lecture in real time.
You read a rolling transcript of what the lecturer says.

Your job:
1. Recognize when the lecturer asks the class a question (direct, rhetorical or guiding)
2. Give short, correct answers the student can use immediately
3. Summarize what was covered
4. Suggest good questions and directions for further study

Keep replies concise and accurate. Reply in ${languageName(outputLanguage)}.`;
}

export function materialsSection(materials: string, budget = MATERIALS_BUDGET_CHARS): string {
  const trimmed = materials.trim();
  if (!trimmed) return "";
  return `Course materials (excerpt):\n${trimmed.slice(0, budget)}`;
}

export function questionDetectionPrompt(transcript: string): string {
  return `Decide whether the lecturer is asking the class a question in the latest lines of this transcript.

Transcript (most recent lines last):
---
${transcript}
---

Respond with JSON only:
{
  "is_question": true or false,
  "question_text": "the lecturer's question, as asked",
  "question_type": "direct | rhetorical | guiding | exercise",
  "confidence": 0.0 to 1.0
}

Only set is_question to true when you are confident the lecturer is addressing the class.`;
}

export function answerPrompt(question: string, recentTranscript: string, materials: string): string {
  return `The lecturer just asked: "${question}"

Recent lecture transcript:
---
${recentTranscript}
---

${materials}

Write the answer a strong student would give out loud: complete, accurate and short.
Respond with the answer text only.`;
}

export function summaryPrompt(transcript: string, minutes: number, materials: string): string {
  return `Summarize this part of the lecture (about ${minutes} minute(s)).

Transcript:
---
${transcript}
---

${materials}

Respond with JSON only:
{
  "title": "topic of this part",
  "key_points": ["point", "..."],
  "important_concepts": ["concept", "..."],
  "summary": "one paragraph"
}`;
}

export function suggestionPrompt(transcript: string, materials: string): string {
  return `Based on the lecture so far, propose one thoughtful question the student could ask in class.
It should show understanding, open further discussion and stay on the current topic.

Transcript:
---
${transcript}
---

${materials}

Respond with JSON only:
{
  "question": "the question to ask",
  "rationale": "why it is a good question",
  "timing": "when to ask it"
}`;
}

export function ideasPrompt(transcript: string, materials: string): string {
  return `Based on the lecture so far, propose creative ideas and directions for deeper study.

Transcript:
---
${transcript}
---

${materials}

Respond with JSON only:
{
  "creative_ideas": [{ "idea": "...", "detail": "link to the lecture and why it matters" }],
  "deep_learning": [{ "topic": "...", "reason": "..." }],
  "cross_discipline": [{ "field": "...", "connection": "..." }]
}`;
}
