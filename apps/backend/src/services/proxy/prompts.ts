import type { SimplificationLevel } from "@read-along/shared/proxy";

export const TASK_COUNT = 5;

const LANGUAGE_NAMES: Readonly<Record<string, string>> = Object.freeze({
	de: "German",
	en: "English",
	tr: "Turkish",
	bg: "Bulgarian",
	ar: "Arabic",
	uk: "Ukrainian",
	ru: "Russian",
	pl: "Polish",
	fr: "French",
	es: "Spanish",
	it: "Italian"
});

export function languageName(code: string): string {
	return LANGUAGE_NAMES[code] ?? code;
}

export function buildTaskGenerationPrompt(text: string): string {
	return `Write ${TASK_COUNT} German comprehension tasks about the text below for students who find reading difficult.

TEXT:
${text}

Answer with a JSON array only, no other text. Use exactly these shapes:
[
  {"type": "multiple_choice", "question": "Question about the text?", "options": ["A", "B", "C", "D"], "correct": 0},
  {"type": "true_false", "question": "A statement about the text.", "correct": true},
  {"type": "fill_blank", "question": "A sentence from the text with a ___ gap.", "correct": "missing word"},
  {"type": "short_answer", "question": "An open question about the text?", "hint": "A small hint"}
]

Rules:
- multiple_choice: "correct" is the zero-based index of the right option
- true_false: "correct" is true or false
- fill_blank: "correct" is the missing word
- use at least two multiple_choice, one true_false and one fill_blank task
- every question must be answerable from the text`;
}

export function buildTranslationSystemPrompt(targetLanguage: string): string {
	return `You are a professional translator. Translate the user's text into ${languageName(targetLanguage)}.
Output only the translation with the original formatting kept. Add no explanations.`;
}

const SIMPLIFICATION_RULES: Record<SimplificationLevel, string[]> = {
	A1: [
		"present tense only",
		"sentences of at most 8 words",
		"only the most common basic vocabulary",
		"no subordinate clauses and no passive voice",
		"repeat nouns instead of using pronouns",
		"no metaphors or idioms"
	],
	A2: [
		"present and perfect tense",
		"short, clear sentences of at most 12 words",
		"everyday vocabulary",
		'simple subordinate clauses with "weil", "dass" or "wenn" are fine',
		"no complex passive constructions"
	],
	B1: [
		"all tenses, clearly structured",
		"sentences of at most 18 words",
		"broader vocabulary, but explain technical terms",
		"replace difficult words with simpler synonyms"
	]
};

export function buildSimplificationPrompt(text: string, level: SimplificationLevel): string {
	const rules = SIMPLIFICATION_RULES[level].map((rule) => `- ${rule}`).join("\n");

	return `Simplify the following German text to CEFR level ${level}. Keep it in German.

Rules for ${level}:
${rules}

Answer with the simplified text only.

ORIGINAL TEXT:
${text}`;
}

export function buildWordInfoPrompt(word: string, targetLanguage?: string): string {
	const translation = targetLanguage
		? `translation into ${languageName(targetLanguage)}`
		: "empty string, no translation requested";

	return `Analyse the German word "${word}" for a language learner and answer with a single JSON object only:
{
  "article": "der/die/das for nouns, otherwise empty",
  "plural": "plural form for nouns, otherwise empty",
  "wordType": "Nomen/Verb/Adjektiv/Adverb/Präposition/...",
  "simpleExplanation": "one or two simple German sentences at A1-A2 level",
  "exampleSentence": "a simple German example sentence using the word",
  "syllables": "syllables separated by hyphens, e.g. Hun-de-hüt-te",
  "translation": "${translation}"
}`;
}

/**
 * Pulls the outermost JSON value delimited by `open`/`close` out of model
 * output that may wrap it in prose or code fences.
 */
export function extractJsonBlock(text: string, open: "[" | "{", close: "]" | "}"): unknown {
	const start = text.indexOf(open);
	const end = text.lastIndexOf(close);
	if (start === -1 || end <= start) {
		return null;
	}

	try {
		return JSON.parse(text.slice(start, end + 1)) as unknown;
	} catch {
		return null;
	}
}
