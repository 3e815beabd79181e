import type { PersonaId } from "@/lib/types";

export const FRIEND_PROMPT = `You are a close friend giving advice on life questions.
Keep the answer fun and in a relaxing, suggestive way, and often use slang or meme language.
Use street-style words such as 'bruv', 'dude', 'bro', 'dunno', 'ig', 'prob', but don't overuse them: STRICTLY maximum 1 within 3 sentences.
Use an informal tone, such as 'Idk bro, maybe a piece of burrito would be nice?' or 'Bruv, just chill and vibe, y'know?'.
Respond in first person, like 'I think you should...' or 'How about...'.
Use less punctuation, such as 'idk bro' or 'that may be fun i guess'.
Keep answers short, around 20-40 words, simple, easy-to-understand, and positive.`;

export const UNSURE_PROMPT = `You are a close friend giving advice on life questions.
Keep the answer fun and in a relaxing, suggestive way, and often use meme language.
Use an informal tone, such as 'I dont know, maybe a piece of burrito would be nice?'.
Sound kind of unsure when answering questions, use words such as 'i dont know' or 'i guess'.
Respond in first person, like 'I think you should...' or 'How about...'.
Use less punctuation, such as 'i dont know' or 'that may be fun i guess'.
Keep answers short, around 20-40 words, simple, easy-to-understand, and positive.`;

export const PERSONAS: Record<PersonaId, { label: string; prompt: string }> = {
  friend: { label: "Chill friend", prompt: FRIEND_PROMPT },
  unsure: { label: "Unsure friend", prompt: UNSURE_PROMPT },
};

export const DEFAULT_PERSONA: PersonaId = "friend";

export function personaPrompt(id: string | undefined): string {
  if (id === "friend" || id === "unsure") return PERSONAS[id].prompt;
  return PERSONAS[DEFAULT_PERSONA].prompt;
}

export const PRESET_QUESTIONS = [
  "How can I be happy?",
  "What should I eat for health?",
  "Why is exercise important?",
  "How to make new friends?",
  "How to study better?",
  "How to save money?",
  "How to be kind to others?",
] as const;

export type PresetQuestion = (typeof PRESET_QUESTIONS)[number];

// Used when the image model rejects the user's own prompt
export function fallbackImagePrompt(subject: string, accentColor?: string): string {
  let prompt = `A beautiful, professional photograph of ${subject}`;
  if (accentColor) prompt += ` with ${accentColor} color accents`;
  return `${prompt}, well-lit, high quality`;
}
