export type ResolveErrorKind = "configuration" | "capability" | "no_image_url";

export interface ResolveError {
  kind: ResolveErrorKind;
  message: string; // human-readable, always starts with "Error"
}

export type ResolveResult<T = string> =
  | { ok: true; value: T }
  | { ok: false; error: ResolveError };

export interface ValidationWarning {
  kind: "validation";
  message: string;
}

export interface GenerationParams {
  temperature: number; // 0..1
  maxTokens: number; // 50..2000
}

export type AnswerResolver = (question: string, params: GenerationParams) => Promise<ResolveResult<string>>;

export interface HistoryEntry {
  question: string;
  answer: string;
  rerolls: number;
}

export interface Session {
  question: string;
  answer: string;
  answerError: ResolveError | null;
  reroll: number;
  history: HistoryEntry[];
  hasAsked: boolean;
}

// "display": preset answers behave exactly like a free-text ask.
// "history-only": preset answers are only appended to history.
export type PresetMode = "display" | "history-only";

export type PersonaId = "friend" | "unsure";

export type Background = "White" | "Black";

export type ImageAspect = "1:1" | "3:2" | "2:3" | "auto";
export type ImageQuality = "low" | "medium" | "high";

export interface ImageRequest {
  prompt: string;
  subject?: string;
  accentColor?: string;
  aspect?: ImageAspect;
  quality?: ImageQuality;
}
