import { PRESET_QUESTIONS } from "@/lib/ai/prompts";
import type {
  AnswerResolver,
  GenerationParams,
  HistoryEntry,
  PresetMode,
  ResolveResult,
  Session,
  ValidationWarning,
} from "@/lib/types";

// Session transitions. Every operation takes the caller's session and returns
// a new one; a rejected operation hands back the very same object.

export type SessionOutcome =
  | { ok: true; session: Session; result: ResolveResult<string> }
  | { ok: false; session: Session; warning: ValidationWarning };

export const WARNINGS = {
  emptyQuestion: "Please enter a question.",
  nothingToReroll: "No previous question to reroll. Ask first.",
  unknownPreset: "Choose one of the preset questions.",
} as const;

function reject(session: Session, message: string): SessionOutcome {
  return { ok: false, session, warning: { kind: "validation", message } };
}

/** Text shown for a result: the answer itself, or the error's message. */
export function answerText(result: ResolveResult<string>): string {
  return result.ok ? result.value : result.error.message;
}

export function createSession(): Session {
  return {
    question: "",
    answer: "",
    answerError: null,
    reroll: 0,
    history: [],
    hasAsked: false,
  };
}

export async function ask(
  session: Session,
  question: string,
  resolve: AnswerResolver,
  params: GenerationParams,
): Promise<SessionOutcome> {
  if (!question.trim()) return reject(session, WARNINGS.emptyQuestion);

  const result = await resolve(question, params);
  const answer = answerText(result);

  return {
    ok: true,
    result,
    session: {
      ...session,
      question,
      answer,
      answerError: result.ok ? null : result.error,
      reroll: 0,
      history: [...session.history, { question, answer, rerolls: 0 }],
      hasAsked: true,
    },
  };
}

export async function reroll(
  session: Session,
  resolve: AnswerResolver,
  params: GenerationParams,
): Promise<SessionOutcome> {
  if (!session.question) return reject(session, WARNINGS.nothingToReroll);

  const count = session.reroll + 1;
  const result = await resolve(session.question, params);
  const answer = answerText(result);

  // Only the most recent entry is ever rewritten
  const history = session.history.length > 0
    ? [...session.history.slice(0, -1), { ...session.history[session.history.length - 1], answer, rerolls: count }]
    : session.history;

  return {
    ok: true,
    result,
    session: {
      ...session,
      answer,
      answerError: result.ok ? null : result.error,
      reroll: count,
      history,
    },
  };
}

export function isPresetQuestion(question: string): boolean {
  return PRESET_QUESTIONS.some((preset) => preset === question);
}

export async function askPreset(
  session: Session,
  question: string,
  resolve: AnswerResolver,
  params: GenerationParams,
  mode: PresetMode = "history-only",
): Promise<SessionOutcome> {
  if (!isPresetQuestion(question)) return reject(session, WARNINGS.unknownPreset);
  if (mode === "display") return ask(session, question, resolve, params);

  const result = await resolve(question, params);
  return {
    ok: true,
    result,
    session: {
      ...session,
      history: [...session.history, { question, answer: answerText(result), rerolls: 0 }],
      hasAsked: true,
    },
  };
}

/**
 * The entry a reroll would overwrite when it belongs to another question,
 * which happens after a history-only preset ask. Null otherwise.
 */
export function rerollOverwritesOther(session: Session): HistoryEntry | null {
  const last = session.history[session.history.length - 1];
  if (!session.question || !last || last.question === session.question) return null;
  return last;
}

// Clearing wipes everything, hasAsked included
export function clearHistory(): Session {
  return createSession();
}
