import { createStore, type StoreApi } from "zustand/vanilla";
import { DEFAULT_GENERATION } from "@/lib/ai/answer";
import { DEFAULT_PERSONA } from "@/lib/ai/prompts";
import { answerText, ask, askPreset, clearHistory, createSession, reroll, type SessionOutcome } from "@/lib/session";
import type {
  AnswerResolver,
  Background,
  GenerationParams,
  PersonaId,
  PresetMode,
  ResolveError,
  Session,
  ValidationWarning,
} from "@/lib/types";

export interface Settings extends GenerationParams {
  background: Background;
  persona: PersonaId;
}

export interface PresetAnswer {
  question: string;
  answer: string;
  error: ResolveError | null;
}

interface SessionState {
  session: Session;
  settings: Settings;
  pending: boolean;
  lastPreset: PresetAnswer | null;
}

interface SessionActions {
  ask: (question: string) => Promise<ValidationWarning | null>;
  reroll: () => Promise<ValidationWarning | null>;
  askPreset: (question: string) => Promise<ValidationWarning | null>;
  clearHistory: () => void;
  setTemperature: (temperature: number) => void;
  setMaxTokens: (maxTokens: number) => void;
  setBackground: (background: Background) => void;
  setPersona: (persona: PersonaId) => void;
}

export type SessionStore = SessionState & SessionActions;

export interface SessionStoreOptions {
  resolverFor: (persona: PersonaId) => AnswerResolver;
  presetMode?: PresetMode;
  settings?: Partial<Settings>;
}

export const BUSY_WARNING: ValidationWarning = {
  kind: "validation",
  message: "Please wait for the current answer.",
};

export const DEFAULT_SETTINGS: Settings = {
  ...DEFAULT_GENERATION,
  background: "White",
  persona: DEFAULT_PERSONA,
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// One store per user session; never share an instance between sessions.
export function createSessionStore({ resolverFor, presetMode = "history-only", settings: initial }: SessionStoreOptions): StoreApi<SessionStore> {
  return createStore<SessionStore>()((set, get) => {
    // Bumped by clearHistory so an answer that lands after a clear is dropped
    let epoch = 0;

    async function run(
      transition: (session: Session, resolve: AnswerResolver, params: GenerationParams) => Promise<SessionOutcome>,
      onSuccess?: (outcome: Extract<SessionOutcome, { ok: true }>) => Partial<SessionState>,
    ): Promise<ValidationWarning | null> {
      const { pending, session, settings } = get();
      if (pending) return BUSY_WARNING;

      const started = epoch;
      const params = { temperature: settings.temperature, maxTokens: settings.maxTokens };
      set({ pending: true });
      try {
        const outcome = await transition(session, resolverFor(settings.persona), params);
        if (!outcome.ok) return outcome.warning;
        if (started === epoch) {
          set({ session: outcome.session, ...onSuccess?.(outcome) });
        }
        return null;
      } finally {
        set({ pending: false });
      }
    }

    return {
      session: createSession(),
      settings: { ...DEFAULT_SETTINGS, ...initial },
      pending: false,
      lastPreset: null,

      ask: (question) =>
        run((session, resolve, params) => ask(session, question, resolve, params)),

      reroll: () =>
        run((session, resolve, params) => reroll(session, resolve, params)),

      askPreset: (question) =>
        run(
          (session, resolve, params) => askPreset(session, question, resolve, params, presetMode),
          ({ result }) => ({
            lastPreset: { question, answer: answerText(result), error: result.ok ? null : result.error },
          }),
        ),

      clearHistory: () => {
        epoch++;
        set({ session: clearHistory(), lastPreset: null });
      },

      setTemperature: (temperature) =>
        set((state) => ({ settings: { ...state.settings, temperature: clamp(temperature, 0, 1) } })),

      setMaxTokens: (maxTokens) =>
        set((state) => ({ settings: { ...state.settings, maxTokens: Math.round(clamp(maxTokens, 50, 2000)) } })),

      setBackground: (background) =>
        set((state) => ({ settings: { ...state.settings, background } })),

      setPersona: (persona) =>
        set((state) => ({ settings: { ...state.settings, persona } })),
    };
  });
}
