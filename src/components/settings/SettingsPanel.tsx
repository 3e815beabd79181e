"use client";

import { Trash2 } from "lucide-react";
import { PERSONAS } from "@/lib/ai/prompts";
import { useSessionStore } from "@/components/session/SessionStoreProvider";
import type { Background, PersonaId } from "@/lib/types";

const PERSONA_IDS: PersonaId[] = ["friend", "unsure"];
const BACKGROUNDS: Background[] = ["White", "Black"];

export function SettingsPanel({ showGeneration }: { showGeneration: boolean }) {
  const settings = useSessionStore((s) => s.settings);
  const pending = useSessionStore((s) => s.pending);
  const setTemperature = useSessionStore((s) => s.setTemperature);
  const setMaxTokens = useSessionStore((s) => s.setMaxTokens);
  const setPersona = useSessionStore((s) => s.setPersona);
  const setBackground = useSessionStore((s) => s.setBackground);
  const clearHistory = useSessionStore((s) => s.clearHistory);

  return (
    <div className="space-y-5 text-sm">
      <h2 className="text-base font-semibold">Settings</h2>

      {showGeneration && (
        <>
          <label className="block space-y-1">
            <span className="flex justify-between">
              <span>Creativity (temperature)</span>
              <span className="tabular-nums opacity-70">{settings.temperature.toFixed(2)}</span>
            </span>
            <input
              type="range"
              min={0}
              max={1}
              step={0.05}
              value={settings.temperature}
              onChange={(e) => setTemperature(Number(e.target.value))}
              className="w-full accent-green-700"
            />
          </label>

          <label className="block space-y-1">
            <span>Max tokens</span>
            <input
              type="number"
              min={50}
              max={2000}
              step={50}
              value={settings.maxTokens}
              onChange={(e) => setMaxTokens(Number(e.target.value))}
              className="w-full rounded-md border border-zinc-400/50 bg-transparent px-2 py-1"
            />
          </label>

          <label className="block space-y-1">
            <span>Voice</span>
            <select
              value={settings.persona}
              onChange={(e) => {
                const persona = PERSONA_IDS.find((id) => id === e.target.value);
                if (persona) setPersona(persona);
              }}
              className="w-full rounded-md border border-zinc-400/50 bg-transparent px-2 py-1"
            >
              {PERSONA_IDS.map((id) => (
                <option key={id} value={id}>{PERSONAS[id].label}</option>
              ))}
            </select>
          </label>
        </>
      )}

      <fieldset className="space-y-1">
        <legend>Background</legend>
        <div className="flex gap-3">
          {BACKGROUNDS.map((bg) => (
            <label key={bg} className="flex items-center gap-1.5">
              <input
                type="radio"
                name="background"
                checked={settings.background === bg}
                onChange={() => setBackground(bg)}
                className="accent-green-700"
              />
              {bg}
            </label>
          ))}
        </div>
      </fieldset>

      <button
        onClick={clearHistory}
        disabled={pending}
        className="flex items-center gap-2 rounded-md border border-zinc-400/50 px-3 py-1.5 hover:bg-zinc-500/10 disabled:opacity-50"
      >
        <Trash2 className="w-4 h-4" />
        Clear History
      </button>
    </div>
  );
}
