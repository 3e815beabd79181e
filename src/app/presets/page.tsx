"use client";

import { useState } from "react";
import { Loader2 } from "lucide-react";
import { useToast } from "@/components/Toast";
import { AnswerCard, ErrorNote } from "@/components/answer/AnswerCard";
import { useSessionStore } from "@/components/session/SessionStoreProvider";
import { PRESET_QUESTIONS, type PresetQuestion } from "@/lib/ai/prompts";

export default function PresetsPage() {
  const { toast } = useToast();
  const pending = useSessionStore((s) => s.pending);
  const lastPreset = useSessionStore((s) => s.lastPreset);
  const askPreset = useSessionStore((s) => s.askPreset);
  const [selected, setSelected] = useState<PresetQuestion>(PRESET_QUESTIONS[0]);

  async function handleAsk() {
    const warning = await askPreset(selected);
    if (warning) {
      toast("warning", warning.message);
      return;
    }
    toast("success", "Answer generated! Check the History page or go back to ask the Machine.");
  }

  return (
    <div className="space-y-6">
      <h1 className="text-3xl font-bold">Preset Questions</h1>

      <label className="block space-y-2">
        <span className="text-sm font-medium">Choose a preset question:</span>
        <select
          value={selected}
          onChange={(e) => {
            const question = PRESET_QUESTIONS.find((q) => q === e.target.value);
            if (question) setSelected(question);
          }}
          className="w-full rounded-md border border-zinc-400/60 bg-transparent px-3 py-2"
        >
          {PRESET_QUESTIONS.map((q) => (
            <option key={q} value={q}>{q}</option>
          ))}
        </select>
      </label>

      <button
        onClick={handleAsk}
        disabled={pending}
        className="flex items-center gap-2 rounded-md bg-green-700 px-4 py-2 text-white hover:bg-green-600 disabled:opacity-60"
      >
        {pending && <Loader2 className="w-4 h-4 animate-spin" />}
        Get Answer for Preset
      </button>

      {pending && <p className="text-sm opacity-70">The Machine is now overheating...</p>}

      {lastPreset && (
        <div className="space-y-3">
          <p><strong>Question:</strong> {lastPreset.question}</p>
          {lastPreset.error ? <ErrorNote message={lastPreset.error.message} /> : <AnswerCard answer={lastPreset.answer} />}
        </div>
      )}
    </div>
  );
}
