"use client";

import { useState, type FormEvent } from "react";
import { Loader2, Palette } from "lucide-react";
import { useToast } from "@/components/Toast";
import { ErrorNote } from "@/components/answer/AnswerCard";
import { fetchImage } from "@/lib/ai/remote";
import type { ImageAspect, ImageQuality, ResolveResult } from "@/lib/types";

const ASPECTS: ImageAspect[] = ["3:2", "1:1", "2:3", "auto"];
const QUALITIES: ImageQuality[] = ["high", "medium", "low"];
const ACCENT_COLORS = ["", "red", "orange", "yellow", "green", "blue", "purple", "pink", "white", "black", "gold"];

const fieldClass = "w-full rounded-md border border-zinc-400/60 bg-transparent px-3 py-2";

export default function ImagePage() {
  const { toast } = useToast();
  const [prompt, setPrompt] = useState("");
  const [subject, setSubject] = useState("");
  const [accentColor, setAccentColor] = useState("");
  const [aspect, setAspect] = useState<ImageAspect>("3:2");
  const [quality, setQuality] = useState<ImageQuality>("high");
  const [pending, setPending] = useState(false);
  const [result, setResult] = useState<ResolveResult<string> | null>(null);

  async function handleSubmit(e: FormEvent) {
    e.preventDefault();
    if (pending) return;
    if (!prompt.trim()) {
      toast("warning", "Please enter a description to generate an image.");
      return;
    }

    setPending(true);
    try {
      setResult(await fetchImage({
        prompt,
        subject: subject.trim() || undefined,
        accentColor: accentColor || undefined,
        aspect,
        quality,
      }));
    } finally {
      setPending(false);
    }
  }

  return (
    <div className="space-y-6">
      <h1 className="text-3xl font-bold flex items-center gap-2"><Palette className="w-7 h-7" /> AI Image Generator</h1>
      <p className="opacity-75">Describe the image you want to create below.</p>

      <form onSubmit={handleSubmit} className="space-y-4">
        <label className="block space-y-1">
          <span className="text-sm font-medium">Enter a detailed description for your image:</span>
          <textarea
            value={prompt}
            onChange={(e) => setPrompt(e.target.value)}
            rows={6}
            placeholder="e.g., A photorealistic image of a majestic lion wearing a crown, sitting on a throne in a futuristic jungle."
            className={fieldClass}
          />
        </label>

        <div className="grid grid-cols-2 gap-3">
          <label className="block space-y-1">
            <span className="text-sm">Short subject (used if the description is rejected)</span>
            <input value={subject} onChange={(e) => setSubject(e.target.value)} className={fieldClass} />
          </label>
          <label className="block space-y-1">
            <span className="text-sm">Accent color</span>
            <select value={accentColor} onChange={(e) => setAccentColor(e.target.value)} className={fieldClass}>
              {ACCENT_COLORS.map((c) => (
                <option key={c} value={c}>{c || "none"}</option>
              ))}
            </select>
          </label>
          <label className="block space-y-1">
            <span className="text-sm">Aspect ratio</span>
            <select
              value={aspect}
              onChange={(e) => setAspect(ASPECTS.find((a) => a === e.target.value) ?? "3:2")}
              className={fieldClass}
            >
              {ASPECTS.map((a) => <option key={a} value={a}>{a}</option>)}
            </select>
          </label>
          <label className="block space-y-1">
            <span className="text-sm">Quality</span>
            <select
              value={quality}
              onChange={(e) => setQuality(QUALITIES.find((q) => q === e.target.value) ?? "high")}
              className={fieldClass}
            >
              {QUALITIES.map((q) => <option key={q} value={q}>{q}</option>)}
            </select>
          </label>
        </div>

        <button
          type="submit"
          disabled={pending}
          className="flex items-center gap-2 rounded-md bg-green-700 px-4 py-2 text-white hover:bg-green-600 disabled:opacity-60"
        >
          {pending && <Loader2 className="w-4 h-4 animate-spin" />}
          Generate Image
        </button>
      </form>

      {result && !result.ok && <ErrorNote message={result.error.message} />}
      {result?.ok && (
        <figure className="space-y-2">
          {/* Arbitrary provider hosts, so no next/image optimisation */}
          <img src={result.value} alt={prompt} className="w-full rounded-lg" />
          <figcaption className="text-xs opacity-60 break-all">{result.value}</figcaption>
        </figure>
      )}
    </div>
  );
}
