"use client";

import { useState, type FormEvent } from "react";
import { motion } from "framer-motion";
import { Loader2, Sparkles } from "lucide-react";
import { useToast } from "@/components/Toast";
import { ErrorNote } from "@/components/answer/AnswerCard";
import { fetchImage } from "@/lib/ai/remote";
import {
  CATS,
  FLIGHT_PATHS,
  FLYER_SUCCESS,
  FLYER_WARNING,
  generatedFlyer,
  randomFlightPath,
  type FlightPathName,
  type Flyer,
} from "@/lib/chillspace";
import { cn } from "@/lib/utils";

export default function ChillspacePage() {
  const { toast } = useToast();
  const [path, setPath] = useState<FlightPathName>("fly1");
  const [cat, setCat] = useState<Flyer>(CATS[0]);
  // Restarts the animation even when the same path is rolled twice
  const [flight, setFlight] = useState(0);

  const [description, setDescription] = useState("");
  const [generating, setGenerating] = useState(false);
  const [generateError, setGenerateError] = useState<string | null>(null);

  const { left, top, rotate } = FLIGHT_PATHS[path];

  async function handleGenerate(e: FormEvent) {
    e.preventDefault();
    if (generating) return;
    if (!description.trim()) {
      toast("warning", FLYER_WARNING);
      return;
    }

    setGenerating(true);
    setGenerateError(null);
    try {
      const flyer = generatedFlyer(description, await fetchImage({ prompt: description.trim() }));
      if (!flyer.ok) {
        setGenerateError(flyer.error.message);
        return;
      }
      setCat(flyer.value);
      toast("success", FLYER_SUCCESS);
    } finally {
      setGenerating(false);
    }
  }

  return (
    <div className="space-y-4">
      <h1 className="text-3xl font-bold">Chillspace for the Bored</h1>
      <p>This game is in Beta. Bugs and issues may occur.</p>
      <p>Click the cat to send it flying somewhere else. Enjoy the game :D</p>

      <div className="flex flex-wrap gap-2">
        {CATS.map((c) => (
          <button
            key={c.name}
            onClick={() => setCat(c)}
            className={cn(
              "rounded-md border border-zinc-400/60 px-3 py-1.5 text-sm hover:bg-zinc-500/10",
              cat.src === c.src && "bg-zinc-500/15 font-medium"
            )}
          >
            Switch to {c.name}
          </button>
        ))}
      </div>

      <form onSubmit={handleGenerate} className="space-y-2">
        <label htmlFor="flyer" className="block text-sm font-medium">
          Generate your own flyer. Describe your character (e.g., &apos;a flying burrito&apos;):
        </label>
        <div className="flex gap-2">
          <input
            id="flyer"
            value={description}
            onChange={(e) => setDescription(e.target.value)}
            className="flex-1 rounded-md border border-zinc-400/60 bg-transparent px-3 py-2"
            autoComplete="off"
          />
          <button
            type="submit"
            disabled={generating}
            className="flex items-center gap-2 rounded-md bg-green-700 px-4 py-2 text-white hover:bg-green-600 disabled:opacity-60"
          >
            {generating ? <Loader2 className="w-4 h-4 animate-spin" /> : <Sparkles className="w-4 h-4" />}
            Generate with AI
          </button>
        </div>
        {generating && <p className="text-sm opacity-70">AI is painting your character... this can take a minute!</p>}
        {generateError && <ErrorNote message={generateError} />}
      </form>

      <div className="relative h-[400px] w-full overflow-hidden rounded-lg border border-zinc-400/40 select-none">
        <motion.img
          key={`${path}-${flight}`}
          src={cat.src}
          alt={cat.name}
          draggable={false}
          onClick={() => {
            setPath(randomFlightPath());
            setFlight((n) => n + 1);
          }}
          className="absolute w-[100px] h-auto object-contain cursor-pointer"
          animate={{ left, top, rotate }}
          transition={{ duration: 10, ease: "linear", repeat: Infinity }}
        />
      </div>
    </div>
  );
}
