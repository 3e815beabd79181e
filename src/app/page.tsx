"use client";

import { useEffect, useState, type FormEvent } from "react";
import Image from "next/image";
import { Dices, Loader2, Send } from "lucide-react";
import { useToast } from "@/components/Toast";
import { AnswerCard, ErrorNote } from "@/components/answer/AnswerCard";
import { useSessionStore } from "@/components/session/SessionStoreProvider";
import { rerollOverwritesOther } from "@/lib/session";

const ROBOT_IMAGE = "https://www.mercurynews.com/wp-content/uploads/2016/08/20150607_051142_sjm-lolrobots0607.jpg?w=572";

export default function AskPage() {
  const { toast } = useToast();
  const session = useSessionStore((s) => s.session);
  const pending = useSessionStore((s) => s.pending);
  const ask = useSessionStore((s) => s.ask);
  const reroll = useSessionStore((s) => s.reroll);

  const overwritten = rerollOverwritesOther(session);

  const [draft, setDraft] = useState(session.question);
  const [action, setAction] = useState<"ask" | "reroll" | null>(null);

  // Clear History empties the input too
  useEffect(() => {
    if (!session.question) setDraft("");
  }, [session.question]);

  async function handleAsk(e: FormEvent) {
    e.preventDefault();
    setAction("ask");
    const warning = await ask(draft);
    setAction(null);
    if (warning) toast("warning", warning.message);
  }

  async function handleReroll() {
    setAction("reroll");
    const warning = await reroll();
    setAction(null);
    if (warning) toast("warning", warning.message);
  }

  return (
    <div className="space-y-6">
      <h1 className="text-3xl font-bold">The Very Cool Machine which can answer all your questions 👍</h1>
      <Image
        src={ROBOT_IMAGE}
        alt="A row of toy robots"
        width={572}
        height={381}
        className="w-full max-w-[572px] h-auto rounded-lg"
        priority
      />

      <form onSubmit={handleAsk} className="space-y-3">
        <label htmlFor="question" className="block text-sm font-medium">
          Ask a random question:
        </label>
        <input
          id="question"
          value={draft}
          onChange={(e) => setDraft(e.target.value)}
          className="w-full rounded-md border border-zinc-400/60 bg-transparent px-3 py-2"
          autoComplete="off"
        />
        <div className="grid grid-cols-2 gap-3">
          <button
            type="submit"
            disabled={pending}
            className="flex items-center justify-center gap-2 rounded-md bg-green-700 px-4 py-2 text-white hover:bg-green-600 disabled:opacity-60"
          >
            {action === "ask" ? <Loader2 className="w-4 h-4 animate-spin" /> : <Send className="w-4 h-4" />}
            Get Answer
          </button>
          <button
            type="button"
            onClick={handleReroll}
            disabled={pending}
            className="flex items-center justify-center gap-2 rounded-md border border-zinc-400/60 px-4 py-2 hover:bg-zinc-500/10 disabled:opacity-60"
          >
            {action === "reroll" ? <Loader2 className="w-4 h-4 animate-spin" /> : <Dices className="w-4 h-4" />}
            Reroll Answer
          </button>
        </div>
      </form>

      {overwritten && (
        <p className="text-sm opacity-70">
          Heads up: the latest history entry is the preset &quot;{overwritten.question}&quot;. Rerolling replaces its
          answer with a new answer to &quot;{session.question}&quot;.
        </p>
      )}

      {pending && (
        <p className="text-sm opacity-70">{action === "reroll" ? "Rerolling..." : "Consulting the Book of Answers..."}</p>
      )}

      {session.answerError ? (
        <ErrorNote message={session.answerError.message} />
      ) : (
        session.answer && <AnswerCard answer={session.answer} footer={`Rerolls: ${session.reroll}`} />
      )}
    </div>
  );
}
