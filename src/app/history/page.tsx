"use client";

import { useSessionStore } from "@/components/session/SessionStoreProvider";

export default function HistoryPage() {
  const history = useSessionStore((s) => s.session.history);
  const hasAsked = useSessionStore((s) => s.session.hasAsked);

  return (
    <div className="space-y-6">
      <h1 className="text-3xl font-bold">History Archive</h1>

      {history.length === 0 && !hasAsked && <p>Go ask some questions bruv</p>}

      {/* Newest first, numbered by position in the session */}
      <ol className="space-y-4">
        {history.map((_, i) => {
          const index = history.length - 1 - i;
          const item = history[index];
          return (
            <li key={index} className="border-b border-zinc-400/40 pb-4 space-y-1">
              <p><strong>Question {index + 1}:</strong> {item.question}</p>
              <p className="whitespace-pre-line"><strong>Answer:</strong> {item.answer}</p>
              <p><strong>Rerolls:</strong> {item.rerolls}</p>
            </li>
          );
        })}
      </ol>
    </div>
  );
}
