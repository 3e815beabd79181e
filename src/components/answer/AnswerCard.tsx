import type { ReactNode } from "react";

export function AnswerCard({ answer, footer }: { answer: string; footer?: ReactNode }) {
  return (
    <section className="rounded-lg bg-[#f6f6f6] p-4 text-black">
      <h3 className="text-lg font-semibold text-[#2b8a3e] mb-2">Answer</h3>
      <p className="whitespace-pre-line leading-relaxed">{answer}</p>
      {footer && <div className="mt-4 pt-3 border-t border-zinc-300 text-sm text-zinc-600">{footer}</div>}
    </section>
  );
}

export function ErrorNote({ message }: { message: string }) {
  return (
    <p role="alert" className="rounded-lg border border-red-300 bg-red-50 px-4 py-3 text-sm text-red-800">
      {message}
    </p>
  );
}
