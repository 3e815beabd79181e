const STACK = ["Next.js", "React", "Tailwind CSS", "Zustand", "Zod", "Framer Motion", "An OpenAI-compatible chat API"];

export default function CreditsPage() {
  return (
    <div className="space-y-4">
      <h1 className="text-3xl font-bold">Credits</h1>
      <p>Built with:</p>
      <ul className="list-disc pl-6">
        {STACK.map((item) => <li key={item}>{item}</li>)}
      </ul>
      <h2 className="text-2xl font-bold pt-4">MORE UPDATES COMING SOON!!!!! STAY TUNED :D</h2>
    </div>
  );
}
