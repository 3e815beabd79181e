"use client";

import type { ReactNode } from "react";
import { usePathname } from "next/navigation";
import { ErrorBoundary } from "@/components/ErrorBoundary";
import { Sidebar } from "@/components/layout/Sidebar";
import { SettingsPanel } from "@/components/settings/SettingsPanel";
import { useSessionStore } from "@/components/session/SessionStoreProvider";
import { cn } from "@/lib/utils";

// Pages whose sidebar carries the answer settings; History only gets Clear
const GENERATION_PAGES = ["/", "/presets"];
const SESSION_PAGES = [...GENERATION_PAGES, "/history"];

export function AppShell({ children }: { children: ReactNode }) {
  const pathname = usePathname();
  const background = useSessionStore((s) => s.settings.background);

  return (
    <div
      className={cn(
        "flex min-h-screen transition-colors",
        background === "Black" ? "bg-[#0b0c0d] text-[#e6e6e6]" : "bg-white text-black"
      )}
    >
      <Sidebar>
        {SESSION_PAGES.includes(pathname) && <SettingsPanel showGeneration={GENERATION_PAGES.includes(pathname)} />}
      </Sidebar>
      <main id="main-content" className="flex-1 px-6 py-10">
        <div className="max-w-2xl mx-auto">
          <ErrorBoundary>{children}</ErrorBoundary>
        </div>
      </main>
    </div>
  );
}
