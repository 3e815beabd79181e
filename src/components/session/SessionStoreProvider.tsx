"use client";

import { createContext, useContext, useState, type ReactNode } from "react";
import { useStore } from "zustand";
import type { StoreApi } from "zustand/vanilla";
import { remoteAnswerResolver } from "@/lib/ai/remote";
import { createSessionStore, type SessionStore } from "@/stores/session-store";
import type { PresetMode } from "@/lib/types";

const SessionStoreContext = createContext<StoreApi<SessionStore> | null>(null);

const PRESET_MODE: PresetMode = process.env.NEXT_PUBLIC_PRESET_MODE === "display" ? "display" : "history-only";

// Created once per mounted app, i.e. once per browser tab
export function SessionStoreProvider({ children }: { children: ReactNode }) {
  const [store] = useState(() =>
    createSessionStore({ resolverFor: (persona) => remoteAnswerResolver(persona), presetMode: PRESET_MODE }),
  );
  return <SessionStoreContext.Provider value={store}>{children}</SessionStoreContext.Provider>;
}

export function useSessionStore<T>(selector: (state: SessionStore) => T): T {
  const store = useContext(SessionStoreContext);
  if (!store) throw new Error("useSessionStore must be used within SessionStoreProvider");
  return useStore(store, selector);
}
