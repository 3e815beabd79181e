"use client";

import type { ReactNode } from "react";
import { ToastProvider } from "@/components/Toast";
import { GlobalErrorHandler } from "@/components/GlobalErrorHandler";
import { SessionStoreProvider } from "@/components/session/SessionStoreProvider";

export function Providers({ children }: { children: ReactNode }) {
  return (
    <SessionStoreProvider>
      <ToastProvider>
        <GlobalErrorHandler />
        {children}
      </ToastProvider>
    </SessionStoreProvider>
  );
}
