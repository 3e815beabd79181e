"use client";

import { useEffect, useRef } from "react";
import { usePathname } from "next/navigation";
import { isOpaqueScriptError, reportError, toError } from "@/lib/error-reporter";

/** Window-level error and rejection listener, tagged with the page the user was on. */
export function GlobalErrorHandler() {
  const pathname = usePathname();
  // Listeners are attached once; the ref keeps the page current without re-binding
  const page = useRef(pathname);
  page.current = pathname;

  useEffect(() => {
    const onError = (e: ErrorEvent) => {
      if (isOpaqueScriptError(e.message, e.error)) return;
      reportError(toError(e.error, e.message), {
        type: "unhandled",
        page: page.current,
        source: `${e.filename}:${e.lineno}:${e.colno}`,
      });
    };
    const onRejection = (e: PromiseRejectionEvent) => {
      reportError(toError(e.reason, "Promise rejected without a reason"), {
        type: "unhandled_rejection",
        page: page.current,
      });
    };

    window.addEventListener("error", onError);
    window.addEventListener("unhandledrejection", onRejection);
    return () => {
      window.removeEventListener("error", onError);
      window.removeEventListener("unhandledrejection", onRejection);
    };
  }, []);

  return null;
}
