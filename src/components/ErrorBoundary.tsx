"use client";

import React from "react";
import { reportError } from "@/lib/error-reporter";

interface Props {
  children: React.ReactNode;
}

interface State {
  error: Error | null;
  resetKey: number;
}

// Wraps each page below the sidebar; the session store lives above it
export class ErrorBoundary extends React.Component<Props, State> {
  state: State = { error: null, resetKey: 0 };

  static getDerivedStateFromError(error: Error): Partial<State> {
    return { error };
  }

  componentDidCatch(error: Error, info: React.ErrorInfo) {
    reportError(error, { type: "render", componentStack: info.componentStack ?? "" });
  }

  handleRetry = () => {
    this.setState((prev) => ({ error: null, resetKey: prev.resetKey + 1 }));
  };

  render() {
    if (this.state.error) {
      return (
        <div className="flex flex-col items-center justify-center gap-4 p-8 text-center">
          <p className="text-[15px] font-medium">The Machine tripped over something</p>
          <p className="text-[13px] opacity-60">{this.state.error.message}</p>
          <button
            onClick={this.handleRetry}
            className="px-4 py-2 text-[13px] font-medium rounded-lg bg-green-700 text-white hover:bg-green-600 transition-colors"
          >
            Try again
          </button>
        </div>
      );
    }
    return <React.Fragment key={this.state.resetKey}>{this.props.children}</React.Fragment>;
  }
}
