import React from "react";
import { ErrorBoundary } from "./components/ErrorBoundary";
import { DumpViewer } from "./components/DumpViewer";

export interface AppProps {
  title: string;
  /** Full dump output: the header pair followed by the data lines. */
  output: readonly string[];
}

export function App({ title, output }: AppProps) {
  const header: readonly [string, string] = [output[0] ?? "", output[1] ?? ""];
  return (
    <ErrorBoundary context="DumpViewer">
      <DumpViewer title={title} header={header} lines={output.slice(2)} />
    </ErrorBoundary>
  );
}
