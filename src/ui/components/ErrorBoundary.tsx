import React, { Component, type ReactNode } from "react";
import { Box, Text } from "ink";
import { Logger } from "../../logger";

interface ErrorBoundaryProps {
  children: ReactNode;
  context?: string;
}

interface ErrorBoundaryState {
  hasError: boolean;
  error: Error | null;
}

/**
 * Shows the error in place of the viewer instead of tearing down the
 * terminal with a React stack.
 */
export class ErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
  constructor(props: ErrorBoundaryProps) {
    super(props);
    this.state = { hasError: false, error: null };
  }

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    Logger.error("ErrorBoundary", `Error in ${this.props.context || "component"}`, error, {
      componentStack: errorInfo.componentStack,
    });
  }

  render() {
    if (this.state.hasError) {
      return (
        <Box flexDirection="column" padding={1}>
          <Text bold>Viewer error</Text>
          <Text>{this.state.error?.message ?? "Unknown error"}</Text>
          <Text>Press Ctrl+C to quit.</Text>
        </Box>
      );
    }
    return this.props.children;
  }
}
