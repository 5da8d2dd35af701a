import { Component, type ErrorInfo, type ReactNode } from 'react';
import { Box, Text } from 'ink';
import { truncateMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';

interface Props {
  children: ReactNode;
  fallback?: ReactNode;
}

interface State {
  error: Error | null;
}

export class ErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    log.error('Render failed', {
      error: error.message,
      stack: error.stack,
      componentStack: errorInfo.componentStack,
    });
    process.exitCode = 1;
  }

  render() {
    if (this.state.error) {
      if (this.props.fallback) {
        return this.props.fallback;
      }

      return (
        <Box flexDirection="column" padding={1}>
          <Text color="red" bold>Dashboard stopped</Text>
          <Text color="gray">{truncateMessage(this.state.error.message || 'Unknown error')}</Text>
          <Box marginTop={1}>
            <Text color="gray" dimColor>Press Ctrl+C to exit</Text>
          </Box>
        </Box>
      );
    }

    return this.props.children;
  }
}
