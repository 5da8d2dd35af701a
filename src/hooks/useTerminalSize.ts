import { useState, useEffect, useCallback } from 'react';
import { useStdout } from 'ink';

export interface TerminalSize {
  width: number;
  height: number;
}

const FALLBACK_WIDTH = 80;
const FALLBACK_HEIGHT = 24;

/**
 * Track the output stream's size, re-rendering on resize
 */
export function useTerminalSize(): TerminalSize {
  const { stdout } = useStdout();

  const getSize = useCallback((): TerminalSize => ({
    width: stdout.columns || FALLBACK_WIDTH,
    height: stdout.rows || FALLBACK_HEIGHT,
  }), [stdout]);

  const [size, setSize] = useState<TerminalSize>(getSize);

  useEffect(() => {
    const handleResize = () => {
      setSize(getSize());
    };

    handleResize();
    stdout.on('resize', handleResize);

    return () => {
      stdout.off('resize', handleResize);
    };
  }, [stdout, getSize]);

  return size;
}
