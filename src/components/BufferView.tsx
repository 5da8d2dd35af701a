import { Box, Text } from 'ink';
import type { StyledRun } from '../render/buffer.js';

interface Props {
  rows: StyledRun[][];
}

/**
 * Draws a rendered frame: one Text line per row, one nested Text per run
 */
export function BufferView({ rows }: Props) {
  return (
    <Box flexDirection="column">
      {rows.map((runs, y) => (
        <Text key={y} wrap="truncate">
          {runs.map((run, i) => (
            <Text key={i} color={run.style.color} dimColor={run.style.dim} bold={run.style.bold}>
              {run.text}
            </Text>
          ))}
        </Text>
      ))}
    </Box>
  );
}
