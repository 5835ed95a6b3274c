import React from 'react';
import { Box, Text } from 'ink';

import type { StyledRow } from '../map/renderMap.js';
import { groupRuns } from './format.js';

export const OrbitMap: React.FC<{ rows: StyledRow[]; width: number; height: number }> = ({
  rows,
  width,
  height
}) => (
  <Box flexDirection="column" borderStyle="single" width={width} height={height} overflow="hidden">
    <Text bold wrap="truncate">
      Orbits + positions
    </Text>
    {rows.map((row, y) => (
      <Text key={y} wrap="truncate">
        {groupRuns(row).map((run, i) =>
          run.color ? (
            <Text key={i} color={run.color}>
              {run.text}
            </Text>
          ) : (
            <Text key={i}>{run.text}</Text>
          )
        )}
      </Text>
    ))}
  </Box>
);
