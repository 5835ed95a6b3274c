import React from 'react';
import { Box, Text } from 'ink';

import { BODIES, iconFor } from '../config/bodies.js';
import type { ViewState } from '../state/viewState.js';
import { formatVectorCells } from './format.js';

const COLUMNS = [
  { key: 'icon', width: 3 },
  { key: 'body', width: 10 },
  { key: 'x', width: 14 },
  { key: 'y', width: 14 },
  { key: 'z', width: 14 },
  { key: 'r', width: 12 }
] as const;

type ColumnKey = (typeof COLUMNS)[number]['key'];

const Row: React.FC<{ cells: Record<ColumnKey, React.ReactNode> }> = ({ cells }) => (
  <Box>
    {COLUMNS.map((col) => (
      <Box key={col.key} width={col.width} flexShrink={0}>
        <Text wrap="truncate">{cells[col.key]}</Text>
      </Box>
    ))}
  </Box>
);

export const VectorTable: React.FC<{ state: ViewState; width: number; height: number }> = ({
  state,
  width,
  height
}) => (
  <Box flexDirection="column" borderStyle="single" width={width} height={height} overflow="hidden">
    <Text bold wrap="truncate">
      Heliocentric vectors (AU)
    </Text>
    <Row cells={{ icon: '', body: 'Body', x: 'X', y: 'Y', z: 'Z', r: 'R' }} />
    {state.bodies.map((body) => {
      const meta = BODIES[body.name];
      const v = formatVectorCells(body.posAu);
      return (
        <Row
          key={body.name}
          cells={{
            icon: <Text color={meta.color}>{iconFor(body.name, state.iconStyle)}</Text>,
            body: body.name,
            x: v.x,
            y: v.y,
            z: v.z,
            r: v.r
          }}
        />
      );
    })}
  </Box>
);
