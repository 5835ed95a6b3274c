import React from 'react';
import { Box, Text } from 'ink';

import type { ViewState } from '../state/viewState.js';
import { formatHeader } from './format.js';

export const Header: React.FC<{ state: ViewState; width: number }> = ({ state, width }) => (
  <Box borderStyle="single" width={width} height={3} paddingX={1}>
    <Text wrap="truncate">
      <Text bold>Solar System</Text> {formatHeader(state)}
    </Text>
  </Box>
);
