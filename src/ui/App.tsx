import React, { useEffect, useMemo, useState } from 'react';
import { Box, useApp, useInput, useStdout } from 'ink';

import { renderMap } from '../map/renderMap.js';
import type { ViewState } from '../state/viewState.js';
import type { ViewStateStore } from '../state/viewStateStore.js';
import { Header } from './Header.js';
import { OrbitMap } from './OrbitMap.js';
import { VectorTable } from './VectorTable.js';
import { keyAction } from './keymap.js';
import { computeLayout } from './layout.js';

interface AppProps {
  store: ViewStateStore;
}

function useTerminalSize(): { columns: number; rows: number } {
  const { stdout } = useStdout();
  const [size, setSize] = useState({ columns: stdout.columns ?? 80, rows: stdout.rows ?? 24 });

  useEffect(() => {
    const onResize = () => setSize({ columns: stdout.columns ?? 80, rows: stdout.rows ?? 24 });
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  return size;
}

function useViewState(store: ViewStateStore): ViewState {
  const [state, setState] = useState<ViewState>(() => store.snapshot());

  useEffect(() => {
    const sub = store.state$.subscribe(setState);
    return () => sub.unsubscribe();
  }, [store]);

  return state;
}

const KeyHandler: React.FC<{ store: ViewStateStore }> = ({ store }) => {
  const { exit } = useApp();

  useInput((input, key) => {
    const action = keyAction(input, key);
    if (!action) {
      return;
    }
    if (action.kind === 'quit') {
      exit();
      return;
    }
    store.update(action.transition);
  });

  return null;
};

export const App: React.FC<AppProps> = ({ store }) => {
  const state = useViewState(store);
  const { columns, rows } = useTerminalSize();
  const layout = computeLayout(columns, rows);

  // Each frame works from the snapshot captured above; the store is never read mid-render.
  const mapRows = useMemo(
    () => renderMap(layout.mapInner.width, layout.mapInner.height, state),
    [layout.mapInner.width, layout.mapInner.height, state]
  );

  return (
    <Box flexDirection="column" width={layout.columns}>
      {process.stdin.isTTY ? <KeyHandler store={store} /> : null}
      <Header state={state} width={layout.columns} />
      <Box flexDirection="row" height={layout.bodyHeight}>
        <VectorTable state={state} width={layout.tableWidth} height={layout.bodyHeight} />
        <OrbitMap rows={mapRows} width={layout.mapWidth} height={layout.bodyHeight} />
      </Box>
    </Box>
  );
};
