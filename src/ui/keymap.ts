import { type ViewTransition, focusIn, focusOut, resetView, zoomIn, zoomOut } from '../state/viewState.js';

export type KeyAction = { kind: 'quit' } | { kind: 'update'; transition: ViewTransition };

const TRANSITIONS = new Map<string, ViewTransition>([
  ['+', zoomIn],
  ['=', zoomIn],
  ['-', zoomOut],
  ['0', resetView],
  ['[', focusIn],
  [']', focusOut]
]);

export function keyAction(input: string, key: { ctrl?: boolean } = {}): KeyAction | null {
  if (input === 'q' || (key.ctrl && input === 'c')) {
    return { kind: 'quit' };
  }
  const transition = TRANSITIONS.get(input);
  return transition ? { kind: 'update', transition } : null;
}
