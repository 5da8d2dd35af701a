export type Action =
  | { type: 'tick' }
  | { type: 'render' }
  | { type: 'resize'; width: number; height: number }
  | { type: 'quit' }
  | { type: 'pause' }
  | { type: 'toggle-fps' }
  | { type: 'toggle-help' }
  | { type: 'clear-screen' }
  | { type: 'error'; message: string };

export type Dispatch = (action: Action) => void;

/**
 * Actions that fire many times a second and are not worth logging
 */
export function isFrequent(action: Action): boolean {
  return action.type === 'tick' || action.type === 'render';
}
