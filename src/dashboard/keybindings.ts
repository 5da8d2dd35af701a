import type { Action } from './actions.js';

/**
 * Key names are the typed character ("q", "?") or "ctrl+<char>" / "escape".
 * A binding is a sequence of key names; pending keys of an unfinished
 * sequence are dropped on every tick.
 */
export class KeyBindings {
  private readonly bindings = new Map<string, Action>();
  private pending: string[] = [];

  bind(keys: readonly string[], action: Action): this {
    this.bindings.set(keys.join(' '), action);
    return this;
  }

  /**
   * Bind each key on its own to the same action
   */
  bindKeys(keys: readonly string[], action: Action): this {
    for (const key of keys) {
      this.bind([key], action);
    }
    return this;
  }

  get(keys: readonly string[]): Action | undefined {
    return this.bindings.get(keys.join(' '));
  }

  entries(): Array<{ keys: string; action: Action }> {
    return Array.from(this.bindings, ([keys, action]) => ({ keys, action }));
  }

  /**
   * Feed one key press; returns the action it completes, if any
   */
  press(key: string): Action | undefined {
    const single = this.get([key]);
    if (single) {
      this.pending = [];
      return single;
    }

    this.pending.push(key);
    const sequence = this.get(this.pending);
    if (sequence) {
      this.pending = [];
    }
    return sequence;
  }

  clearPending(): void {
    this.pending = [];
  }
}

export function defaultKeyBindings(): KeyBindings {
  return new KeyBindings()
    .bindKeys(['q', 'Q', 'ctrl+c'], { type: 'quit' })
    .bindKeys(['p', 'P'], { type: 'pause' })
    .bindKeys(['f', 'F'], { type: 'toggle-fps' })
    .bindKeys(['?'], { type: 'toggle-help' })
    .bindKeys(['ctrl+l'], { type: 'clear-screen' });
}

/**
 * Key name for an Ink key event
 */
export function keyName(input: string, key: { ctrl: boolean; escape: boolean }): string {
  if (key.escape) return 'escape';
  if (key.ctrl) return `ctrl+${input.toLowerCase()}`;
  return input;
}
