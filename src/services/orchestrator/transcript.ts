// Append-only record of one agent session

import type { Turn } from './types.js';

export class Transcript {
  private readonly turnList: Turn[] = [];
  private readonly chunks: string[] = [];

  /** Stores a frozen copy; later changes to the caller's action or args do not reach it. */
  record(turn: Turn): void {
    const action = turn.action
      ? Object.freeze({ tool: turn.action.tool, args: Object.freeze([...turn.action.args]) })
      : null;
    this.turnList.push(Object.freeze({ ...turn, action }));
  }

  append(chunk: string): void {
    this.chunks.push(chunk);
  }

  get turns(): Turn[] {
    return [...this.turnList];
  }

  get history(): string[] {
    return [...this.chunks];
  }
}
