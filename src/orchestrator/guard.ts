export const LEVELS = [
  "accounts",
  "subscriptions",
  "resources",
  "secrets",
  "value",
] as const;

export type Level = (typeof LEVELS)[number];

export interface LoadToken {
  readonly level: Level;
  readonly generation: number;
}

/**
 * Generation counters per level. Starting a load at a level bumps it and every
 * deeper level, so any result captured under an older token is stale.
 */
export class SelectionGuard {
  private readonly generations = new Map<Level, number>(
    LEVELS.map((level) => [level, 0])
  );

  /** Supersede everything at `level` and below; returns the new token. */
  advance(level: Level): LoadToken {
    for (const l of LEVELS.slice(LEVELS.indexOf(level))) {
      this.generations.set(l, this.generation(l) + 1);
    }
    return { level, generation: this.generation(level) };
  }

  isCurrent(token: LoadToken): boolean {
    return this.generation(token.level) === token.generation;
  }

  /** Run `apply` only if `token` still names the live selection. */
  applyIfCurrent(token: LoadToken, apply: () => void): boolean {
    if (!this.isCurrent(token)) return false;
    apply();
    return true;
  }

  private generation(level: Level): number {
    return this.generations.get(level) ?? 0;
  }
}
