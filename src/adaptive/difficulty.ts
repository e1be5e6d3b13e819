import { DIFFICULTY_LEVELS, type AdaptationAction, type DifficultyLevel } from "./types";

export const levelIndex = (level: DifficultyLevel): number => DIFFICULTY_LEVELS.indexOf(level);

export const isCeiling = (level: DifficultyLevel): boolean => level === 'Hard';
export const isFloor = (level: DifficultyLevel): boolean => level === 'Easy';

/**
 * Moves at most one step. Requests past either end leave the level unchanged.
 */
export const applyAction = (level: DifficultyLevel, action: AdaptationAction): DifficultyLevel => {
  const idx = levelIndex(level);

  switch (action) {
    case 'increase':
      return DIFFICULTY_LEVELS[Math.min(idx + 1, DIFFICULTY_LEVELS.length - 1)] ?? level;
    case 'decrease':
      return DIFFICULTY_LEVELS[Math.max(idx - 1, 0)] ?? level;
    case 'maintain':
      return level;
  }
};

export class DifficultyHistory {
  private readonly levels: DifficultyLevel[];

  constructor(initialLevel: DifficultyLevel) {
    this.levels = [initialLevel];
  }

  get current(): DifficultyLevel {
    return this.levels[this.levels.length - 1] ?? this.initial;
  }

  get initial(): DifficultyLevel {
    return this.levels[0] ?? 'Easy';
  }

  get changes(): number {
    return this.levels.length - 1;
  }

  /**
   * Applies the action to the current level and records the result only
   * when the level actually moved. Returns the level after the transition.
   */
  transition(action: AdaptationAction): DifficultyLevel {
    const from = this.current;
    const to = applyAction(from, action);
    if (to !== from) {
      this.levels.push(to);
    }
    return to;
  }

  toArray(): DifficultyLevel[] {
    return [...this.levels];
  }
}
