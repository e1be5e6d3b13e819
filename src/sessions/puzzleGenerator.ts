import type { DifficultyLevel } from "../adaptive/types";

export type Operation = '+' | '-' | '×' | '÷';

export interface Puzzle {
  question: string;
  operand1: number;
  operand2: number;
  operation: Operation;
  answer: number;
  difficulty: DifficultyLevel;
}

export interface DifficultyRange {
  min: number;
  max: number;
  operations: readonly Operation[];
  description: string;
}

export const DIFFICULTY_RANGES: Record<DifficultyLevel, DifficultyRange> = {
  Easy: {
    min: 1,
    max: 9,
    operations: ['+', '-', '×'],
    description: 'Single-digit operations'
  },
  Medium: {
    min: 10,
    max: 50,
    operations: ['+', '-', '×', '÷'],
    description: 'Double-digit operations'
  },
  Hard: {
    min: 50,
    max: 100,
    operations: ['+', '-', '×', '÷'],
    description: 'Multi-digit operations'
  }
};

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

const randomInt = (random: RandomSource, min: number, max: number): number => {
  return min + Math.floor(random() * (max - min + 1));
};

export class PuzzleGenerator {
  constructor(private readonly random: RandomSource = Math.random) {}

  generatePuzzle(difficulty: DifficultyLevel): Puzzle {
    const range = DIFFICULTY_RANGES[difficulty];
    const operation = range.operations[randomInt(this.random, 0, range.operations.length - 1)] ?? '+';

    let operand1 = randomInt(this.random, range.min, range.max);
    let operand2 = randomInt(this.random, range.min, range.max);
    let answer: number;

    switch (operation) {
      case '+':
        answer = operand1 + operand2;
        break;
      case '-':
        // Larger operand first so the result is never negative.
        [operand1, operand2] = [Math.max(operand1, operand2), Math.min(operand1, operand2)];
        answer = operand1 - operand2;
        break;
      case '×':
        answer = operand1 * operand2;
        break;
      case '÷':
        answer = randomInt(this.random, range.min, range.max);
        operand1 = answer * operand2;
        break;
    }

    return {
      question: `${operand1} ${operation} ${operand2} = ?`,
      operand1,
      operand2,
      operation,
      answer,
      difficulty
    };
  }

  generateMultiple(difficulty: DifficultyLevel, count = 5): Puzzle[] {
    return Array.from({ length: count }, () => this.generatePuzzle(difficulty));
  }
}
