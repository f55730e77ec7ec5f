export const Answer = {
  CORRECT: "D",
  WRONG: "Y",
  EMPTY: "B",
  MISSING: " ",
} as const;

export type Answer = (typeof Answer)[keyof typeof Answer];
