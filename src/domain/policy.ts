import type { QuizBlueprint, SubjectBlueprint } from "./types.js";

export const QUESTIONS_PER_CATEGORY = 100 as const;

export const THEORETICAL_NAME = "Temel" as const;
export const CLINICAL_NAME = "Klinik" as const;

export const THEORETICAL_BLUEPRINTS: readonly SubjectBlueprint[] = [
  { name: "Anatomi", questionCount: 13 },
  { name: "Fizyoloji", questionCount: 15 },
  { name: "Biyokimya", questionCount: 18 },
  { name: "Mikrobiyoloji", questionCount: 18 },
  { name: "Patoloji", questionCount: 18 },
  { name: "Farmakoloji", questionCount: 18 },
];

export const CLINICAL_BLUEPRINTS: readonly SubjectBlueprint[] = [
  { name: "Dahiliye", questionCount: 25 },
  { name: "Dahili KS", questionCount: 10 },
  { name: "Pediatri", questionCount: 25 },
  { name: "Genel Cerrahi", questionCount: 21 },
  { name: "Cerrahi KS", questionCount: 9 },
  { name: "Kadın Doğum", questionCount: 10 },
];

// Each wrong answer cancels a quarter of a correct one.
export const WRONG_PENALTY = 1 / 4;

export const DEFAULT_QUIZ_BLUEPRINT: QuizBlueprint = {
  theoretical: { name: THEORETICAL_NAME, subjects: THEORETICAL_BLUEPRINTS },
  clinical: { name: CLINICAL_NAME, subjects: CLINICAL_BLUEPRINTS },
  questionsPerCategory: QUESTIONS_PER_CATEGORY,
};
