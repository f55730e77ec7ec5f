import type { Answer } from "./answer.js";

export interface SubjectBlueprint {
  name: string;
  questionCount: number;
}

export interface SubjectRecord {
  name: string;
  answers: Answer[];
}

export interface CategoryRecord {
  name: string;
  subjects: Record<string, SubjectRecord>;
}

export interface QuizRecord {
  created_at: string;
  theoretical: CategoryRecord;
  clinical: CategoryRecord;
}

export interface CategoryBlueprint {
  name: string;
  subjects: readonly SubjectBlueprint[];
}

export interface QuizBlueprint {
  theoretical: CategoryBlueprint;
  clinical: CategoryBlueprint;
  questionsPerCategory: number;
}
