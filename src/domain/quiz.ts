import { Answer } from "./answer.js";
import { QuizCategory } from "./category.js";
import { RecordInvalidError } from "./errors.js";
import type {
  CategoryBlueprint,
  CategoryRecord,
  QuizBlueprint,
  QuizRecord,
} from "./types.js";

export type QuizState = "FillingTheoretical" | "FillingClinical" | "Complete";

export interface RestoreOptions {
  questionsPerCategory: number;
}

export interface QuizOptions {
  now?: () => Date;
  /** Overrides the identifier derived from `now`. */
  createdAt?: string;
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

/** Session identifier in local time: yy_MM_dd_HHmmss. */
export function formatCreatedAt(d: Date): string {
  const yy: string = pad2(d.getFullYear() % 100);
  const date = `${yy}_${pad2(d.getMonth() + 1)}_${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}${pad2(d.getMinutes())}${pad2(
    d.getSeconds()
  )}`;
  return `${date}_${time}`;
}

/**
 * Drives sequential entry across the theoretical and clinical categories.
 * Once theoretical fills up, input moves to clinical for good; erasing never
 * moves it back.
 */
export class Quiz {
  public readonly theoretical: QuizCategory;
  public readonly clinical: QuizCategory;
  public readonly createdAt: string;
  private current: QuizCategory;

  public constructor(blueprint: QuizBlueprint, options: QuizOptions = {}) {
    this.theoretical = new QuizCategory(
      blueprint.theoretical.name,
      blueprint.theoretical.subjects,
      blueprint.questionsPerCategory
    );
    this.clinical = new QuizCategory(
      blueprint.clinical.name,
      blueprint.clinical.subjects,
      blueprint.questionsPerCategory
    );
    this.current = this.theoretical;
    const now: Date = options.now ? options.now() : new Date();
    this.createdAt = options.createdAt ?? formatCreatedAt(now);
  }

  public get active(): QuizCategory {
    return this.current;
  }

  public get state(): QuizState {
    if (this.clinical.view.isFull) return "Complete";
    return this.current === this.theoretical
      ? "FillingTheoretical"
      : "FillingClinical";
  }

  public get isComplete(): boolean {
    return this.state === "Complete";
  }

  public get length(): number {
    return this.theoretical.view.length + this.clinical.view.length;
  }

  public get subjectCount(): number {
    return this.theoretical.subjects.length + this.clinical.subjects.length;
  }

  /** @returns true only on the call that fills the last clinical slot */
  public update(answer: Answer): boolean {
    if (!this.current.view.updateNext(answer)) return false;
    if (this.current !== this.clinical) {
      this.current = this.clinical;
      return false;
    }
    return true;
  }

  public erase(): boolean {
    return this.current.view.eraseLast();
  }

  public toRecord(): QuizRecord {
    return {
      created_at: this.createdAt,
      theoretical: this.theoretical.toRecord(),
      clinical: this.clinical.toRecord(),
    };
  }

  /**
   * Rebuild a quiz by replaying a persisted record's answers in order.
   * Answers must form a filled prefix followed only by MISSING slots.
   */
  public static fromRecord(
    record: QuizRecord,
    options: RestoreOptions
  ): Quiz {
    const quiz = new Quiz(
      {
        theoretical: blueprintOf(record.theoretical),
        clinical: blueprintOf(record.clinical),
        questionsPerCategory: options.questionsPerCategory,
      },
      { createdAt: record.created_at }
    );

    const sequence: Answer[] = [
      ...flatten(record.theoretical),
      ...flatten(record.clinical),
    ];
    let filled = 0;
    while (filled < sequence.length && sequence[filled] !== Answer.MISSING) {
      quiz.update(sequence[filled]);
      filled++;
    }
    const trailing: number = sequence
      .slice(filled)
      .findIndex((a) => a !== Answer.MISSING);
    if (trailing !== -1) {
      throw new RecordInvalidError(
        `Record ${record.created_at} has an answer at position ${
          filled + trailing
        } after an unanswered slot at ${filled}`
      );
    }
    return quiz;
  }
}

function blueprintOf(record: CategoryRecord): CategoryBlueprint {
  return {
    name: record.name,
    subjects: Object.values(record.subjects).map((s) => ({
      name: s.name,
      questionCount: s.answers.length,
    })),
  };
}

function flatten(record: CategoryRecord): Answer[] {
  return Object.values(record.subjects).flatMap((s) => s.answers);
}
