import { Answer } from "./answer.js";
import { IndexOutOfRangeError } from "./errors.js";
import { WRONG_PENALTY } from "./policy.js";
import type { SubjectRecord } from "./types.js";

/**
 * A named block of question slots. The slot count is fixed at construction;
 * slots are only ever overwritten by index.
 */
export class Subject {
  public readonly name: string;
  private readonly answers: Answer[];

  public constructor(name: string, questionCount: number) {
    this.name = name;
    this.answers = new Array<Answer>(questionCount).fill(Answer.MISSING);
  }

  public get length(): number {
    return this.answers.length;
  }

  public get(index: number): Answer {
    this.checkIndex(index);
    return this.answers[index];
  }

  public set(index: number, value: Answer): void {
    this.checkIndex(index);
    this.answers[index] = value;
  }

  public get numCorrect(): number {
    return this.count(Answer.CORRECT);
  }

  public get numWrong(): number {
    return this.count(Answer.WRONG);
  }

  public get numEmpty(): number {
    return this.count(Answer.EMPTY);
  }

  public get numNet(): number {
    return this.numCorrect - this.numWrong * WRONG_PENALTY;
  }

  public values(): readonly Answer[] {
    return this.answers;
  }

  public toRecord(): SubjectRecord {
    return { name: this.name, answers: [...this.answers] };
  }

  private count(value: Answer): number {
    let n = 0;
    for (const a of this.answers) if (a === value) n++;
    return n;
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.answers.length) {
      throw new IndexOutOfRangeError(index, this.answers.length);
    }
  }
}
