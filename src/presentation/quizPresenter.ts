import { Answer } from "../domain/answer.js";
import type { QuizCategory } from "../domain/category.js";
import type { Quiz } from "../domain/quiz.js";
import type { Subject } from "../domain/subject.js";

interface Tally {
  numCorrect: number;
  numWrong: number;
  numEmpty: number;
  numNet: number;
}

function renderTally(t: Tally): string {
  return (
    `${String(t.numCorrect).padStart(3)}${Answer.CORRECT} ` +
    `${String(t.numWrong).padStart(3)}${Answer.WRONG} ` +
    `${String(t.numEmpty).padStart(3)}${Answer.EMPTY} ` +
    `-> ${t.numNet.toFixed(2).padStart(5)}`
  );
}

export class QuizPresenter {
  public static legend(): string {
    return [
      `${Answer.CORRECT} -> Doğru`,
      `${Answer.WRONG} -> Yanlış`,
      `${Answer.EMPTY} -> Boş`,
      "Backspace -> Sil",
      "CTRL+C -> İptal",
      "",
    ].join("\n");
  }

  public static categoryHeader(category: QuizCategory): string {
    const progress = `${String(category.view.cursor).padStart(2)}/${
      category.expectedSize
    }`;
    return `${category.name}: (${progress}) \t${renderTally(category)}`;
  }

  public static subjectLine(subject: Subject): string {
    const cells: string = subject
      .values()
      .map((a) => `[${a}]`)
      .join("");
    return `${subject.name}:\t${renderTally(subject)} ${cells}`;
  }

  /** Header plus one tab-indented line per subject, for both categories. */
  public static lines(quiz: Quiz): string[] {
    const out: string[] = [];
    for (const category of [quiz.theoretical, quiz.clinical]) {
      out.push(QuizPresenter.categoryHeader(category));
      for (const subject of category.subjects) {
        out.push(`\t${QuizPresenter.subjectLine(subject)}`);
      }
    }
    return out;
  }
}
