import { Quiz } from "../../domain/quiz.js";
import type { QuizRecord } from "../../domain/types.js";
import { QuizPresenter } from "../../presentation/quizPresenter.js";
import { BaseCommand } from "./baseCommand.js";

export class ShowCommand extends BaseCommand {
  private get file(): string | undefined {
    return this.args[0];
  }

  protected validate(): Promise<boolean> {
    if (!this.file) {
      this.println("Usage: show <file>");
      return Promise.resolve(false);
    }
    return Promise.resolve(true);
  }

  protected process(): Promise<number> {
    const file: string = this.file ?? "";
    const record: QuizRecord = this.ctx.recordService.loadQuizRecord(file);
    const quiz: Quiz = Quiz.fromRecord(record, {
      questionsPerCategory: this.ctx.blueprint.questionsPerCategory,
    });
    this.println(`Quiz ${quiz.createdAt} (${quiz.state})`);
    for (const line of QuizPresenter.lines(quiz)) this.println(line);
    return Promise.resolve(0);
  }

  public getCommandId(): string {
    return "show";
  }

  public getDescription(): string {
    return "Print a saved answer sheet";
  }

  public getArgumentSpec(): string {
    return "<file>";
  }
}
