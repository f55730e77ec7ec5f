import { Quiz } from "../../domain/quiz.js";
import { logger } from "../../logger.js";
import { recordQuiz, type RecordOutcome } from "../../tui/recorder.js";
import { QuizPainter } from "../../tui/terminal.js";
import { BaseCommand } from "./baseCommand.js";

export class RecordCommand extends BaseCommand {
  protected validate(): Promise<boolean> {
    return Promise.resolve(true);
  }

  protected async process(): Promise<number> {
    const quiz = new Quiz(this.ctx.blueprint, { now: this.ctx.now });
    logger.debug(`Recording quiz ${quiz.createdAt}`);

    const painter = new QuizPainter(this.ctx.out);
    const outcome: RecordOutcome = await recordQuiz(
      quiz,
      this.ctx.keySource(),
      painter
    );

    if (outcome === "aborted") {
      this.println("Quiz aborted by user.");
      return 130;
    }
    if (outcome === "input-ended") {
      this.println("Input ended before the quiz was complete; nothing saved.");
      return 1;
    }

    this.println("Quiz entry successful.");
    const filePath: string = this.ctx.recordService.saveQuizRecord(
      quiz,
      this.ctx.config.QUIZ_RECORDS_DIR
    );
    this.println(`Quiz record saved to ${filePath}`);
    return 0;
  }

  public getCommandId(): string {
    return "record";
  }

  public getDescription(): string {
    return "Enter a new answer sheet from the keyboard";
  }
}
