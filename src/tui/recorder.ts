import type { Quiz } from "../domain/quiz.js";
import { logger } from "../logger.js";
import { QuizPresenter } from "../presentation/quizPresenter.js";
import { parseKey, type KeyAction } from "./keys.js";
import type { QuizPainter } from "./terminal.js";

export type RecordOutcome = "complete" | "aborted" | "input-ended";

/**
 * Feed keys into the quiz until it completes, the user aborts, or the key
 * source runs dry. The sheet is repainted after every accepted key.
 */
export async function recordQuiz(
  quiz: Quiz,
  keys: AsyncIterable<string>,
  painter: QuizPainter
): Promise<RecordOutcome> {
  painter.println(QuizPresenter.legend());
  painter.paint(quiz);

  for await (const raw of keys) {
    const action: KeyAction | null = parseKey(raw);
    if (!action) continue;

    switch (action.kind) {
      case "abort":
        logger.info("Quiz aborted by user", { createdAt: quiz.createdAt });
        return "aborted";
      case "erase":
        quiz.erase();
        painter.paint(quiz);
        break;
      case "answer": {
        const complete: boolean = quiz.update(action.answer);
        painter.paint(quiz);
        if (complete) return "complete";
        break;
      }
    }
  }

  logger.warn("Key input ended before the quiz was complete", {
    createdAt: quiz.createdAt,
    state: quiz.state,
  });
  return "input-ended";
}
