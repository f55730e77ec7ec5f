import { describe, it, expect } from "vitest";
import { Answer } from "../domain/answer.js";
import { Quiz } from "../domain/quiz.js";
import type { QuizBlueprint } from "../domain/types.js";
import { CLEAR_LINE, QuizPainter, cursorUp } from "./terminal.js";

const ONE_EACH: QuizBlueprint = {
  theoretical: { name: "Temel", subjects: [{ name: "T", questionCount: 1 }] },
  clinical: { name: "Klinik", subjects: [{ name: "K", questionCount: 1 }] },
  questionsPerCategory: 1,
};

describe("QuizPainter", () => {
  it("paints once, then repaints over the same block", () => {
    const writes: string[] = [];
    const painter = new QuizPainter({ write: (s: string) => writes.push(s) });
    const quiz = new Quiz(ONE_EACH);

    painter.paint(quiz);
    quiz.update(Answer.CORRECT);
    painter.paint(quiz);

    expect(writes[0]).toBe(
      `${CLEAR_LINE}Temel: ( 0/1) \t  0D   0Y   0B ->  0.00\n` +
        `${CLEAR_LINE}\tT:\t  0D   0Y   0B ->  0.00 [ ]\n` +
        `${CLEAR_LINE}Klinik: ( 0/1) \t  0D   0Y   0B ->  0.00\n` +
        `${CLEAR_LINE}\tK:\t  0D   0Y   0B ->  0.00 [ ]\n`
    );
    expect(writes[1].startsWith(`${cursorUp(4)}${CLEAR_LINE}Temel: ( 1/1)`)).toBe(true);
  });

  it("writes plain lines to the sink it was given", () => {
    const writes: string[] = [];
    const painter = new QuizPainter({ write: (s: string) => writes.push(s) });
    painter.println("Quiz entry successful.");
    painter.println();
    expect(writes).toEqual(["Quiz entry successful.\n", "\n"]);
  });

  it("encodes cursor movement as an ANSI sequence", () => {
    expect(cursorUp(14)).toBe("\x1b[14A");
  });
});
