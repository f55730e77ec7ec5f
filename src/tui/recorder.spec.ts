import { describe, it, expect } from "vitest";
import { Quiz } from "../domain/quiz.js";
import type { QuizBlueprint } from "../domain/types.js";
import { recordQuiz } from "./recorder.js";
import { QuizPainter, cursorUp } from "./terminal.js";

const TINY: QuizBlueprint = {
  theoretical: {
    name: "Temel",
    subjects: [
      { name: "T1", questionCount: 1 },
      { name: "T2", questionCount: 1 },
    ],
  },
  clinical: {
    name: "Klinik",
    subjects: [
      { name: "K1", questionCount: 1 },
      { name: "K2", questionCount: 1 },
    ],
  },
  questionsPerCategory: 2,
};

async function* keys(...chars: string[]): AsyncGenerator<string> {
  for (const ch of chars) yield ch;
}

function setup(): { quiz: Quiz; painter: QuizPainter; writes: string[] } {
  const writes: string[] = [];
  return {
    quiz: new Quiz(TINY, { createdAt: "test" }),
    painter: new QuizPainter({ write: (s: string) => writes.push(s) }),
    writes,
  };
}

describe("recordQuiz", () => {
  it("records until the sheet is complete", async () => {
    const { quiz, painter, writes } = setup();
    const outcome = await recordQuiz(
      quiz,
      keys("d", "Y", "x", " ", "b", "\x7f", "B", "d"),
      painter
    );

    expect(outcome).toBe("complete");
    expect(quiz.toRecord().theoretical.subjects).toEqual({
      T1: { name: "T1", answers: ["D"] },
      T2: { name: "T2", answers: ["Y"] },
    });
    expect(quiz.toRecord().clinical.subjects).toEqual({
      K1: { name: "K1", answers: ["B"] },
      K2: { name: "K2", answers: ["D"] },
    });
    // legend, first paint, then one repaint per accepted key
    expect(writes).toHaveLength(8);
    expect(writes.slice(2).every((w) => w.startsWith(cursorUp(6)))).toBe(true);
  });

  it("stops on ctrl+c without consuming further keys", async () => {
    const { quiz, painter } = setup();
    const outcome = await recordQuiz(quiz, keys("d", "\x03", "d"), painter);
    expect(outcome).toBe("aborted");
    expect(quiz.theoretical.view.cursor).toBe(1);
  });

  it("reports input that ends early", async () => {
    const { quiz, painter } = setup();
    const outcome = await recordQuiz(quiz, keys("d"), painter);
    expect(outcome).toBe("input-ended");
    expect(quiz.state).toBe("FillingTheoretical");
  });
});
