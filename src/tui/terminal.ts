import type { Quiz } from "../domain/quiz.js";
import { QuizPresenter } from "../presentation/quizPresenter.js";

export const CLEAR_LINE = "\x1b[2K\r";

export function cursorUp(lines: number): string {
  return `\x1b[${lines}A`;
}

export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Repaints the answer sheet in place: every paint after the first moves the
 * cursor back over the block it drew last time.
 */
export class QuizPainter {
  private readonly out: TextSink;
  private paintedLines = 0;

  constructor(out: TextSink) {
    this.out = out;
  }

  public paint(quiz: Quiz): void {
    const lines: string[] = QuizPresenter.lines(quiz);
    let frame = this.paintedLines > 0 ? cursorUp(this.paintedLines) : "";
    for (const line of lines) frame += `${CLEAR_LINE}${line}\n`;
    this.out.write(frame);
    this.paintedLines = lines.length;
  }

  public println(text: string = ""): void {
    this.out.write(`${text}\n`);
  }
}
