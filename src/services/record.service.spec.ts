import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { Answer } from "../domain/answer.js";
import { RecordInvalidError } from "../domain/errors.js";
import { Quiz } from "../domain/quiz.js";
import type { QuizBlueprint } from "../domain/types.js";
import {
  listQuizRecords,
  loadQuizRecord,
  recordFileName,
  saveQuizRecord,
} from "./record.service.js";

const TINY: QuizBlueprint = {
  theoretical: { name: "Temel", subjects: [{ name: "T1", questionCount: 2 }] },
  clinical: { name: "Klinik", subjects: [{ name: "K1", questionCount: 2 }] },
  questionsPerCategory: 2,
};

describe("record.service", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "answer-sheet-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("names files after the quiz identifier", () => {
    expect(recordFileName("24_06_07_090503")).toBe("quiz_24_06_07_090503.json");
  });

  it("saves pretty-printed JSON, creating the directory", () => {
    const quiz = new Quiz(TINY, { createdAt: "24_06_07_090503" });
    quiz.update(Answer.CORRECT);
    const target: string = path.join(dir, "nested", "records");

    const written: string = saveQuizRecord(quiz, target);

    expect(written).toBe(path.join(target, "quiz_24_06_07_090503.json"));
    expect(fs.readFileSync(written, "utf8")).toBe(
      JSON.stringify(quiz.toRecord(), null, 4)
    );
  });

  it("loads what it saved", () => {
    const quiz = new Quiz(TINY, { createdAt: "a" });
    quiz.update(Answer.WRONG);
    quiz.update(Answer.EMPTY);
    const written: string = saveQuizRecord(quiz, dir);
    expect(loadQuizRecord(written)).toEqual(quiz.toRecord());
  });

  it("reports a file that cannot be read", () => {
    const file: string = path.join(dir, "quiz_absent.json");
    expect(() => loadQuizRecord(file)).toThrow(RecordInvalidError);
    expect(() => loadQuizRecord(file)).toThrow(`${file}: cannot read (ENOENT`);
  });

  it("rejects files that are not JSON", () => {
    const file: string = path.join(dir, "quiz_bad.json");
    fs.writeFileSync(file, "{ nope", "utf8");
    expect(() => loadQuizRecord(file)).toThrow(RecordInvalidError);
    expect(() => loadQuizRecord(file)).toThrow(`${file}: not valid JSON`);
  });

  it("rejects unknown answer codes with the offending path", () => {
    const rec = new Quiz(TINY, { createdAt: "b" }).toRecord();
    const raw = JSON.parse(JSON.stringify(rec)) as {
      theoretical: { subjects: { T1: { answers: string[] } } };
    };
    raw.theoretical.subjects.T1.answers[0] = "Q";
    const file: string = path.join(dir, "quiz_b.json");
    fs.writeFileSync(file, JSON.stringify(raw), "utf8");

    expect(() => loadQuizRecord(file)).toThrow(RecordInvalidError);
    expect(() => loadQuizRecord(file)).toThrow(
      `${file}: theoretical.subjects.T1.answers.0:`
    );
  });

  it("rejects records missing a category", () => {
    const file: string = path.join(dir, "quiz_c.json");
    fs.writeFileSync(file, JSON.stringify({ created_at: "c" }), "utf8");
    expect(() => loadQuizRecord(file)).toThrow(`${file}: theoretical:`);
  });

  it("lists record files sorted by name", () => {
    for (const name of ["quiz_24_02_01_000000.json", "notes.txt", "quiz_23_12_31_000000.json"]) {
      fs.writeFileSync(path.join(dir, name), "{}", "utf8");
    }
    expect(listQuizRecords(dir)).toEqual([
      path.join(dir, "quiz_23_12_31_000000.json"),
      path.join(dir, "quiz_24_02_01_000000.json"),
    ]);
  });

  it("lists nothing for a missing directory", () => {
    expect(listQuizRecords(path.join(dir, "absent"))).toEqual([]);
  });
});
