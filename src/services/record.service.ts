import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { Answer } from "../domain/answer.js";
import { RecordInvalidError } from "../domain/errors.js";
import type { Quiz } from "../domain/quiz.js";
import type { QuizRecord } from "../domain/types.js";
import { logger } from "../logger.js";

/* -------------------------------- schema -------------------------------- */

const AnswerCode = z.enum([
  Answer.CORRECT,
  Answer.WRONG,
  Answer.EMPTY,
  Answer.MISSING,
]);

const SubjectRecordSchema = z.object({
  name: z.string().min(1),
  answers: z.array(AnswerCode),
});

const CategoryRecordSchema = z.object({
  name: z.string().min(1),
  subjects: z.record(SubjectRecordSchema),
});

const QuizRecordSchema = z.object({
  created_at: z.string().min(1),
  theoretical: CategoryRecordSchema,
  clinical: CategoryRecordSchema,
});

/* ------------------------------ file access ------------------------------ */

const RECORD_FILE = /^quiz_.+\.json$/;

export function recordFileName(createdAt: string): string {
  return `quiz_${createdAt}.json`;
}

/**
 * Write the quiz as pretty-printed JSON under `dir`, creating it if needed.
 * @returns the path written
 */
export function saveQuizRecord(quiz: Quiz, dir: string): string {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  const filePath: string = path.join(dir, recordFileName(quiz.createdAt));
  fs.writeFileSync(filePath, JSON.stringify(quiz.toRecord(), null, 4), "utf8");
  logger.info(`Quiz record saved to ${filePath}`);
  return filePath;
}

export function parseQuizRecord(raw: unknown, source: string): QuizRecord {
  const res = QuizRecordSchema.safeParse(raw);
  if (!res.success) {
    const issue = res.error.issues[0];
    throw new RecordInvalidError(
      `${source}: ${issue.path.join(".") || "<root>"}: ${issue.message}`
    );
  }
  return res.data;
}

export function loadQuizRecord(filePath: string): QuizRecord {
  let text: string;
  try {
    text = fs.readFileSync(path.resolve(filePath), "utf8");
  } catch (e) {
    const reason: string = e instanceof Error ? e.message : String(e);
    throw new RecordInvalidError(`${filePath}: cannot read (${reason})`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    const reason: string = e instanceof Error ? e.message : String(e);
    throw new RecordInvalidError(`${filePath}: not valid JSON (${reason})`);
  }
  logger.debug(`Loaded quiz record from ${filePath}`);
  return parseQuizRecord(parsed, filePath);
}

export function listQuizRecords(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((f) => RECORD_FILE.test(f))
    .sort()
    .map((f) => path.join(dir, f));
}

export interface RecordService {
  saveQuizRecord(quiz: Quiz, dir: string): string;
  loadQuizRecord(filePath: string): QuizRecord;
  listQuizRecords(dir: string): string[];
}

export const recordService: RecordService = {
  saveQuizRecord,
  loadQuizRecord,
  listQuizRecords,
};
