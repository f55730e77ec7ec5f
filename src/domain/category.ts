import { ConfigurationInvalidError } from "./errors.js";
import { SegmentedView } from "./segmentedView.js";
import { Subject } from "./subject.js";
import type { CategoryRecord, SubjectBlueprint, SubjectRecord } from "./types.js";

// Integer-like keys are hoisted to the front of a plain object, which would
// reorder subjects in the persisted record.
const INTEGER_KEY = /^(0|[1-9]\d*)$/;

export class QuizCategory {
  public readonly name: string;
  public readonly expectedSize: number;
  private readonly subjectList: readonly Subject[];
  private readonly byName: ReadonlyMap<string, Subject>;
  private readonly arrayView: SegmentedView;

  public constructor(
    name: string,
    blueprints: readonly SubjectBlueprint[],
    expectedSize: number
  ) {
    this.name = name;
    this.expectedSize = expectedSize;

    const byName = new Map<string, Subject>();
    for (const bp of blueprints) {
      if (!Number.isInteger(bp.questionCount) || bp.questionCount < 0) {
        throw new ConfigurationInvalidError(
          `Subject '${bp.name}' in ${name} has invalid question count ${bp.questionCount}`
        );
      }
      if (INTEGER_KEY.test(bp.name)) {
        throw new ConfigurationInvalidError(
          `Subject name '${bp.name}' in ${name} must not be a plain integer`
        );
      }
      if (byName.has(bp.name)) {
        throw new ConfigurationInvalidError(
          `Subject '${bp.name}' appears more than once in ${name}`
        );
      }
      byName.set(bp.name, new Subject(bp.name, bp.questionCount));
    }
    this.byName = byName;
    this.subjectList = [...byName.values()];
    this.arrayView = new SegmentedView(this.subjectList);

    if (this.arrayView.length !== expectedSize) {
      throw new ConfigurationInvalidError(
        `${this.arrayView.length} questions in ${name} instead of ${expectedSize}`
      );
    }
  }

  public get subjects(): readonly Subject[] {
    return this.subjectList;
  }

  public subject(name: string): Subject | undefined {
    return this.byName.get(name);
  }

  public get view(): SegmentedView {
    return this.arrayView;
  }

  public get numCorrect(): number {
    return this.sum((s) => s.numCorrect);
  }

  public get numWrong(): number {
    return this.sum((s) => s.numWrong);
  }

  public get numEmpty(): number {
    return this.sum((s) => s.numEmpty);
  }

  public get numNet(): number {
    return this.sum((s) => s.numNet);
  }

  public toRecord(): CategoryRecord {
    const subjects: Record<string, SubjectRecord> = {};
    for (const s of this.subjectList) subjects[s.name] = s.toRecord();
    return { name: this.name, subjects };
  }

  private sum(pick: (s: Subject) => number): number {
    let total = 0;
    for (const s of this.subjectList) total += pick(s);
    return total;
  }
}
