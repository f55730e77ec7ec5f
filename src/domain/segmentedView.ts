import { Answer } from "./answer.js";
import { CursorExhaustedError, IndexOutOfRangeError } from "./errors.js";
import type { Subject } from "./subject.js";

export interface Segment {
  name: string;
  start: number; // inclusive
  length: number;
  subject: Subject;
}

export interface Location {
  segment: string;
  index: number;
}

/**
 * One flat, cursor-driven index space over an ordered list of subjects.
 *
 * The offset table is built once and is the only source of ordering; the
 * view keeps references to the subjects, so every write lands in the
 * subject's own storage.
 */
export class SegmentedView {
  private readonly segments: readonly Segment[];
  private readonly totalLength: number;
  private indexToUpdate = 0;

  public constructor(subjects: readonly Subject[]) {
    const segments: Segment[] = [];
    let offset = 0;
    for (const subject of subjects) {
      segments.push({
        name: subject.name,
        start: offset,
        length: subject.length,
        subject,
      });
      offset += subject.length;
    }
    this.segments = segments;
    this.totalLength = offset;
  }

  public get length(): number {
    return this.totalLength;
  }

  /** Next absolute index `updateNext` will write to. */
  public get cursor(): number {
    return this.indexToUpdate;
  }

  public get isFull(): boolean {
    return this.indexToUpdate === this.totalLength;
  }

  public get(absoluteIndex: number): Answer {
    const { segment, internalIndex } = this.resolve(absoluteIndex);
    return segment.subject.get(internalIndex);
  }

  public set(absoluteIndex: number, value: Answer): void {
    const { segment, internalIndex } = this.resolve(absoluteIndex);
    segment.subject.set(internalIndex, value);
  }

  public locate(absoluteIndex: number): Location | undefined {
    const hit = this.find(absoluteIndex);
    return hit
      ? { segment: hit.segment.name, index: hit.internalIndex }
      : undefined;
  }

  /** @returns true when this write filled the last slot */
  public updateNext(answer: Answer): boolean {
    if (this.indexToUpdate >= this.totalLength) {
      throw new CursorExhaustedError(this.totalLength);
    }
    this.set(this.indexToUpdate, answer);
    this.indexToUpdate += 1;
    return this.indexToUpdate === this.totalLength;
  }

  /** @returns false when there was nothing to erase */
  public eraseLast(): boolean {
    if (this.indexToUpdate === 0) return false;
    this.indexToUpdate -= 1;
    this.set(this.indexToUpdate, Answer.MISSING);
    return true;
  }

  private resolve(absoluteIndex: number): {
    segment: Segment;
    internalIndex: number;
  } {
    const hit = this.find(absoluteIndex);
    if (!hit) throw new IndexOutOfRangeError(absoluteIndex, this.totalLength);
    return hit;
  }

  // Binary search over segment starts; empty segments are never matched.
  private find(
    absoluteIndex: number
  ): { segment: Segment; internalIndex: number } | undefined {
    if (
      !Number.isInteger(absoluteIndex) ||
      absoluteIndex < 0 ||
      absoluteIndex >= this.totalLength
    ) {
      return undefined;
    }
    let lo = 0;
    let hi = this.segments.length - 1;
    while (lo <= hi) {
      const mid: number = (lo + hi) >> 1;
      const seg: Segment = this.segments[mid];
      if (absoluteIndex < seg.start) {
        hi = mid - 1;
      } else if (absoluteIndex >= seg.start + seg.length) {
        lo = mid + 1;
      } else {
        return { segment: seg, internalIndex: absoluteIndex - seg.start };
      }
    }
    return undefined;
  }
}
