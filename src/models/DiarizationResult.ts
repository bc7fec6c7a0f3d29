import { SpeakerSegment } from '../types/index.js';

export class DiarizationResult {
  constructor(
    public readonly segments: SpeakerSegment[],
    public readonly speakerCount: number
  ) {}

  static empty(): DiarizationResult {
    return new DiarizationResult([], 0);
  }

  static fromSegments(segments: SpeakerSegment[]): DiarizationResult {
    const speakers = new Set(segments.map(segment => segment.speakerLabel));
    return new DiarizationResult(segments, speakers.size);
  }

  /**
   * Label of the first segment whose [start, end) contains time
   */
  speakerLabelAt(time: number): string | null {
    for (const segment of this.segments) {
      if (time >= segment.start && time < segment.end) {
        return segment.speakerLabel;
      }
    }
    return null;
  }

  /**
   * Relabel matching segments in place
   */
  renameSpeaker(oldLabel: string, newLabel: string): void {
    for (const segment of this.segments) {
      if (segment.speakerLabel === oldLabel) {
        segment.speakerLabel = newLabel;
      }
    }
  }
}
