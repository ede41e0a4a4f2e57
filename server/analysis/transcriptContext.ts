/**
 * Running transcript shared by the analyzers.
 *
 * Finals are kept in arrival order; partials are held per id and replaced by
 * later segments with the same id until their final arrives. A final also
 * clears partials that started before it ended.
 */

import type { TranscriptSegment } from "@shared/schema";

export class TranscriptContext {
  private readonly finals: TranscriptSegment[] = [];
  private readonly finalIds = new Set<string>();
  private readonly partials = new Map<string, TranscriptSegment>();

  /** Returns true when the segment is a final not seen before */
  add(segment: TranscriptSegment): boolean {
    if (this.finalIds.has(segment.id)) {
      return false;
    }

    if (!segment.isFinal) {
      this.partials.set(segment.id, segment);
      return false;
    }

    this.partials.delete(segment.id);
    // Partials under another id that the final already covers will never be finalized
    for (const [id, partial] of this.partials) {
      if (partial.startTime < segment.endTime) {
        this.partials.delete(id);
      }
    }
    this.finalIds.add(segment.id);
    this.finals.push(segment);
    return true;
  }

  get finalCount(): number {
    return this.finals.length;
  }

  lastFinal(): TranscriptSegment | undefined {
    return this.finals[this.finals.length - 1];
  }

  recentFinals(count: number): TranscriptSegment[] {
    return count > 0 ? this.finals.slice(-count) : [];
  }

  currentPartials(): TranscriptSegment[] {
    return Array.from(this.partials.values()).sort((a, b) => a.startTime - b.startTime);
  }

  /** Recent finals followed by any in-progress partial text */
  recentText(count: number, includePartials = false): string {
    const lines = this.recentFinals(count).map(segment => segment.text);
    if (includePartials) {
      lines.push(...this.currentPartials().map(segment => segment.text));
    }
    return lines.join("\n");
  }

  /** Transcript to date, trimmed to the newest `maxChars` characters */
  fullText(maxChars = 12000): string {
    const text = this.finals.map(segment => segment.text).join("\n");
    return text.length > maxChars ? text.slice(text.length - maxChars) : text;
  }
}
