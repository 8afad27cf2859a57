import type { DetectedMarker } from '@marker-engine/core';

/**
 * Detections grouped by marker id. A marker is present when it has at least
 * one detection, however many spans it matched.
 */
export class DetectionIndex {
  private byId: Map<string, DetectedMarker[]> = new Map();

  static from(detected: readonly DetectedMarker[]): DetectionIndex {
    const index = new DetectionIndex();
    detected.forEach((marker) => index.add(marker));
    return index;
  }

  add(marker: DetectedMarker): void {
    const list = this.byId.get(marker.marker_id);
    if (list) {
      list.push(marker);
    } else {
      this.byId.set(marker.marker_id, [marker]);
    }
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  instances(id: string): readonly DetectedMarker[] {
    return this.byId.get(id) ?? [];
  }

  /**
   * Highest confidence among a marker's detections, 0 when absent
   */
  maxConfidence(id: string): number {
    return this.instances(id).reduce((max, marker) => Math.max(max, marker.confidence), 0);
  }

  /**
   * The given ids that are present, without duplicates, in the given order
   */
  present(ids: readonly string[]): string[] {
    return [...new Set(ids)].filter((id) => this.has(id));
  }
}
