import { centroid, containsPoint, distance, iou } from "../../shared/geometry/box";
import type { PpeItem, RawDetection } from "../../shared/types/detector";
import type { TrackingConfig } from "../config/pipeline-config";
import { type TrackIdGenerator, createTrackIdGenerator } from "./track-ids";
import type {
  ItemObservation,
  MatchResult,
  MatchableTrack,
  NewTrack,
  TrackUpdate,
} from "./types";

export type TrackMatcherOptions = {
  config: TrackingConfig;
  ids?: TrackIdGenerator;
};

type IndexedDetection = {
  index: number;
  detection: RawDetection;
};

type CandidatePair = {
  trackIndex: number;
  detectionIndex: number;
  iou: number;
};

type SeenPerson = {
  trackId: number;
  detection: RawDetection;
};

const isPerson = (entry: IndexedDetection): boolean =>
  entry.detection.label === "person";

/**
 * Greedy IoU association of person detections with live tracks, followed by
 * attribution of item detections to the persons seen in the frame.
 */
export class TrackMatcher {
  private readonly config: TrackingConfig;

  private readonly ids: TrackIdGenerator;

  constructor(options: TrackMatcherOptions) {
    this.config = { ...options.config };
    this.ids = options.ids ?? createTrackIdGenerator();
  }

  match(
    tracks: readonly MatchableTrack[],
    detections: readonly RawDetection[],
    timestamp: number,
  ): MatchResult {
    const indexed = detections.map((detection, index) => ({ index, detection }));
    const persons = indexed.filter(isPerson);
    const items = indexed.filter((entry) => !isPerson(entry));

    const pairs = this.rankPairs(tracks, persons, detections);
    const assignedTracks = new Map<number, CandidatePair>();
    const assignedDetections = new Set<number>();

    pairs.forEach((pair) => {
      if (assignedTracks.has(pair.trackIndex)) {
        return;
      }
      if (assignedDetections.has(pair.detectionIndex)) {
        return;
      }
      assignedTracks.set(pair.trackIndex, pair);
      assignedDetections.add(pair.detectionIndex);
    });

    const updated: TrackUpdate[] = [];
    const expiredTrackIds: number[] = [];
    const seen: SeenPerson[] = [];

    tracks.forEach((track, trackIndex) => {
      const pair = assignedTracks.get(trackIndex);
      if (pair) {
        const detection = detections[pair.detectionIndex];
        updated.push({
          trackId: track.trackId,
          detection,
          iou: pair.iou,
          missedFrames: 0,
        });
        seen.push({ trackId: track.trackId, detection });
        return;
      }

      const missedFrames = track.missedFrames + 1;
      if (missedFrames > this.config.maxMissedFrames) {
        expiredTrackIds.push(track.trackId);
        return;
      }
      updated.push({
        trackId: track.trackId,
        detection: null,
        iou: 0,
        missedFrames,
      });
    });

    const created: NewTrack[] = persons
      .filter((entry) => !assignedDetections.has(entry.index))
      .sort(
        (a, b) =>
          b.detection.confidence - a.detection.confidence || a.index - b.index,
      )
      .map((entry) => {
        const newTrack = { trackId: this.ids.next(), detection: entry.detection };
        seen.push(newTrack);
        return newTrack;
      });

    return {
      timestamp,
      updated,
      created,
      expiredTrackIds,
      observations: this.attributeItems(seen, items),
    };
  }

  private rankPairs(
    tracks: readonly MatchableTrack[],
    persons: readonly IndexedDetection[],
    detections: readonly RawDetection[],
  ): CandidatePair[] {
    const pairs: CandidatePair[] = [];
    tracks.forEach((track, trackIndex) => {
      persons.forEach(({ index, detection }) => {
        const overlap = iou(track.box, detection.box);
        if (overlap > this.config.iouThreshold) {
          pairs.push({ trackIndex, detectionIndex: index, iou: overlap });
        }
      });
    });

    return pairs.sort((a, b) => {
      if (b.iou !== a.iou) {
        return b.iou - a.iou;
      }
      const confidenceDelta =
        detections[b.detectionIndex].confidence -
        detections[a.detectionIndex].confidence;
      if (confidenceDelta !== 0) {
        return confidenceDelta;
      }
      const trackDelta = tracks[a.trackIndex].trackId - tracks[b.trackIndex].trackId;
      if (trackDelta !== 0) {
        return trackDelta;
      }
      return a.detectionIndex - b.detectionIndex;
    });
  }

  private attributeItems(
    seen: readonly SeenPerson[],
    items: readonly IndexedDetection[],
  ): Map<number, ItemObservation> {
    const observations = new Map<number, ItemObservation>();
    seen.forEach((person) => {
      observations.set(person.trackId, new Map<PpeItem, number>());
    });

    items.forEach(({ detection }) => {
      const { label } = detection;
      if (label === "person") {
        return;
      }
      const point = centroid(detection.box);
      let owner: SeenPerson | null = null;
      let ownerDistance = Number.POSITIVE_INFINITY;

      for (const person of seen) {
        if (!containsPoint(person.detection.box, point, this.config.itemMargin)) {
          continue;
        }
        const candidateDistance = distance(centroid(person.detection.box), point);
        const closer = candidateDistance < ownerDistance;
        const tiedLower =
          candidateDistance === ownerDistance &&
          owner !== null &&
          person.trackId < owner.trackId;
        if (closer || tiedLower) {
          owner = person;
          ownerDistance = candidateDistance;
        }
      }

      if (owner === null) {
        return;
      }
      const observation = observations.get(owner.trackId);
      if (!observation) {
        return;
      }
      const previous = observation.get(label) ?? 0;
      observation.set(label, Math.max(previous, detection.confidence));
    });

    return observations;
  }
}
