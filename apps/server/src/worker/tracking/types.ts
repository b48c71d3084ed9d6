import type { BoundingBox, PpeItem, RawDetection } from "../../shared/types/detector";

/** The slice of a track the matcher needs. */
export type MatchableTrack = {
  trackId: number;
  box: BoundingBox;
  missedFrames: number;
};

export type TrackUpdate = {
  trackId: number;
  /** The person detection that continued the track, null when unmatched. */
  detection: RawDetection | null;
  iou: number;
  missedFrames: number;
};

export type NewTrack = {
  trackId: number;
  detection: RawDetection;
};

/** Items seen on a person this frame, with the best confidence per item. */
export type ItemObservation = Map<PpeItem, number>;

export type MatchResult = {
  timestamp: number;
  updated: TrackUpdate[];
  created: NewTrack[];
  expiredTrackIds: number[];
  /** Keyed by track id; only tracks seen this frame have an entry. */
  observations: Map<number, ItemObservation>;
};
