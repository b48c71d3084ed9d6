export interface TrackIdGenerator {
  next: () => number;
}

/** Monotonic, process-local track ids. Share one instance across sessions. */
export const createTrackIdGenerator = (start = 1): TrackIdGenerator => {
  let nextId = Math.max(1, Math.floor(start));
  return {
    next: () => {
      const id = nextId;
      nextId += 1;
      return id;
    },
  };
};
