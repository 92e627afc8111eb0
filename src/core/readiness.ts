export type ReadinessState = {
  readonly marker?: string;
  readonly fired: boolean;
};

export type ScanResult = {
  state: ReadinessState;
  fired: boolean;
};

export function initialReadiness(marker?: string): ReadinessState {
  // An empty marker would match any line; treat it as no marker at all.
  return marker ? { fired: false, marker } : { fired: false };
}

/**
 * Advance the readiness state by one output line. `fired` is true only for
 * the line on which the marker is first seen.
 */
export function scanLine(state: ReadinessState, line: string): ScanResult {
  if (state.fired || state.marker === undefined) {
    return { fired: false, state };
  }
  if (!line.includes(state.marker)) {
    return { fired: false, state };
  }
  return { fired: true, state: { ...state, fired: true } };
}

/**
 * Readiness confirmation once the process is known to be running. Fires only
 * for tasks without a marker.
 */
export function scanSpawn(state: ReadinessState): ScanResult {
  if (state.fired || state.marker !== undefined) {
    return { fired: false, state };
  }
  return { fired: true, state: { ...state, fired: true } };
}

export class ReadinessDetector {
  private state: ReadinessState;

  constructor(marker?: string) {
    this.state = initialReadiness(marker);
  }

  get isReady(): boolean {
    return this.state.fired;
  }

  get hasMarker(): boolean {
    return this.state.marker !== undefined;
  }

  feed(line: string): boolean {
    const result = scanLine(this.state, line);
    this.state = result.state;
    return result.fired;
  }

  fireOnSpawn(): boolean {
    const result = scanSpawn(this.state);
    this.state = result.state;
    return result.fired;
  }
}
