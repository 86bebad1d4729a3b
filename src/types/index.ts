/**
 * Core type definitions for the GrIsu writer
 */

import type { LineSink } from "@/output/LineSink";

// =============================================================================
// COORDINATE TYPES
// =============================================================================

/** Azimuth and ground position expressed in one coordinate convention */
export interface AzimuthPosition {
  readonly azimuth: number; // radians
  readonly x: number;
  readonly y: number;
}

/** Planar position (immutable) */
export interface Position2 {
  readonly x: number;
  readonly y: number;
}

// =============================================================================
// INPUT RECORDS
// =============================================================================

/**
 * CORSIKA run header block, one float per word.
 * Usually a Float32Array straight from the decoder.
 */
export type RunHeaderBuffer = ArrayLike<number>;

/** Renders a descriptive block for the run header */
export interface RunHeaderInfo {
  printHeader(sink: LineSink): void;
}

/** One simulated air shower */
export interface ShowerEvent {
  readonly energy: number; // TeV
  readonly azimuth: number; // degrees, CORSIKA convention
  readonly altitude: number; // degrees
  readonly xCore: number;
  readonly yCore: number;
  readonly firstInteraction: number; // height of first interaction
  readonly showerId: number;
}

/** One photon bunch hitting a telescope */
export interface PhotonBunch {
  readonly x: number;
  readonly y: number;
  readonly cx: number; // direction cosine, CORSIKA x
  readonly cy: number; // direction cosine, CORSIKA y
  readonly zem: number; // emission height
  readonly ctime: number; // time since first interaction
  readonly lambda: number; // wavelength [nm]
}

// =============================================================================
// WRITER OPTIONS
// =============================================================================

/** Configuration surface of the writer */
export interface WriterOptions {
  /** File path, or STDOUT_DESTINATION */
  readonly destination: string;
  /** Atmosphere model id; negative disables the atmosphere */
  readonly atmosphereId: number;
  /** Text embedded in the header banner */
  readonly versionLabel: string;
  /** Value written on the "R" line */
  readonly quantumEfficiency: number;
  /** Value written on the "H" line [m] */
  readonly observationHeight: number;
}
