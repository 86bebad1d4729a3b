/**
 * RecordDocument - decoded CORSIKA records read from JSON
 *
 * The binary CORSIKA/IACT file is decoded elsewhere; this module accepts the
 * decoded records and checks their shape before anything is written.
 */

import { InputFormatError } from "@/errors";
import type { LineSink } from "@/output/LineSink";
import type { PhotonBunch, RunHeaderBuffer, RunHeaderInfo, ShowerEvent } from "@/types";

/** Run header words up to the magnetic field z component */
export const MIN_RUN_HEADER_WORDS = 72;

export interface TelescopePhoton {
  readonly telescope: number;
  readonly bunch: PhotonBunch;
}

export interface EventRecord {
  readonly shower: ShowerEvent;
  readonly photons: readonly TelescopePhoton[];
}

export interface RecordDocument {
  readonly runHeader: RunHeaderBuffer;
  readonly runHeaderInfo: RunHeaderInfo | null;
  readonly events: readonly EventRecord[];
}

/**
 * Prints free-text run header lines verbatim.
 */
export class TextRunHeaderInfo implements RunHeaderInfo {
  readonly lines: readonly string[];

  constructor(lines: readonly string[]) {
    this.lines = lines;
  }

  printHeader(sink: LineSink): void {
    for (const line of this.lines) {
      sink.writeLine(line);
    }
  }
}

// =============================================================================
// FIELD READERS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readObject(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) throw new InputFormatError(path, "an object");
  return value;
}

function readArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new InputFormatError(path, "an array");
  return value;
}

function readNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InputFormatError(path, "a finite number");
  }
  return value;
}

function readInteger(value: unknown, path: string): number {
  const n = readNumber(value, path);
  if (!Number.isInteger(n)) throw new InputFormatError(path, "an integer");
  return n;
}

// =============================================================================
// RECORDS
// =============================================================================

function parseShower(raw: Record<string, unknown>, path: string): ShowerEvent {
  return {
    energy: readNumber(raw.energy, `${path}.energy`),
    azimuth: readNumber(raw.azimuth, `${path}.azimuth`),
    altitude: readNumber(raw.altitude, `${path}.altitude`),
    xCore: readNumber(raw.xCore, `${path}.xCore`),
    yCore: readNumber(raw.yCore, `${path}.yCore`),
    firstInteraction: readNumber(raw.firstInteraction, `${path}.firstInteraction`),
    showerId: readInteger(raw.showerId, `${path}.showerId`),
  };
}

function parsePhoton(value: unknown, path: string): TelescopePhoton {
  const raw = readObject(value, path);
  const telescope = readInteger(raw.telescope, `${path}.telescope`);
  if (telescope < 0) throw new InputFormatError(`${path}.telescope`, "a non-negative index");
  return {
    telescope,
    bunch: {
      x: readNumber(raw.x, `${path}.x`),
      y: readNumber(raw.y, `${path}.y`),
      cx: readNumber(raw.cx, `${path}.cx`),
      cy: readNumber(raw.cy, `${path}.cy`),
      zem: readNumber(raw.zem, `${path}.zem`),
      ctime: readNumber(raw.ctime, `${path}.ctime`),
      lambda: readNumber(raw.lambda, `${path}.lambda`),
    },
  };
}

function parseEvent(value: unknown, path: string): EventRecord {
  const raw = readObject(value, path);
  const photons = raw.photons === undefined ? [] : readArray(raw.photons, `${path}.photons`);
  return {
    shower: parseShower(raw, path),
    photons: photons.map((photon, i) => parsePhoton(photon, `${path}.photons[${i}]`)),
  };
}

function parseRunHeader(value: unknown): Float32Array {
  const words = readArray(value, "runHeader");
  if (words.length < MIN_RUN_HEADER_WORDS) {
    throw new InputFormatError("runHeader", `at least ${MIN_RUN_HEADER_WORDS} words`);
  }
  return Float32Array.from(words.map((w, i) => readNumber(w, `runHeader[${i}]`)));
}

function parseHeaderText(value: unknown): RunHeaderInfo | null {
  if (value === undefined) return null;
  const lines = readArray(value, "runHeaderText").map((line, i) => {
    if (typeof line !== "string") throw new InputFormatError(`runHeaderText[${i}]`, "a string");
    return line;
  });
  return new TextRunHeaderInfo(lines);
}

/**
 * Validate a parsed JSON document and return typed records
 * @throws InputFormatError naming the first offending path
 */
export function parseRecordDocument(json: unknown): RecordDocument {
  const raw = readObject(json, "$");
  return {
    runHeader: parseRunHeader(raw.runHeader),
    runHeaderInfo: parseHeaderText(raw.runHeaderText),
    events: readArray(raw.events, "events").map((event, i) => parseEvent(event, `events[${i}]`)),
  };
}
