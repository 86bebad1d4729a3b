/**
 * GrisuWriter - writes CORSIKA results as a GrIsu photon list
 *
 * Call order per output: writeRunHeader once, then for each shower
 * writeEvent followed by writePhotons for its bunches. Every call appends its
 * lines to the sink immediately.
 *
 * Photon lines carry no information about the emitting particle; its type is
 * always written as 3.
 */

import {
  initAtmosphere,
  type AtmosphereFactory,
  type AtmosphereProfile,
} from "@/atmosphere/AtmosphereProfile";
import { createWriterConfig } from "@/config/writerConfig";
import { transformCoord } from "@/coordinates/CoordinateTransform";
import { AtmosphereRequiredError } from "@/errors";
import { debugLog, debugWarn } from "@/logging/log";
import { Angle } from "@/math/Angle";
import { openSink, type LineSink } from "@/output/LineSink";
import {
  HEADER_FORMAT,
  PHOTON_FORMAT,
  RECORD_FORMAT,
  formatFixed,
  formatInteger,
  formatLine,
  integer,
  real,
} from "@/output/NumberFormat";
import { ParticleMap } from "@/particles/ParticleMap";
import type {
  PhotonBunch,
  Position2,
  RunHeaderBuffer,
  RunHeaderInfo,
  ShowerEvent,
  WriterOptions,
} from "@/types";

/** Word positions in the CORSIKA run header */
export const RUN_HEADER = {
  PARTICLE_ID: 2,
  ZENITH: 10,
  AZIMUTH: 11,
  RUN_NUMBER: 43,
  DATE: 44,
  VERSION: 45,
  OBSERVATION_HEIGHT: 47,
  SLOPE: 57,
  ENERGY_MIN: 58,
  ENERGY_MAX: 59,
  CUT_HADRON: 60,
  CUT_MUON: 61,
  CUT_ELECTRON: 62,
  CUT_PHOTON: 63,
  FIELD_X: 70,
  FIELD_Z: 71,
} as const;

/** Type code written for the particle emitting a photon */
const PHOTON_EMITTER_TYPE = 3;

/** Placeholder fields closing every shower line */
const SHOWER_PLACEHOLDERS = [integer(-1), integer(-1), integer(-1)];

/** |dcos|, |dsin| below this are rounding noise */
const DIRECTION_EPSILON = 1e-8;

function snapToZero(value: number): number {
  return Math.abs(value) < DIRECTION_EPSILON ? 0 : value;
}

function word(buffer: RunHeaderBuffer, index: number): number {
  return buffer[index] ?? 0;
}

export interface GrisuWriterDeps {
  /** Builds the atmosphere handle when atmosphereId >= 0 */
  atmosphereFactory?: AtmosphereFactory;
  /** Atmosphere handle that is already initialised; skips the factory */
  atmosphere?: AtmosphereProfile | null;
}

function resolveAtmosphere(config: WriterOptions, deps: GrisuWriterDeps): AtmosphereProfile | null {
  if (deps.atmosphere !== undefined) return deps.atmosphere;
  if (config.atmosphereId < 0) return null;
  const factory = deps.atmosphereFactory ?? initAtmosphere;
  return factory(config.atmosphereId, config.observationHeight);
}

export class GrisuWriter {
  readonly options: WriterOptions;
  private readonly sink: LineSink;
  private readonly atmosphere: AtmosphereProfile | null;
  private coreOffset: Position2 = { x: 0, y: 0 };

  constructor(sink: LineSink, options: Partial<WriterOptions> = {}, deps: GrisuWriterDeps = {}) {
    this.sink = sink;
    this.options = createWriterConfig(options);
    this.atmosphere = resolveAtmosphere(this.options, deps);
  }

  /**
   * Open the configured destination and create a writer on it.
   * The atmosphere is set up first, so a failure there leaves the output untouched.
   * @throws OutputOpenError if the output file cannot be opened
   */
  static open(options: Partial<WriterOptions> = {}, deps: GrisuWriterDeps = {}): GrisuWriter {
    const config = createWriterConfig(options);
    const atmosphere = resolveAtmosphere(config, deps);
    const sink = openSink(config.destination);
    debugLog(`Writing GrIsu output to ${config.destination}`);
    return new GrisuWriter(sink, config, { atmosphere });
  }

  /** Raw core position of the most recent shower */
  get lastCoreOffset(): Position2 {
    return this.coreOffset;
  }

  /** Observation height written on the "H" line */
  get observationHeight(): number {
    return this.atmosphere?.observationHeight ?? this.options.observationHeight;
  }

  get hasAtmosphere(): boolean {
    return this.atmosphere !== null;
  }

  /**
   * Write the header block describing the CORSIKA run
   */
  writeRunHeader(buffer: RunHeaderBuffer, info?: RunHeaderInfo | null): void {
    const f4 = (value: number) => formatFixed(value, HEADER_FORMAT);
    const w = (index: number) => word(buffer, index);
    const out = (line: string) => this.sink.writeLine(line);

    const particleId = Math.trunc(w(RUN_HEADER.PARTICLE_ID));
    const kascadeId = ParticleMap.lookup(particleId);
    const zenith = w(RUN_HEADER.ZENITH);
    const azimuth = w(RUN_HEADER.AZIMUTH);
    const grisuAzimuth = transformCoord(azimuth, 0, 0).azimuth;

    out("* HEADF  <-- Start of header flag");
    out("");
    out(`photon list created with ${this.options.versionLabel}`);
    out("");
    out(`       Photons generated by CORSIKA  (date: ${formatInteger(w(RUN_HEADER.DATE))})`);
    out("");
    out(`\t CORSIKA run number: ${formatInteger(w(RUN_HEADER.RUN_NUMBER))}`);
    out(`\t CORSIKA version: ${f4(w(RUN_HEADER.VERSION))}`);
    out("");
    out("");

    out(" TITLE OF RUN: ");
    out(
      `\t\t\t Primary energy<min.,max.> TeV = ${f4(w(RUN_HEADER.ENERGY_MIN) / 1e3)}\t${f4(w(RUN_HEADER.ENERGY_MAX) / 1e3)}`
    );
    out(`\t\t\t Slope of energy spectrum: ${f4(w(RUN_HEADER.SLOPE))}`);
    out(`\t\t\t Type code for primary particle (CORSIKA ID) ${formatInteger(particleId)}`);
    out(`PTYPE: ${formatInteger(particleId)}`);
    if (kascadeId !== undefined) {
      out(`\t\t\t Type code for primary particle (kascade ID) ${formatInteger(kascadeId)}`);
    } else {
      debugWarn(`No KASCADE ID for CORSIKA particle ${particleId}`);
      out("\t\t\t Type code for primary particle (kascade ID) \t unknown particle (for kascade)");
    }
    out(`\t\t\t Primary zenith angle  (CORSIKA coord.): ${f4(Angle.toDegrees(zenith))}`);
    out(`\t\t\t Primary azimuth angle (CORSIKA coord.): ${f4(Angle.toDegrees(azimuth))}`);
    out(`\t\t\t Primary zenith angle  (kascade coord.): ${f4(Angle.toDegrees(zenith))}`);
    out(`\t\t\t Primary azimuth angle (kascade coord.): ${f4(Angle.toDegrees(grisuAzimuth))}`);
    out(`\t\t\t Magnetic field (x/z): ${f4(w(RUN_HEADER.FIELD_X))}\t${f4(w(RUN_HEADER.FIELD_Z))}`);
    out(`\t\t\t Observation height [m]: ${f4(w(RUN_HEADER.OBSERVATION_HEIGHT) * 0.01)}`);
    const cuts = [
      RUN_HEADER.CUT_HADRON,
      RUN_HEADER.CUT_MUON,
      RUN_HEADER.CUT_ELECTRON,
      RUN_HEADER.CUT_PHOTON,
    ].map((index) => f4(w(index)));
    out(`\t\t\t Energy cuts (hadr./muon/el./phot.) [GeV]: ${cuts.join("\t")}`);

    out("CORSIKA RUN HEADER (START)");
    if (info) {
      info.printHeader(this.sink);
    }
    out("CORSIKA RUN HEADER (END)");

    out("");
    out("* DATAF  <-- end of header flag");
    out(`R ${f4(this.options.quantumEfficiency)}`);
    out(`H ${f4(this.observationHeight)}`);
  }

  /**
   * Write the shower line ("S") and, on request, the extended info line ("C")
   * @throws AtmosphereRequiredError if extended info is requested without an atmosphere
   */
  writeEvent(event: ShowerEvent, printMoreInfo = false): void {
    if (printMoreInfo && this.atmosphere === null) {
      throw new AtmosphereRequiredError();
    }

    const zenith = Angle.zenithFromAltitude(event.altitude);
    this.coreOffset = { x: event.xCore, y: event.yCore };

    const grisu = transformCoord(Angle.toRadians(event.azimuth), event.xCore, event.yCore);
    const dcos = snapToZero(Math.sin(zenith) * Math.cos(grisu.azimuth));
    const dsin = snapToZero(Math.sin(zenith) * Math.sin(grisu.azimuth));

    this.sink.writeLine(
      formatLine(
        "S",
        [
          real(event.energy),
          real(grisu.x),
          real(grisu.y),
          real(dcos),
          real(dsin),
          real(event.firstInteraction),
          ...SHOWER_PLACEHOLDERS,
        ],
        RECORD_FORMAT
      )
    );

    // First interaction height, slant depth of first interaction, shower id
    if (printMoreInfo && this.atmosphere !== null) {
      const thickness = this.atmosphere.thickness(100 * event.firstInteraction) / Math.cos(zenith);
      this.sink.writeLine(
        formatLine(
          "C",
          [real(event.firstInteraction), real(thickness), integer(event.showerId)],
          RECORD_FORMAT
        )
      );
    }
  }

  /**
   * Write one photon bunch ("P" line)
   * @param telescope zero-based telescope index
   */
  writePhotons(bunch: PhotonBunch, telescope: number): void {
    const zenith = Angle.zenithFromDirectionCosines(bunch.cx, bunch.cy);
    const grisu = transformCoord(Math.atan2(bunch.cy, bunch.cx), bunch.x, bunch.y);

    this.sink.writeLine(
      formatLine(
        "P",
        [
          real(grisu.x),
          real(grisu.y),
          real(Math.sin(zenith) * Math.cos(grisu.azimuth)),
          real(Math.sin(zenith) * Math.sin(grisu.azimuth)),
          real(bunch.zem),
          real(bunch.ctime), // time since first interaction, not since emission
          integer(bunch.lambda),
          integer(PHOTON_EMITTER_TYPE),
          integer(telescope + 1),
        ],
        PHOTON_FORMAT
      )
    );
  }

  close(): void {
    this.sink.close();
  }
}
