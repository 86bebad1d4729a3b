/**
 * AtmosphereProfile - vertical atmospheric thickness as a function of height
 *
 * Layered parametrisation (Linsley): below the top layer
 *   T(h) = a + b * exp(-h / c)
 * and in the top layer
 *   T(h) = a - b * h / c
 * with h in cm and T in g/cm². T is zero above the top of the atmosphere.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { UnknownAtmosphereError } from "@/errors";
import { debugLog } from "@/logging/log";

export interface AtmosphereLayer {
  /** Lower boundary of the layer [cm] */
  readonly bottom: number;
  readonly a: number;
  readonly b: number;
  readonly c: number;
}

export interface AtmosphereModel {
  readonly name: string;
  readonly layers: readonly AtmosphereLayer[];
}

/**
 * Handle to an initialised atmosphere model.
 */
export interface AtmosphereProfile {
  readonly modelId: number;
  readonly observationHeight: number;
  /** Vertical thickness above a height given in cm */
  thickness(height: number): number;
}

/** Creates an atmosphere handle for a model id and observation height */
export type AtmosphereFactory = (modelId: number, observationHeight: number) => AtmosphereProfile;

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const MODELS_PATH = path.resolve(__dirname, "models.json");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseLayer(value: unknown, where: string): AtmosphereLayer {
  if (!isRecord(value)) {
    throw new Error(`Atmosphere table: ${where} is not an object`);
  }
  const { bottom, a, b, c } = value;
  if (
    typeof bottom !== "number" ||
    typeof a !== "number" ||
    typeof b !== "number" ||
    typeof c !== "number"
  ) {
    throw new Error(`Atmosphere table: ${where} needs numeric bottom, a, b, c`);
  }
  return { bottom, a, b, c };
}

/**
 * Parse the model table, keyed by model id
 */
export function parseAtmosphereModels(raw: unknown): ReadonlyMap<number, AtmosphereModel> {
  if (!isRecord(raw)) {
    throw new Error("Atmosphere table must be an object keyed by model id");
  }
  const models = new Map<number, AtmosphereModel>();
  for (const [key, entry] of Object.entries(raw)) {
    const id = Number(key);
    const rawLayers: unknown = isRecord(entry) ? entry.layers : undefined;
    if (!Number.isInteger(id) || !Array.isArray(rawLayers)) {
      throw new Error(`Atmosphere table: invalid model "${key}"`);
    }
    const layers = rawLayers.map((layer: unknown, i) => parseLayer(layer, `model ${key} layer ${i}`));
    if (layers.length === 0) {
      throw new Error(`Atmosphere table: model "${key}" has no layers`);
    }
    const rawName: unknown = isRecord(entry) ? entry.name : undefined;
    const name = typeof rawName === "string" ? rawName : `model ${key}`;
    models.set(id, { name, layers });
  }
  return models;
}

let cachedModels: ReadonlyMap<number, AtmosphereModel> | null = null;

/**
 * Models shipped with the writer (loaded once)
 */
export function loadAtmosphereModels(): ReadonlyMap<number, AtmosphereModel> {
  if (cachedModels === null) {
    cachedModels = parseAtmosphereModels(JSON.parse(fs.readFileSync(MODELS_PATH, "utf8")));
  }
  return cachedModels;
}

/**
 * Atmosphere profile backed by a layered model.
 */
export class LayeredAtmosphere implements AtmosphereProfile {
  readonly modelId: number;
  readonly observationHeight: number;
  private readonly layers: readonly AtmosphereLayer[];

  constructor(modelId: number, model: AtmosphereModel, observationHeight: number) {
    this.modelId = modelId;
    this.observationHeight = observationHeight;
    this.layers = [...model.layers].sort((l1, l2) => l1.bottom - l2.bottom);
  }

  thickness(height: number): number {
    const top = this.layers.length - 1;
    let index = 0;
    while (index < top && height >= (this.layers[index + 1]?.bottom ?? Infinity)) {
      index++;
    }
    const layer = this.layers[index];
    if (layer === undefined) return 0;

    if (index === top) {
      return Math.max(0, layer.a - (layer.b * height) / layer.c);
    }
    return layer.a + layer.b * Math.exp(-height / layer.c);
  }
}

/**
 * Initialise the atmosphere model with the given id
 * @throws UnknownAtmosphereError if no model has this id
 */
export const initAtmosphere: AtmosphereFactory = (modelId, observationHeight) => {
  const model = loadAtmosphereModels().get(modelId);
  if (!model) {
    throw new UnknownAtmosphereError(modelId);
  }
  debugLog(`Atmosphere model ${modelId}: ${model.name}`);
  return new LayeredAtmosphere(modelId, model, observationHeight);
};
