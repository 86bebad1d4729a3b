import { STDOUT_DESTINATION } from "@/output/LineSink";
import type { WriterOptions } from "@/types";

/** Banner label used when none is configured */
export const DEFAULT_VERSION_LABEL = "grisu-writer 1.0.0";

/**
 * Default writer options
 */
export const DEFAULT_WRITER_OPTIONS: WriterOptions = {
  destination: STDOUT_DESTINATION,
  /** Negative: no atmosphere model, no extended shower info */
  atmosphereId: -1,
  versionLabel: DEFAULT_VERSION_LABEL,
  quantumEfficiency: 1,
  observationHeight: 100,
};

/**
 * Creates the writer configuration from partial options
 */
export function createWriterConfig(options: Partial<WriterOptions> = {}): WriterOptions {
  return { ...DEFAULT_WRITER_OPTIONS, ...options };
}
