import type { RecordDocument } from "@/input/RecordDocument";
import type { GrisuWriter } from "./GrisuWriter";

export interface WriteSummary {
  readonly events: number;
  readonly photons: number;
}

/**
 * Write a whole record document: header, then every shower and its photons
 */
export function writeDocument(
  writer: GrisuWriter,
  document: RecordDocument,
  printMoreInfo = false
): WriteSummary {
  writer.writeRunHeader(document.runHeader, document.runHeaderInfo);

  let photons = 0;
  for (const event of document.events) {
    writer.writeEvent(event.shower, printMoreInfo);
    for (const photon of event.photons) {
      writer.writePhotons(photon.bunch, photon.telescope);
      photons++;
    }
  }
  return { events: document.events.length, photons };
}
