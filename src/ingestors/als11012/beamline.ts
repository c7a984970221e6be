/**
 * Fields common to every dataset recorded at ALS beamline 11.0.1.2.
 */

import type { DatasetRecord } from "../types.js";
import { UNKNOWN_EMAIL } from "../../scicat/types.js";

export const BEAMLINE_11012 = {
  beamline: "11.0.1.2",
  instrumentId: "11.0.1.2",
  creationLocation: "ALS 11.0.1.2",
  contactEmail: UNKNOWN_EMAIL,
  proposalId: "unknown",
} satisfies Partial<DatasetRecord>;

/** "PS_b-P2VP_film-3" → "PS b P2VP film 3" */
export function humanizeSampleName(name: string): string {
  return name.replace(/[_-]+/g, " ").trim();
}
