/**
 * Owner and access groups for a new dataset.
 */

import type { Ownable } from "./types.js";

/** Beamline names as they arrive from instruments, mapped to the group names users are in */
const BEAMLINE_GROUP_ALIASES: Record<string, string> = {
  bl832: "8.3.2",
};

/** Lower-case and strip surrounding quotes, commas and whitespace */
export function normalizeBeamline(beamline: string): string {
  const cleaned = beamline.toLowerCase().replace(/^["'\s,]+|["'\s,]+$/g, "");
  return BEAMLINE_GROUP_ALIASES[cleaned] ?? cleaned;
}

/**
 * The owner group is the proposal when one is known, else the owner username.
 * Access groups hold the beamline and, when it differs, the owner username.
 */
export function calculateAccessControls(
  username: string,
  beamline?: string,
  proposal?: string
): Ownable {
  const ownerGroup = proposal && proposal !== "None" && proposal !== "unknown" ? proposal : username;

  const accessGroups: string[] = [];
  if (beamline) {
    const group = normalizeBeamline(beamline);
    accessGroups.push(group);
    if (username !== group) {
      accessGroups.push(username);
    }
  }

  return { ownerGroup, accessGroups };
}
