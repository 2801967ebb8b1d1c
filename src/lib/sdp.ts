import { parse } from "sdp-transform";

export type ParsedSdp = ReturnType<typeof parse>;

export interface OfferSummary {
  parsed: ParsedSdp;
  /** mids in m-line order; index i is the mid of m-line i. */
  mids: Array<string | null>;
  hasVideo: boolean;
}

/**
 * Syntactic validation of a remote offer. sdp-transform is lenient and happily
 * parses garbage into an empty description, so the structural lines every
 * offer must carry are checked explicitly.
 *
 * Returns a description of the problem, or the parsed summary.
 */
export function inspectOffer(sdp: unknown): OfferSummary | string {
  if (typeof sdp !== "string" || sdp.trim() === "") {
    return "SDP must be a non-empty string";
  }
  if (!/^v=0\r?$/m.test(sdp.split("\n", 1)[0] ?? "")) {
    return "SDP must start with v=0";
  }

  const parsed = parse(sdp);
  if (!parsed.origin) {
    return "SDP has no o= line";
  }
  if (parsed.media.length === 0) {
    return "SDP has no m= sections";
  }

  return {
    parsed,
    mids: parsed.media.map((m) => (m.mid === undefined ? null : String(m.mid))),
    hasVideo: parsed.media.some((m) => m.type === "video"),
  };
}

/** Resolves the mid for an m-line index, when the offer declared one. */
export function midForMLine(mids: ReadonlyArray<string | null>, mlineIndex: number): string | null {
  return mids[mlineIndex] ?? null;
}
