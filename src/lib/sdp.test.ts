import { describe, expect, it } from "vitest";
import { OFFER_SDP } from "../test/fakeEngine.js";
import { inspectOffer, midForMLine } from "./sdp.js";

describe("inspectOffer", () => {
  it("summarizes a well-formed offer", () => {
    const summary = inspectOffer(OFFER_SDP);
    if (typeof summary === "string") throw new Error(summary);

    expect(summary.mids).toEqual(["0"]);
    expect(summary.hasVideo).toBe(true);
    expect(midForMLine(summary.mids, 0)).toBe("0");
    expect(midForMLine(summary.mids, 3)).toBeNull();
  });

  it.each([
    [undefined, "SDP must be a non-empty string"],
    ["   ", "SDP must be a non-empty string"],
    ["not sdp at all", "SDP must start with v=0"],
    ["v=0\r\ns=-\r\nm=video 9 RTP/AVP 96\r\n", "SDP has no o= line"],
    ["v=0\r\no=- 1 1 IN IP4 127.0.0.1\r\ns=-\r\nt=0 0\r\n", "SDP has no m= sections"],
  ])("rejects %j", (input, problem) => {
    expect(inspectOffer(input)).toBe(problem);
  });
});
