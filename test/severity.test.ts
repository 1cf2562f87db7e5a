import { describe, expect, it } from "vitest";
import { cvssV3BaseScore, scoreToSeverity, vulnerabilitySeverity } from "../src/policy/severity";

describe("cvssV3BaseScore", () => {
  it("scores unchanged and changed scope vectors", () => {
    expect(cvssV3BaseScore("CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H")).toBe(9.8);
    expect(cvssV3BaseScore("CVSS:3.1/AV:N/AC:L/PR:N/UI:R/S:C/C:L/I:L/A:N")).toBe(6.1);
  });

  it("returns 0 without impact and undefined for other vectors", () => {
    expect(cvssV3BaseScore("CVSS:3.0/AV:N/AC:L/PR:N/UI:N/S:U/C:N/I:N/A:N")).toBe(0);
    expect(cvssV3BaseScore("CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:X/C:H/I:H/A:H")).toBeUndefined();
    expect(cvssV3BaseScore("AV:N/AC:L/Au:N/C:P/I:P/A:P")).toBeUndefined();
  });
});

describe("vulnerabilitySeverity", () => {
  it("takes the highest level across severity entries", () => {
    expect(
      vulnerabilitySeverity({
        id: "GHSA-x",
        severity: [
          { type: "CVSS_V3", score: "CVSS:3.1/AV:N/AC:L/PR:N/UI:R/S:C/C:L/I:L/A:N" },
          { type: "CVSS_V3", score: "7.5" }
        ]
      })
    ).toBe("high");
  });

  it("falls back to the database label, then to the default", () => {
    expect(vulnerabilitySeverity({ id: "GHSA-x", database_specific: { severity: "MODERATE" } })).toBe("medium");
    expect(vulnerabilitySeverity({ id: "GHSA-x" })).toBe("medium");
    expect(vulnerabilitySeverity({ id: "GHSA-x" }, "low")).toBe("low");
  });

  it("maps scores onto levels", () => {
    expect([9, 7, 4, 0.1, 0].map(scoreToSeverity)).toEqual(["critical", "high", "medium", "low", undefined]);
  });
});
