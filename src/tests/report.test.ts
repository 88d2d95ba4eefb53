import {
  humanFileSize,
  renderDuplicateGroups,
  renderDuplicateSummaries,
  renderOutcome,
} from "../report.js";

describe("report helpers", () => {
  test("humanFileSize", () => {
    expect(humanFileSize(500)).toBe("500 B");
    expect(humanFileSize(1024)).toBe("1 KiB");
    expect(humanFileSize(1536)).toBe("1.50 KiB");
    expect(humanFileSize(Number.NaN)).toBe("-");
  });

  test("duplicate groups render one line per path", () => {
    const groups = new Map([["abc", ["/a", "/b"]]]);
    expect(renderDuplicateGroups(groups)).toEqual([
      "Duplicate files for hash abc:",
      " - /a",
      " - /b",
    ]);
  });

  test("duplicate summaries end with the reclaimable size", () => {
    expect(
      renderDuplicateSummaries([
        {
          digest: "abc",
          paths: ["/a", "/b", "/c"],
          size: 1024,
          reclaimable: 2048,
        },
      ]),
    ).toEqual([
      "Duplicate files for hash abc:",
      " - /a",
      " - /b",
      " - /c",
      "Reclaimable: 2 KiB",
    ]);
  });

  test("outcomes", () => {
    expect(
      renderOutcome({
        status: "resolved",
        digest: "d",
        survivor: "/a",
        deleted: ["/b"],
        dryRun: true,
      }),
    ).toEqual(["Would delete file: /b"]);
    expect(
      renderOutcome({
        status: "skipped",
        digest: "d",
        reason: "no survivor chosen",
      }),
    ).toEqual(["Skipped d: no survivor chosen"]);
  });
});
