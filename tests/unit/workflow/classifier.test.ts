import { describe, expect, it } from "vitest";
import { classifyRelease, compileReleasePattern, renderFolderName } from "../../../src/workflow";
import { makeCandidate, makeWorkflow } from "../../helpers/fixtures";

const ROOT = "/tmp/archive-root";

describe("release classifier", () => {
  it("extracts the release number from the subject and renders the folder template", () => {
    const result = classifyRelease(makeCandidate({ subject: "Newsletter — Episode 42" }), makeWorkflow(ROOT));

    expect(result).toEqual({
      ok: true,
      release: { releaseId: "42", folderName: "Episode_42", releaseNumber: "42" },
    });
  });

  it("falls back to the secondary pattern when the primary one misses", () => {
    const workflow = makeWorkflow(ROOT, {
      release: { primaryPattern: "Issue\\s*(\\d+)", fallbackPattern: "(\\d+)", folderTemplate: "Issue_{number}" },
    });

    const result = classifyRelease(makeCandidate({ subject: "The 17th dispatch" }), workflow);

    expect(result.ok && result.release.folderName).toBe("Issue_17");
  });

  it("matches bare patterns case-insensitively and honours flags written as /pattern/flags", () => {
    expect(compileReleasePattern("Show\\s*(\\d+)").flags).toBe("i");
    expect(compileReleasePattern("/Show\\s*(\\d+)/").flags).toBe("");
    expect(compileReleasePattern("/Show\\s*(\\d+)/gim").flags).toBe("im");

    const workflow = makeWorkflow(ROOT, { release: { primaryPattern: "/SHOW\\s*(\\d+)/", folderTemplate: "Show_{number}" } });

    expect(classifyRelease(makeCandidate({ subject: "late show 5" }), workflow).ok).toBe(false);
    const result = classifyRelease(makeCandidate({ subject: "LATE SHOW 5" }), workflow);
    expect(result.ok && result.release.folderName).toBe("Show_5");
  });

  it("searches the body only when configured", () => {
    const candidate = makeCandidate({ subject: "Fresh tunes", textBody: "Inside: Episode 7 of the series" });

    expect(classifyRelease(candidate, makeWorkflow(ROOT)).ok).toBe(false);

    const withBody = makeWorkflow(ROOT, { release: { label: "Episode", searchBody: true } });
    const result = classifyRelease(candidate, withBody);
    expect(result.ok && result.release.folderName).toBe("Episode_7");
  });

  it("reads the body from HTML when no text part exists", () => {
    const workflow = makeWorkflow(ROOT, { release: { folderTemplate: "Vol_{number}", searchBody: true } });
    const candidate = makeCandidate({ subject: "Fresh tunes", textBody: undefined, htmlBody: "<p>This is <b>Volume 3</b></p>" });

    const result = classifyRelease(candidate, workflow);

    expect(result.ok && result.release.folderName).toBe("Vol_3");
  });

  it("returns a typed failure when no pattern matches", () => {
    const result = classifyRelease(makeCandidate({ subject: "Just saying hi" }), makeWorkflow(ROOT));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe("classification_failure");
      expect(result.failure.subject).toBe("Just saying hi");
    }
  });

  it("puts every playlist message in the single named release", () => {
    const workflow = makeWorkflow(ROOT, { release: { collectionType: "playlist", singleReleaseName: "Mixtape Collection" } });

    const result = classifyRelease(makeCandidate({ subject: "anything" }), workflow);

    expect(result).toEqual({ ok: true, release: { releaseId: "mixtape_collection", folderName: "Mixtape Collection" } });
  });

  it("slugifies the operator title for named releases and fails without one", () => {
    const workflow = makeWorkflow(ROOT, { release: { collectionType: "named_release" } });

    expect(classifyRelease(makeCandidate(), workflow, { title: "Summer Live Set!" })).toEqual({
      ok: true,
      release: { releaseId: "summer_live_set", folderName: "summer_live_set" },
    });
    expect(classifyRelease(makeCandidate(), workflow).ok).toBe(false);
  });

  it("keeps folder names free of path separators", () => {
    expect(renderFolderName("Show/{number}", "5")).toBe("Show_5");
  });
});
