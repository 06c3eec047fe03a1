import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildWorkflowSpec, findWorkflow, loadConfig, parseConfigOverrides, withArchiveRoot } from "../../../src/config";
import { ConfigError, UnknownWorkflowError } from "../../../src/core/errors";
import { HANDLER_NAMES, makeTempDir } from "../../helpers/fixtures";

const EXAMPLE_CONFIG = path.resolve(__dirname, "../../../archiver.config.example.json");

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir("config-");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const file = path.join(tempDir, "archiver.config.json");
    fs.writeFileSync(file, JSON.stringify(content), "utf-8");
    return file;
  }

  it("loads the example configuration", () => {
    const config = loadConfig(EXAMPLE_CONFIG, HANDLER_NAMES, { ARCHIVE_ROOT: tempDir });

    expect(config.workflows.map((workflow) => workflow.name)).toEqual(["sonic_twist", "late_night_radio", "mixtapes"]);
    const sonic = findWorkflow(config.workflows, "sonic_twist");
    expect(sonic.archiveDir).toBe(path.join(tempDir, "sonic_twist"));
    expect(sonic.release.folderTemplate).toBe("Episode_{number}");
    expect(sonic.processors.map((processor) => processor.handler)).toEqual([
      "process_zip_attachment",
      "normalize_audio",
      "extract_docx_text",
      "save_image",
    ]);
    const radio = findWorkflow(config.workflows, "late_night_radio");
    expect(radio.merge).toEqual({ enabled: true, policy: { kind: "quiet_period", quietPeriodMinutes: 720 } });
    expect(radio.mailboxFolder).toBe("[Gmail]/All Mail");
  });

  it("applies environment overrides over file values", () => {
    const file = writeConfig({ imap: { host: "mail.example.test", port: 143, secure: false }, sinkType: "none" });

    const config = loadConfig(file, HANDLER_NAMES, {
      IMAP_PORT: "1993",
      IMAP_SECURE: "true",
      IMAP_USER: "archivist@example.test",
      IMAP_PASSWORD: "test-secret",
      STORE_PATH: "/tmp/ledger.sqlite",
      SINK_TYPE: "HTTP",
      HTTP_SINK_ENDPOINT: "http://sink.example.test/records",
    });

    expect(config.imap).toEqual({
      host: "mail.example.test",
      port: 1993,
      secure: true,
      user: "archivist@example.test",
      password: "test-secret",
      defaultFolder: "[Gmail]/All Mail",
    });
    expect(config.storePath).toBe("/tmp/ledger.sqlite");
    expect(config.sinkType).toBe("http");
    expect(config.httpSinkEndpoint).toBe("http://sink.example.test/records");
  });

  it("uses the IMAP default folder for workflows without their own", () => {
    const file = writeConfig({ workflows: [{ name: "plain", processors: [] }] });

    const config = loadConfig(file, HANDLER_NAMES, { IMAP_DEFAULT_FOLDER: "INBOX" });

    expect(config.workflows[0].mailboxFolder).toBe("INBOX");
  });

  it("rejects an explicit config path that does not exist", () => {
    expect(() => loadConfig(path.join(tempDir, "missing.json"), HANDLER_NAMES, {})).toThrow(ConfigError);
  });

  it("rejects unknown sink types", () => {
    const file = writeConfig({});
    expect(() => loadConfig(file, HANDLER_NAMES, { SINK_TYPE: "kafka" })).toThrow("Unsupported sink type: kafka");
  });

  it("rejects malformed JSON with the file name", () => {
    expect(() => parseConfigOverrides("{ nope", "bad.json")).toThrow(/bad\.json is not valid JSON/);
  });

  it("rejects settings of the wrong type as configuration errors", () => {
    expect(() => parseConfigOverrides('{"sinkType": 5}', "c.json")).toThrow(ConfigError);
    expect(() => parseConfigOverrides('{"sinkType": 5}', "c.json")).toThrow("Config file c.json: sinkType must be a string");
    expect(() => parseConfigOverrides('{"imap": {"port": "993"}}', "c.json")).toThrow("Config file c.json: imap.port must be a number");
    expect(() => parseConfigOverrides('{"outputDirs": {"archive": false}}', "c.json")).toThrow(
      "Config file c.json: outputDirs.archive must be a string",
    );
  });

  it("moves every workflow under a different archive root", () => {
    const file = writeConfig({ workflows: [{ name: "one" }, { name: "two", archiveDir: "/elsewhere/two" }] });
    const config = loadConfig(file, HANDLER_NAMES, { ARCHIVE_ROOT: "/archive" });

    const moved = withArchiveRoot(config, "/tmp/dry");

    expect(moved.outputDirs.archive).toBe("/tmp/dry");
    expect(moved.workflows.map((workflow) => workflow.archiveDir)).toEqual([path.resolve("/tmp/dry", "one"), path.resolve("/tmp/dry", "two")]);
    expect(config.workflows[0].archiveDir).toBe(path.resolve("/archive", "one"));
  });

  it("rejects duplicate workflow names", () => {
    const file = writeConfig({ workflows: [{ name: "twice" }, { name: "twice" }] });
    expect(() => loadConfig(file, HANDLER_NAMES, {})).toThrow("Duplicate workflow name: twice");
  });
});

describe("buildWorkflowSpec", () => {
  it("fills defaults and freezes the result", () => {
    const spec = buildWorkflowSpec({ name: "minimal" }, "/archive", HANDLER_NAMES);

    expect(spec.archiveDir).toBe(path.resolve("/archive", "minimal"));
    expect(spec.release).toEqual({
      collectionType: "bound_volume",
      primaryPattern: "(?:Issue|Episode|Volume|#)\\s*(\\d+)",
      fallbackPattern: undefined,
      searchBody: false,
      folderTemplate: "Issue_{number}",
      label: "Issue",
      singleReleaseName: undefined,
      onDuplicate: "flag",
    });
    expect(spec.audio).toEqual({ normalize: true, targetLufs: -16, bitrate: "320k", outputFormat: "original" });
    expect(spec.lyrics).toEqual({ extractFromDocx: true, fieldName: "lyrics" });
    expect(spec.merge).toEqual({ enabled: false, policy: { kind: "quiet_period", quietPeriodMinutes: 1440 } });
    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.filters.excludePatterns)).toBe(true);
  });

  it("rejects unknown handler names at load time", () => {
    expect(() =>
      buildWorkflowSpec({ name: "bad", processors: [{ patterns: ["*.mp3"], handler: "transcode_everything" }] }, "/archive", HANDLER_NAMES),
    ).toThrow(/unknown handler "transcode_everything"/);
  });

  it("rejects processors without patterns", () => {
    expect(() => buildWorkflowSpec({ name: "bad", processors: [{ handler: "save_file" }] }, "/archive", HANDLER_NAMES)).toThrow(
      /patterns must list at least one file pattern/,
    );
  });

  it("rejects invalid regular expressions and dates", () => {
    expect(() => buildWorkflowSpec({ name: "bad", release: { primaryPattern: "(unclosed" } }, "/archive", HANDLER_NAMES)).toThrow(
      ConfigError,
    );
    expect(() => buildWorkflowSpec({ name: "bad", filters: { afterDate: "not a date" } }, "/archive", HANDLER_NAMES)).toThrow(
      /afterDate is not a valid date/,
    );
  });

  it("validates merge policies", () => {
    const spec = buildWorkflowSpec(
      { name: "radio", merge: { enabled: true, policy: "expected_count", expectedCount: 3 } },
      "/archive",
      HANDLER_NAMES,
    );
    expect(spec.merge.policy).toEqual({ kind: "expected_count", expectedCount: 3 });

    expect(() =>
      buildWorkflowSpec({ name: "radio", merge: { enabled: true, policy: "expected_count" } }, "/archive", HANDLER_NAMES),
    ).toThrow(/expectedCount must be a positive integer/);
  });

  it("requires a release name for playlists and a number slot for bound volumes", () => {
    expect(() => buildWorkflowSpec({ name: "p", release: { collectionType: "playlist" } }, "/archive", HANDLER_NAMES)).toThrow(
      /singleReleaseName is required/,
    );
    expect(() => buildWorkflowSpec({ name: "b", release: { folderTemplate: "Episode" } }, "/archive", HANDLER_NAMES)).toThrow(
      /must contain \{number\}/,
    );
  });

  it("rejects workflow names that are not filesystem friendly", () => {
    expect(() => buildWorkflowSpec({ name: "Bad Name" }, "/archive", HANDLER_NAMES)).toThrow(ConfigError);
  });

  it("raises UnknownWorkflowError listing what exists", () => {
    const spec = buildWorkflowSpec({ name: "known" }, "/archive", HANDLER_NAMES);
    expect(() => findWorkflow([spec], "missing")).toThrow(UnknownWorkflowError);
    expect(() => findWorkflow([spec], "missing")).toThrow("Unknown workflow: missing. Available: known");
  });
});
