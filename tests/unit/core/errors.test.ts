import { describe, expect, it } from "vitest";
import {
  ClassificationFailure,
  ConfigError,
  HandlerFailure,
  MailboxFailure,
  errorMessage,
  isArchiveError,
} from "../../../src/core/errors";
import { MetricsRegistry, createRunId } from "../../../src/observability";

describe("archive errors", () => {
  it("carries a kind and the subclass name", () => {
    const error = new ConfigError("bad config");
    expect(error.kind).toBe("config_error");
    expect(error.name).toBe("ConfigError");
    expect(isArchiveError(error)).toBe(true);
    expect(isArchiveError(new Error("plain"))).toBe(false);
  });

  it("describes the patterns a classification tried", () => {
    const error = new ClassificationFailure("Hello", ["Episode\\s*(\\d+)"]);
    expect(error.message).toBe('No release number found in "Hello" (tried /Episode\\s*(\\d+)/)');
  });

  it("folds the cause into handler and mailbox failures", () => {
    expect(new HandlerFailure("a.mp3", "normalize_audio", new Error("boom")).message).toBe("normalize_audio failed on a.mp3: boom");
    expect(new MailboxFailure("Search failed in INBOX", "timeout").message).toBe("Search failed in INBOX: timeout");
  });

  it("truncates long messages", () => {
    const message = errorMessage(new Error("x".repeat(600)));
    expect(message).toHaveLength(501);
    expect(message.endsWith("…")).toBe(true);
  });
});

describe("observability helpers", () => {
  it("builds run ids from the clock and workflow", () => {
    expect(createRunId(new Date("2024-03-11T08:00:00.000Z"), "sonic_twist")).toMatch(
      /^run_sonic_twist_2024-03-11T08-00-00-000Z_[a-z0-9]{1,6}$/,
    );
  });

  it("counts and times", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("records_archived");
    metrics.incrementCounter("records_archived", 2);
    metrics.startTimer("handler_ms")();

    expect(metrics.getCounters().records_archived).toBe(3);
    expect(metrics.getTimerSummaries().handler_ms.count).toBe(1);
    expect(metrics.getTimerSummaries().candidate_ms).toEqual({ count: 0, min: 0, max: 0, avg: 0 });
  });
});
