import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { Options } from "amqplib";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../../src/config";
import { HttpSink, LocalJsonlSink, NoopSink, RabbitSink, SqsSink, createSink } from "../../../src/sink";
import { ProcessingRecord } from "../../../src/types";
import { makeTempDir } from "../../helpers/fixtures";

function record(overrides: Partial<ProcessingRecord> = {}): ProcessingRecord {
  return {
    workflow: "sonic_twist",
    messageId: "msg-1@example.test",
    status: "archived",
    releaseId: "42",
    processedAt: "2024-03-11T08:00:00.000Z",
    memberMessageIds: ["msg-1@example.test"],
    attachments: [],
    unhandled: [],
    ...overrides,
  };
}

describe("LocalJsonlSink", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir("sink-");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("appends one line per record tagged with the run id", async () => {
    const sink = new LocalJsonlSink({ outputDirs: { archive: "archive", manifests: path.join(tempDir, "manifests") } }, "run_test");

    await sink.publishRecords([record()]);
    await sink.publishRecords([record({ messageId: "msg-2@example.test", status: "failed" })]);
    await sink.publishRecords([]);

    expect(sink.filePath).toBe(path.join(tempDir, "manifests", "records.jsonl"));
    const lines = fs.readFileSync(sink.filePath, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual({ runId: "run_test", ...record() });
    expect(JSON.parse(lines[1])).toMatchObject({ runId: "run_test", messageId: "msg-2@example.test", status: "failed" });
  });
});

interface FetchCall {
  url: string;
  headers: Record<string, string>;
  body: string;
}

function fakeFetch(statuses: number[]) {
  const calls: FetchCall[] = [];
  const fetchFn = async (url: string, init: { headers: Record<string, string>; body: string }) => {
    calls.push({ url, headers: init.headers, body: init.body });
    const status = statuses.shift() ?? 200;
    return { ok: status < 300, status, text: async () => (status === 400 ? "bad request" : "busy") };
  };
  return { calls, fetchFn };
}

describe("HttpSink", () => {
  it("posts records with an idempotency key and bearer token", async () => {
    const { calls, fetchFn } = fakeFetch([200]);
    const sink = new HttpSink({ endpoint: "http://sink.example.test/records", token: "test-secret", fetchFn });

    await sink.publishRecords([record(), record({ messageId: "msg-2@example.test", status: "skipped" })]);

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("http://sink.example.test/records");
    expect(calls[0].headers).toEqual({
      "Content-Type": "application/json",
      "Idempotency-Key": "sonic_twist:msg-1@example.test:archived,sonic_twist:msg-2@example.test:skipped",
      Authorization: "Bearer test-secret",
    });
    const body: unknown = JSON.parse(calls[0].body);
    expect(body).toMatchObject({
      kind: "processing_records",
      events: [
        {
          type: "record.archived",
          key: "sonic_twist:msg-1@example.test",
          idempotencyKey: "sonic_twist:msg-1@example.test:archived",
          workflow: "sonic_twist",
          releaseId: "42",
          record: record(),
        },
        { type: "record.skipped", record: record({ messageId: "msg-2@example.test", status: "skipped" }) },
      ],
    });
  });

  it("retries transient statuses", async () => {
    const { calls, fetchFn } = fakeFetch([503, 429, 200]);
    const sink = new HttpSink({ endpoint: "http://sink.example.test", fetchFn, retryDelayMs: 0 });

    await sink.publishRecords([record()]);

    expect(calls).toHaveLength(3);
  });

  it("gives up on permanent errors", async () => {
    const { calls, fetchFn } = fakeFetch([400]);
    const sink = new HttpSink({ endpoint: "http://sink.example.test", fetchFn, retryDelayMs: 0 });

    await expect(sink.publishRecords([record()])).rejects.toThrow("HTTP sink rejected 1 record(s): status 400: bad request");
    expect(calls).toHaveLength(1);
  });

  it("gives up once retries are exhausted", async () => {
    const { calls, fetchFn } = fakeFetch([500, 500, 500]);
    const sink = new HttpSink({ endpoint: "http://sink.example.test", fetchFn, maxRetries: 2, retryDelayMs: 0 });

    await expect(sink.publishRecords([record()])).rejects.toThrow("HTTP sink gave up after 3 attempt(s): status 500: busy");
    expect(calls).toHaveLength(3);
  });

  it("refuses to publish without an endpoint", async () => {
    await expect(new HttpSink().publishRecords([record()])).rejects.toThrow("HTTP sink is not configured");
  });
});

interface Published {
  exchange: string;
  routingKey: string;
  content: Buffer;
  options?: Options.Publish;
}

interface RabbitState {
  connects: number;
  closedChannels: number;
  closedConnections: number;
  exchanges: string[];
}

function fakeRabbit(failConnects = 0) {
  const published: Published[] = [];
  const state: RabbitState = { connects: 0, closedChannels: 0, closedConnections: 0, exchanges: [] };
  const connectFn = async (url: string) => {
    state.connects += 1;
    if (state.connects <= failConnects) {
      throw new Error(`cannot reach ${url}`);
    }
    return {
      createConfirmChannel: async () => ({
        assertExchange: async (exchange: string) => {
          state.exchanges.push(exchange);
          return {};
        },
        publish: (exchange: string, routingKey: string, content: Buffer, options?: Options.Publish) => {
          published.push({ exchange, routingKey, content, options });
          return true;
        },
        waitForConfirms: async () => undefined,
        close: async () => {
          state.closedChannels += 1;
        },
      }),
      close: async () => {
        state.closedConnections += 1;
      },
    };
  };
  return { published, state, connectFn };
}

describe("RabbitSink", () => {
  it("publishes each record to the topic exchange under its status", async () => {
    const { published, state, connectFn } = fakeRabbit();
    const sink = new RabbitSink({ connectionUrl: "amqp://localhost", connectFn });

    await sink.publishRecords([record(), record({ messageId: "msg-2@example.test", status: "failed" })]);

    expect(state.exchanges).toEqual(["mail-archiver"]);
    expect(published.map((entry) => entry.routingKey)).toEqual(["records.archived", "records.failed"]);
    expect(published[1].options).toEqual({
      persistent: true,
      contentType: "application/json",
      messageId: "sonic_twist:msg-2@example.test:failed",
      type: "record.failed",
      headers: { "x-workflow": "sonic_twist", "x-release-id": "42" },
    });
    expect(JSON.parse(published[0].content.toString("utf-8"))).toMatchObject({
      type: "record.archived",
      key: "sonic_twist:msg-1@example.test",
      record: record(),
    });
    expect(state).toMatchObject({ closedChannels: 1, closedConnections: 1 });
  });

  it("reconnects after a failed attempt", async () => {
    const { published, state, connectFn } = fakeRabbit(1);
    const sink = new RabbitSink({ connectionUrl: "amqp://localhost", connectFn, retryDelayMs: 0 });

    await sink.publishRecords([record()]);

    expect(state.connects).toBe(2);
    expect(published).toHaveLength(1);
  });

  it("refuses to publish without a connection url", async () => {
    await expect(new RabbitSink().publishRecords([record()])).rejects.toThrow("RabbitMQ sink is not configured");
  });
});

describe("SqsSink", () => {
  function fakeClient(responses: Array<{ Failed?: Array<{ Id?: string }> }>) {
    const batches: string[][] = [];
    const bodies: string[][] = [];
    const client = {
      send: async (command: { input: { Entries?: Array<{ Id?: string; MessageBody?: string; MessageGroupId?: string; MessageDeduplicationId?: string }> } }) => {
        const entries = command.input.Entries ?? [];
        batches.push(entries.map((entry) => entry.Id ?? ""));
        bodies.push(entries.map((entry) => `${entry.MessageGroupId ?? "-"}|${entry.MessageDeduplicationId ?? "-"}`));
        return responses.shift() ?? {};
      },
    };
    return { batches, bodies, client };
  }

  it("sends batches of at most ten entries", async () => {
    const { batches, client } = fakeClient([]);
    const sink = new SqsSink({ queueUrl: "https://sqs.example.test/queue", client });
    const records = Array.from({ length: 12 }, (_, index) => record({ messageId: `msg-${index}@example.test` }));

    await sink.publishRecords(records);

    expect(batches.map((batch) => batch.length)).toEqual([10, 2]);
    expect(batches[1]).toEqual(["10", "11"]);
  });

  it("groups FIFO messages by workflow and deduplicates by status", async () => {
    const { bodies, client } = fakeClient([]);
    const sink = new SqsSink({ queueUrl: "https://sqs.example.test/queue.fifo", client });

    await sink.publishRecords([record()]);

    const dedup = createHash("sha256").update("sonic_twist:msg-1@example.test:archived").digest("hex");
    expect(bodies).toEqual([[`mail-archiver.sonic_twist|${dedup}`]]);
  });

  it("retries only the entries that failed", async () => {
    const { batches, client } = fakeClient([{ Failed: [{ Id: "1" }] }, {}]);
    const sink = new SqsSink({ queueUrl: "https://sqs.example.test/queue", client, retryDelayMs: 0 });

    await sink.publishRecords([record(), record({ messageId: "msg-2@example.test" })]);

    expect(batches).toEqual([["0", "1"], ["1"]]);
  });
});

describe("createSink", () => {
  it("builds the configured sink", () => {
    const tempDir = makeTempDir("sink-factory-");
    try {
      const base = { ...DEFAULT_CONFIG, outputDirs: { archive: "archive", manifests: tempDir } };
      expect(createSink({ ...base, sinkType: "none" }, "run_test")).toBeInstanceOf(NoopSink);
      expect(createSink({ ...base, sinkType: "local_jsonl" }, "run_test")).toBeInstanceOf(LocalJsonlSink);
      expect(createSink({ ...base, sinkType: "http", httpSinkEndpoint: "http://sink.example.test" }, "run_test")).toBeInstanceOf(HttpSink);
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });
});
