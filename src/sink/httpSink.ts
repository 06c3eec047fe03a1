import { Agent, fetch as undiciFetch } from "undici";
import { errorMessage } from "../core/errors";
import { ProcessingRecord } from "../types";
import { BaseSink, sleep } from "./baseSink";

interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }) => Promise<HttpResponseLike>;

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

type Delivery = { kind: "delivered" } | { kind: "retry"; detail: string } | { kind: "rejected"; detail: string };

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class HttpSink extends BaseSink {
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpSinkOptions = {}) {
    super();
    this.endpoint = options.endpoint;
    this.token = options.token;
    const dispatcher = options.ignoreHttpsErrors ? new Agent({ connect: { rejectUnauthorized: false } }) : undefined;
    this.fetchFn = options.fetchFn ?? ((url, init) => undiciFetch(url, { ...init, dispatcher }));
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
  }

  async publishRecords(records: ProcessingRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const endpoint = this.ensureConfigured("HTTP", this.endpoint);
    const sentAt = new Date().toISOString();
    const events = records.map((record) => this.toEvent(record, sentAt));
    const body = JSON.stringify({ kind: "processing_records", sentAt, events });

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": events.map((event) => event.idempotencyKey).join(","),
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    for (let attempt = 1; ; attempt += 1) {
      const delivery = await this.post(endpoint, headers, body);
      if (delivery.kind === "delivered") {
        return;
      }
      if (delivery.kind === "rejected") {
        throw new Error(`HTTP sink rejected ${events.length} record(s): ${delivery.detail}`);
      }
      if (attempt > this.maxRetries) {
        throw new Error(`HTTP sink gave up after ${attempt} attempt(s): ${delivery.detail}`);
      }
      await sleep(this.retryDelayMs * attempt);
    }
  }

  private async post(endpoint: string, headers: Record<string, string>, body: string): Promise<Delivery> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(endpoint, { method: "POST", headers, body, signal: controller.signal });
      if (response.ok) {
        return { kind: "delivered" };
      }
      const detail = `status ${response.status}: ${await response.text()}`;
      return isRetriableStatus(response.status) ? { kind: "retry", detail } : { kind: "rejected", detail };
    } catch (error) {
      return { kind: "retry", detail: errorMessage(error) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
