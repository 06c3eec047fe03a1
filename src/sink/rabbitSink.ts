import type { Options } from "amqplib";
import { connect as amqpConnect } from "amqplib";
import { ProcessingRecord } from "../types";
import { BaseSink, sleep } from "./baseSink";
import { RecordEvent } from "./types";

type ConnectFn = (url: string) => Promise<ConnectionLike>;

interface ConnectionLike {
  createConfirmChannel(): Promise<ChannelLike>;
  close(): Promise<void>;
}

interface ChannelLike {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms?(): Promise<void>;
  close(): Promise<void>;
}

export interface RabbitSinkOptions {
  connectionUrl?: string;
  exchange?: string;
  routingKeyPrefix?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  connectFn?: ConnectFn;
}

// Events go to a topic exchange as <prefix>.<status>, e.g. records.archived.
export class RabbitSink extends BaseSink {
  private readonly connectionUrl?: string;
  private readonly exchange: string;
  private readonly routingKeyPrefix: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly connectFn: ConnectFn;

  constructor(optionsOrConnectionUrl?: RabbitSinkOptions | string) {
    super();
    const options: RabbitSinkOptions =
      typeof optionsOrConnectionUrl === "string" ? { connectionUrl: optionsOrConnectionUrl } : (optionsOrConnectionUrl ?? {});

    this.connectionUrl = options.connectionUrl;
    this.exchange = options.exchange ?? "mail-archiver";
    this.routingKeyPrefix = options.routingKeyPrefix ?? "records";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.connectFn = options.connectFn ?? ((url: string) => amqpConnect(url));
  }

  async publishRecords(records: ProcessingRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const url = this.ensureConfigured("RabbitMQ", this.connectionUrl);
    const sentAt = new Date().toISOString();
    const events = records.map((record) => this.toEvent(record, sentAt));

    for (let attempt = 1; ; attempt += 1) {
      try {
        await this.publishOnce(url, events);
        return;
      } catch (error) {
        if (attempt > this.maxRetries) {
          throw error;
        }
      }
      await sleep(this.retryDelayMs * attempt);
    }
  }

  private async publishOnce(url: string, events: RecordEvent[]): Promise<void> {
    const connection = await this.connectFn(url);
    try {
      const channel = await connection.createConfirmChannel();
      try {
        await channel.assertExchange(this.exchange, "topic", { durable: true });
        for (const event of events) {
          channel.publish(this.exchange, `${this.routingKeyPrefix}.${event.record.status}`, Buffer.from(JSON.stringify(event)), {
            persistent: true,
            contentType: "application/json",
            messageId: event.idempotencyKey,
            type: event.type,
            headers: {
              "x-workflow": event.workflow,
              ...(event.releaseId ? { "x-release-id": event.releaseId } : {}),
            },
          });
        }
        await channel.waitForConfirms?.();
      } finally {
        await channel.close().catch(() => undefined);
      }
    } finally {
      await connection.close().catch(() => undefined);
    }
  }
}
