import { AppConfig } from "../config";
import { NoopSink } from "./baseSink";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink } from "./sqsSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config, runId);
    case "sqs":
      return new SqsSink(config.sqsQueueUrl);
    case "rabbit":
      return new RabbitSink(config.rabbitUrl);
    case "http":
      return new HttpSink({
        endpoint: config.httpSinkEndpoint,
        token: config.httpSinkToken,
        ignoreHttpsErrors: config.ignoreHttpsErrors,
      });
    case "none":
      return new NoopSink();
  }
}

export { NoopSink } from "./baseSink";
export { HttpSink } from "./httpSink";
export { LocalJsonlSink } from "./localJsonlSink";
export { RabbitSink } from "./rabbitSink";
export { SqsSink } from "./sqsSink";
export * from "./types";
