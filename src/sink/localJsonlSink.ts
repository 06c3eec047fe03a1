import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { ProcessingRecord } from "../types";
import { BaseSink } from "./baseSink";

export class LocalJsonlSink extends BaseSink {
  private readonly recordsPath: string;
  private readonly runId: string;

  constructor(config: Pick<AppConfig, "outputDirs">, runId: string) {
    super();
    const manifestsDir = path.resolve(config.outputDirs.manifests);
    fs.mkdirSync(manifestsDir, { recursive: true });
    this.recordsPath = path.join(manifestsDir, "records.jsonl");
    this.runId = runId;
  }

  get filePath(): string {
    return this.recordsPath;
  }

  async publishRecords(records: ProcessingRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify({ runId: this.runId, ...record })).join("\n") + "\n";
    await fs.promises.appendFile(this.recordsPath, content, "utf-8");
  }
}
