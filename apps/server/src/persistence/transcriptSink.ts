import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

export const TranscriptRecordSchema = z.object({
  session_id: z.string(),
  window_sequence: z.number().int().nonnegative(),
  text: z.string(),
  confidence: z.number(),
  language: z.string(),
  timestamp: z.number(),
});
export type TranscriptRecord = z.infer<typeof TranscriptRecordSchema>;

/**
 * Append-only destination for finished transcript lines. The live path never
 * waits on it; failures are logged by the caller and otherwise ignored.
 */
export interface TranscriptSink {
  appendRecord(record: TranscriptRecord): Promise<void>;
  /** Optional read-back, used by the history endpoint. */
  readSession?(sessionId: string): Promise<TranscriptRecord[]>;
}

export const noopTranscriptSink: TranscriptSink = {
  async appendRecord() {
    // persistence disabled
  },
};

/**
 * One JSON object per line. Writes are chained so lines never interleave.
 */
export class JsonlTranscriptSink implements TranscriptSink {
  private readonly path: string;
  private ready: Promise<unknown> | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(path: string) {
    this.path = path;
  }

  appendRecord(record: TranscriptRecord): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    const write = this.tail.then(async () => {
      this.ready ??= mkdir(dirname(this.path), { recursive: true });
      await this.ready;
      await appendFile(this.path, line, "utf8");
    });
    // Keep the chain alive after a failed write; the caller sees the rejection.
    this.tail = write.catch(() => undefined);
    return write;
  }

  async readSession(sessionId: string): Promise<TranscriptRecord[]> {
    let contents: string;
    try {
      contents = await readFile(this.path, "utf8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const records: TranscriptRecord[] = [];
    for (const line of contents.split("\n")) {
      if (!line.trim()) continue;
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch {
        continue; // torn last line after a crash
      }
      const parsed = TranscriptRecordSchema.safeParse(value);
      if (parsed.success && parsed.data.session_id === sessionId) records.push(parsed.data);
    }
    return records.sort((a, b) => a.window_sequence - b.window_sequence);
  }
}

function isNotFound(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
