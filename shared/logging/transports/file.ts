/**
 * File Transport
 *
 * Appends JSON lines to `<logDir>/<filename>-YYYY-MM-DD.log`, rotating by
 * size. Node.js only.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "edgeprobe") */
  filename?: string;
  /** Max file size in bytes before rotation (default: 5MB) */
  maxSize?: number;
  /** Rotated files kept beside the active one (default: 3) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private logDir: string;
  private filename: string;
  private maxSize: number;
  private maxFiles: number;
  private currentPath: string;
  private currentSize = 0;
  private stream: fs.WriteStream;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel || "debug";
    this.logDir = options.logDir;
    this.filename = options.filename || "edgeprobe";
    this.maxSize = options.maxSize || 5 * 1024 * 1024;
    this.maxFiles = options.maxFiles || 3;

    fs.mkdirSync(this.logDir, { recursive: true });
    this.currentPath = this.logPath();
    this.stream = this.open();
  }

  private logPath(): string {
    const date = new Date().toISOString().slice(0, 10);
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private open(): fs.WriteStream {
    try {
      this.currentSize = fs.statSync(this.currentPath).size;
    } catch {
      this.currentSize = 0;
    }

    // Open synchronously so the file exists on disk before rotation can rename it
    const stream = fs.createWriteStream(this.currentPath, { fd: fs.openSync(this.currentPath, "a") });
    stream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
    return stream;
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    const size = Buffer.byteLength(line);

    if (this.currentSize + size > this.maxSize) {
      this.rotate();
    }

    this.stream.write(line);
    this.currentSize += size;
  }

  private rotate(): void {
    this.stream.end();

    const oldest = `${this.currentPath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.currentPath}.${i}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${this.currentPath}.${i + 1}`);
      }
    }
    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }

    this.stream = this.open();
  }

  async flush(): Promise<void> {
    if (this.stream.writableLength === 0) return;
    // Writes complete in order, so an empty write's callback marks the queue as drained
    await new Promise<void>(resolve => this.stream.write("", () => resolve()));
  }

  async close(): Promise<void> {
    await new Promise<void>(resolve => this.stream.end(() => resolve()));
  }
}
