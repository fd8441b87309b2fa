import { Writable } from "node:stream";

/**
 * Writable stream that keeps everything written to it.
 */
export class MockWritableStream extends Writable {
  public output = "";
  isTTY: boolean;

  constructor(isTTY = false) {
    super();
    this.isTTY = isTTY;
  }

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void): void {
    this.output += chunk.toString();
    callback();
  }

  /**
   * Written lines without the trailing empty one.
   */
  lines(): string[] {
    const lines = this.output.split("\n");
    if (lines[lines.length - 1] === "") {
      lines.pop();
    }
    return lines;
  }

  clear(): void {
    this.output = "";
  }
}
