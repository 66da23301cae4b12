/**
 * Line-level SSE decoding.
 *
 * Bytes arrive in arbitrary chunks; lines are handed out as soon as their
 * terminating newline has been read. A trailing partial line is held until
 * the next chunk or flush().
 */

export type SseLine =
  | { kind: "data"; payload: string }
  | { kind: "field"; name: "event" | "id" | "retry"; value: string }
  | { kind: "comment"; text: string }
  | { kind: "blank" }
  | { kind: "text"; text: string };

const FIELD_NAMES = ["event", "id", "retry"] as const;

function fieldValue(line: string, name: string): string | null {
  if (!line.startsWith(`${name}:`)) return null;
  return line.slice(name.length + 1).trim();
}

export function classifyLine(rawLine: string): SseLine {
  const line = rawLine.trim();
  if (line.length === 0) return { kind: "blank" };

  const data = fieldValue(line, "data");
  if (data !== null) return { kind: "data", payload: data };

  for (const name of FIELD_NAMES) {
    const value = fieldValue(line, name);
    if (value !== null) return { kind: "field", name, value };
  }

  if (line.startsWith(":")) return { kind: "comment", text: line.slice(1).trim() };
  return { kind: "text", text: line };
}

export class SseLineDecoder {
  private readonly decoder = new TextDecoder("utf-8");
  private buffer = "";

  /** Feed a chunk; returns the lines it completed. */
  push(chunk: Uint8Array): SseLine[] {
    this.buffer += this.decoder.decode(chunk, { stream: true });
    return this.drain();
  }

  /** End of input: decode what is left, including an unterminated last line. */
  flush(): SseLine[] {
    this.buffer += this.decoder.decode();
    const lines = this.drain();
    if (this.buffer.length > 0) {
      lines.push(classifyLine(this.buffer));
      this.buffer = "";
    }
    return lines;
  }

  private drain(): SseLine[] {
    const lines: SseLine[] = [];
    let newline = this.buffer.indexOf("\n");
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, "");
      this.buffer = this.buffer.slice(newline + 1);
      lines.push(classifyLine(line));
      newline = this.buffer.indexOf("\n");
    }
    return lines;
  }
}
