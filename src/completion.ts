/**
 * Reply-completion policies for the agent process bridge.
 *
 * The agent writes its reply incrementally; a policy decides when the reply
 * for the current turn is finished:
 *
 *   prompt      the agent prints its input prompt again (a line starting
 *               with the marker, or a trailing bare marker awaiting input)
 *   sentinel    the agent prints a line that is exactly the marker
 *   quiescence  no output for a fixed window after the first output
 *
 * A detector is created per turn and is fed decoded output chunks. A marker
 * seen before any reply text (a prompt left over from startup) does not end
 * the reply.
 */

export interface CompletedReply {
  reply: string;
  /** Output that followed the completion signal in the same chunk. */
  remainder: string;
}

export interface CompletionDetector {
  /** Feed output. Returns the reply once this chunk completes it. */
  push(chunk: string): CompletedReply | null;
  /** Idle window after which `flush` ends the reply; null if the policy has none. */
  readonly idleMs: number | null;
  /** End the reply with what has been seen so far, if anything. */
  flush(): CompletedReply | null;
}

export interface CompletionPolicy {
  readonly name: string;
  createDetector(): CompletionDetector;
}

type LineTest = (line: string) => boolean;

class LineDetector implements CompletionDetector {
  readonly idleMs = null;
  private lines: string[] = [];
  private partial = "";

  constructor(
    private readonly endsReply: LineTest,
    private readonly endsReplyPartial: LineTest,
  ) {}

  push(chunk: string): CompletedReply | null {
    const text = this.partial + chunk.replace(/\r\n/g, "\n");
    const parts = text.split("\n");
    this.partial = parts.pop() ?? "";

    for (let i = 0; i < parts.length; i++) {
      const line = parts[i];
      if (this.endsReply(line)) {
        // A marker before any reply text is a leftover prompt
        if (this.collected() === "") {
          this.lines = [];
          continue;
        }
        const rest = parts.slice(i + 1);
        rest.push(this.partial);
        return { reply: this.collected(), remainder: rest.join("\n") };
      }
      this.lines.push(line);
    }

    if (this.partial !== "" && this.endsReplyPartial(this.partial)) {
      this.partial = "";
      if (this.collected() === "") {
        this.lines = [];
        return null;
      }
      return { reply: this.collected(), remainder: "" };
    }
    return null;
  }

  flush(): CompletedReply | null {
    return null;
  }

  private collected(): string {
    return this.lines.join("\n").trim();
  }
}

/** Reply ends when the agent shows its input prompt again. */
export class PromptMarkerPolicy implements CompletionPolicy {
  readonly name = "prompt";

  constructor(private readonly marker: string = ">") {}

  createDetector(): CompletionDetector {
    const marker = this.marker;
    return new LineDetector(
      (line) => line.trim().startsWith(marker),
      (partial) => partial.trim() === marker,
    );
  }
}

/** Reply ends at a line that is exactly the marker. */
export class SentinelPolicy implements CompletionPolicy {
  readonly name = "sentinel";

  constructor(private readonly marker: string) {
    if (marker.trim() === "") {
      throw new Error("Sentinel marker must not be blank");
    }
  }

  createDetector(): CompletionDetector {
    const marker = this.marker.trim();
    return new LineDetector(
      (line) => line.trim() === marker,
      () => false,
    );
  }
}

class QuiescenceDetector implements CompletionDetector {
  private buffer = "";

  constructor(readonly idleMs: number) {}

  push(chunk: string): CompletedReply | null {
    this.buffer += chunk;
    return null;
  }

  flush(): CompletedReply | null {
    const reply = this.buffer.trim();
    if (reply === "") return null;
    this.buffer = "";
    return { reply, remainder: "" };
  }
}

/** Reply ends after `idleMs` without further output. */
export class QuiescencePolicy implements CompletionPolicy {
  readonly name = "quiescence";

  constructor(private readonly idleMs: number) {
    if (idleMs <= 0) {
      throw new Error("Quiescence window must be positive");
    }
  }

  createDetector(): CompletionDetector {
    return new QuiescenceDetector(this.idleMs);
  }
}

export function createCompletionPolicy(
  mode: "prompt" | "quiescence" | "sentinel",
  options: { marker: string; quiescenceMs: number },
): CompletionPolicy {
  switch (mode) {
    case "prompt":
      return new PromptMarkerPolicy(options.marker);
    case "sentinel":
      return new SentinelPolicy(options.marker);
    case "quiescence":
      return new QuiescencePolicy(options.quiescenceMs);
  }
}
