import { createInterface } from "node:readline";
import { Writable } from "node:stream";

export class PromptCancelledError extends Error {
  constructor() {
    super("Cancelled.");
    this.name = "PromptCancelledError";
  }
}

export interface PromptStreams {
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
}

/**
 * Ask for a password without echoing it. Resolves with the trimmed first line;
 * rejects with PromptCancelledError on Ctrl-C or end of input.
 */
export function promptHidden(question: string, streams: PromptStreams = {}): Promise<string> {
  const input = streams.input ?? process.stdin;
  const output = streams.output ?? process.stderr;
  const terminal = input.isTTY === true;

  // readline echoes keystrokes to its output; give it one that drops them.
  const muted = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });

  output.write(question);

  const rl = createInterface({ input, output: muted, terminal });

  return new Promise((res, rej) => {
    let answered = false;

    rl.once("line", (line) => {
      answered = true;
      rl.close();
      if (terminal) output.write("\n");
      res(line.trim());
    });

    rl.once("SIGINT", () => {
      rl.close();
    });

    rl.once("close", () => {
      if (!answered) rej(new PromptCancelledError());
    });
  });
}
