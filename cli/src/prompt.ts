import type { Readable, Writable } from "node:stream";
import { createInterface, type Interface } from "node:readline";
import prompts from "prompts";
import {
  describeLoopEvent,
  KeyLookupError,
  type CandidateSource,
  type SelectionSource,
  type StoredKey,
} from "@pgp-mfa/core";

/** Terminal side of a challenge: picking the key and reading solutions. */
export interface ChallengeIo {
  selectKey: SelectionSource;
  readCandidate: CandidateSource;
  /** Release the input once the challenge is over. */
  close?(): void;
}

export interface TerminalStreams {
  input?: Readable & { isTTY?: boolean };
  output?: Writable;
}

const SOLUTION_PROMPT = describeLoopEvent({ type: "prompt", attempts: 0 });

export function keyChoiceTitle(key: StoredKey, index: number): string {
  return `[${index}]: ${key.fingerprint} (imported ${key.createdAt.toISOString()})`;
}

/**
 * Line-by-line reader over a stream. Resolves null once the stream has ended
 * and every buffered line was handed out; rejects with the stream's error.
 */
export class LineReader {
  private readonly buffered: string[] = [];
  private ended = false;
  private failed = false;
  private failure: unknown;
  private waiter: { resolve(line: string | null): void; reject(err: unknown): void } | null = null;
  private readonly rl: Interface;

  constructor(input: Readable) {
    this.rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
    this.rl.on("line", (line) => {
      this.buffered.push(line);
      this.settle();
    });
    this.rl.on("close", () => {
      this.ended = true;
      this.settle();
    });
    const fail = (err: unknown) => {
      if (this.failed) return;
      this.failed = true;
      this.failure = err;
      this.settle();
    };
    this.rl.on("error", fail);
    input.on("error", fail);
  }

  read(): Promise<string | null> {
    if (this.waiter) {
      return Promise.reject(new Error("a line is already being read"));
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
      this.settle();
    });
  }

  close(): void {
    this.rl.close();
  }

  private settle(): void {
    const waiter = this.waiter;
    if (!waiter) return;

    const line = this.buffered.shift();
    if (line !== undefined) {
      this.waiter = null;
      waiter.resolve(line);
    } else if (this.failed) {
      this.waiter = null;
      waiter.reject(this.failure);
    } else if (this.ended) {
      this.waiter = null;
      waiter.resolve(null);
    }
  }
}

function noKeySelected(): KeyLookupError {
  return new KeyLookupError("invalid_selection", "no key selected");
}

async function promptKeySelection(
  candidates: readonly StoredKey[],
  streams: Required<TerminalStreams>
): Promise<number> {
  const response = await prompts(
    {
      type: "select",
      name: "choice",
      message: "select a key",
      choices: candidates.map((key, index) => ({ title: keyChoiceTitle(key, index), value: index })),
      initial: 0,
      stdin: streams.input,
      stdout: streams.output,
    },
    { onCancel: () => false }
  );

  const choice: unknown = response.choice;
  if (typeof choice !== "number") {
    throw noKeySelected();
  }
  return choice;
}

async function promptSolution(streams: Required<TerminalStreams>): Promise<string | null> {
  const response = await prompts(
    {
      type: "password",
      name: "solution",
      message: SOLUTION_PROMPT,
      stdin: streams.input,
      stdout: streams.output,
    },
    { onCancel: () => false }
  );

  const solution: unknown = response.solution;
  return typeof solution === "string" ? solution : null;
}

/**
 * Interactive menus and a hidden prompt on a terminal; plain lines when the
 * input is piped, so a closed pipe ends the challenge.
 */
export function createTerminalIo(streams: TerminalStreams = {}): ChallengeIo {
  const resolved = { input: streams.input ?? process.stdin, output: streams.output ?? process.stderr };

  if (resolved.input.isTTY) {
    return {
      selectKey: (candidates) => promptKeySelection(candidates, resolved),
      readCandidate: () => promptSolution(resolved),
    };
  }

  let reader: LineReader | null = null;
  const nextLine = () => {
    reader ??= new LineReader(resolved.input);
    return reader.read();
  };

  return {
    async selectKey(candidates) {
      candidates.forEach((key, index) => resolved.output.write(`${keyChoiceTitle(key, index)}\n`));
      resolved.output.write("select a key: ");
      const line = await nextLine();
      if (line === null) throw noKeySelected();
      return line;
    },
    readCandidate() {
      resolved.output.write(`${SOLUTION_PROMPT}: `);
      return nextLine();
    },
    close() {
      reader?.close();
    },
  };
}
