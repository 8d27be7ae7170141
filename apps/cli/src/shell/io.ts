import { createInterface } from "node:readline";

export interface ShellIO {
  /** Resolves to null once input has ended. */
  question(prompt: string): Promise<string | null>;
  write(line: string): void;
}

export interface ConsoleIO extends ShellIO {
  close(): void;
}

/**
 * Line-oriented console I/O. Lines are read through the readline async
 * iterator, which buffers them, so piped input is not lost between prompts.
 */
export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ConsoleIO {
  const rl = createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    async question(prompt: string): Promise<string | null> {
      // Input may have ended while lines are still buffered
      if (closed) {
        output.write(prompt);
      } else {
        rl.setPrompt(prompt);
        rl.prompt();
      }
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    write(line: string): void {
      output.write(`${line}\n`);
    },
    close(): void {
      if (!closed) {
        rl.close();
      }
    },
  };
}
