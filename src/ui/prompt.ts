import * as readline from 'readline';
import { Writable } from 'stream';

/**
 * Raised to every pending question once input ends (Ctrl+D, Ctrl+C or a
 * closed pipe).
 */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export interface Prompter {
  ask(question: string): Promise<string>;
  /** Like ask(), but the typed characters are not echoed. */
  askSecret(question: string): Promise<string>;
  close(): void;
}

/**
 * Pass-through to the real output that can be silenced while a secret is
 * being typed.
 */
class MutableWritable extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

interface Waiter {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

/**
 * Line-oriented prompter over readline. Lines that arrive before a question
 * is asked are queued, so piped input works the same as a terminal.
 */
export function createPrompter(
  input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const sink = new MutableWritable(output);
  const rl = readline.createInterface({
    input,
    output: sink,
    terminal: input.isTTY === true,
  });

  const queued: string[] = [];
  const waiting: Waiter[] = [];
  let closed = false;

  rl.on('line', (line) => {
    const waiter = waiting.shift();
    if (waiter) {
      waiter.resolve(line);
    } else {
      queued.push(line);
    }
  });

  rl.on('SIGINT', () => rl.close());

  rl.on('close', () => {
    closed = true;
    for (const waiter of waiting.splice(0)) {
      waiter.reject(new InputClosedError());
    }
  });

  const nextLine = (): Promise<string> => {
    const line = queued.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (closed) {
      return Promise.reject(new InputClosedError());
    }
    return new Promise<string>((resolve, reject) => {
      waiting.push({ resolve, reject });
    });
  };

  return {
    ask(question: string): Promise<string> {
      if (!closed) {
        rl.setPrompt(question);
        rl.prompt();
      }
      return nextLine();
    },

    async askSecret(question: string): Promise<string> {
      output.write(question);
      sink.muted = true;
      try {
        return await nextLine();
      } finally {
        sink.muted = false;
        output.write('\n');
      }
    },

    close(): void {
      rl.close();
    },
  };
}
