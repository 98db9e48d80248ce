import { createInterface, Interface } from 'readline';
import { z } from 'zod';
import { InputClosedError } from '../../types/errors';
import { validateInput } from '../validation/schemas';

/**
 * Line-based console boundary. The session only talks to the user through this,
 * so tests can drive it with canned answers.
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  print(line?: string): void;
}

interface PendingQuestion {
  resolve: (answer: string) => void;
  reject: (error: Error) => void;
}

/**
 * Prompter over stdin/stdout. Lines that arrive before a question is asked
 * (piped input) are queued rather than dropped.
 */
export class ConsolePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly queued: string[] = [];
  private pending: PendingQuestion | null = null;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on('line', (line) => this.onLine(line));
    this.rl.on('close', () => this.onClose());
  }

  ask(question: string): Promise<string> {
    const next = this.queued.shift();
    if (next !== undefined) {
      this.output.write(question);
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.reject(new InputClosedError());
    }

    this.rl.setPrompt(question);
    this.rl.prompt();
    return new Promise<string>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  print(line: string = ''): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    this.rl.close();
  }

  private onLine(line: string): void {
    const waiting = this.pending;
    if (waiting) {
      this.pending = null;
      waiting.resolve(line);
    } else {
      this.queued.push(line);
    }
  }

  private onClose(): void {
    this.closed = true;
    const waiting = this.pending;
    if (waiting) {
      this.pending = null;
      waiting.reject(new InputClosedError());
    }
  }
}

/**
 * Ask the same question until the answer passes the schema, printing the
 * validation message after each rejected answer. There is no way out other
 * than a valid answer.
 */
export async function askUntilValid<T>(
  io: Prompter,
  question: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  for (;;) {
    const answer = await io.ask(question);
    const result = validateInput(schema, answer);
    if (result.valid) {
      return result.data;
    }
    io.print(result.error);
  }
}
