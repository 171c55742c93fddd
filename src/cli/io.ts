/**
 * outline-porter CLI - I/O boundary.
 *
 * The command talks to files and standard streams only through
 * {@link CliIo}, so tests can run it in-process against an in-memory fake.
 */
import { readFile, writeFile } from 'node:fs/promises';

export interface CliIo {
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
  /** Resolves to `''` when stdin is an interactive terminal. */
  readStdin(): Promise<string>;
  writeStdout(text: string): void;
}

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    return '';
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

export const nodeIo: CliIo = {
  readFile: (path) => readFile(path, 'utf8'),
  writeFile: (path, content) => writeFile(path, content, 'utf8'),
  readStdin,
  writeStdout: (text) => {
    process.stdout.write(text);
  },
};
