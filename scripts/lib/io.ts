import { readFile } from 'node:fs/promises';

export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

/** Reads the named file, or stdin when no file is given. */
export async function readInput(file: string | null): Promise<string> {
  return file ? readFile(file, 'utf8') : readStdin();
}

export function readOption(argv: readonly string[], name: string): string | null {
  const index = argv.indexOf(name);
  if (index === -1) {
    return null;
  }
  return argv[index + 1] ?? null;
}
