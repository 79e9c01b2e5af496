import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(directory: string): Promise<void> {
  await fs.rm(directory, { recursive: true, force: true });
}
