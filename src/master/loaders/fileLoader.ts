import * as path from 'path';
import * as fs from 'fs-extra';
import { fileURLToPath } from 'url';

export function canHandleUrl(baseUrl: string): boolean {
  const match = /^([a-z][a-z0-9+.-]+):\/\//i.exec(baseUrl);
  if (match && match[1].toLowerCase() !== 'file') {
    return false;
  }
  return true;
}

function solvePath(baseUrl: string): string {
  if (baseUrl.startsWith('file:')) {
    return fileURLToPath(baseUrl);
  }
  // maybe relative
  return path.resolve(process.cwd(), baseUrl);
}

async function listFilesInPath(
  basePath: string,
  thisPath: string,
  out: string[],
) {
  const finalPath = path.resolve(basePath, thisPath);
  const stat = await fs.lstat(finalPath);
  if (!stat.isDirectory()) {
    out.push(thisPath);
    return;
  }
  if (thisPath) {
    // subdirectories are not listed.
    return;
  }
  const names = (await fs.readdir(finalPath)).sort();
  for (const name of names) {
    if (!name.startsWith('.')) {
      await listFilesInPath(basePath, path.join(thisPath, name), out);
    }
  }
}

// Paths relative to `baseUrl`; a plain file lists as the single name ''.
export async function listFiles(baseUrl: string): Promise<string[]> {
  const out: string[] = [];
  await listFilesInPath(solvePath(baseUrl), '', out);
  return out;
}

export function resolveFile(baseUrl: string, filename: string): string {
  return path.resolve(solvePath(baseUrl), filename);
}

export function loadFile(baseUrl: string, filename: string): Promise<Buffer> {
  return fs.readFile(resolveFile(baseUrl, filename));
}
