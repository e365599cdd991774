import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, join, relative, sep } from 'node:path';
import { OutputError } from './errors.js';

const strictDecoder = new TextDecoder('utf-8', { fatal: true });
const lenientDecoder = new TextDecoder('utf-8');

export interface SourceText {
  text: string;
  /** True when undecodable bytes were replaced with U+FFFD */
  lossy: boolean;
}

export function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/** Recursively lists files ending in `extension`, depth first, entries in name order. */
export function listSourceFiles(dir: string, extension: string, acc: string[] = []): string[] {
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      listSourceFiles(fullPath, extension, acc);
    } else if (entry.isFile() && entry.name.endsWith(extension)) {
      acc.push(fullPath);
    }
  }
  return acc;
}

export function readSourceFile(path: string): SourceText {
  const bytes = readFileSync(path);
  try {
    return { text: strictDecoder.decode(bytes), lossy: false };
  } catch {
    return { text: lenientDecoder.decode(bytes), lossy: true };
  }
}

export function toDisplayPath(rootDir: string, file: string): string {
  const rel = relative(rootDir, file);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
    return file.split(sep).join('/');
  }
  return rel.split(sep).join('/');
}

/** Writes the whole report in one call, creating the parent directory when missing. */
export function writeReport(outputPath: string, content: string): void {
  try {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, content, 'utf-8');
  } catch (error) {
    throw new OutputError(`Unable to write ${outputPath}`, {
      cause: error instanceof Error ? error.message : String(error)
    });
  }
}

export function readExistingReport(outputPath: string): string | null {
  if (!existsSync(outputPath)) {
    return null;
  }
  return readFileSync(outputPath, 'utf-8');
}
