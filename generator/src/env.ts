/**
 * Load environment variables FIRST before anything else
 * Scripts import this file before reading configuration
 */
import dotenv from 'dotenv';
import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const generatorDir = join(__dirname, '../');

const envName = (process.env.API_DOCS_ENV || process.env.NODE_ENV || 'development').trim();
const candidateFiles = ['.env', `.env.${envName}`, `.env.${envName}.local`];

const searchDirs = [process.cwd(), generatorDir];
const loadedFiles: string[] = [];

for (const candidate of candidateFiles) {
  for (const dir of searchDirs) {
    const fullPath = join(dir, candidate);
    if (existsSync(fullPath) && !loadedFiles.includes(fullPath)) {
      dotenv.config({ path: fullPath, override: true });
      loadedFiles.push(fullPath);
    }
  }
}

if (loadedFiles.length > 0) {
  console.log('📝 Loaded environment files:', loadedFiles.join(', '));
}

export { loadedFiles };
