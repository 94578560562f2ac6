/**
 * Environment loader - import before anything that reads DUBBING_* or API keys.
 *
 * Files are resolved against the project root rather than the working
 * directory, so `npm run dub` from a subfolder still finds them. Earlier files
 * win: DUBBING_ENV_FILE, then .env.local, then .env. Variables already set in
 * the process are never overwritten.
 */
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { parse } from 'dotenv';

export const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

const DEFAULT_PORT = 3001;

export function envFileCandidates(rootDir: string, env: NodeJS.ProcessEnv = process.env): string[] {
  const candidates = [path.join(rootDir, '.env.local'), path.join(rootDir, '.env')];
  const explicit = env.DUBBING_ENV_FILE;
  if (explicit) {
    candidates.unshift(path.resolve(rootDir, explicit));
  }
  return candidates;
}

/**
 * Load the env files that exist into `env`; returns the ones read
 */
export function loadEnvFiles(rootDir: string = PROJECT_ROOT, env: NodeJS.ProcessEnv = process.env): string[] {
  const loaded: string[] = [];
  for (const file of envFileCandidates(rootDir, env)) {
    if (!fs.existsSync(file)) continue;
    const parsed = parse(fs.readFileSync(file));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
    loaded.push(file);
  }
  return loaded;
}

export function serverPort(env: NodeJS.ProcessEnv = process.env): number {
  const port = Number(env.PORT);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_PORT;
}

export const loadedEnvFiles = loadEnvFiles();
