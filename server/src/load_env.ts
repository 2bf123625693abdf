import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

/**
 * Loads the first env file found, checking ENV_FILE, then `.env.local` and `.env`
 * in the working directory and its parent. Returns the path used, if any.
 */
export function loadEnv(): string | null {
  const cwd = process.cwd();
  const candidates = [
    process.env.ENV_FILE ? path.resolve(cwd, process.env.ENV_FILE) : null,
    path.resolve(cwd, '.env.local'),
    path.resolve(cwd, '..', '.env.local'),
    path.resolve(cwd, '.env'),
    path.resolve(cwd, '..', '.env')
  ].filter((candidate): candidate is string => candidate !== null);

  const envPath = candidates.find((candidate) => fs.existsSync(candidate));
  if (!envPath) {
    return null;
  }
  dotenv.config({ path: envPath });
  return envPath;
}
