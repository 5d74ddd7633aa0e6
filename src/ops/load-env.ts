import { config } from 'dotenv';
import { resolve } from 'path';
import fs from 'fs';

const ENV_FILES = ['.env.local', '.env'];

/**
 * Loads the first env file found in `cwd`. Variables already set in the
 * process environment win. Returns the file used, if any.
 */
export const loadEnv = (cwd: string = process.cwd()): string | undefined => {
  const path = ENV_FILES.map((file) => resolve(cwd, file)).find((candidate) => fs.existsSync(candidate));
  if (!path) return undefined;

  const { error } = config({ path });
  if (error) {
    console.warn(`[Ops] Could not read ${path}:`, error.message);
    return undefined;
  }
  return path;
};
