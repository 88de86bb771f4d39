import { fileURLToPath } from 'node:url';
import { join } from 'node:path';

// Two levels up from src/lib (or dist/lib once built).
export const PROJECT_ROOT = fileURLToPath(new URL('../../', import.meta.url));

export const DATA_DIR = join(PROJECT_ROOT, 'data');
export const PROMPTS_DIR = join(PROJECT_ROOT, 'prompts');
export const PUBLIC_DIR = join(PROJECT_ROOT, 'public');
