/**
 * Environment Preloader
 *
 * Must be the first import of chat.ts: ES modules hoist imports, so this
 * loads .env (and .env.local overrides) before the config is read.
 */

import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

console.log('[cli] Loaded env from .env.local / .env');
