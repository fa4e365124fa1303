/**
 * Loads .env.local first, then .env. Imported ahead of everything else so
 * that modules reading the environment at load time (the logger) see it.
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
