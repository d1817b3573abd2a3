/**
 * Configuration loader
 * This MUST be imported before any other modules to ensure
 * environment variables are loaded before they are accessed
 */

import { config } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const envPath = join(__dirname, '..', '.env');

// Load .env from the project directory (not current working directory)
config({ path: envPath });

if (process.env.LOG_LEVEL === 'debug') {
  console.error('[alert-ticket] Loaded .env from:', envPath);
  console.error('[alert-ticket] MCP servers configured:',
    Object.keys(process.env).filter(k => k.endsWith('_MCP_TRANSPORT')));
}
