import dotenv from 'dotenv';
import { parseEnv } from './env.schema.js';

dotenv.config();

const _env = parseEnv(process.env);

if (!_env.success) {
  console.error('❌ Invalid Environment Variables:', _env.error.format());
  process.exit(1); // Stop the server if config is wrong
}

export const env = _env.data;
