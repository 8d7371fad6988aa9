import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';

// Загрузка .env из корня репозитория до создания логгеров (skip in test environment)
const isTestEnv = process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);

if (!isTestEnv) {
  dotenv.config({ path: fileURLToPath(new URL('../../../.env', import.meta.url)) });
}
