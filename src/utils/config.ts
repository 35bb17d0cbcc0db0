import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { resolve, dirname, isAbsolute } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');

loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

const envSchema = z.object({
  // Runtime platform
  MESSAGING_PLATFORM: z.enum(['telegram', 'demo']).default('telegram'),

  // Telegram
  TELEGRAM_BOT_TOKEN: z.string().optional(),

  // Comma-separated user ids allowed to register FAQs. Empty = everyone.
  FAQ_ADMIN_IDS: z.string().default(''),

  // Storage
  DB_PATH: z.string().default('data/huddle.db'),

  // In-memory recent-message buffer per group
  CONTEXT_MAX_MESSAGES: z.coerce.number().int().min(1).max(10_000).default(100),

  // Infrastructure
  HEALTH_PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  HEALTH_BIND_HOST: z.string().default('127.0.0.1'),
  DEMO_PORT: z.coerce.number().int().min(0).max(65535).default(3002),
  DEMO_BIND_HOST: z.string().default('127.0.0.1'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  for (const issue of parsed.error.issues) {
    console.error(`   ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

if (parsed.data.MESSAGING_PLATFORM === 'telegram' && !parsed.data.TELEGRAM_BOT_TOKEN) {
  console.error('❌ TELEGRAM_BOT_TOKEN is required when MESSAGING_PLATFORM=telegram (or set MESSAGING_PLATFORM=demo)');
  process.exit(1);
}

const faqAdminIds = parsed.data.FAQ_ADMIN_IDS
  .split(',')
  .map((id) => id.trim())
  .filter(Boolean);

const dbPath = isAbsolute(parsed.data.DB_PATH)
  ? parsed.data.DB_PATH
  : resolve(PROJECT_ROOT, parsed.data.DB_PATH);

export const config = {
  ...parsed.data,
  DB_PATH: dbPath,
  FAQ_ADMIN_IDS: faqAdminIds,
};
export { PROJECT_ROOT };
