/**
 * Configuration constants
 */

import { config } from 'dotenv';
import path from 'node:path';

// Load environment variables before reading them
config();

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min = 1): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= min ? n : fallback;
}

function readFloat(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= min && n <= max ? n : fallback;
}

function readFlag(env: Env, key: string): boolean {
  const v = (env[key] ?? '').trim().toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function loadConfig(env: Env = process.env) {
  const dataDir = env.DATA_DIR?.trim() || './data';

  return {
    APP_NAME: 'PDF Hint Tutor',
    OPENAI_API_KEY: env.OPENAI_API_KEY?.trim() || undefined,

    // Model settings are passed straight through to the gateway
    MODEL_NAME: env.MODEL_NAME?.trim() || 'gpt-4o-mini',
    TEMPERATURE: readFloat(env, 'TEMPERATURE', 0.7, 0, 2),
    TOP_P: readFloat(env, 'TOP_P', 0.9, 0, 1),
    MAX_OUTPUT_TOKENS: readInt(env, 'MAX_OUTPUT_TOKENS', 1024),

    // Conversation bounds
    MAX_HISTORY_LENGTH: readInt(env, 'MAX_HISTORY_LENGTH', 20),
    SESSION_TIMEOUT_MINUTES: readInt(env, 'SESSION_TIMEOUT_MINUTES', 60),
    SESSION_SWEEP_INTERVAL_SECONDS: readInt(env, 'SESSION_SWEEP_INTERVAL_SECONDS', 60),

    // Characters of serialized corpus allowed into one request
    MAX_KNOWLEDGE_CHARS: readInt(env, 'MAX_KNOWLEDGE_CHARS', 200_000),

    HOST: env.HOST?.trim() || '0.0.0.0',
    PORT: readInt(env, 'PORT', 8000),

    DATA_DIR: dataDir,
    MATERIALS_DIR: env.PDF_MATERIALS_DIR?.trim() || path.join(dataDir, 'pdfs', 'materials'),
    ASSIGNMENTS_DIR: env.PDF_ASSIGNMENTS_DIR?.trim() || path.join(dataDir, 'pdfs', 'assignments'),
    STATIC_DIR: env.STATIC_DIR?.trim() || './static',

    DEBUG: readFlag(env, 'DEBUG'),
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const CONFIG: AppConfig = loadConfig();
