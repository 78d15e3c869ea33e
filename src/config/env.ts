import type { ChimeinProvider } from './types.js';

export interface ChimeinEnv extends NodeJS.ProcessEnv {
  CHIMEIN_CONFIG_PATH?: string;
  CHIMEIN_MODEL_PROVIDER?: string;
  CHIMEIN_MODEL_BASE_URL?: string;
  CHIMEIN_MODEL_DEFAULT?: string;
  CHIMEIN_MODEL_FAST?: string;
  CHIMEIN_ATTENTION_ENABLED?: string;
  CHIMEIN_COMMAND_PREFIXES?: string;
  CHIMEIN_IMMERSIVE_ENABLED?: string;
  CHIMEIN_IMMERSIVE_TTL_MS?: string;
  CHIMEIN_PROACTIVE_ENABLED?: string;
  CHIMEIN_PROACTIVE_DELAY_MS?: string;
  CHIMEIN_PROACTIVE_REARM?: string;
}

const parseBoolEnv = (value: string | undefined): boolean | undefined => {
  if (value === undefined) return undefined;
  const v = value.trim().toLowerCase();
  if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true;
  if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false;
  return undefined;
};

export const parseBoolEnvStrict = (
  value: string | undefined,
  label: string,
): boolean | undefined => {
  const parsed = parseBoolEnv(value);
  if (value !== undefined && parsed === undefined) {
    throw new Error(`Invalid ${label}: expected true/false/1/0/yes/no/on/off`);
  }
  return parsed;
};

/** Comma-separated list; single or double quotes keep commas inside an item. */
export const parseCsvEnv = (value: string | undefined, label: string): string[] | undefined => {
  if (value === undefined) return undefined;
  const out: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let quoted = false;
  const flush = (): void => {
    const item = quoted ? current : current.trim();
    if (item) out.push(item);
    current = '';
    quoted = false;
  };
  for (const ch of value) {
    if (quote) {
      if (ch === quote) quote = null;
      else current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      quoted = true;
      current = current.trim();
      continue;
    }
    if (ch === ',') {
      flush();
      continue;
    }
    if (quoted && /\s/u.test(ch)) continue;
    current += ch;
  }
  if (quote) {
    throw new Error(`Invalid ${label}: unclosed quote in comma-separated list`);
  }
  flush();
  return out;
};

export const parseIntEnv = (value: string | undefined, label: string): number | undefined => {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  const n = Number(trimmed);
  if (!trimmed || !Number.isInteger(n)) {
    throw new Error(`Invalid ${label}: expected an integer (got "${value}")`);
  }
  return n;
};

const normalizeProviderBaseUrl = (raw: string | undefined, label: string): string | undefined => {
  const value = raw?.trim();
  if (!value) return undefined;
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch (_err) {
    throw new Error(`Invalid ${label}: expected a valid http(s) URL`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Invalid ${label}: expected a valid http(s) URL`);
  }
  return parsed.toString().replace(/\/+$/u, '');
};

export const resolveProvider = (
  providerRaw: string | undefined,
  baseUrlRaw?: string | undefined,
): ChimeinProvider => {
  const provider = (providerRaw ?? 'anthropic').trim().toLowerCase();
  const baseUrl = normalizeProviderBaseUrl(baseUrlRaw, 'model.base_url');
  switch (provider) {
    case 'anthropic':
      return { kind: 'anthropic' };
    case 'openrouter':
      return { kind: 'openai-compatible', baseUrl: 'https://openrouter.ai/api/v1' };
    case 'openai':
      return { kind: 'openai-compatible', baseUrl: 'https://api.openai.com/v1' };
    case 'ollama':
      return { kind: 'openai-compatible', baseUrl: 'http://localhost:11434/v1' };
    case 'openai-compatible':
    case 'openai_compatible':
      return baseUrl ? { kind: 'openai-compatible', baseUrl } : { kind: 'openai-compatible' };
    default:
      throw new Error(
        `Unknown model provider "${providerRaw ?? ''}" (expected one of: anthropic, openrouter, openai, ollama, openai-compatible)`,
      );
  }
};

export const nonEmptyTrimmed = (value: string | undefined): string | undefined => {
  const v = value?.trim();
  return v ? v : undefined;
};

export const assertModelName = (label: string, value: string): void => {
  const visible = [...value].every((ch) => {
    const code = ch.codePointAt(0) ?? 0;
    return code >= 0x20 && code !== 0x7f;
  });
  if (!value || value.length > 200 || /\s/u.test(value) || !visible) {
    throw new Error(
      `Invalid ${label}: expected 1-200 visible non-whitespace characters (got "${value}")`,
    );
  }
};

export const assertIntInRange = (label: string, value: number, min: number, max: number): void => {
  if (!Number.isFinite(value)) throw new Error(`${label} must be a finite number`);
  if (!Number.isInteger(value)) throw new Error(`${label} must be an integer`);
  if (value < min || value > max) throw new Error(`${label} must be between ${min} and ${max}`);
};
