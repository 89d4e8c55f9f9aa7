import { ConfigService } from '@nestjs/config';

// Environment values arrive as strings; parse them here so services get real types.

export function readNumber(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export function readBoolean(config: ConfigService, key: string, fallback: boolean): boolean {
  const raw = config.get<string | boolean>(key);
  if (typeof raw === 'boolean') {
    return raw;
  }
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

export function readString(config: ConfigService, key: string, fallback: string): string {
  const raw = config.get<string>(key);
  return raw === undefined || raw === '' ? fallback : raw;
}
